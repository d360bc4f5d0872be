type Meridiem = 'am' | 'pm' | null;

interface CalendarFields {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
  meridiem: Meridiem;
}

interface TimestampPattern {
  name: string;
  pattern: RegExp;
  extract(m: RegExpMatchArray): CalendarFields | null;
}

const MONTHS: Record<string, number> = {
  jan: 1, feb: 2, mar: 3, apr: 4, may: 5, jun: 6,
  jul: 7, aug: 8, sep: 9, oct: 10, nov: 11, dec: 12
};

function monthFromName(name: string | undefined): number | null {
  if (!name || name.length < 3) return null;
  return MONTHS[name.slice(0, 3).toLowerCase()] ?? null;
}

function toInt(value: string | undefined): number {
  return value ? Number.parseInt(value, 10) : 0;
}

function toMeridiem(value: string | undefined): Meridiem {
  if (!value) return null;
  const v = value.toLowerCase();
  if (v === '上午' || v === 'am') return 'am';
  if (v === '下午' || v === 'pm') return 'pm';
  return null;
}

const TIMESTAMP_PATTERNS: readonly TimestampPattern[] = [
  {
    // 2025年9月18日 星期四 上午11:20:48
    name: 'zh-calendar',
    pattern: /(\d{4})年\s*(\d{1,2})月\s*(\d{1,2})日.*?(上午|下午)?\s*(\d{1,2}):(\d{2}):(\d{2})/,
    extract: (m) => ({
      year: toInt(m[1]),
      month: toInt(m[2]),
      day: toInt(m[3]),
      meridiem: toMeridiem(m[4]),
      hour: toInt(m[5]),
      minute: toInt(m[6]),
      second: toInt(m[7])
    })
  },
  {
    // 2025-09-18 11:20:48, 2025/09/18T11:20:48
    name: 'iso-numeric',
    pattern: /(\d{4})[-/](\d{1,2})[-/](\d{1,2})[ T](\d{1,2}):(\d{2}):(\d{2})/,
    extract: (m) => ({
      year: toInt(m[1]),
      month: toInt(m[2]),
      day: toInt(m[3]),
      hour: toInt(m[4]),
      minute: toInt(m[5]),
      second: toInt(m[6]),
      meridiem: null
    })
  },
  {
    // Thursday, September 18, 2025 11:20:48 AM
    name: 'en-us',
    pattern: /([A-Za-z]{3,})\.?\s+(\d{1,2}),\s*(\d{4})\s+(\d{1,2}):(\d{2})(?::(\d{2}))?\s*(AM|PM)?/i,
    extract: (m) => {
      const month = monthFromName(m[1]);
      if (month === null) return null;
      return {
        year: toInt(m[3]),
        month,
        day: toInt(m[2]),
        hour: toInt(m[4]),
        minute: toInt(m[5]),
        second: toInt(m[6]),
        meridiem: toMeridiem(m[7])
      };
    }
  },
  {
    // Thursday, 18 September 2025 11:20:48
    name: 'en-gb',
    pattern: /(\d{1,2})\s+([A-Za-z]{3,})\.?\s+(\d{4})\s+(\d{1,2}):(\d{2})(?::(\d{2}))?\s*(AM|PM)?/i,
    extract: (m) => {
      const month = monthFromName(m[2]);
      if (month === null) return null;
      return {
        year: toInt(m[3]),
        month,
        day: toInt(m[1]),
        hour: toInt(m[4]),
        minute: toInt(m[5]),
        second: toInt(m[6]),
        meridiem: toMeridiem(m[7])
      };
    }
  }
];

function daysInMonth(year: number, month: number): number {
  return new Date(year, month, 0).getDate();
}

/**
 * Interprets the fields in the host's local time zone. Exports carry no
 * offset, so captures taken in another zone compare with that zone's skew.
 */
function toLocalEpochSeconds(fields: CalendarFields): number | null {
  let { hour } = fields;
  if (fields.meridiem === 'pm' && hour < 12) hour += 12;
  if (fields.meridiem === 'am' && hour === 12) hour = 0;

  const { year, month, day, minute, second } = fields;
  if (month < 1 || month > 12) return null;
  if (day < 1 || day > daysInMonth(year, month)) return null;
  if (hour > 23 || minute > 59 || second > 59) return null;

  const date = new Date(2000, 0, 1, 0, 0, 0, 0);
  date.setFullYear(year, month - 1, day);
  date.setHours(hour, minute, second, 0);
  const ms = date.getTime();
  return Number.isFinite(ms) ? Math.floor(ms / 1000) : null;
}

export function parseTimestampToEpoch(raw: string | null | undefined): number | null {
  const text = raw?.trim();
  if (!text) return null;

  for (const candidate of TIMESTAMP_PATTERNS) {
    const m = text.match(candidate.pattern);
    if (!m) continue;
    const fields = candidate.extract(m);
    if (!fields) continue;
    // A recognised layout with impossible fields is not retried against later layouts.
    return toLocalEpochSeconds(fields);
  }
  return null;
}
