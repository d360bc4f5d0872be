const CJK_IDEOGRAPH_RE = /[\u4e00-\u9fff]/g;
const TRAILING_TERMINALS_RE = /[。！？….!?]+$/;
const CLAUSE_SPLIT_RE = /[。！？；;.!?\n]+/;

export const CJK_RATIO_THRESHOLD = 0.3;

export function isMostlyCjk(text: string, threshold: number = CJK_RATIO_THRESHOLD): boolean {
  if (!text) return false;
  const ideographs = text.match(CJK_IDEOGRAPH_RE)?.length ?? 0;
  return ideographs / Math.max(1, text.length) >= threshold;
}

/**
 * Canonical form used only for comparison, never for display.
 */
export function normalizeForCompare(text: string): string {
  if (!text) return '';
  let t = text.replace(/\r\n?/g, '\n').trim();
  t = t.replace(/\s+/g, ' ');
  // Dense scripts don't use inter-word spaces; any left are export noise.
  if (isMostlyCjk(t)) {
    t = t.replace(/\s+/g, '');
  }
  return t.replace(TRAILING_TERMINALS_RE, '').trimEnd();
}

export function splitClauses(text: string): string[] {
  if (!text) return [];
  const clauses = text
    .split(CLAUSE_SPLIT_RE)
    .map((c) => c.trim())
    .filter((c) => c.length > 0);
  if (clauses.length > 0) return clauses;
  const whole = text.trim();
  return whole ? [whole] : [];
}
