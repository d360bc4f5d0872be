import { createHash } from 'node:crypto';
import type { Entry } from '../types/entry.js';
import { DEFAULT_METADATA_MATCHERS, firstMatch, type MetadataMatchers } from './metadata/matchers.js';
import { parseTimestampToEpoch } from './metadata/timestamp.js';
import { normalizeForCompare, splitClauses } from './text-pipeline/normalizer.js';

export function stripBom(s: string): string {
  return s.replace(/^\uFEFF+/, '').trim();
}

export function contentHash(normalized: string): string {
  return createHash('md5').update(normalized, 'utf8').digest('hex');
}

/**
 * Parses one record block: title line, metadata line, then body lines.
 * Returns null only for blocks with fewer than two lines.
 */
export function parseEntry(
  block: string,
  sequenceIndex: number,
  matchers: MetadataMatchers = DEFAULT_METADATA_MATCHERS
): Entry | null {
  const lines = block.split('\n').map((l) => l.replace(/\r$/, ''));
  if (lines.length < 2) return null;

  const documentTitle = stripBom(lines[0] ?? '');
  const metadata = (lines[1] ?? '').trim();

  const bodyLines = lines.slice(2);
  while (bodyLines.length > 0 && !(bodyLines[0] ?? '').trim()) {
    bodyLines.shift();
  }
  const body = bodyLines.join('\n').trim();

  const location = firstMatch(matchers.location, metadata) ?? { start: null, end: null };
  const timestampRaw = firstMatch(matchers.timestamp, metadata);
  const normalizedBody = normalizeForCompare(body);

  return {
    sequenceIndex,
    documentTitle,
    metadata,
    kind: firstMatch(matchers.kind, metadata) ?? 'unknown',
    location,
    timestampRaw,
    timestampEpoch: parseTimestampToEpoch(timestampRaw),
    body,
    normalizedBody,
    contentHash: contentHash(normalizedBody),
    clauses: splitClauses(normalizedBody)
  };
}

export function parseEntries(blocks: readonly string[], matchers?: MetadataMatchers): { entries: Entry[]; skipped: number } {
  const entries: Entry[] = [];
  let skipped = 0;
  blocks.forEach((block, index) => {
    const entry = parseEntry(block, index, matchers);
    if (entry) {
      entries.push(entry);
    } else {
      skipped += 1;
    }
  });
  return { entries, skipped };
}
