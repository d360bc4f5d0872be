import { diffChars } from 'diff';
import type { LocationRange } from '../types/entry.js';

// Ratios on shorter strings are too noisy; those only compare exactly.
export const NEAR_EQUAL_MIN_LENGTH = 8;
export const DEFAULT_LOCATION_TOLERANCE = 8;
export const DEFAULT_TIME_TOLERANCE_SECONDS = 300;

export function isExactMatch(a: string, b: string): boolean {
  return a === b;
}

export function isSubset(a: string, b: string, minLength: number): boolean {
  if (!a || !b) return false;
  if (Math.min(a.length, b.length) < minLength) return false;
  return a.includes(b) || b.includes(a);
}

/**
 * 2·M / (|a| + |b|), M being the length of a longest common subsequence of
 * characters.
 */
export function similarityRatio(a: string, b: string): number {
  const total = a.length + b.length;
  if (total === 0) return 1;
  if (!a || !b) return 0;
  let matched = 0;
  for (const part of diffChars(a, b)) {
    if (!part.added && !part.removed) matched += part.value.length;
  }
  return (2 * matched) / total;
}

export function isNearEqual(a: string, b: string, threshold: number): boolean {
  if (!a || !b) return false;
  if (Math.min(a.length, b.length) < NEAR_EQUAL_MIN_LENGTH) return a === b;
  return similarityRatio(a, b) >= threshold;
}

export function hasClauseOverlap(
  aClauses: readonly string[],
  bClauses: readonly string[],
  minClauseLength: number,
  ratio: number
): boolean {
  for (const ca of aClauses) {
    if (ca.length < minClauseLength) continue;
    for (const cb of bClauses) {
      if (cb.length < minClauseLength) continue;
      if (ca.includes(cb) || cb.includes(ca)) return true;
      if (similarityRatio(ca, cb) >= ratio) return true;
    }
  }
  return false;
}

export function rangesOverlap(
  a: Readonly<LocationRange>,
  b: Readonly<LocationRange>,
  tolerance: number = DEFAULT_LOCATION_TOLERANCE
): boolean {
  if (a.start === null || b.start === null) return false;
  const aEnd = a.end ?? a.start;
  const bEnd = b.end ?? b.start;
  return !(aEnd + tolerance < b.start || bEnd + tolerance < a.start);
}

export function isTimeClose(
  a: number | null,
  b: number | null,
  toleranceSeconds: number = DEFAULT_TIME_TOLERANCE_SECONDS
): boolean {
  if (a === null || b === null) return false;
  return Math.abs(a - b) <= toleranceSeconds;
}
