import type { DigestLogger } from '../utils/logger.js';

/**
 * Policy constants for the duplicate classifier.
 *
 * Each corroborated value (time-close, overlapping) must be no stricter than
 * its uncorroborated pair; `validateThresholds` enforces that ordering.
 */
export interface DuplicateThresholds {
  clauseRatio: number;
  clauseRatioTimeClose: number;
  subsetMinLengthOverlap: number;
  subsetMinLength: number;
  subsetMinLengthTimeClose: number;
  nearEqualOverlap: number;
  nearEqual: number;
  nearEqualTimeClose: number;
}

export interface DigestConfig {
  // Matching
  timeToleranceSeconds?: number;
  minClauseLength?: number;
  locationTolerance?: number;
  thresholds?: Partial<DuplicateThresholds>;

  // Input format
  recordSeparator?: string;

  // Diagnostics
  debug?: boolean;
  logger?: DigestLogger;
}

export type ResolvedDigestConfig = Required<Omit<DigestConfig, 'thresholds' | 'logger'>> & {
  thresholds: DuplicateThresholds;
  logger: DigestLogger;
};
