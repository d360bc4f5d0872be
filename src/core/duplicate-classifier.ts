import type { DuplicateThresholds } from '../types/config.js';
import type { Entry } from '../types/entry.js';
import { DecisionTrace } from '../utils/logger.js';
import {
  DEFAULT_LOCATION_TOLERANCE,
  DEFAULT_TIME_TOLERANCE_SECONDS,
  hasClauseOverlap,
  isNearEqual,
  isSubset,
  isTimeClose,
  rangesOverlap
} from './similarity.js';

export const DEFAULT_MIN_CLAUSE_LENGTH = 12;

export const DEFAULT_DUPLICATE_THRESHOLDS: Readonly<DuplicateThresholds> = {
  clauseRatio: 0.92,
  clauseRatioTimeClose: 0.88,
  subsetMinLengthOverlap: 12,
  subsetMinLength: 16,
  subsetMinLengthTimeClose: 10,
  nearEqualOverlap: 0.9,
  nearEqual: 0.95,
  nearEqualTimeClose: 0.92
};

export type DuplicateReason =
  | 'empty-body'
  | 'exact'
  | 'overlap+clause'
  | 'overlap+subset'
  | 'overlap+near-equal'
  | 'clause'
  | 'subset'
  | 'near-equal'
  | 'distinct';

export type DuplicateDecision = {
  duplicate: boolean;
  reason: DuplicateReason;
  overlap: boolean;
  timeClose: boolean;
};

export interface DuplicateClassifierOptions {
  thresholds?: Partial<DuplicateThresholds>;
  timeToleranceSeconds?: number;
  minClauseLength?: number;
  locationTolerance?: number;
  trace?: DecisionTrace;
}

export function validateThresholds(t: DuplicateThresholds): void {
  const ratios: (keyof DuplicateThresholds)[] = [
    'clauseRatio',
    'clauseRatioTimeClose',
    'nearEqualOverlap',
    'nearEqual',
    'nearEqualTimeClose'
  ];
  for (const key of ratios) {
    const v = t[key];
    if (!Number.isFinite(v) || v < 0 || v > 1) {
      throw new Error(`Invalid threshold ${key}: ${v} (expected a ratio between 0 and 1)`);
    }
  }
  const lengths: (keyof DuplicateThresholds)[] = [
    'subsetMinLengthOverlap',
    'subsetMinLength',
    'subsetMinLengthTimeClose'
  ];
  for (const key of lengths) {
    const v = t[key];
    if (!Number.isInteger(v) || v < 0) {
      throw new Error(`Invalid threshold ${key}: ${v} (expected a non-negative integer)`);
    }
  }
  if (t.clauseRatioTimeClose > t.clauseRatio) {
    throw new Error('clauseRatioTimeClose must not be stricter than clauseRatio');
  }
  if (t.subsetMinLengthTimeClose > t.subsetMinLength) {
    throw new Error('subsetMinLengthTimeClose must not be stricter than subsetMinLength');
  }
  if (t.nearEqualTimeClose > t.nearEqual) {
    throw new Error('nearEqualTimeClose must not be stricter than nearEqual');
  }
  if (t.nearEqualOverlap > t.nearEqualTimeClose) {
    throw new Error('nearEqualOverlap must not be stricter than nearEqualTimeClose');
  }
}

/**
 * Decides whether two same-kind entries capture the same passage.
 *
 * Location overlap and timestamp proximity are corroborating signals: each
 * lowers the textual bar, and with neither present the text has to be
 * near-identical.
 */
export class DuplicateClassifier {
  readonly thresholds: Readonly<DuplicateThresholds>;
  private readonly timeToleranceSeconds: number;
  private readonly minClauseLength: number;
  private readonly locationTolerance: number;
  private readonly trace: DecisionTrace;

  constructor(options: DuplicateClassifierOptions = {}) {
    const thresholds = { ...DEFAULT_DUPLICATE_THRESHOLDS, ...options.thresholds };
    validateThresholds(thresholds);
    this.thresholds = thresholds;
    this.timeToleranceSeconds = options.timeToleranceSeconds ?? DEFAULT_TIME_TOLERANCE_SECONDS;
    this.minClauseLength = options.minClauseLength ?? DEFAULT_MIN_CLAUSE_LENGTH;
    this.locationTolerance = options.locationTolerance ?? DEFAULT_LOCATION_TOLERANCE;
    this.trace = options.trace ?? new DecisionTrace(false);
  }

  isDuplicate(candidate: Entry, kept: Entry): boolean {
    return this.classify(candidate, kept).duplicate;
  }

  classify(candidate: Entry, kept: Entry): DuplicateDecision {
    const a = candidate.normalizedBody;
    const b = kept.normalizedBody;
    const t = this.thresholds;

    if (!a || !b) {
      return { duplicate: false, reason: 'empty-body', overlap: false, timeClose: false };
    }
    if (candidate.contentHash === kept.contentHash && a === b) {
      return this.decide(candidate, kept, true, 'exact', false, false);
    }

    const overlap = rangesOverlap(candidate.location, kept.location, this.locationTolerance);
    const timeClose = isTimeClose(candidate.timestampEpoch, kept.timestampEpoch, this.timeToleranceSeconds);
    const clauseMatch = hasClauseOverlap(
      candidate.clauses,
      kept.clauses,
      this.minClauseLength,
      timeClose ? t.clauseRatioTimeClose : t.clauseRatio
    );

    const looseSubsetMin = timeClose ? t.subsetMinLengthTimeClose : t.subsetMinLength;

    if (overlap) {
      if (clauseMatch) return this.decide(candidate, kept, true, 'overlap+clause', overlap, timeClose);
      // Overlap never raises the floor above what time proximity alone allows.
      const subsetMin = Math.min(t.subsetMinLengthOverlap, looseSubsetMin);
      if (isSubset(a, b, subsetMin)) {
        return this.decide(candidate, kept, true, 'overlap+subset', overlap, timeClose);
      }
      if (isNearEqual(a, b, t.nearEqualOverlap)) {
        return this.decide(candidate, kept, true, 'overlap+near-equal', overlap, timeClose);
      }
      return this.decide(candidate, kept, false, 'distinct', overlap, timeClose);
    }

    if (clauseMatch) return this.decide(candidate, kept, true, 'clause', overlap, timeClose);
    if (isSubset(a, b, looseSubsetMin)) {
      return this.decide(candidate, kept, true, 'subset', overlap, timeClose);
    }
    if (isNearEqual(a, b, timeClose ? t.nearEqualTimeClose : t.nearEqual)) {
      return this.decide(candidate, kept, true, 'near-equal', overlap, timeClose);
    }
    return this.decide(candidate, kept, false, 'distinct', overlap, timeClose);
  }

  private decide(
    candidate: Entry,
    kept: Entry,
    duplicate: boolean,
    reason: DuplicateReason,
    overlap: boolean,
    timeClose: boolean
  ): DuplicateDecision {
    if (this.trace.active) {
      this.trace.log(
        `#${candidate.sequenceIndex} vs #${kept.sequenceIndex}:`,
        duplicate ? 'dup' : 'keep',
        reason,
        `(overlap=${overlap}, timeClose=${timeClose})`
      );
    }
    return { duplicate, reason, overlap, timeClose };
  }
}
