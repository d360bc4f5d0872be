export { splitRecords, DEFAULT_RECORD_SEPARATOR } from './record-splitter.js';
export { parseEntry, parseEntries, contentHash, stripBom } from './entry-parser.js';
export { DEFAULT_METADATA_MATCHERS, firstMatch, type FieldMatcher, type MetadataMatchers } from './metadata/matchers.js';
export { parseTimestampToEpoch } from './metadata/timestamp.js';
export { normalizeForCompare, splitClauses, isMostlyCjk, CJK_RATIO_THRESHOLD } from './text-pipeline/normalizer.js';
export {
  isExactMatch,
  isSubset,
  isNearEqual,
  similarityRatio,
  hasClauseOverlap,
  rangesOverlap,
  isTimeClose,
  NEAR_EQUAL_MIN_LENGTH,
  DEFAULT_LOCATION_TOLERANCE,
  DEFAULT_TIME_TOLERANCE_SECONDS
} from './similarity.js';
export {
  DuplicateClassifier,
  DEFAULT_DUPLICATE_THRESHOLDS,
  DEFAULT_MIN_CLAUSE_LENGTH,
  validateThresholds,
  type DuplicateDecision,
  type DuplicateReason,
  type DuplicateClassifierOptions
} from './duplicate-classifier.js';
export {
  deduplicateByDocument,
  groupByDocument,
  compareForDigest,
  toDocuments,
  type GroupingOptions,
  type GroupingResult
} from './grouping.js';
