export type { AnnotationKind, LocationRange, Entry, DeduplicatedDocument } from './entry.js';
export type { DigestStats, DigestOutput, MarkdownOptions } from './output.js';
export type {
  DuplicateThresholds,
  DigestConfig,
  ResolvedDigestConfig
} from './config.js';
