import type { DigestConfig, ResolvedDigestConfig } from './types/config.js';
import type { Entry } from './types/entry.js';
import type { DigestOutput, DigestStats } from './types/output.js';
import { DEFAULT_DUPLICATE_THRESHOLDS, DEFAULT_MIN_CLAUSE_LENGTH, DuplicateClassifier, validateThresholds } from './core/duplicate-classifier.js';
import { parseEntries } from './core/entry-parser.js';
import { deduplicateByDocument, type GroupingResult } from './core/grouping.js';
import { DEFAULT_RECORD_SEPARATOR, splitRecords } from './core/record-splitter.js';
import { DEFAULT_LOCATION_TOLERANCE, DEFAULT_TIME_TOLERANCE_SECONDS } from './core/similarity.js';
import { consoleLogger, debugEnvEnabled, DecisionTrace } from './utils/logger.js';

export type PresetName = 'balanced' | 'strict' | 'lenient';

export const ConfigPresets: Record<PresetName, DigestConfig> = {
  /**
   * Defaults: five-minute re-capture window, 12-character clauses
   */
  balanced: {},

  /**
   * No temporal relaxation; only location overlap may loosen the bar
   */
  strict: {
    timeToleranceSeconds: 0,
    minClauseLength: 16
  },

  /**
   * Wide re-capture window for exports merged from several devices
   */
  lenient: {
    timeToleranceSeconds: 1800,
    minClauseLength: 10,
    locationTolerance: 16
  }
};

function assertNonNegative(name: string, value: number): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new Error(`Invalid ${name}: ${value} (expected a non-negative number)`);
  }
}

export function resolveConfig(config: DigestConfig = {}): ResolvedDigestConfig {
  const resolved: ResolvedDigestConfig = {
    timeToleranceSeconds: config.timeToleranceSeconds ?? DEFAULT_TIME_TOLERANCE_SECONDS,
    minClauseLength: config.minClauseLength ?? DEFAULT_MIN_CLAUSE_LENGTH,
    locationTolerance: config.locationTolerance ?? DEFAULT_LOCATION_TOLERANCE,
    recordSeparator: config.recordSeparator ?? DEFAULT_RECORD_SEPARATOR,
    debug: config.debug ?? debugEnvEnabled(),
    thresholds: { ...DEFAULT_DUPLICATE_THRESHOLDS, ...config.thresholds },
    logger: config.logger ?? consoleLogger
  };

  assertNonNegative('timeToleranceSeconds', resolved.timeToleranceSeconds);
  assertNonNegative('minClauseLength', resolved.minClauseLength);
  assertNonNegative('locationTolerance', resolved.locationTolerance);
  if (!resolved.recordSeparator.trim()) {
    throw new Error('Invalid recordSeparator: must contain non-whitespace characters');
  }
  validateThresholds(resolved.thresholds);
  return resolved;
}

export class ClippingsDigest {
  private config: ResolvedDigestConfig;

  constructor(config: DigestConfig = {}) {
    this.config = resolveConfig(config);
  }

  get settings(): Readonly<ResolvedDigestConfig> {
    return this.config;
  }

  applyPreset(preset: PresetName): this {
    const presetConfig = ConfigPresets[preset];
    if (!presetConfig) {
      throw new Error(`Unknown preset: ${preset}. Available presets: ${Object.keys(ConfigPresets).join(', ')}`);
    }
    // Diagnostics and input format are not part of a preset.
    this.config = resolveConfig({
      ...presetConfig,
      recordSeparator: this.config.recordSeparator,
      debug: this.config.debug,
      logger: this.config.logger
    });
    return this;
  }

  setDebug(enabled: boolean = true): this {
    this.config = { ...this.config, debug: enabled };
    return this;
  }

  parse(content: string): { entries: Entry[]; blocks: number; skipped: number } {
    const blocks = splitRecords(content, this.config.recordSeparator);
    const { entries, skipped } = parseEntries(blocks);
    return { entries, blocks: blocks.length, skipped };
  }

  deduplicateEntries(entries: readonly Entry[]): GroupingResult {
    const trace = new DecisionTrace(this.config.debug, this.config.logger);
    const classifier = new DuplicateClassifier({
      thresholds: this.config.thresholds,
      timeToleranceSeconds: this.config.timeToleranceSeconds,
      minClauseLength: this.config.minClauseLength,
      locationTolerance: this.config.locationTolerance,
      trace
    });
    return deduplicateByDocument(entries, { classifier, trace });
  }

  /**
   * Never throws for any input text; unusable blocks and fields degrade to
   * skipped entries or missing signals.
   */
  process(content: string): DigestOutput {
    const { entries, blocks, skipped } = this.parse(content);
    const { documents, filteredEmpty, droppedDuplicates } = this.deduplicateEntries(entries);

    let keptEntries = 0;
    for (const list of documents.values()) keptEntries += list.length;

    const stats: DigestStats = {
      blocks,
      parsedEntries: entries.length,
      skippedBlocks: skipped,
      filteredEmpty,
      droppedDuplicates,
      keptEntries,
      documents: documents.size
    };
    return { documents, stats };
  }
}

export function buildDigest(content: string, config?: DigestConfig): DigestOutput {
  return new ClippingsDigest(config).process(content);
}

export function deduplicate(content: string, config?: DigestConfig): Map<string, Entry[]> {
  return buildDigest(content, config).documents;
}

export * from './types/index.js';
export * from './core/index.js';
export { MarkdownGenerator, renderEntry } from './render/markdown-generator.js';
export { resolveCliOptions, DEFAULT_INPUT_FILE, DEFAULT_OUTPUT_FILE, type CliOptions } from './cli/options.js';
export { DecisionTrace, consoleLogger, type DigestLogger } from './utils/logger.js';
