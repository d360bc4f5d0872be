import type { DigestConfig } from '../types/config.js';

export const DEFAULT_INPUT_FILE = 'My Clippings.txt';
export const DEFAULT_OUTPUT_FILE = 'Clipping_cleaned.md';

export interface CliOptions {
  inputPath: string;
  outputPath: string;
  config: DigestConfig;
}

function parseNonNegativeInt(value: string | undefined): number | undefined {
  if (value === undefined || !/^\s*\d+\s*$/.test(value)) return undefined;
  return Number.parseInt(value, 10);
}

function parseFlag(value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined;
  const n = parseNonNegativeInt(value);
  if (n !== undefined) return n !== 0;
  const v = value.trim().toLowerCase();
  if (v === 'true' || v === 'yes') return true;
  if (v === 'false' || v === 'no') return false;
  return undefined;
}

/**
 * Positional arguments: [in] [out] [timeTol] [clauseMinLen] [debug].
 * Environment values apply where an argument is absent; anything that does
 * not parse falls back to the library default.
 */
export function resolveCliOptions(
  argv: readonly string[],
  env: Record<string, string | undefined> = {}
): CliOptions {
  const [inputArg, outputArg, timeArg, clauseArg, debugArg] = argv;

  const config: DigestConfig = {};
  const time = parseNonNegativeInt(timeArg ?? env.CLIPPINGS_TIME_TOLERANCE);
  if (time !== undefined) config.timeToleranceSeconds = time;
  const clause = parseNonNegativeInt(clauseArg ?? env.CLIPPINGS_MIN_CLAUSE_LENGTH);
  if (clause !== undefined) config.minClauseLength = clause;
  const debug = parseFlag(debugArg ?? env.CLIPPINGS_DEBUG);
  if (debug !== undefined) config.debug = debug;
  if (env.CLIPPINGS_SEPARATOR) config.recordSeparator = env.CLIPPINGS_SEPARATOR;

  return {
    inputPath: inputArg || DEFAULT_INPUT_FILE,
    outputPath: outputArg || DEFAULT_OUTPUT_FILE,
    config
  };
}
