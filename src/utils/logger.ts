export interface DigestLogger {
  debug(...args: unknown[]): void;
}

export const consoleLogger: DigestLogger = {
  debug: (...args: unknown[]) => console.log(...args)
};

export function debugEnvEnabled(): boolean {
  if (typeof process === 'undefined') return false;
  return process.env.CLIPPINGS_DEBUG === '1';
}

/**
 * Decision-path tracer. A no-op unless enabled; enabling it never changes
 * what the engine returns.
 */
export class DecisionTrace {
  constructor(
    private readonly enabled: boolean,
    private readonly logger: DigestLogger = consoleLogger
  ) {}

  get active(): boolean {
    return this.enabled;
  }

  log(...args: unknown[]): void {
    if (!this.enabled) return;
    this.logger.debug('[dedup]', ...args);
  }
}
