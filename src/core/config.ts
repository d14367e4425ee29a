/**
 * Time source used by deadline clocks and `sleep()`.
 *
 * `schedule` returns a function that cancels the pending callback; calling it
 * after the callback ran (or twice) must be harmless.
 */
export interface Clock {
  /** Current time in epoch milliseconds. */
  now(): number;
  schedule(fn: () => void, delayMs: number): () => void;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  schedule(fn, delayMs) {
    const id = setTimeout(fn, delayMs);
    return () => clearTimeout(id);
  },
};

/** Largest delay a host timer accepts before it fires immediately instead. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

export interface ScopeConfig {
  /** Time source for deadlines and sleeps. Default: `systemClock`. */
  clock: Clock;

  /**
   * Value lookups that walk this many parent scopes warn once in dev mode.
   * Set to Infinity to disable the warning. Default: 50.
   */
  deepLookupWarnDepth: number;

  /**
   * Longest single timer a deadline clock schedules; longer deadlines re-arm
   * in steps. Default: MAX_TIMER_DELAY_MS.
   */
  maxTimerDelayMs: number;
}

const DEFAULT_CONFIG: Readonly<ScopeConfig> = {
  clock: systemClock,
  deepLookupWarnDepth: 50,
  maxTimerDelayMs: MAX_TIMER_DELAY_MS,
};

const scopeConfig: ScopeConfig = { ...DEFAULT_CONFIG };

/**
 * Configure scope runtime settings.
 *
 * Clocks are captured when a deadline is armed, so swap the clock before
 * creating the scopes that should use it.
 *
 * Example:
 * ```ts
 * configureScopes({ deepLookupWarnDepth: Infinity });
 * ```
 */
export function configureScopes(config: Partial<ScopeConfig>): void {
  if (config.deepLookupWarnDepth !== undefined) {
    const depth = config.deepLookupWarnDepth;
    if (Number.isNaN(depth) || depth < 1) {
      throw new RangeError(`[Scopeline] deepLookupWarnDepth must be >= 1, got ${depth}.`);
    }
  }
  if (config.maxTimerDelayMs !== undefined) {
    const max = config.maxTimerDelayMs;
    if (!Number.isFinite(max) || max < 1 || max > MAX_TIMER_DELAY_MS) {
      throw new RangeError(
        `[Scopeline] maxTimerDelayMs must be between 1 and ${MAX_TIMER_DELAY_MS}, got ${max}.`
      );
    }
  }
  Object.assign(scopeConfig, config);
}

export function getScopeConfig(): Readonly<ScopeConfig> {
  return { ...scopeConfig };
}

export function resetScopeConfig(): void {
  Object.assign(scopeConfig, DEFAULT_CONFIG);
}
