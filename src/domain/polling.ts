/**
 * Wait budget configuration.
 *
 * Asynchronous transitions have very different timing profiles: a
 * UI-driven state change may take seconds, focus convergence a few
 * seconds, and draining a stream of results only milliseconds per item.
 * A wait budget pairs a total timeout with the interval at which the
 * condition is re-evaluated.
 */

/** Progress info emitted while a condition is being polled. */
export interface WaitProgress {
  /** Number of predicate evaluations so far. */
  polls: number;
  elapsedMs: number;
  remainingMs: number;
}

export type WaitProgressCallback = (progress: WaitProgress) => void;

export interface WaitConfig {
  /** Total wall-clock budget (ms). Default: 15_000. */
  timeoutMs: number;
  /** Interval (ms) between predicate evaluations. Default: 50. */
  pollIntervalMs: number;
  /** Optional callback invoked after every unsatisfied evaluation. */
  onProgress?: WaitProgressCallback;
}

export const DEFAULT_WAIT_CONFIG: Readonly<WaitConfig> = {
  timeoutMs: 15_000,
  pollIntervalMs: 50,
};

/** Preset budgets for common transitions. */
export const WAIT_PRESETS = {
  /** UI-driven transitions such as tuning or track selection. */
  uiTransition: {
    ...DEFAULT_WAIT_CONFIG,
  } satisfies WaitConfig,

  /** Auto-focus or auto-exposure convergence. */
  focusConvergence: {
    timeoutMs: 3_000,
    pollIntervalMs: 20,
  } satisfies WaitConfig,

  /** Draining a stream of per-request results. */
  resultDrain: {
    timeoutMs: 5_000,
    pollIntervalMs: 10,
  } satisfies WaitConfig,
} as const;

export type WaitPresetName = keyof typeof WAIT_PRESETS;

/**
 * Merge a partial wait config with a base (the defaults unless given).
 * Undefined fields in the override keep the base value.
 */
export function mergeWaitConfig(
  override?: Partial<WaitConfig>,
  base: Readonly<WaitConfig> = DEFAULT_WAIT_CONFIG,
): WaitConfig {
  const merged: WaitConfig = { ...base };
  if (!override) return merged;
  if (override.timeoutMs !== undefined) merged.timeoutMs = override.timeoutMs;
  if (override.pollIntervalMs !== undefined) merged.pollIntervalMs = override.pollIntervalMs;
  if (override.onProgress !== undefined) merged.onProgress = override.onProgress;
  return merged;
}

/** Check a wait config; returns the list of problems, empty when valid. */
export function checkWaitConfig(config: Pick<WaitConfig, 'timeoutMs' | 'pollIntervalMs'>): string[] {
  const errors: string[] = [];
  if (!Number.isFinite(config.timeoutMs) || config.timeoutMs < 0) {
    errors.push(`timeoutMs must be a non-negative number, got ${config.timeoutMs}`);
  }
  if (!Number.isFinite(config.pollIntervalMs) || config.pollIntervalMs < 1) {
    errors.push(`pollIntervalMs must be at least 1, got ${config.pollIntervalMs}`);
  }
  return errors;
}
