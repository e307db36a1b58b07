/**
 * Harness configuration.
 *
 * Defaults for wait budgets and event retention, overridable through
 * environment variables:
 *
 *   HARNESS_TIMEOUT_MS            default wait budget (15000)
 *   HARNESS_POLL_INTERVAL_MS      default poll interval (50)
 *   HARNESS_EVENT_HISTORY_LIMIT   events retained per scenario log (1000)
 *   HARNESS_LOG_LEVEL             debug | info | warn | error (info)
 *   PORT                          report explorer port (5000)
 */

import { LogLevel, parseLogLevel } from './logger';

export interface HarnessConfig {
  /** Wait budget applied when a step does not name its own. */
  defaultTimeoutMs: number;
  /** Poll interval applied when a step does not name its own. */
  defaultPollIntervalMs: number;
  /** Maximum number of events an EventLog keeps in its history. */
  eventHistoryLimit: number;
  logLevel: LogLevel;
  port: number;
}

export const DEFAULT_HARNESS_CONFIG: Readonly<HarnessConfig> = {
  defaultTimeoutMs: 15_000,
  defaultPollIntervalMs: 50,
  eventHistoryLimit: 1_000,
  logLevel: LogLevel.Info,
  port: 5000,
};

/** Validation result for a harness configuration. */
export interface ConfigValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

function readInt(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? Math.trunc(parsed) : NaN;
}

/**
 * Build a configuration from environment variables.
 * Unparseable numbers come back as NaN so validateHarnessConfig reports them.
 */
export function loadHarnessConfig(
  env: Record<string, string | undefined> = process.env,
): HarnessConfig {
  return {
    defaultTimeoutMs: readInt(env.HARNESS_TIMEOUT_MS, DEFAULT_HARNESS_CONFIG.defaultTimeoutMs),
    defaultPollIntervalMs: readInt(env.HARNESS_POLL_INTERVAL_MS, DEFAULT_HARNESS_CONFIG.defaultPollIntervalMs),
    eventHistoryLimit: readInt(env.HARNESS_EVENT_HISTORY_LIMIT, DEFAULT_HARNESS_CONFIG.eventHistoryLimit),
    logLevel: parseLogLevel(env.HARNESS_LOG_LEVEL) ?? DEFAULT_HARNESS_CONFIG.logLevel,
    port: readInt(env.PORT, DEFAULT_HARNESS_CONFIG.port),
  };
}

export function validateHarnessConfig(config: HarnessConfig): ConfigValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!Number.isInteger(config.defaultTimeoutMs) || config.defaultTimeoutMs < 0) {
    errors.push('defaultTimeoutMs must be a non-negative integer');
  }
  if (!Number.isInteger(config.defaultPollIntervalMs) || config.defaultPollIntervalMs < 1) {
    errors.push('defaultPollIntervalMs must be an integer of at least 1');
  }
  if (!Number.isInteger(config.eventHistoryLimit) || config.eventHistoryLimit < 1) {
    errors.push('eventHistoryLimit must be an integer of at least 1');
  }
  if (!Number.isInteger(config.port) || config.port < 0 || config.port > 65535) {
    errors.push('port must be an integer between 0 and 65535');
  }

  if (errors.length === 0 && config.defaultPollIntervalMs > config.defaultTimeoutMs) {
    warnings.push('defaultPollIntervalMs exceeds defaultTimeoutMs; waits will evaluate at most twice');
  }

  return { valid: errors.length === 0, errors, warnings };
}
