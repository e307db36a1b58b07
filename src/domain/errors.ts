/**
 * Typed error model for machine-actionable error handling.
 *
 * Scenario outcomes carry typed errors rather than raw exceptions so that
 * reports, lifecycle events and API responses share one serializable shape.
 * The thrown wrappers at the bottom of this file carry a TypedError and are
 * what the orchestrator classifies into Fail or Error outcomes.
 */

import { formatValue } from './tolerance';

/** Top-level error domain namespaces. */
export type ErrorDomain =
  | 'ACQUIRE'
  | 'COMMAND'
  | 'WAIT'
  | 'ASSERT'
  | 'RELEASE'
  | 'SCENARIO'
  | 'VALIDATION'
  | 'CONFIG'
  | 'SYSTEM';

/** Typed suggested fix that agents can apply. */
export interface SuggestedFix {
  type: string;
  params: Record<string, unknown>;
  description?: string;
}

/** The core typed error structure recorded in results and API responses. */
export interface TypedError {
  /** Namespaced error code (e.g., "WAIT.TIMED_OUT"). */
  code: string;
  /** Human-readable error message. */
  message: string;
  /** Associated scenario if applicable. */
  scenarioId?: string;
  /** Whether the same operation is expected to succeed without changes. */
  retryable: boolean;
  /** Structured detail payload. */
  details?: Record<string, unknown>;
  /** Machine-actionable remediation suggestions. */
  suggestedFixes: SuggestedFix[];
}

/** Create a typed error with defaults. */
export function createTypedError(params: {
  code: string;
  message: string;
  scenarioId?: string;
  retryable?: boolean;
  details?: Record<string, unknown>;
  suggestedFixes?: SuggestedFix[];
}): TypedError {
  return {
    code: params.code,
    message: params.message,
    scenarioId: params.scenarioId,
    retryable: params.retryable ?? false,
    details: params.details,
    suggestedFixes: params.suggestedFixes ?? [],
  };
}

/** Extract a message from an unknown thrown value. */
export function describeThrown(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === 'string') return err;
  return 'Unknown error';
}

// --- Common error factory functions ---

export function validationError(message: string, details?: Record<string, unknown>): TypedError {
  return createTypedError({
    code: 'VALIDATION.SCHEMA',
    message,
    retryable: false,
    details,
  });
}

export function notFoundError(resourceType: string, resourceId: string): TypedError {
  return createTypedError({
    code: 'VALIDATION.NOT_FOUND',
    message: `${resourceType} not found: ${resourceId}`,
    retryable: false,
  });
}

export function configError(errors: string[]): TypedError {
  return createTypedError({
    code: 'CONFIG.INVALID',
    message: `Invalid harness configuration: ${errors.join('; ')}`,
    retryable: false,
    details: { errors },
  });
}

export function resourceUnavailableError(kind: string, resourceId: string, scenarioId?: string): TypedError {
  return createTypedError({
    code: 'ACQUIRE.UNAVAILABLE',
    message: `No ${kind} resource matches "${resourceId}"`,
    scenarioId,
    retryable: false,
    details: { kind, resourceId },
    suggestedFixes: [
      { type: 'CHECK_RESOURCE_ID', params: { kind, resourceId }, description: 'Verify the collaborator exposes this resource' },
    ],
  });
}

export function acquireFailedError(kind: string, resourceId: string, cause: string, scenarioId?: string): TypedError {
  return createTypedError({
    code: 'ACQUIRE.FAILED',
    message: `Failed to acquire ${kind} "${resourceId}": ${cause}`,
    scenarioId,
    retryable: true,
    details: { kind, resourceId, cause },
  });
}

export function alreadyHeldError(resourceId: string, scenarioId?: string): TypedError {
  return createTypedError({
    code: 'ACQUIRE.ALREADY_HELD',
    message: `Resource scope already used for "${resourceId}"; create a new scope per acquisition`,
    scenarioId,
    retryable: false,
    details: { resourceId },
  });
}

export function commandRejectedError(command: string, cause: string, scenarioId?: string): TypedError {
  return createTypedError({
    code: 'COMMAND.REJECTED',
    message: `Command "${command}" rejected: ${cause}`,
    scenarioId,
    retryable: false,
    details: { command, cause },
  });
}

type ObservedValue = string | number | boolean | null;

/**
 * Event payloads are opaque; keep primitives and render everything else as
 * text so the details survive JSON and structuredClone.
 */
export function recordableObserved(observed: Record<string, unknown>): Record<string, ObservedValue> {
  const recordable: Record<string, ObservedValue> = {};
  for (const [key, value] of Object.entries(observed)) {
    if (value === undefined) continue;
    if (value === null || typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      recordable[key] = value;
    } else {
      recordable[key] = formatValue(value);
    }
  }
  return recordable;
}

export function waitTimedOutError(
  description: string,
  timeoutMs: number,
  elapsedMs: number,
  lastObserved: Record<string, unknown>,
  scenarioId?: string,
): TypedError {
  const observed = recordableObserved(lastObserved);
  return createTypedError({
    code: 'WAIT.TIMED_OUT',
    message: `Timed out after ${elapsedMs}ms waiting for ${description} (budget ${timeoutMs}ms); last observed ${JSON.stringify(observed)}`,
    scenarioId,
    retryable: true,
    details: { description, timeoutMs, elapsedMs, lastObserved: observed },
    suggestedFixes: [
      { type: 'INCREASE_TIMEOUT', params: { timeoutMs: timeoutMs * 2 } },
    ],
  });
}

export function assertionMismatchError(label: string, mismatches: string[], scenarioId?: string): TypedError {
  return createTypedError({
    code: 'ASSERT.MISMATCH',
    message: `${label}: ${mismatches.join('; ')}`,
    scenarioId,
    retryable: false,
    details: { label, mismatches },
  });
}

export function releaseFailedError(resourceId: string, cause: string, scenarioId?: string): TypedError {
  return createTypedError({
    code: 'RELEASE.FAILED',
    message: `Failed to release "${resourceId}": ${cause}`,
    scenarioId,
    retryable: true,
    details: { resourceId, cause },
  });
}

export function scenarioInvalidError(scenarioId: string, errors: string[]): TypedError {
  return createTypedError({
    code: 'SCENARIO.INVALID',
    message: `Scenario "${scenarioId}" is invalid: ${errors.join('; ')}`,
    scenarioId,
    retryable: false,
    details: { errors },
  });
}

export function duplicateScenarioIdError(ids: string[]): TypedError {
  return createTypedError({
    code: 'SCENARIO.DUPLICATE_ID',
    message: `Duplicate scenario ids in sweep: ${ids.join(', ')}`,
    retryable: false,
    details: { ids },
  });
}

export function unexpectedScenarioError(cause: string, scenarioId?: string): TypedError {
  return createTypedError({
    code: 'SCENARIO.UNEXPECTED',
    message: cause,
    scenarioId,
    retryable: false,
  });
}

/** API error response wrapper. */
export interface ApiErrorResponse {
  error: TypedError;
}

/** Construct an API error response. */
export function apiError(error: TypedError): ApiErrorResponse {
  return { error };
}

// --- Thrown wrappers ---

/** Base class for errors that carry a TypedError. */
export class HarnessError extends Error {
  constructor(public readonly typedError: TypedError) {
    super(typedError.message);
    this.name = 'HarnessError';
  }
}

/** The collaborator has no matching resource, or acquisition failed. */
export class AcquireError extends HarnessError {
  constructor(typedError: TypedError) {
    super(typedError);
    this.name = 'AcquireError';
  }
}

/** A command was rejected synchronously by the collaborator. */
export class CommandError extends HarnessError {
  constructor(typedError: TypedError) {
    super(typedError);
    this.name = 'CommandError';
  }
}

/** A bounded wait elapsed without its condition becoming true. */
export class TimedOutError extends HarnessError {
  constructor(
    typedError: TypedError,
    public readonly elapsedMs: number,
    public readonly lastObserved: Record<string, unknown>,
  ) {
    super(typedError);
    this.name = 'TimedOutError';
  }
}

/** Observed state differs from the expected state. */
export class AssertionMismatchError extends HarnessError {
  constructor(typedError: TypedError, public readonly mismatches: string[]) {
    super(typedError);
    this.name = 'AssertionMismatchError';
  }
}

/** Cleanup failed. Logged by ResourceScope, never escalated by it. */
export class ReleaseError extends HarnessError {
  constructor(typedError: TypedError) {
    super(typedError);
    this.name = 'ReleaseError';
  }
}

/** A scenario or sweep definition failed validation. */
export class ScenarioValidationError extends HarnessError {
  constructor(typedError: TypedError) {
    super(typedError);
    this.name = 'ScenarioValidationError';
  }
}
