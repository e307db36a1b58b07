/**
 * Scenario phase state machine.
 *
 * Enforces valid phase transitions, producing typed errors on invalid ones.
 */

import {
  ScenarioOutcome,
  ScenarioPhase,
  VALID_PHASE_TRANSITIONS,
} from '../domain/scenario';
import { TypedError, createTypedError } from '../domain/errors';

/** Result of a phase transition attempt. */
export interface TransitionResult<S> {
  success: boolean;
  newPhase?: S;
  error?: TypedError;
}

/** Attempt a scenario phase transition. */
export function transitionScenarioPhase(
  current: ScenarioPhase,
  target: ScenarioPhase,
): TransitionResult<ScenarioPhase> {
  const validTargets = VALID_PHASE_TRANSITIONS[current];
  if (!validTargets.includes(target)) {
    return {
      success: false,
      error: createTypedError({
        code: 'SCENARIO.INVALID_TRANSITION',
        message: `Invalid scenario phase transition: ${current} -> ${target}`,
        retryable: false,
        details: { current, target, validTargets },
      }),
    };
  }
  return { success: true, newPhase: target };
}

/** Check if a phase is one of the three outcome phases. */
export function isOutcomePhase(phase: ScenarioPhase): boolean {
  return (
    phase === ScenarioPhase.Pass ||
    phase === ScenarioPhase.Fail ||
    phase === ScenarioPhase.Error
  );
}

/** Check if a phase is terminal (no further transitions). */
export function isTerminalPhase(phase: ScenarioPhase): boolean {
  return VALID_PHASE_TRANSITIONS[phase].length === 0;
}

/** The outcome phase matching an outcome. */
export function outcomePhase(outcome: ScenarioOutcome): ScenarioPhase {
  switch (outcome) {
    case ScenarioOutcome.Pass:
      return ScenarioPhase.Pass;
    case ScenarioOutcome.Fail:
      return ScenarioPhase.Fail;
    case ScenarioOutcome.Error:
      return ScenarioPhase.Error;
  }
}

/**
 * Tracks the phases of one scenario run, rejecting invalid transitions.
 * Every accepted phase is appended to `history`.
 */
export class PhaseTracker {
  private current: ScenarioPhase = ScenarioPhase.Init;
  private readonly entered: ScenarioPhase[] = [ScenarioPhase.Init];

  constructor(private readonly onEnter?: (phase: ScenarioPhase, previous: ScenarioPhase) => void) {}

  get phase(): ScenarioPhase {
    return this.current;
  }

  get history(): readonly ScenarioPhase[] {
    return this.entered;
  }

  /** Move to `target`; returns the typed error instead of throwing on an invalid move. */
  enter(target: ScenarioPhase): TransitionResult<ScenarioPhase> {
    const result = transitionScenarioPhase(this.current, target);
    if (!result.success) return result;
    const previous = this.current;
    this.current = target;
    this.entered.push(target);
    this.onEnter?.(target, previous);
    return result;
  }
}
