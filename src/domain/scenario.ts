/**
 * Scenario domain model.
 *
 * A scenario acquires one collaborator resource, runs an ordered list of
 * steps against it and ends in exactly one outcome. Its lifecycle is a
 * phase machine; every path ends with resource_released then done.
 */

import { Logger } from '../logger';
import { CommandSpec, ResourceHandle, ResourceSpec } from './collaborator';
import { TypedError } from './errors';
import { EventLogReader } from './events';
import { Tolerance } from './tolerance';

/** Scenario lifecycle phases. */
export enum ScenarioPhase {
  Init = 'init',
  ResourceAcquired = 'resource_acquired',
  CommandIssued = 'command_issued',
  AwaitingEvent = 'awaiting_event',
  Asserting = 'asserting',
  Pass = 'pass',
  Fail = 'fail',
  Error = 'error',
  ResourceReleased = 'resource_released',
  Done = 'done',
}

/** Terminal scenario outcomes. */
export enum ScenarioOutcome {
  Pass = 'pass',
  Fail = 'fail',
  Error = 'error',
}

const STEP_PHASES = [ScenarioPhase.CommandIssued, ScenarioPhase.AwaitingEvent, ScenarioPhase.Asserting];
const OUTCOME_PHASES = [ScenarioPhase.Pass, ScenarioPhase.Fail, ScenarioPhase.Error];

/**
 * Valid phase transitions. Steps may repeat, so the three step phases
 * reach each other (and themselves) freely.
 */
export const VALID_PHASE_TRANSITIONS: Record<ScenarioPhase, ScenarioPhase[]> = {
  [ScenarioPhase.Init]: [ScenarioPhase.ResourceAcquired, ScenarioPhase.Error],
  [ScenarioPhase.ResourceAcquired]: [...STEP_PHASES, ...OUTCOME_PHASES],
  [ScenarioPhase.CommandIssued]: [...STEP_PHASES, ...OUTCOME_PHASES],
  [ScenarioPhase.AwaitingEvent]: [...STEP_PHASES, ...OUTCOME_PHASES],
  [ScenarioPhase.Asserting]: [...STEP_PHASES, ...OUTCOME_PHASES],
  [ScenarioPhase.Pass]: [ScenarioPhase.ResourceReleased],
  [ScenarioPhase.Fail]: [ScenarioPhase.ResourceReleased],
  [ScenarioPhase.Error]: [ScenarioPhase.ResourceReleased],
  [ScenarioPhase.ResourceReleased]: [ScenarioPhase.Done],
  [ScenarioPhase.Done]: [],
};

/** Per-wait overrides; unset fields fall back to the harness defaults. */
export interface StepWaitOptions {
  timeoutMs?: number;
  pollIntervalMs?: number;
  /** Names the condition in timeout diagnostics. */
  description?: string;
  /** Inputs reported with a timeout. */
  observe?: () => Record<string, unknown>;
}

/** Context handed to every step of a running scenario. */
export interface StepContext {
  readonly scenario: Scenario;
  readonly handle: ResourceHandle;
  readonly params: Readonly<Record<string, unknown>>;
  readonly events: EventLogReader;
  readonly logger: Logger;
  /** Values stashed by earlier steps of the same run. */
  readonly captured: Map<string, unknown>;
  /** Issue a command; a rejection surfaces as CommandError. */
  issueCommand(command: CommandSpec): Promise<void>;
  /** Wait for a predicate; a timeout surfaces as TimedOutError. */
  waitFor(predicate: () => boolean, options?: StepWaitOptions): Promise<void>;
  /** Wait until the generation of (subject, kind) exceeds the baseline by `transitions`. */
  waitForTransition(
    subject: string,
    kind: string,
    baseline: number,
    options?: StepWaitOptions & { transitions?: number },
  ): Promise<void>;
}

/** A transition a command step waits for after issuing its command. */
export interface TransitionAwait {
  subject: string;
  kind: string;
  /** New transitions required past the baseline. Default: 1. */
  transitions?: number;
  timeoutMs?: number;
  pollIntervalMs?: number;
}

export interface CommandStep {
  type: 'command';
  label?: string;
  command: CommandSpec;
  /** Baselines for these are captured before the command is issued. */
  awaits?: TransitionAwait[];
}

export interface AwaitStep {
  type: 'await';
  label?: string;
  until: (events: EventLogReader, ctx: StepContext) => boolean;
  /** Diagnostic inputs reported on timeout. */
  observe?: (events: EventLogReader) => Record<string, unknown>;
  timeoutMs?: number;
  pollIntervalMs?: number;
}

export interface ExpectStep {
  type: 'expect';
  label?: string;
  observe: (ctx: StepContext) => unknown;
  expected: unknown;
  tolerance?: Tolerance;
}

/** Soft checks reported together; see ExpectationCollector. */
export interface ExpectationSink {
  expectTrue(message: string, condition: boolean): boolean;
  expectEquals(label: string, actual: unknown, expected: unknown, tolerance?: Tolerance): boolean;
  expectWithin(label: string, actual: number, min: number, max: number): boolean;
  expectNotNull<T>(label: string, value: T | null | undefined): value is T;
  expectContains<T>(label: string, collection: readonly T[], item: T): boolean;
}

export interface AssertStep {
  type: 'assert';
  label?: string;
  check: (ctx: StepContext, expect: ExpectationSink) => void | Promise<void>;
}

export interface ActionStep {
  type: 'action';
  label?: string;
  run: (ctx: StepContext) => void | Promise<void>;
}

export type Step = CommandStep | AwaitStep | ExpectStep | AssertStep | ActionStep;

/** An immutable scenario definition. Build with defineScenario(). */
export interface Scenario {
  readonly id: string;
  readonly description?: string;
  readonly resource: Readonly<ResourceSpec>;
  readonly params: Readonly<Record<string, unknown>>;
  readonly steps: readonly Step[];
  readonly expectedOutcome: ScenarioOutcome;
}

/** Result of one scenario execution. Frozen once created. */
export interface ScenarioResult {
  readonly scenarioId: string;
  /** Unique per execution. */
  readonly runId: string;
  readonly outcome: ScenarioOutcome;
  readonly expectedOutcome: ScenarioOutcome;
  /** Whether outcome equals expectedOutcome. */
  readonly asExpected: boolean;
  readonly message: string;
  readonly error?: TypedError;
  /** Formatted assertion mismatches, empty unless an assertion failed. */
  readonly mismatches: readonly string[];
  /** Every phase entered, in order. */
  readonly phases: readonly ScenarioPhase[];
  /** Label of the step that ended the scenario early. */
  readonly failedStep?: string;
  readonly elapsedMs: number;
  readonly startedAt: string;
  readonly completedAt: string;
}

/** Label used in messages for a step without its own. */
export function stepLabel(step: Step, index: number): string {
  return step.label ?? `${step.type}#${index + 1}`;
}
