/**
 * Orchestrator: runs scenarios against a collaborator.
 *
 * Each scenario moves through init -> resource_acquired -> step phases ->
 * pass | fail | error -> resource_released -> done. The resource is
 * released and the event sink unregistered on every path; the release
 * outcome is logged but never changes the scenario outcome.
 *
 * A sweep runs scenarios one after another; a failing or erroring
 * scenario is recorded and the sweep moves on.
 */

import { v4 as uuid } from 'uuid';
import { Collaborator, CommandSpec, ResourceHandle } from '../domain/collaborator';
import {
  AssertionMismatchError,
  CommandError,
  HarnessError,
  ScenarioValidationError,
  TimedOutError,
  TypedError,
  assertionMismatchError,
  commandRejectedError,
  describeThrown,
  duplicateScenarioIdError,
  scenarioInvalidError,
  unexpectedScenarioError,
} from '../domain/errors';
import { LifecycleEventType } from '../domain/events';
import {
  Scenario,
  ScenarioOutcome,
  ScenarioPhase,
  ScenarioResult,
  Step,
  StepContext,
  StepWaitOptions,
  stepLabel,
} from '../domain/scenario';
import { DEFAULT_HARNESS_CONFIG } from '../config';
import { LifecyclePublisher } from '../data-plane/publisher';
import { findDuplicateIds, validateScenario } from '../dsl/validator';
import { Logger, logger as rootLogger } from '../logger';
import { ScenarioReport } from '../report/scenario-report';
import { waitUntil } from './condition-waiter';
import { EventLog } from './event-log';
import { ExpectationCollector } from './expectations';
import { ResourceScope } from './resource-scope';
import { PhaseTracker, outcomePhase } from './state-machine';

export interface OrchestratorOptions {
  /** Wait budget for steps that do not name one. */
  defaultTimeoutMs?: number;
  /** Poll interval for steps that do not name one. */
  defaultPollIntervalMs?: number;
  /** History limit of each scenario's EventLog. */
  eventHistoryLimit?: number;
  /** Receives lifecycle events; omitted means nothing is published. */
  publisher?: LifecyclePublisher;
  logger?: Logger;
}

export interface RunScenarioOptions {
  /** Report the scenario belongs to, stamped on lifecycle events. */
  reportId?: string;
}

export interface SweepOptions {
  /** Report to fill; a new one is created when omitted. */
  report?: ScenarioReport;
  suiteId?: string;
  /** Called after each scenario is added to the report. */
  onResult?: (result: ScenarioResult, report: ScenarioReport) => void | Promise<void>;
}

interface Settled {
  outcome: ScenarioOutcome;
  error?: TypedError;
  mismatches: string[];
}

/** Map a thrown value onto a scenario outcome. */
export function classifyFailure(err: unknown, scenarioId: string, stepLabelText?: string): Settled {
  if (err instanceof TimedOutError) {
    return { outcome: ScenarioOutcome.Fail, error: withScenario(err.typedError, scenarioId), mismatches: [] };
  }
  if (err instanceof AssertionMismatchError) {
    return {
      outcome: ScenarioOutcome.Fail,
      error: withScenario(err.typedError, scenarioId),
      mismatches: [...err.mismatches],
    };
  }
  if (err instanceof HarnessError) {
    return { outcome: ScenarioOutcome.Error, error: withScenario(err.typedError, scenarioId), mismatches: [] };
  }
  // node:assert failures count as mismatches too.
  if (err instanceof Error && 'code' in err && err.code === 'ERR_ASSERTION') {
    return {
      outcome: ScenarioOutcome.Fail,
      error: assertionMismatchError(stepLabelText ?? 'assertion', [err.message], scenarioId),
      mismatches: [err.message],
    };
  }
  return {
    outcome: ScenarioOutcome.Error,
    error: unexpectedScenarioError(describeThrown(err), scenarioId),
    mismatches: [],
  };
}

function withScenario(error: TypedError, scenarioId: string): TypedError {
  return error.scenarioId ? error : { ...error, scenarioId };
}

export class Orchestrator {
  private readonly defaultTimeoutMs: number;
  private readonly defaultPollIntervalMs: number;
  private readonly eventHistoryLimit: number;
  private readonly publisher?: LifecyclePublisher;
  private readonly logger: Logger;

  constructor(
    private readonly collaborator: Collaborator,
    options: OrchestratorOptions = {},
  ) {
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? DEFAULT_HARNESS_CONFIG.defaultTimeoutMs;
    this.defaultPollIntervalMs = options.defaultPollIntervalMs ?? DEFAULT_HARNESS_CONFIG.defaultPollIntervalMs;
    this.eventHistoryLimit = options.eventHistoryLimit ?? DEFAULT_HARNESS_CONFIG.eventHistoryLimit;
    this.publisher = options.publisher;
    this.logger = options.logger ?? rootLogger.child({ module: 'orchestrator' });
  }

  /** Run one scenario. Never rejects: every failure becomes the result's outcome. */
  async runScenario(scenario: Scenario, options: RunScenarioOptions = {}): Promise<ScenarioResult> {
    const runId = `srun_${uuid()}`;
    const startedAt = new Date();
    const refs = { reportId: options.reportId, scenarioId: scenario.id };
    const log = this.logger.child({ scenarioId: scenario.id, runId });
    const publications: Promise<void>[] = [];

    const phases = new PhaseTracker((phase, previous) => {
      log.debug('Phase entered', { phase, previous });
      publications.push(this.safePublish('scenario.phase', { runId, phase, previous }, refs));
    });

    // Absent on definitions not built with defineScenario.
    const resource = scenario.resource ? { ...scenario.resource } : undefined;
    await this.safePublish('scenario.started', { runId, resource }, refs);
    log.info('Scenario started', { resourceKind: resource?.kind, resourceId: resource?.id });

    const events = new EventLog({ historyLimit: this.eventHistoryLimit });
    const scope = new ResourceScope(this.collaborator, { logger: log, scenarioId: scenario.id });
    let unsubscribe: (() => void) | undefined;

    let settled: Settled = { outcome: ScenarioOutcome.Pass, mismatches: [] };
    let currentStep: string | undefined;

    try {
      try {
        const validation = validateScenario(scenario);
        if (!validation.valid) {
          throw new ScenarioValidationError(scenarioInvalidError(scenario.id, validation.errors));
        }

        unsubscribe = this.collaborator.onEvent(events.sink);

        const handle = await scope.acquire(scenario.resource);
        this.enter(phases, ScenarioPhase.ResourceAcquired);

        const ctx = this.createContext(scenario, handle, events, phases, log);
        for (const [index, step] of scenario.steps.entries()) {
          currentStep = stepLabel(step, index);
          log.debug('Step started', { step: currentStep, type: step.type });
          await this.executeStep(step, currentStep, ctx, phases);
        }
        currentStep = undefined;
      } catch (err) {
        settled = classifyFailure(err, scenario.id, currentStep);
      }

      const moved = phases.enter(outcomePhase(settled.outcome));
      if (!moved.success && moved.error) {
        settled = { outcome: ScenarioOutcome.Error, error: moved.error, mismatches: [] };
        phases.enter(ScenarioPhase.Error);
      }
    } finally {
      const release = await scope.release();
      if (!release.released && !release.skipped) {
        await this.safePublish('resource.release_failed', { runId, error: release.error.typedError }, refs);
      }
      if (unsubscribe) {
        try {
          unsubscribe();
        } catch (err) {
          log.warn('Event sink unregistration failed', { error: describeThrown(err) });
        }
      }
      phases.enter(ScenarioPhase.ResourceReleased);
    }
    phases.enter(ScenarioPhase.Done);

    const completedAt = new Date();
    const result: ScenarioResult = Object.freeze({
      scenarioId: scenario.id,
      runId,
      outcome: settled.outcome,
      expectedOutcome: scenario.expectedOutcome,
      asExpected: settled.outcome === scenario.expectedOutcome,
      message: settled.error ? settled.error.message : `Passed ${scenario.steps.length} step(s)`,
      error: settled.error,
      mismatches: Object.freeze([...settled.mismatches]),
      phases: Object.freeze([...phases.history]),
      failedStep: settled.outcome === ScenarioOutcome.Pass ? undefined : currentStep,
      elapsedMs: completedAt.getTime() - startedAt.getTime(),
      startedAt: startedAt.toISOString(),
      completedAt: completedAt.toISOString(),
    });

    await Promise.all(publications);
    await this.safePublish(
      'scenario.completed',
      { runId, outcome: result.outcome, asExpected: result.asExpected, elapsedMs: result.elapsedMs, error: result.error },
      refs,
    );

    const level = result.outcome === ScenarioOutcome.Pass ? 'info' : 'warn';
    log[level]('Scenario completed', {
      outcome: result.outcome,
      elapsedMs: result.elapsedMs,
      ...(result.error ? { code: result.error.code, failedStep: result.failedStep } : {}),
    });

    return result;
  }

  /**
   * Run scenarios in order, each with its own resource scope and event log.
   * Rejects only when the sweep itself is malformed (duplicate ids).
   */
  async runSweep(scenarios: readonly Scenario[], options: SweepOptions = {}): Promise<ScenarioReport> {
    const duplicates = findDuplicateIds(scenarios);
    if (duplicates.length > 0) {
      throw new ScenarioValidationError(duplicateScenarioIdError(duplicates));
    }

    const report = options.report ?? new ScenarioReport({ suiteId: options.suiteId });
    const log = this.logger.child({ reportId: report.id });
    await this.safePublish('sweep.started', { suiteId: report.suiteId, scenarioCount: scenarios.length }, { reportId: report.id });
    log.info('Sweep started', { suiteId: report.suiteId, scenarioCount: scenarios.length });

    for (const scenario of scenarios) {
      const result = await this.runScenario(scenario, { reportId: report.id });
      report.add(result);
      if (options.onResult) {
        try {
          await options.onResult(result, report);
        } catch (err) {
          log.warn('Sweep result callback failed', { scenarioId: scenario.id, error: describeThrown(err) });
        }
      }
    }

    report.complete();
    const counts = report.counts();
    await this.safePublish(
      'sweep.completed',
      { suiteId: report.suiteId, overallOutcome: report.overallOutcome(), counts },
      { reportId: report.id },
    );
    log.info('Sweep completed', { overallOutcome: report.overallOutcome(), ...counts });
    return report;
  }

  private createContext(
    scenario: Scenario,
    handle: ResourceHandle,
    events: EventLog,
    phases: PhaseTracker,
    log: Logger,
  ): StepContext {
    const reader = events.reader();

    const waitFor = async (predicate: () => boolean, options: StepWaitOptions = {}): Promise<void> => {
      this.enter(phases, ScenarioPhase.AwaitingEvent);
      await waitUntil(predicate, {
        timeoutMs: options.timeoutMs ?? this.defaultTimeoutMs,
        pollIntervalMs: options.pollIntervalMs ?? this.defaultPollIntervalMs,
        description: options.description,
        observe: options.observe,
        scenarioId: scenario.id,
      });
    };

    return {
      scenario,
      handle,
      params: scenario.params,
      events: reader,
      logger: log,
      captured: new Map<string, unknown>(),
      issueCommand: async (command: CommandSpec) => {
        this.enter(phases, ScenarioPhase.CommandIssued);
        log.debug('Issuing command', { command: command.name });
        try {
          await this.collaborator.issueCommand(handle, command);
        } catch (err) {
          if (err instanceof CommandError) throw err;
          throw new CommandError(commandRejectedError(command.name, describeThrown(err), scenario.id));
        }
      },
      waitFor,
      waitForTransition: (subject, kind, baseline, options = {}) => {
        const transitions = options.transitions ?? 1;
        const target = baseline + transitions;
        return waitFor(() => reader.generationOf(subject, kind) >= target, {
          ...options,
          description:
            options.description ??
            `${transitions} new "${kind}" transition(s) on "${subject}" past generation ${baseline}`,
          observe:
            options.observe ??
            (() => ({
              subject,
              kind,
              baseline,
              generation: reader.generationOf(subject, kind),
              latestValue: reader.latestValue(subject, kind),
            })),
        });
      },
    };
  }

  private async executeStep(step: Step, label: string, ctx: StepContext, phases: PhaseTracker): Promise<void> {
    switch (step.type) {
      case 'command': {
        // Baselines first: a transition completing before the wait starts still counts.
        const baselines = (step.awaits ?? []).map((wait) => ({
          wait,
          baseline: ctx.events.generationOf(wait.subject, wait.kind),
        }));
        await ctx.issueCommand(step.command);
        for (const { wait, baseline } of baselines) {
          await ctx.waitForTransition(wait.subject, wait.kind, baseline, {
            transitions: wait.transitions,
            timeoutMs: wait.timeoutMs,
            pollIntervalMs: wait.pollIntervalMs,
          });
        }
        return;
      }
      case 'await': {
        const observe = step.observe;
        await ctx.waitFor(() => step.until(ctx.events, ctx), {
          timeoutMs: step.timeoutMs,
          pollIntervalMs: step.pollIntervalMs,
          description: label,
          observe: observe ? () => observe(ctx.events) : undefined,
        });
        return;
      }
      case 'expect': {
        this.enter(phases, ScenarioPhase.Asserting);
        const collector = new ExpectationCollector(label, ctx.scenario.id);
        const actual = await step.observe(ctx);
        collector.expectEquals('observed', actual, step.expected, step.tolerance);
        collector.throwIfFailed();
        return;
      }
      case 'assert': {
        this.enter(phases, ScenarioPhase.Asserting);
        const collector = new ExpectationCollector(label, ctx.scenario.id);
        await step.check(ctx, collector);
        collector.throwIfFailed();
        return;
      }
      case 'action':
        await step.run(ctx);
        return;
    }
  }

  private enter(phases: PhaseTracker, target: ScenarioPhase): void {
    const result = phases.enter(target);
    if (!result.success && result.error) {
      throw new HarnessError(result.error);
    }
  }

  private async safePublish(
    type: LifecycleEventType,
    payload: Record<string, unknown>,
    refs: { reportId?: string; scenarioId?: string },
  ): Promise<void> {
    if (!this.publisher) return;
    try {
      await this.publisher.publish(type, payload, refs);
    } catch (err) {
      // Publishing is observational; a failure never changes an outcome.
      this.logger.warn('Lifecycle publish failed', { type, error: describeThrown(err) });
    }
  }
}
