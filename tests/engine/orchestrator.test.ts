import assert from 'node:assert';
import { Orchestrator, classifyFailure } from '../../src/engine/orchestrator';
import { defineScenario } from '../../src/dsl/builder';
import { LifecyclePublisher } from '../../src/data-plane/publisher';
import { createMemoryStore } from '../../src/storage/memory-store';
import {
  CommandError,
  ScenarioValidationError,
  TimedOutError,
  commandRejectedError,
  waitTimedOutError,
} from '../../src/domain/errors';
import { Scenario, ScenarioOutcome, ScenarioPhase, Step } from '../../src/domain/scenario';
import { absolute } from '../../src/domain/tolerance';
import { LogEntry, LogLevel, resetLogHandler, setLogHandler } from '../../src/logger';
import { StubCollaborator, stubCollaborator } from '../support/stub-collaborator';

const RESOURCE = { kind: 'tuner', id: 'tuner-0' };

function scenario(id: string, steps: Step[], expectedOutcome?: ScenarioOutcome): Scenario {
  return defineScenario({ id, resource: RESOURCE, steps, expectedOutcome });
}

/** Tune command whose channel event arrives `delayMs` later. */
function tuneAfter(collaborator: StubCollaborator, delayMs: number): void {
  collaborator.issueCommand.mockImplementation(async (handle, command) => {
    collaborator.emitLater(handle.resourceId, 'channel', command.args?.channel, delayMs);
  });
}

const TUNE_STEPS = (timeoutMs: number): Step[] => [
  {
    type: 'command',
    label: 'tune',
    command: { name: 'tune', args: { channel: 7 } },
    awaits: [{ subject: 'tuner-0', kind: 'channel', timeoutMs, pollIntervalMs: 5 }],
  },
  {
    type: 'expect',
    label: 'channel',
    observe: (ctx) => ctx.events.latestValue('tuner-0', 'channel'),
    expected: 7,
  },
];

describe('Orchestrator.runScenario', () => {
  let collaborator: StubCollaborator;
  let logs: LogEntry[];

  beforeEach(() => {
    collaborator = stubCollaborator();
    logs = [];
    setLogHandler((entry) => logs.push(entry));
  });

  afterEach(() => {
    collaborator.dispose();
    resetLogHandler();
  });

  test('passes when the event arrives within the budget', async () => {
    tuneAfter(collaborator, 50);
    const orchestrator = new Orchestrator(collaborator);

    const result = await orchestrator.runScenario(scenario('tune-ok', TUNE_STEPS(1000)));

    expect(result.outcome).toBe(ScenarioOutcome.Pass);
    expect(result.asExpected).toBe(true);
    expect(result.message).toBe('Passed 2 step(s)');
    expect(result.error).toBeUndefined();
    expect(result.failedStep).toBeUndefined();
    expect(result.elapsedMs).toBeGreaterThanOrEqual(45);
    expect(result.phases).toEqual([
      ScenarioPhase.Init,
      ScenarioPhase.ResourceAcquired,
      ScenarioPhase.CommandIssued,
      ScenarioPhase.AwaitingEvent,
      ScenarioPhase.Asserting,
      ScenarioPhase.Pass,
      ScenarioPhase.ResourceReleased,
      ScenarioPhase.Done,
    ]);
    expect(collaborator.releaseResource).toHaveBeenCalledTimes(1);
    expect(Object.isFrozen(result)).toBe(true);
  });

  test('fails with WAIT.TIMED_OUT when the budget is shorter than the latency', async () => {
    tuneAfter(collaborator, 50);
    const orchestrator = new Orchestrator(collaborator);

    const result = await orchestrator.runScenario(scenario('tune-slow', TUNE_STEPS(10)));

    expect(result.outcome).toBe(ScenarioOutcome.Fail);
    expect(result.error?.code).toBe('WAIT.TIMED_OUT');
    expect(result.error?.scenarioId).toBe('tune-slow');
    expect(result.failedStep).toBe('tune');
    expect(result.message).toContain(
      'waiting for 1 new "channel" transition(s) on "tuner-0" past generation 0 (budget 10ms)',
    );
    expect(result.message).toContain('"generation":0');
    expect(result.elapsedMs).toBeLessThan(50);
    expect(collaborator.releaseResource).toHaveBeenCalledTimes(1);
  });

  test('captures the baseline before issuing, so a synchronous callback is not missed', async () => {
    collaborator.issueCommand.mockImplementation(async (handle) => {
      collaborator.emit(handle.resourceId, 'channel', 3);
    });
    const orchestrator = new Orchestrator(collaborator);

    const result = await orchestrator.runScenario(
      scenario('tune-instant', [
        {
          type: 'command',
          command: { name: 'tune' },
          awaits: [{ subject: 'tuner-0', kind: 'channel', timeoutMs: 0, pollIntervalMs: 1 }],
        },
      ]),
    );

    expect(result.outcome).toBe(ScenarioOutcome.Pass);
  });

  test('waits for several transitions past the baseline', async () => {
    collaborator.issueCommand.mockImplementation(async (handle) => {
      collaborator.emitLater(handle.resourceId, 'result', 1, 5);
      collaborator.emitLater(handle.resourceId, 'result', 2, 10);
      collaborator.emitLater(handle.resourceId, 'result', 3, 15);
    });
    const orchestrator = new Orchestrator(collaborator);

    const result = await orchestrator.runScenario(
      scenario('drain', [
        {
          type: 'command',
          command: { name: 'burst' },
          awaits: [{ subject: 'tuner-0', kind: 'result', transitions: 3, timeoutMs: 1000, pollIntervalMs: 1 }],
        },
        {
          type: 'expect',
          observe: (ctx) => ctx.events.events({ kind: 'result' }).map((e) => e.value),
          expected: [1, 2, 3],
        },
      ]),
    );

    expect(result.outcome).toBe(ScenarioOutcome.Pass);
  });

  test('acquire failure is an error; no steps run and nothing is released', async () => {
    collaborator.acquireResource.mockResolvedValueOnce(null);
    const step = jest.fn();
    const orchestrator = new Orchestrator(collaborator);

    const result = await orchestrator.runScenario(scenario('no-tuner', [{ type: 'action', run: step }]));

    expect(result.outcome).toBe(ScenarioOutcome.Error);
    expect(result.error?.code).toBe('ACQUIRE.UNAVAILABLE');
    expect(result.message).toBe('No tuner resource matches "tuner-0"');
    expect(result.phases).toEqual([
      ScenarioPhase.Init,
      ScenarioPhase.Error,
      ScenarioPhase.ResourceReleased,
      ScenarioPhase.Done,
    ]);
    expect(step).not.toHaveBeenCalled();
    expect(collaborator.releaseResource).not.toHaveBeenCalled();
    expect(collaborator.unsubscribe).toHaveBeenCalledTimes(1);
  });

  test('a rejected command is an error and the resource is released once', async () => {
    collaborator.issueCommand.mockRejectedValueOnce(new Error('unsupported channel'));
    const orchestrator = new Orchestrator(collaborator);

    const result = await orchestrator.runScenario(scenario('bad-command', TUNE_STEPS(100)));

    expect(result.outcome).toBe(ScenarioOutcome.Error);
    expect(result.error?.code).toBe('COMMAND.REJECTED');
    expect(result.message).toBe('Command "tune" rejected: unsupported channel');
    expect(result.failedStep).toBe('tune');
    expect(collaborator.releaseResource).toHaveBeenCalledTimes(1);
  });

  test('an assertion mismatch fails with every mismatch listed', async () => {
    tuneAfter(collaborator, 1);
    const orchestrator = new Orchestrator(collaborator);

    const result = await orchestrator.runScenario(
      scenario('wrong-channel', [
        ...TUNE_STEPS(1000).slice(0, 1),
        {
          type: 'assert',
          label: 'tuned state',
          check: (ctx, expect) => {
            expect.expectEquals('channel', ctx.events.latestValue('tuner-0', 'channel'), 8);
            expect.expectTrue('signal locked', false);
          },
        },
      ]),
    );

    expect(result.outcome).toBe(ScenarioOutcome.Fail);
    expect(result.error?.code).toBe('ASSERT.MISMATCH');
    expect(result.mismatches).toEqual([
      'channel: expected 8, got 7 (outside tolerance exact)',
      'signal locked',
    ]);
    expect(result.message).toBe('tuned state: channel: expected 8, got 7 (outside tolerance exact); signal locked');
    expect(result.failedStep).toBe('tuned state');
    expect(collaborator.releaseResource).toHaveBeenCalledTimes(1);
  });

  test('expect steps compare under a tolerance', async () => {
    const orchestrator = new Orchestrator(collaborator);
    const measure = (value: number): Step[] => [
      { type: 'expect', label: 'gain', observe: () => value, expected: 1.0, tolerance: absolute(0.001) },
    ];

    const within = await orchestrator.runScenario(scenario('gain-ok', measure(1.0009)));
    const outside = await orchestrator.runScenario(scenario('gain-off', measure(1.002)));

    expect(within.outcome).toBe(ScenarioOutcome.Pass);
    expect(outside.outcome).toBe(ScenarioOutcome.Fail);
    expect(outside.mismatches).toEqual(['observed: expected 1, got 1.002 (outside tolerance ±0.001)']);
  });

  test('node:assert failures count as mismatches', async () => {
    const orchestrator = new Orchestrator(collaborator);

    const result = await orchestrator.runScenario(
      scenario('plain-assert', [
        {
          type: 'action',
          label: 'check',
          run: () => {
            assert.strictEqual(1, 2, 'one is not two');
          },
        },
      ]),
    );

    expect(result.outcome).toBe(ScenarioOutcome.Fail);
    expect(result.error?.code).toBe('ASSERT.MISMATCH');
    expect(result.mismatches).toEqual(['one is not two']);
  });

  test('an unexpected throw is an error', async () => {
    const orchestrator = new Orchestrator(collaborator);

    const result = await orchestrator.runScenario(
      scenario('crash', [
        {
          type: 'action',
          run: () => {
            throw new TypeError('cannot read property');
          },
        },
      ]),
    );

    expect(result.outcome).toBe(ScenarioOutcome.Error);
    expect(result.error?.code).toBe('SCENARIO.UNEXPECTED');
    expect(result.message).toBe('cannot read property');
    expect(result.failedStep).toBe('action#1');
    expect(collaborator.releaseResource).toHaveBeenCalledTimes(1);
  });

  test('an invalid scenario errors before acquiring', async () => {
    const orchestrator = new Orchestrator(collaborator);

    const result = await orchestrator.runScenario(
      scenario('bad-budget', [{ type: 'await', until: () => true, pollIntervalMs: 0 }]),
    );

    expect(result.outcome).toBe(ScenarioOutcome.Error);
    expect(result.error?.code).toBe('SCENARIO.INVALID');
    expect(collaborator.acquireResource).not.toHaveBeenCalled();
  });

  test('a definition without a resource errors instead of throwing', async () => {
    const loose: Scenario = JSON.parse('{"id":"no-resource","params":{},"steps":[],"expectedOutcome":"pass"}');
    const orchestrator = new Orchestrator(collaborator);

    const result = await orchestrator.runScenario(loose);

    expect(result.outcome).toBe(ScenarioOutcome.Error);
    expect(result.message).toBe('Scenario "no-resource" is invalid: resource is required');
    expect(result.phases.slice(-2)).toEqual([ScenarioPhase.ResourceReleased, ScenarioPhase.Done]);
    expect(collaborator.onEvent).not.toHaveBeenCalled();
    expect(collaborator.acquireResource).not.toHaveBeenCalled();
  });

  test('a failing release is logged and does not change the outcome', async () => {
    collaborator.releaseResource.mockRejectedValueOnce(new Error('stuck'));
    const store = createMemoryStore();
    const orchestrator = new Orchestrator(collaborator, { publisher: new LifecyclePublisher(store) });

    const result = await orchestrator.runScenario(scenario('sticky', [{ type: 'action', run: () => undefined }]), {
      reportId: 'rpt_1',
    });

    expect(result.outcome).toBe(ScenarioOutcome.Pass);
    expect(result.phases.slice(-2)).toEqual([ScenarioPhase.ResourceReleased, ScenarioPhase.Done]);
    expect(logs.some((l) => l.level === LogLevel.Warn && l.message === 'Resource release failed')).toBe(true);

    const failures = await store.events.listByReport('rpt_1', { eventTypes: ['resource.release_failed'] });
    expect(failures).toHaveLength(1);
    expect(failures[0].payload.error).toMatchObject({ code: 'RELEASE.FAILED' });
  });

  test('the sink is registered before acquire and removed after release', async () => {
    const orchestrator = new Orchestrator(collaborator);

    await orchestrator.runScenario(scenario('ordering', [{ type: 'action', run: () => undefined }]));

    const registered = collaborator.onEvent.mock.invocationCallOrder[0];
    const acquired = collaborator.acquireResource.mock.invocationCallOrder[0];
    const released = collaborator.releaseResource.mock.invocationCallOrder[0];
    const removed = collaborator.unsubscribe.mock.invocationCallOrder[0];
    expect(registered).toBeLessThan(acquired);
    expect(released).toBeLessThan(removed);
    expect(collaborator.sinkCount()).toBe(0);
  });

  test('records expectedOutcome and whether it was met', async () => {
    collaborator.acquireResource.mockResolvedValueOnce(null);
    const orchestrator = new Orchestrator(collaborator);

    const result = await orchestrator.runScenario(scenario('absent', [], ScenarioOutcome.Error));

    expect(result.outcome).toBe(ScenarioOutcome.Error);
    expect(result.expectedOutcome).toBe(ScenarioOutcome.Error);
    expect(result.asExpected).toBe(true);
  });

  test('each run gets a fresh event log and run id', async () => {
    collaborator.issueCommand.mockImplementation(async (handle) => {
      collaborator.emit(handle.resourceId, 'channel', 1);
    });
    const orchestrator = new Orchestrator(collaborator);
    const steps: Step[] = [
      { type: 'command', command: { name: 'tune' } },
      { type: 'expect', observe: (ctx) => ctx.events.generationOf('tuner-0', 'channel'), expected: 1 },
    ];

    const first = await orchestrator.runScenario(scenario('fresh', steps));
    const second = await orchestrator.runScenario(scenario('fresh', steps));

    expect(first.outcome).toBe(ScenarioOutcome.Pass);
    expect(second.outcome).toBe(ScenarioOutcome.Pass);
    expect(first.runId).not.toBe(second.runId);
  });
});

describe('Orchestrator.runSweep', () => {
  let collaborator: StubCollaborator;

  beforeEach(() => {
    collaborator = stubCollaborator();
    setLogHandler(() => undefined);
  });

  afterEach(() => {
    collaborator.dispose();
    resetLogHandler();
  });

  test('a failing scenario does not stop the sweep', async () => {
    const orchestrator = new Orchestrator(collaborator);
    const ok = (id: string) => scenario(id, [{ type: 'expect', observe: () => 1, expected: 1 }]);

    const report = await orchestrator.runSweep([
      ok('first'),
      scenario('second', [{ type: 'expect', observe: () => 1, expected: 2 }]),
      ok('third'),
    ]);

    expect(report.results.map((r) => r.outcome)).toEqual([
      ScenarioOutcome.Pass,
      ScenarioOutcome.Fail,
      ScenarioOutcome.Pass,
    ]);
    expect(report.overallOutcome()).toBe(ScenarioOutcome.Fail);
    expect(report.isComplete).toBe(true);
    expect(collaborator.acquireResource).toHaveBeenCalledTimes(3);
    expect(collaborator.releaseResource).toHaveBeenCalledTimes(3);
  });

  test('a sink registration that throws errors that scenario only', async () => {
    const register = collaborator.onEvent.getMockImplementation();
    if (!register) throw new Error('stub has no onEvent implementation');
    collaborator.onEvent
      .mockImplementationOnce(register)
      .mockImplementationOnce(() => {
        throw new Error('listener registry full');
      });
    const orchestrator = new Orchestrator(collaborator);
    const ok = (id: string) => scenario(id, [{ type: 'expect', observe: () => 1, expected: 1 }]);

    const report = await orchestrator.runSweep([ok('a'), ok('b'), ok('c')]);

    expect(report.results.map((r) => r.outcome)).toEqual([
      ScenarioOutcome.Pass,
      ScenarioOutcome.Error,
      ScenarioOutcome.Pass,
    ]);
    const failed = report.results[1];
    expect(failed.message).toBe('listener registry full');
    expect(failed.phases.slice(-3)).toEqual([ScenarioPhase.Error, ScenarioPhase.ResourceReleased, ScenarioPhase.Done]);
    expect(collaborator.acquireResource).toHaveBeenCalledTimes(2);
    expect(collaborator.releaseResource).toHaveBeenCalledTimes(2);
    expect(collaborator.unsubscribe).toHaveBeenCalledTimes(2);
    expect(collaborator.sinkCount()).toBe(0);
  });

  test('duplicate scenario ids are rejected before anything runs', async () => {
    const orchestrator = new Orchestrator(collaborator);
    const twice = scenario('same', []);

    await expect(orchestrator.runSweep([twice, twice])).rejects.toBeInstanceOf(ScenarioValidationError);
    expect(collaborator.acquireResource).not.toHaveBeenCalled();
  });

  test('onResult sees each result as it lands, and its failures are ignored', async () => {
    const orchestrator = new Orchestrator(collaborator);
    const seen: number[] = [];

    const report = await orchestrator.runSweep([scenario('a', []), scenario('b', [])], {
      suiteId: 'suite-x',
      onResult: (_result, current) => {
        seen.push(current.length);
        throw new Error('listener broke');
      },
    });

    expect(seen).toEqual([1, 2]);
    expect(report.suiteId).toBe('suite-x');
    expect(report.length).toBe(2);
  });

  test('publishes sweep and scenario lifecycle events in order', async () => {
    const store = createMemoryStore();
    const orchestrator = new Orchestrator(collaborator, { publisher: new LifecyclePublisher(store) });

    const report = await orchestrator.runSweep([scenario('only', [{ type: 'action', run: () => undefined }])]);

    const events = await store.events.listByReport(report.id);
    expect(events.map((e) => e.type)).toEqual([
      'sweep.started',
      'scenario.started',
      'scenario.phase',
      'scenario.phase',
      'scenario.phase',
      'scenario.phase',
      'scenario.completed',
      'sweep.completed',
    ]);
    expect(events.filter((e) => e.type === 'scenario.phase').map((e) => e.payload.phase)).toEqual([
      ScenarioPhase.ResourceAcquired,
      ScenarioPhase.Pass,
      ScenarioPhase.ResourceReleased,
      ScenarioPhase.Done,
    ]);
    expect(events[7].payload).toMatchObject({ overallOutcome: ScenarioOutcome.Pass });
  });

  test('an empty sweep passes', async () => {
    const orchestrator = new Orchestrator(collaborator);
    const report = await orchestrator.runSweep([]);
    expect(report.overallOutcome()).toBe(ScenarioOutcome.Pass);
  });
});

describe('classifyFailure', () => {
  test('timeouts and mismatches fail, harness errors and the rest error', () => {
    const timeout = new TimedOutError(waitTimedOutError('x', 1, 1, {}), 1, {});
    const rejected = new CommandError(commandRejectedError('tune', 'no'));

    expect(classifyFailure(timeout, 'scn').outcome).toBe(ScenarioOutcome.Fail);
    expect(classifyFailure(timeout, 'scn').error?.scenarioId).toBe('scn');
    expect(classifyFailure(rejected, 'scn').outcome).toBe(ScenarioOutcome.Error);
    expect(classifyFailure('just a string', 'scn')).toEqual({
      outcome: ScenarioOutcome.Error,
      error: expect.objectContaining({ code: 'SCENARIO.UNEXPECTED', message: 'just a string' }),
      mismatches: [],
    });
  });
});
