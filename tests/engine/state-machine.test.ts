import {
  PhaseTracker,
  isOutcomePhase,
  isTerminalPhase,
  outcomePhase,
  transitionScenarioPhase,
} from '../../src/engine/state-machine';
import { ScenarioOutcome, ScenarioPhase } from '../../src/domain/scenario';

describe('Scenario phase state machine', () => {
  test('valid transition: init -> resource_acquired', () => {
    const result = transitionScenarioPhase(ScenarioPhase.Init, ScenarioPhase.ResourceAcquired);
    expect(result.success).toBe(true);
    expect(result.newPhase).toBe(ScenarioPhase.ResourceAcquired);
  });

  test('valid transition: init -> error (acquire failed)', () => {
    expect(transitionScenarioPhase(ScenarioPhase.Init, ScenarioPhase.Error).success).toBe(true);
  });

  test('step phases may repeat', () => {
    expect(transitionScenarioPhase(ScenarioPhase.AwaitingEvent, ScenarioPhase.CommandIssued).success).toBe(true);
    expect(transitionScenarioPhase(ScenarioPhase.CommandIssued, ScenarioPhase.CommandIssued).success).toBe(true);
    expect(transitionScenarioPhase(ScenarioPhase.Asserting, ScenarioPhase.AwaitingEvent).success).toBe(true);
  });

  test('every outcome moves only to resource_released', () => {
    for (const phase of [ScenarioPhase.Pass, ScenarioPhase.Fail, ScenarioPhase.Error]) {
      expect(transitionScenarioPhase(phase, ScenarioPhase.ResourceReleased).success).toBe(true);
      expect(transitionScenarioPhase(phase, ScenarioPhase.Done).success).toBe(false);
    }
  });

  test('invalid transition: init -> pass', () => {
    const result = transitionScenarioPhase(ScenarioPhase.Init, ScenarioPhase.Pass);
    expect(result.success).toBe(false);
    expect(result.error?.code).toBe('SCENARIO.INVALID_TRANSITION');
    expect(result.error?.message).toBe('Invalid scenario phase transition: init -> pass');
  });

  test('invalid transition: done -> init', () => {
    expect(transitionScenarioPhase(ScenarioPhase.Done, ScenarioPhase.Init).success).toBe(false);
  });

  test('phase classification', () => {
    expect(isOutcomePhase(ScenarioPhase.Fail)).toBe(true);
    expect(isOutcomePhase(ScenarioPhase.Asserting)).toBe(false);
    expect(isTerminalPhase(ScenarioPhase.Done)).toBe(true);
    expect(isTerminalPhase(ScenarioPhase.ResourceReleased)).toBe(false);
    expect(outcomePhase(ScenarioOutcome.Error)).toBe(ScenarioPhase.Error);
  });
});

describe('PhaseTracker', () => {
  test('records accepted phases and notifies', () => {
    const onEnter = jest.fn();
    const tracker = new PhaseTracker(onEnter);

    tracker.enter(ScenarioPhase.ResourceAcquired);
    tracker.enter(ScenarioPhase.Pass);

    expect(tracker.phase).toBe(ScenarioPhase.Pass);
    expect(tracker.history).toEqual([ScenarioPhase.Init, ScenarioPhase.ResourceAcquired, ScenarioPhase.Pass]);
    expect(onEnter).toHaveBeenLastCalledWith(ScenarioPhase.Pass, ScenarioPhase.ResourceAcquired);
  });

  test('rejected phases leave the tracker unchanged', () => {
    const onEnter = jest.fn();
    const tracker = new PhaseTracker(onEnter);

    const result = tracker.enter(ScenarioPhase.Done);

    expect(result.success).toBe(false);
    expect(tracker.phase).toBe(ScenarioPhase.Init);
    expect(tracker.history).toEqual([ScenarioPhase.Init]);
    expect(onEnter).not.toHaveBeenCalled();
  });
});
