import { Latch, awaitCondition, waitUntil } from '../../src/engine/condition-waiter';
import { EventLog } from '../../src/engine/event-log';
import { HarnessError, TimedOutError } from '../../src/domain/errors';

describe('awaitCondition', () => {
  test('returns immediately when the predicate already holds', async () => {
    const result = await awaitCondition(() => true, { timeoutMs: 1000, pollIntervalMs: 10 });
    expect(result.satisfied).toBe(true);
    expect(result.polls).toBe(1);
  });

  test('polls until the predicate holds', async () => {
    let calls = 0;
    const onProgress = jest.fn();
    const result = await awaitCondition(() => ++calls >= 3, { timeoutMs: 1000, pollIntervalMs: 5, onProgress });

    expect(result.satisfied).toBe(true);
    expect(result.polls).toBe(3);
    expect(onProgress).toHaveBeenCalledTimes(2);
    expect(onProgress.mock.calls[0][0].polls).toBe(1);
  });

  test('times out within one poll interval of the budget', async () => {
    const started = Date.now();
    const result = await awaitCondition(() => false, { timeoutMs: 200, pollIntervalMs: 10 });
    const wall = Date.now() - started;

    expect(result.satisfied).toBe(false);
    expect(result.elapsedMs).toBeGreaterThanOrEqual(200);
    expect(result.elapsedMs).toBeLessThan(200 + 10 + 100);
    expect(wall).toBeLessThan(200 + 10 + 100);
  });

  test('reports the observed inputs on timeout', async () => {
    const result = await awaitCondition(() => false, {
      timeoutMs: 20,
      pollIntervalMs: 5,
      observe: () => ({ generation: 0 }),
    });
    if (result.satisfied) throw new Error('expected a timeout');
    expect(result.timedOut).toBe(true);
    expect(result.lastObserved).toEqual({ generation: 0 });
  });

  test('zero budget evaluates exactly once', async () => {
    const predicate = jest.fn(() => false);
    const result = await awaitCondition(predicate, { timeoutMs: 0, pollIntervalMs: 10 });
    expect(result.satisfied).toBe(false);
    expect(predicate).toHaveBeenCalledTimes(1);
  });

  test('rejects a poll interval below 1ms', async () => {
    await expect(awaitCondition(() => true, { timeoutMs: 100, pollIntervalMs: 0 })).rejects.toBeInstanceOf(HarnessError);
  });

  test('a throwing predicate rejects the wait with its error', async () => {
    const boom = new Error('predicate exploded');
    await expect(
      awaitCondition(() => {
        throw boom;
      }, { timeoutMs: 100, pollIntervalMs: 5 }),
    ).rejects.toBe(boom);
  });

  test('observes a transition posted between polls without missing it', async () => {
    // Events arrive on their own timers while the waiter polls every 1ms.
    for (let round = 0; round < 25; round++) {
      const log = new EventLog();
      const baseline = log.generationOf('tuner', 'channel');
      const delay = round % 6;
      const timer = setTimeout(() => log.record('tuner', 'channel', round), delay);

      const result = await awaitCondition(() => log.generationOf('tuner', 'channel') > baseline, {
        timeoutMs: 1000,
        pollIntervalMs: 1,
      });

      clearTimeout(timer);
      expect(result.satisfied).toBe(true);
      expect(log.latestValue('tuner', 'channel')).toBe(round);
    }
  });

  test('a transition recorded before the wait starts still counts against the baseline', async () => {
    const log = new EventLog();
    const baseline = log.generationOf('a', 'x');
    log.record('a', 'x', 1);

    const result = await awaitCondition(() => log.generationOf('a', 'x') > baseline, {
      timeoutMs: 0,
      pollIntervalMs: 1,
    });
    expect(result.satisfied).toBe(true);
  });
});

describe('waitUntil', () => {
  test('resolves when satisfied', async () => {
    await expect(waitUntil(() => true, { timeoutMs: 10, pollIntervalMs: 1 })).resolves.toBeUndefined();
  });

  test('rejects with TimedOutError carrying diagnostics', async () => {
    let caught: unknown;
    try {
      await waitUntil(() => false, {
        timeoutMs: 30,
        pollIntervalMs: 5,
        description: 'channel to change',
        observe: () => ({ generation: 0, baseline: 0 }),
        scenarioId: 'scn_1',
      });
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(TimedOutError);
    if (!(caught instanceof TimedOutError)) return;
    expect(caught.typedError.code).toBe('WAIT.TIMED_OUT');
    expect(caught.typedError.scenarioId).toBe('scn_1');
    expect(caught.elapsedMs).toBeGreaterThanOrEqual(30);
    expect(caught.lastObserved).toEqual({ generation: 0, baseline: 0 });
    expect(caught.message).toContain('waiting for channel to change (budget 30ms)');
    expect(caught.message).toContain('last observed {"generation":0,"baseline":0}');
  });
});

describe('Latch', () => {
  test('block resolves true at once when already open', async () => {
    const latch = new Latch();
    latch.open();
    await expect(latch.block(10)).resolves.toBe(true);
  });

  test('block resolves true when opened later', async () => {
    const latch = new Latch();
    setTimeout(() => latch.open(), 20);
    await expect(latch.block(1000)).resolves.toBe(true);
    expect(latch.isOpen).toBe(true);
  });

  test('block resolves false on timeout', async () => {
    const latch = new Latch();
    await expect(latch.block(20)).resolves.toBe(false);
  });

  test('open wakes every waiter', async () => {
    const latch = new Latch();
    const waits = [latch.block(1000), latch.block(1000)];
    latch.open();
    await expect(Promise.all(waits)).resolves.toEqual([true, true]);
  });

  test('waitAndReset closes the latch after a successful wait', async () => {
    const latch = new Latch();
    setTimeout(() => latch.open(), 5);
    await latch.waitAndReset(1000);
    expect(latch.isOpen).toBe(false);
  });

  test('waitAndReset rejects with TimedOutError when never opened', async () => {
    const latch = new Latch();
    const failure = latch.waitAndReset(20, 'focus to lock', 'scn_focus');
    await expect(failure).rejects.toBeInstanceOf(TimedOutError);
    await expect(failure).rejects.toMatchObject({
      lastObserved: { open: false },
      typedError: { code: 'WAIT.TIMED_OUT', scenarioId: 'scn_focus' },
    });
  });
});
