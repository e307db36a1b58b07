/**
 * ConditionWaiter: bounded polling on the waiting flow.
 *
 * The predicate is evaluated once immediately and then every
 * pollIntervalMs until it returns true or the budget runs out. Sleeps
 * never extend past the deadline, so a timed-out wait returns within one
 * poll interval of timeoutMs. Evaluation happens between timer ticks on
 * the caller's flow, leaving the event loop free to deliver the very
 * callbacks being waited for.
 */

import {
  HarnessError,
  TimedOutError,
  validationError,
  waitTimedOutError,
} from '../domain/errors';
import { WaitConfig, checkWaitConfig, mergeWaitConfig } from '../domain/polling';

export interface WaitOptions extends Partial<WaitConfig> {
  /** Names the condition in timeout diagnostics. */
  description?: string;
  /** Inputs reported with a timeout. Called once, when the wait gives up. */
  observe?: () => Record<string, unknown>;
  /** Attached to the TimedOutError raised by waitUntil. */
  scenarioId?: string;
  /** Millisecond clock. Default: Date.now. */
  clock?: () => number;
}

export type WaitResult =
  | { satisfied: true; elapsedMs: number; polls: number }
  | {
      satisfied: false;
      timedOut: true;
      elapsedMs: number;
      polls: number;
      lastObserved: Record<string, unknown>;
    };

/**
 * Poll `predicate` until it holds or the budget elapses.
 * Rejects only when the options are invalid or the predicate throws.
 */
export async function awaitCondition(
  predicate: () => boolean,
  options: WaitOptions = {},
): Promise<WaitResult> {
  const config = mergeWaitConfig(options);
  const problems = checkWaitConfig(config);
  if (problems.length > 0) {
    throw new HarnessError(validationError(`Invalid wait options: ${problems.join('; ')}`, { problems }));
  }

  const now = options.clock ?? Date.now;
  const start = now();
  const deadline = start + config.timeoutMs;
  let polls = 0;

  for (;;) {
    polls++;
    if (predicate()) {
      return { satisfied: true, elapsedMs: now() - start, polls };
    }

    const remaining = deadline - now();
    if (remaining <= 0) {
      return {
        satisfied: false,
        timedOut: true,
        elapsedMs: now() - start,
        polls,
        lastObserved: options.observe?.() ?? {},
      };
    }

    config.onProgress?.({ polls, elapsedMs: now() - start, remainingMs: remaining });
    await sleep(Math.min(config.pollIntervalMs, remaining));
  }
}

/** Like awaitCondition, but rejects with TimedOutError when the budget runs out. */
export async function waitUntil(predicate: () => boolean, options: WaitOptions = {}): Promise<void> {
  const result = await awaitCondition(predicate, options);
  if (result.satisfied) return;

  const timeoutMs = mergeWaitConfig(options).timeoutMs;
  throw new TimedOutError(
    waitTimedOutError(
      options.description ?? 'condition',
      timeoutMs,
      result.elapsedMs,
      result.lastObserved,
      options.scenarioId,
    ),
    result.elapsedMs,
    result.lastObserved,
  );
}

/**
 * One-shot gate: open() releases every blocked waiter and keeps the latch
 * open until close(). Suits completion callbacks that fire once per request.
 */
export class Latch {
  private opened = false;
  private waiters = new Set<() => void>();

  open(): void {
    this.opened = true;
    const waiters = [...this.waiters];
    this.waiters.clear();
    for (const wake of waiters) wake();
  }

  close(): void {
    this.opened = false;
  }

  get isOpen(): boolean {
    return this.opened;
  }

  /** Resolve true once open, or false after timeoutMs. */
  block(timeoutMs: number): Promise<boolean> {
    if (this.opened) return Promise.resolve(true);
    return new Promise<boolean>((resolve) => {
      const wake = () => {
        clearTimeout(timer);
        resolve(true);
      };
      const timer = setTimeout(() => {
        this.waiters.delete(wake);
        resolve(false);
      }, timeoutMs);
      this.waiters.add(wake);
    });
  }

  /** Wait for the latch, then close it for the next round. */
  async waitAndReset(timeoutMs: number, description = 'latch to open', scenarioId?: string): Promise<void> {
    const start = Date.now();
    if (await this.block(timeoutMs)) {
      this.close();
      return;
    }
    const elapsedMs = Date.now() - start;
    const lastObserved = { open: this.opened };
    throw new TimedOutError(
      waitTimedOutError(description, timeoutMs, elapsedMs, lastObserved, scenarioId),
      elapsedMs,
      lastObserved,
    );
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
