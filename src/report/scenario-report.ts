/**
 * ScenarioReport: the outcome of a sweep.
 *
 * Results are kept in execution order. The overall outcome is Fail as
 * soon as any scenario failed or errored, Pass otherwise (including an
 * empty sweep).
 */

import { v4 as uuid } from 'uuid';
import { ScenarioOutcome, ScenarioResult } from '../domain/scenario';

export interface OutcomeCounts {
  total: number;
  pass: number;
  fail: number;
  error: number;
  /** Results whose outcome differs from the scenario's expected outcome. */
  unexpected: number;
}

/** Serializable form of a report, as stored and served. */
export interface ScenarioReportRecord {
  id: string;
  suiteId?: string;
  status: 'running' | 'completed';
  overallOutcome: ScenarioOutcome.Pass | ScenarioOutcome.Fail;
  counts: OutcomeCounts;
  results: ScenarioResult[];
  startedAt: string;
  completedAt?: string;
}

export interface ScenarioReportOptions {
  id?: string;
  suiteId?: string;
  startedAt?: string;
}

export class ScenarioReport {
  readonly id: string;
  readonly suiteId?: string;
  readonly startedAt: string;
  private completedAt?: string;
  private readonly entries: ScenarioResult[] = [];

  constructor(options: ScenarioReportOptions = {}) {
    this.id = options.id ?? `rpt_${uuid()}`;
    this.suiteId = options.suiteId;
    this.startedAt = options.startedAt ?? new Date().toISOString();
  }

  add(result: ScenarioResult): void {
    if (this.completedAt) {
      throw new Error(`Report ${this.id} is complete; results can no longer be added`);
    }
    this.entries.push(Object.isFrozen(result) ? result : Object.freeze({ ...result }));
  }

  /** Mark the report complete. Further add() calls throw. */
  complete(at: string = new Date().toISOString()): void {
    if (!this.completedAt) this.completedAt = at;
  }

  get isComplete(): boolean {
    return this.completedAt !== undefined;
  }

  /** Results in the order they were added, as a frozen snapshot. */
  get results(): readonly ScenarioResult[] {
    return Object.freeze([...this.entries]);
  }

  get length(): number {
    return this.entries.length;
  }

  overallOutcome(): ScenarioOutcome.Pass | ScenarioOutcome.Fail {
    const failed = this.entries.some(
      (r) => r.outcome === ScenarioOutcome.Fail || r.outcome === ScenarioOutcome.Error,
    );
    return failed ? ScenarioOutcome.Fail : ScenarioOutcome.Pass;
  }

  counts(): OutcomeCounts {
    const counts: OutcomeCounts = { total: this.entries.length, pass: 0, fail: 0, error: 0, unexpected: 0 };
    for (const result of this.entries) {
      switch (result.outcome) {
        case ScenarioOutcome.Pass:
          counts.pass++;
          break;
        case ScenarioOutcome.Fail:
          counts.fail++;
          break;
        case ScenarioOutcome.Error:
          counts.error++;
          break;
      }
      if (!result.asExpected) counts.unexpected++;
    }
    return counts;
  }

  /** Process exit code for the sweep: 0 on Pass, 1 otherwise. */
  exitCode(): number {
    return this.overallOutcome() === ScenarioOutcome.Pass ? 0 : 1;
  }

  /** One line per scenario plus a totals line. */
  summaryLines(): string[] {
    const lines = this.entries.map((r) => {
      const base = `${r.outcome.toUpperCase().padEnd(5)} ${r.scenarioId} (${r.elapsedMs}ms)`;
      return r.outcome === ScenarioOutcome.Pass ? base : `${base}: ${r.message}`;
    });
    const c = this.counts();
    lines.push(`${this.overallOutcome().toUpperCase()} ${c.total} scenarios: ${c.pass} passed, ${c.fail} failed, ${c.error} errored`);
    return lines;
  }

  toRecord(): ScenarioReportRecord {
    return {
      id: this.id,
      suiteId: this.suiteId,
      status: this.completedAt ? 'completed' : 'running',
      overallOutcome: this.overallOutcome(),
      counts: this.counts(),
      results: [...this.entries],
      startedAt: this.startedAt,
      completedAt: this.completedAt,
    };
  }
}
