/**
 * ExpectationCollector: soft assertions.
 *
 * Each expect* call records a mismatch instead of throwing, so one pass
 * over a captured result reports every wrong field at once. The step that
 * owns the collector calls throwIfFailed() when it is done.
 */

import { AssertionMismatchError, assertionMismatchError } from '../domain/errors';
import { ExpectationSink } from '../domain/scenario';
import {
  EXACT,
  Tolerance,
  formatMismatch,
  formatValue,
  structuralMismatches,
} from '../domain/tolerance';

export class ExpectationCollector implements ExpectationSink {
  private readonly failures: string[] = [];
  private checks = 0;

  constructor(
    private readonly label: string,
    private readonly scenarioId?: string,
  ) {}

  expectTrue(message: string, condition: boolean): boolean {
    this.checks++;
    if (!condition) this.failures.push(message);
    return condition;
  }

  expectEquals(label: string, actual: unknown, expected: unknown, tolerance: Tolerance = EXACT): boolean {
    this.checks++;
    const mismatches = structuralMismatches(actual, expected, tolerance);
    for (const mismatch of mismatches) {
      this.failures.push(formatMismatch(mismatch, label));
    }
    return mismatches.length === 0;
  }

  expectWithin(label: string, actual: number, min: number, max: number): boolean {
    this.checks++;
    const ok = actual >= min && actual <= max;
    if (!ok) this.failures.push(`${label}: ${formatValue(actual)} not in [${min}, ${max}]`);
    return ok;
  }

  expectNotNull<T>(label: string, value: T | null | undefined): value is T {
    this.checks++;
    if (value === null || value === undefined) {
      this.failures.push(`${label}: expected a value, got ${formatValue(value)}`);
      return false;
    }
    return true;
  }

  expectContains<T>(label: string, collection: readonly T[], item: T): boolean {
    this.checks++;
    const ok = collection.includes(item);
    if (!ok) this.failures.push(`${label}: ${formatValue(item)} not in ${formatValue(collection)}`);
    return ok;
  }

  get checkCount(): number {
    return this.checks;
  }

  get mismatches(): readonly string[] {
    return this.failures;
  }

  hasFailures(): boolean {
    return this.failures.length > 0;
  }

  throwIfFailed(): void {
    if (this.failures.length === 0) return;
    const mismatches = [...this.failures];
    throw new AssertionMismatchError(assertionMismatchError(this.label, mismatches, this.scenarioId), mismatches);
  }
}
