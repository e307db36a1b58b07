/**
 * Scenario validator.
 *
 * Catches definition mistakes before a scenario touches a resource:
 * missing identifiers, nonsensical wait budgets and duplicate ids within
 * a sweep.
 */

import { Scenario, Step, stepLabel } from '../domain/scenario';
import { checkWaitConfig } from '../domain/polling';

export interface ScenarioValidationResult {
  valid: boolean;
  errors: string[];
}

function checkOptionalBudget(
  where: string,
  budget: { timeoutMs?: number; pollIntervalMs?: number },
  errors: string[],
): void {
  if (budget.timeoutMs === undefined && budget.pollIntervalMs === undefined) return;
  const problems = checkWaitConfig({
    timeoutMs: budget.timeoutMs ?? 0,
    pollIntervalMs: budget.pollIntervalMs ?? 1,
  });
  for (const problem of problems) errors.push(`${where}: ${problem}`);
}

function validateStep(step: Step, index: number, errors: string[]): void {
  const where = `step "${stepLabel(step, index)}"`;
  switch (step.type) {
    case 'command':
      if (!step.command?.name) errors.push(`${where}: command name is required`);
      for (const [i, wait] of (step.awaits ?? []).entries()) {
        const waitWhere = `${where} await #${i + 1}`;
        if (!wait.subject) errors.push(`${waitWhere}: subject is required`);
        if (!wait.kind) errors.push(`${waitWhere}: kind is required`);
        if (wait.transitions !== undefined && (!Number.isInteger(wait.transitions) || wait.transitions < 1)) {
          errors.push(`${waitWhere}: transitions must be a positive integer`);
        }
        checkOptionalBudget(waitWhere, wait, errors);
      }
      break;
    case 'await':
      checkOptionalBudget(where, step, errors);
      break;
    case 'expect':
    case 'assert':
    case 'action':
      break;
  }
}

export function validateScenario(scenario: Scenario): ScenarioValidationResult {
  const errors: string[] = [];

  if (!scenario.id || !scenario.id.trim()) errors.push('id is required');
  if (!scenario.resource) {
    errors.push('resource is required');
  } else {
    if (!scenario.resource.kind) errors.push('resource kind is required');
    if (!scenario.resource.id) errors.push('resource id is required');
  }

  if (!Array.isArray(scenario.steps)) {
    errors.push('steps must be an array');
    return { valid: false, errors };
  }

  const labels = new Set<string>();
  scenario.steps.forEach((step, index) => {
    const label = stepLabel(step, index);
    if (labels.has(label)) errors.push(`duplicate step label "${label}"`);
    labels.add(label);
    validateStep(step, index, errors);
  });

  return { valid: errors.length === 0, errors };
}

/** Ids that occur more than once, in first-seen order. */
export function findDuplicateIds(scenarios: readonly Scenario[]): string[] {
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const scenario of scenarios) {
    if (seen.has(scenario.id)) duplicates.add(scenario.id);
    seen.add(scenario.id);
  }
  return [...duplicates];
}
