/**
 * Scenario builders.
 *
 * defineScenario() freezes a definition so nothing can change it while it
 * runs. expandSweep() turns one template and the values of a single varied
 * dimension (device instance, data vector, size combination) into an
 * ordered list of scenarios.
 */

import { ResourceSpec } from '../domain/collaborator';
import { Scenario, ScenarioOutcome, Step } from '../domain/scenario';

export interface ScenarioInput {
  id: string;
  description?: string;
  resource: ResourceSpec;
  params?: Record<string, unknown>;
  steps: Step[];
  /** Default: pass. */
  expectedOutcome?: ScenarioOutcome;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) return false;
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Frozen copies of plain objects and arrays. Anything else (typed arrays,
 * class instances, functions) is kept by reference and left unfrozen.
 */
function frozenCopy(value: unknown): unknown {
  if (Array.isArray(value)) return Object.freeze(value.map(frozenCopy));
  if (isPlainObject(value)) return frozenRecord(value);
  return value;
}

function frozenRecord(record: Record<string, unknown>): Readonly<Record<string, unknown>> {
  const copy: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(record)) copy[key] = frozenCopy(value);
  return Object.freeze(copy);
}

export function defineScenario(input: ScenarioInput): Scenario {
  const { options, ...resource } = input.resource;
  return Object.freeze({
    id: input.id,
    description: input.description,
    resource: Object.freeze(options ? { ...resource, options: frozenRecord(options) } : resource),
    params: frozenRecord(input.params ?? {}),
    steps: Object.freeze(input.steps.map((step) => Object.freeze({ ...step }))),
    expectedOutcome: input.expectedOutcome ?? ScenarioOutcome.Pass,
  });
}

/** Template for a sweep over one dimension with values of type V. */
export interface SweepTemplate<V> {
  /** Scenario id for each value. */
  id: (value: V, index: number) => string;
  description?: (value: V, index: number) => string;
  resource: ResourceSpec | ((value: V, index: number) => ResourceSpec);
  /** Parameters shared by every scenario; the varied value is added under `variant`. */
  params?: Record<string, unknown>;
  steps: (value: V, index: number) => Step[];
  expectedOutcome?: ScenarioOutcome | ((value: V, index: number) => ScenarioOutcome);
}

export function expandSweep<V>(template: SweepTemplate<V>, values: readonly V[]): Scenario[] {
  return values.map((value, index) =>
    defineScenario({
      id: template.id(value, index),
      description: template.description?.(value, index),
      resource: typeof template.resource === 'function' ? template.resource(value, index) : template.resource,
      params: { ...template.params, variant: value },
      steps: template.steps(value, index),
      expectedOutcome:
        typeof template.expectedOutcome === 'function'
          ? template.expectedOutcome(value, index)
          : template.expectedOutcome,
    }),
  );
}
