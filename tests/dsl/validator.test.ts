import { defineScenario } from '../../src/dsl/builder';
import { findDuplicateIds, validateScenario } from '../../src/dsl/validator';
import { Step } from '../../src/domain/scenario';

function scenario(steps: Step[], overrides: { id?: string; kind?: string; resourceId?: string } = {}) {
  return defineScenario({
    id: overrides.id ?? 'scn_valid',
    resource: { kind: overrides.kind ?? 'tuner', id: overrides.resourceId ?? 'tuner-0' },
    steps,
  });
}

describe('validateScenario', () => {
  test('accepts a well-formed scenario', () => {
    const result = validateScenario(
      scenario([
        { type: 'command', command: { name: 'tune' }, awaits: [{ subject: 'tuner-0', kind: 'channel', timeoutMs: 100 }] },
        { type: 'await', until: () => true, timeoutMs: 100, pollIntervalMs: 5 },
        { type: 'expect', observe: () => 1, expected: 1 },
      ]),
    );
    expect(result).toEqual({ valid: true, errors: [] });
  });

  test('requires an id and a resource', () => {
    const result = validateScenario(scenario([], { id: ' ', kind: '', resourceId: '' }));
    expect(result.errors).toEqual(['id is required', 'resource kind is required', 'resource id is required']);
  });

  test('rejects bad wait budgets and transition counts', () => {
    const result = validateScenario(
      scenario([
        {
          type: 'command',
          label: 'tune',
          command: { name: 'tune' },
          awaits: [{ subject: 'tuner-0', kind: 'channel', transitions: 0, pollIntervalMs: 0 }],
        },
        { type: 'await', label: 'settle', until: () => true, timeoutMs: -5 },
      ]),
    );

    expect(result.valid).toBe(false);
    expect(result.errors).toEqual([
      'step "tune" await #1: transitions must be a positive integer',
      'step "tune" await #1: pollIntervalMs must be at least 1, got 0',
      'step "settle": timeoutMs must be a non-negative number, got -5',
    ]);
  });

  test('rejects missing command names, subjects and kinds', () => {
    const result = validateScenario(
      scenario([{ type: 'command', command: { name: '' }, awaits: [{ subject: '', kind: '' }] }]),
    );
    expect(result.errors).toEqual([
      'step "command#1": command name is required',
      'step "command#1" await #1: subject is required',
      'step "command#1" await #1: kind is required',
    ]);
  });

  test('rejects duplicate step labels', () => {
    const result = validateScenario(
      scenario([
        { type: 'action', label: 'wait', run: () => undefined },
        { type: 'action', label: 'wait', run: () => undefined },
      ]),
    );
    expect(result.errors).toEqual(['duplicate step label "wait"']);
  });
});

describe('findDuplicateIds', () => {
  test('lists each repeated id once', () => {
    const a = scenario([], { id: 'a' });
    const b = scenario([], { id: 'b' });
    expect(findDuplicateIds([a, b, a, a])).toEqual(['a']);
    expect(findDuplicateIds([a, b])).toEqual([]);
  });
});
