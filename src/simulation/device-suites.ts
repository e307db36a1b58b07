/**
 * Built-in suites backed by SimulatedDeviceHub.
 */

import { defineScenario, expandSweep } from '../dsl/builder';
import { WAIT_PRESETS } from '../domain/polling';
import { Scenario } from '../domain/scenario';
import { SuiteDefinition, SuiteRegistry } from '../suites/registry';
import { SimulatedDevice, SimulatedDeviceHub } from './simulated-device';

export const SIMULATED_CAMERAS: SimulatedDevice[] = [
  { id: 'cam-0', kind: 'camera', properties: { facing: 'back' } },
  { id: 'cam-1', kind: 'camera', properties: { facing: 'front' } },
  { id: 'cam-2', kind: 'camera', properties: { facing: 'external' } },
];

const CAPTURE_SIZES: Array<{ width: number; height: number }> = [
  { width: 640, height: 480 },
  { width: 1280, height: 720 },
  { width: 1920, height: 1080 },
];

const BURST_COUNT = 4;

function availabilityScenarios(): Scenario[] {
  return expandSweep<SimulatedDevice>(
    {
      id: (device) => `availability-${device.id}`,
      description: (device) => `${device.id} reports available after open`,
      resource: (device) => ({ kind: device.kind, id: device.id }),
      steps: (device) => [
        {
          type: 'command',
          label: 'open',
          command: { name: 'open' },
          awaits: [
            {
              subject: device.id,
              kind: 'available',
              timeoutMs: WAIT_PRESETS.uiTransition.timeoutMs,
              pollIntervalMs: WAIT_PRESETS.uiTransition.pollIntervalMs,
            },
          ],
        },
        {
          type: 'expect',
          label: 'available',
          observe: (ctx) => ctx.events.latestValue(device.id, 'available'),
          expected: true,
        },
      ],
    },
    SIMULATED_CAMERAS,
  );
}

function captureScenarios(): Scenario[] {
  return expandSweep(
    {
      id: (size) => `capture-${size.width}x${size.height}`,
      description: (size) => `capture result matches the requested ${size.width}x${size.height}`,
      resource: { kind: 'camera', id: 'cam-0' },
      steps: (size) => [
        {
          type: 'command',
          label: 'capture',
          command: { name: 'capture', args: { ...size, format: 'jpeg' } },
          awaits: [
            {
              subject: 'cam-0',
              kind: 'captureResult',
              timeoutMs: WAIT_PRESETS.resultDrain.timeoutMs,
              pollIntervalMs: WAIT_PRESETS.resultDrain.pollIntervalMs,
            },
          ],
        },
        {
          type: 'assert',
          label: 'capture result',
          check: (ctx, expect) => {
            const result = ctx.events.latestValue('cam-0', 'captureResult');
            expect.expectEquals('captureResult', result, { ...size, format: 'jpeg' });
          },
        },
      ],
    },
    CAPTURE_SIZES,
  );
}

function burstScenario(): Scenario {
  return defineScenario({
    id: 'burst-drain',
    description: `every one of ${BURST_COUNT} burst results is delivered in order`,
    resource: { kind: 'camera', id: 'cam-1' },
    params: { count: BURST_COUNT },
    steps: [
      {
        type: 'command',
        label: 'burst',
        command: { name: 'burst', args: { count: BURST_COUNT } },
        awaits: [
          {
            subject: 'cam-1',
            kind: 'result',
            transitions: BURST_COUNT,
            timeoutMs: WAIT_PRESETS.resultDrain.timeoutMs,
            pollIntervalMs: WAIT_PRESETS.resultDrain.pollIntervalMs,
          },
        ],
      },
      {
        type: 'expect',
        label: 'results in order',
        observe: (ctx) => ctx.events.events({ subject: 'cam-1', kind: 'result' }).map((e) => e.value),
        expected: Array.from({ length: BURST_COUNT }, (_, i) => i + 1),
      },
    ],
  });
}

export const SIMULATED_DEVICE_SUITE: SuiteDefinition = {
  id: 'simulated-device-availability',
  description: 'Opens, captures from and drains every simulated camera',
  createCollaborator: () => {
    const hub = new SimulatedDeviceHub({ devices: SIMULATED_CAMERAS, latencyMs: 20 });
    return { collaborator: hub, dispose: () => hub.dispose() };
  },
  scenarios: () => [...availabilityScenarios(), ...captureScenarios(), burstScenario()],
};

/** A registry holding every built-in suite. */
export function createBuiltinRegistry(): SuiteRegistry {
  const registry = new SuiteRegistry();
  registry.register(SIMULATED_DEVICE_SUITE);
  return registry;
}
