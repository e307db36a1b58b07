/**
 * SimulatedDeviceHub: an in-process collaborator.
 *
 * Devices are acquired exclusively. Commands are answered by per-command
 * behaviours that schedule events on their own timers, so callbacks
 * arrive on a later macrotask exactly like a real asynchronous
 * subsystem. Releasing a device drops its pending events.
 */

import { v4 as uuid } from 'uuid';
import {
  Collaborator,
  CommandSpec,
  EventSink,
  ResourceHandle,
  ResourceSpec,
} from '../domain/collaborator';

export interface SimulatedDevice {
  id: string;
  kind: string;
  /** Static facts behaviours may read (supported sizes, track lists...). */
  properties?: Record<string, unknown>;
}

/** What a behaviour can do in response to a command. */
export interface BehaviourContext {
  handle: ResourceHandle;
  device: SimulatedDevice;
  command: CommandSpec;
  /** Default latency of the hub. */
  latencyMs: number;
  /** Deliver an event after delayMs (default: the hub latency). */
  emit(subject: string, kind: string, value: unknown, delayMs?: number): void;
}

/** Throw to reject the command synchronously. */
export type CommandBehaviour = (ctx: BehaviourContext) => void;

export interface SimulatedDeviceHubOptions {
  devices: SimulatedDevice[];
  /** Default event latency in ms. Default: 50. */
  latencyMs?: number;
  behaviours?: Record<string, CommandBehaviour>;
  /** Resource ids whose release rejects. */
  failReleaseFor?: string[];
}

export interface HubStats {
  acquired: number;
  released: number;
  commands: number;
  emitted: number;
}

/** Behaviours shared by most simulated suites. */
export const DEFAULT_BEHAVIOURS: Record<string, CommandBehaviour> = {
  /** Bring the device up; reports `available: true`. */
  open: ({ device, emit }) => {
    emit(device.id, 'available', true);
  },
  /** Select a track: `args.trackType`, `args.trackId`. */
  selectTrack: ({ device, command, emit }) => {
    const trackType = String(command.args?.trackType ?? 'video');
    emit(device.id, `selectedTrack:${trackType}`, command.args?.trackId ?? null);
  },
  /** Capture a frame: `args.width`, `args.height`, `args.format`. */
  capture: ({ device, command, emit }) => {
    emit(device.id, 'captureResult', {
      width: command.args?.width ?? 640,
      height: command.args?.height ?? 480,
      format: command.args?.format ?? 'jpeg',
    });
  },
  /** Emit `count` results, one latency apart. */
  burst: ({ device, command, emit, latencyMs }) => {
    const count = Number(command.args?.count ?? 1);
    for (let i = 1; i <= count; i++) {
      emit(device.id, 'result', i, latencyMs * i);
    }
  },
};

export class SimulatedDeviceHub implements Collaborator {
  private readonly devices = new Map<string, SimulatedDevice>();
  private readonly held = new Map<string, ResourceHandle>();
  private readonly timers = new Map<string, Set<NodeJS.Timeout>>();
  private sinks: EventSink[] = [];
  private readonly behaviours: Record<string, CommandBehaviour>;
  private readonly latencyMs: number;
  private readonly failRelease: Set<string>;
  private readonly counters: HubStats = { acquired: 0, released: 0, commands: 0, emitted: 0 };

  constructor(options: SimulatedDeviceHubOptions) {
    for (const device of options.devices) this.devices.set(device.id, device);
    this.behaviours = { ...DEFAULT_BEHAVIOURS, ...options.behaviours };
    this.latencyMs = options.latencyMs ?? 50;
    this.failRelease = new Set(options.failReleaseFor ?? []);
  }

  async acquireResource(spec: ResourceSpec): Promise<ResourceHandle | null> {
    const device = this.devices.get(spec.id);
    if (!device || device.kind !== spec.kind) return null;
    if (this.held.has(device.id)) {
      throw new Error(`Device ${device.id} is already in use`);
    }
    const handle: ResourceHandle = Object.freeze({ id: `hdl_${uuid()}`, resourceId: device.id, kind: device.kind });
    this.held.set(device.id, handle);
    this.counters.acquired++;
    return handle;
  }

  async releaseResource(handle: ResourceHandle): Promise<void> {
    this.assertHeld(handle);
    this.cancelPending(handle.id);
    this.held.delete(handle.resourceId);
    this.counters.released++;
    if (this.failRelease.has(handle.resourceId)) {
      throw new Error(`Device ${handle.resourceId} did not close cleanly`);
    }
  }

  async issueCommand(handle: ResourceHandle, command: CommandSpec): Promise<void> {
    this.assertHeld(handle);
    const behaviour = this.behaviours[command.name];
    if (!behaviour) {
      throw new Error(`Unsupported command "${command.name}"`);
    }
    const device = this.devices.get(handle.resourceId);
    if (!device) {
      throw new Error(`Unknown device ${handle.resourceId}`);
    }
    this.counters.commands++;
    behaviour({
      handle,
      device,
      command,
      latencyMs: this.latencyMs,
      emit: (subject, kind, value, delayMs) => this.schedule(handle.id, subject, kind, value, delayMs ?? this.latencyMs),
    });
  }

  onEvent(sink: EventSink): () => void {
    this.sinks.push(sink);
    return () => {
      this.sinks = this.sinks.filter((s) => s !== sink);
    };
  }

  /** Deliver an event right now, outside any command (e.g. a spontaneous state change). */
  emitNow(subject: string, kind: string, value: unknown): void {
    this.deliver(subject, kind, value);
  }

  isHeld(resourceId: string): boolean {
    return this.held.has(resourceId);
  }

  get stats(): Readonly<HubStats> {
    return { ...this.counters };
  }

  /** Number of events scheduled but not yet delivered. */
  get pendingEvents(): number {
    let total = 0;
    for (const set of this.timers.values()) total += set.size;
    return total;
  }

  /** Drop every pending event and all held devices. */
  dispose(): void {
    for (const handleId of [...this.timers.keys()]) this.cancelPending(handleId);
    this.held.clear();
    this.sinks = [];
  }

  private schedule(handleId: string, subject: string, kind: string, value: unknown, delayMs: number): void {
    const pending = this.timers.get(handleId) ?? new Set<NodeJS.Timeout>();
    const timer = setTimeout(() => {
      pending.delete(timer);
      this.deliver(subject, kind, value);
    }, delayMs);
    pending.add(timer);
    this.timers.set(handleId, pending);
  }

  private deliver(subject: string, kind: string, value: unknown): void {
    this.counters.emitted++;
    for (const sink of [...this.sinks]) sink(subject, kind, value);
  }

  private cancelPending(handleId: string): void {
    const pending = this.timers.get(handleId);
    if (!pending) return;
    for (const timer of pending) clearTimeout(timer);
    this.timers.delete(handleId);
  }

  private assertHeld(handle: ResourceHandle): void {
    const current = this.held.get(handle.resourceId);
    if (!current || current.id !== handle.id) {
      throw new Error(`Handle ${handle.id} does not hold ${handle.resourceId}`);
    }
  }
}
