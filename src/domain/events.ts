/**
 * Event models.
 *
 * Two families live here: HarnessEvent, posted by collaborator callbacks
 * into a scenario's EventLog, and LifecycleEvent, published by the harness
 * about its own sweeps and scenarios.
 */

/** An event delivered by the collaborator. Frozen once appended. */
export interface HarnessEvent {
  /** Log-wide monotonic counter, starting at 1. */
  readonly sequence: number;
  readonly subject: string;
  readonly kind: string;
  readonly value: unknown;
  readonly timestamp: string;
}

/** Per-(subject, kind) view of the log. */
export interface EventSnapshot {
  subject: string;
  kind: string;
  generation: number;
  hasValue: boolean;
  latestValue: unknown;
  /** Sequence of the latest event for this pair, 0 when none. */
  lastSequence: number;
}

/** Filter for event history queries. */
export interface EventFilter {
  subject?: string;
  kind?: string;
}

/** Read-only view of an EventLog handed to steps and predicates. */
export interface EventLogReader {
  generationOf(subject: string, kind: string): number;
  latestValue(subject: string, kind: string): unknown;
  hasValue(subject: string, kind: string): boolean;
  snapshot(subject: string, kind: string): EventSnapshot;
  events(filter?: EventFilter): readonly HarnessEvent[];
  eventsSince(sequence: number, filter?: EventFilter): readonly HarnessEvent[];
  readonly lastSequence: number;
}

/** Lifecycle event type taxonomy. */
export type LifecycleEventType =
  | 'sweep.started'
  | 'sweep.completed'
  | 'scenario.started'
  | 'scenario.phase'
  | 'scenario.completed'
  | 'resource.release_failed';

/** A lifecycle event published by the harness. */
export interface LifecycleEvent {
  id: string;
  type: LifecycleEventType;
  schemaVersion: string;
  timestamp: string;
  reportId?: string;
  scenarioId?: string;
  payload: Record<string, unknown>;
}

/** Subscription to lifecycle events. */
export interface LifecycleSubscription {
  id: string;
  /** Only deliver events for this report. */
  reportId?: string;
  eventTypes?: LifecycleEventType[];
  callback: (event: LifecycleEvent) => void;
}
