/**
 * EventLog: the record collaborator callbacks post into.
 *
 * Each (subject, kind) pair owns an entry with a generation counter and
 * the latest value. Callbacks and waiters share the Node event loop, so
 * record() runs to completion before any reader observes the log; a
 * reader always sees every event recorded before it runs.
 */

import { EventSink } from '../domain/collaborator';
import {
  EventFilter,
  EventLogReader,
  EventSnapshot,
  HarnessEvent,
} from '../domain/events';

interface Entry {
  generation: number;
  hasValue: boolean;
  latestValue: unknown;
  lastSequence: number;
}

export interface EventLogOptions {
  /** Maximum events kept in history. Counters and latest values are never dropped. */
  historyLimit?: number;
  now?: () => Date;
}

const DEFAULT_HISTORY_LIMIT = 1_000;

function entryKey(subject: string, kind: string): string {
  return JSON.stringify([subject, kind]);
}

function matches(event: HarnessEvent, filter?: EventFilter): boolean {
  if (!filter) return true;
  if (filter.subject !== undefined && event.subject !== filter.subject) return false;
  if (filter.kind !== undefined && event.kind !== filter.kind) return false;
  return true;
}

export class EventLog implements EventLogReader {
  private entries = new Map<string, Entry>();
  private history: HarnessEvent[] = [];
  private sequence = 0;
  private readonly historyLimit: number;
  private readonly now: () => Date;

  /** Bound record function, suitable for Collaborator.onEvent. */
  readonly sink: EventSink = (subject, kind, value) => {
    this.record(subject, kind, value);
  };

  constructor(options: EventLogOptions = {}) {
    this.historyLimit = Math.max(1, options.historyLimit ?? DEFAULT_HISTORY_LIMIT);
    this.now = options.now ?? (() => new Date());
  }

  /** Append an event and bump the generation of its (subject, kind). */
  record(subject: string, kind: string, value: unknown): HarnessEvent {
    this.sequence += 1;
    const event: HarnessEvent = Object.freeze({
      sequence: this.sequence,
      subject,
      kind,
      value,
      timestamp: this.now().toISOString(),
    });

    const key = entryKey(subject, kind);
    const entry = this.entries.get(key) ?? { generation: 0, hasValue: false, latestValue: undefined, lastSequence: 0 };
    entry.generation += 1;
    entry.hasValue = true;
    entry.latestValue = value;
    entry.lastSequence = event.sequence;
    this.entries.set(key, entry);

    this.history.push(event);
    if (this.history.length > this.historyLimit) {
      this.history.splice(0, this.history.length - this.historyLimit);
    }
    return event;
  }

  generationOf(subject: string, kind: string): number {
    return this.entries.get(entryKey(subject, kind))?.generation ?? 0;
  }

  latestValue(subject: string, kind: string): unknown {
    return this.entries.get(entryKey(subject, kind))?.latestValue;
  }

  hasValue(subject: string, kind: string): boolean {
    return this.entries.get(entryKey(subject, kind))?.hasValue ?? false;
  }

  snapshot(subject: string, kind: string): EventSnapshot {
    const entry = this.entries.get(entryKey(subject, kind));
    return {
      subject,
      kind,
      generation: entry?.generation ?? 0,
      hasValue: entry?.hasValue ?? false,
      latestValue: entry?.latestValue,
      lastSequence: entry?.lastSequence ?? 0,
    };
  }

  /** Retained history, oldest first. */
  events(filter?: EventFilter): readonly HarnessEvent[] {
    return this.history.filter((event) => matches(event, filter));
  }

  /** Retained events with a sequence strictly greater than `sequence`. */
  eventsSince(sequence: number, filter?: EventFilter): readonly HarnessEvent[] {
    return this.history.filter((event) => event.sequence > sequence && matches(event, filter));
  }

  get lastSequence(): number {
    return this.sequence;
  }

  /** Read-only view that cannot be used to record. */
  reader(): EventLogReader {
    const log = this;
    return {
      generationOf: (subject, kind) => this.generationOf(subject, kind),
      latestValue: (subject, kind) => this.latestValue(subject, kind),
      hasValue: (subject, kind) => this.hasValue(subject, kind),
      snapshot: (subject, kind) => this.snapshot(subject, kind),
      events: (filter) => this.events(filter),
      eventsSince: (sequence, filter) => this.eventsSince(sequence, filter),
      get lastSequence() {
        return log.lastSequence;
      },
    };
  }
}
