/**
 * In-memory storage implementation.
 *
 * Reference implementation for development and testing. Records are
 * deep-copied on the way in and out so callers never alias stored state.
 */

import { LifecycleEvent, LifecycleEventType } from '../domain/events';
import { ScenarioReportRecord } from '../report/scenario-report';
import {
  LifecycleEventStore,
  ListOptions,
  ReportStore,
  Store,
} from './store';

function applyListOptions<T>(items: T[], options?: ListOptions): T[] {
  const offset = options?.offset ?? 0;
  const limit = options?.limit ?? 100;
  return items.slice(offset, offset + limit);
}

function deepCopy<T>(obj: T): T {
  return structuredClone(obj);
}

class MemoryReportStore implements ReportStore {
  private data = new Map<string, ScenarioReportRecord>();

  async create(report: ScenarioReportRecord): Promise<ScenarioReportRecord> {
    if (this.data.has(report.id)) {
      throw new Error(`Report already exists: ${report.id}`);
    }
    this.data.set(report.id, deepCopy(report));
    return deepCopy(report);
  }

  async getById(id: string): Promise<ScenarioReportRecord | null> {
    const report = this.data.get(id);
    return report ? deepCopy(report) : null;
  }

  async update(id: string, report: ScenarioReportRecord): Promise<ScenarioReportRecord | null> {
    if (!this.data.has(id)) return null;
    const updated = { ...deepCopy(report), id };
    this.data.set(id, updated);
    return deepCopy(updated);
  }

  async list(options?: ListOptions & { suiteId?: string }): Promise<ScenarioReportRecord[]> {
    const items = [...this.data.values()]
      .filter((r) => !options?.suiteId || r.suiteId === options.suiteId)
      .sort((a, b) => b.startedAt.localeCompare(a.startedAt));
    return applyListOptions(items, options).map(deepCopy);
  }
}

class MemoryLifecycleEventStore implements LifecycleEventStore {
  private data: LifecycleEvent[] = [];

  async create(event: LifecycleEvent): Promise<LifecycleEvent> {
    this.data.push(deepCopy(event));
    return deepCopy(event);
  }

  async listByReport(
    reportId: string,
    options?: ListOptions & { eventTypes?: LifecycleEventType[] },
  ): Promise<LifecycleEvent[]> {
    const eventTypes = options?.eventTypes;
    const items = this.data.filter(
      (e) => e.reportId === reportId && (!eventTypes?.length || eventTypes.includes(e.type)),
    );
    return applyListOptions(items, options).map(deepCopy);
  }
}

/** Create a new in-memory store. */
export function createMemoryStore(): Store {
  return {
    reports: new MemoryReportStore(),
    events: new MemoryLifecycleEventStore(),
  };
}
