/**
 * Storage layer interfaces.
 *
 * Defines the contract for persisting sweep reports and lifecycle events
 * with pluggable backends.
 */

import { LifecycleEvent, LifecycleEventType } from '../domain/events';
import { ScenarioReportRecord } from '../report/scenario-report';

/** Generic list query options. */
export interface ListOptions {
  limit?: number;
  offset?: number;
}

/** Store interface for sweep reports. */
export interface ReportStore {
  create(report: ScenarioReportRecord): Promise<ScenarioReportRecord>;
  getById(id: string): Promise<ScenarioReportRecord | null>;
  /** Replace the stored record; null when the id is unknown. */
  update(id: string, report: ScenarioReportRecord): Promise<ScenarioReportRecord | null>;
  /** Most recently started first. */
  list(options?: ListOptions & { suiteId?: string }): Promise<ScenarioReportRecord[]>;
}

/** Store interface for lifecycle events. */
export interface LifecycleEventStore {
  create(event: LifecycleEvent): Promise<LifecycleEvent>;
  /** Oldest first. */
  listByReport(
    reportId: string,
    options?: ListOptions & { eventTypes?: LifecycleEventType[] },
  ): Promise<LifecycleEvent[]>;
}

/** Combined store interface. */
export interface Store {
  reports: ReportStore;
  events: LifecycleEventStore;
}
