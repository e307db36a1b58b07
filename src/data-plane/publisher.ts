/**
 * Lifecycle Publisher.
 *
 * Emits stable, versioned harness events (sweep and scenario lifecycle,
 * release failures), persists them and fans them out to subscribers.
 */

import { v4 as uuid } from 'uuid';
import {
  LifecycleEvent,
  LifecycleEventType,
  LifecycleSubscription,
} from '../domain/events';
import { Store } from '../storage/store';
import { Logger, logger as rootLogger } from '../logger';

export const LIFECYCLE_SCHEMA_VERSION = '1.0.0';

export class LifecyclePublisher {
  private subscriptions: LifecycleSubscription[] = [];
  private readonly logger: Logger;

  constructor(
    private store: Store,
    logger?: Logger,
  ) {
    this.logger = logger ?? rootLogger.child({ module: 'publisher' });
  }

  /** Build and publish an event. */
  async publish(
    type: LifecycleEventType,
    payload: Record<string, unknown>,
    refs: { reportId?: string; scenarioId?: string } = {},
  ): Promise<LifecycleEvent> {
    return this.publishEvent({
      id: `evt_${uuid()}`,
      type,
      schemaVersion: LIFECYCLE_SCHEMA_VERSION,
      timestamp: new Date().toISOString(),
      reportId: refs.reportId,
      scenarioId: refs.scenarioId,
      payload,
    });
  }

  /** Persist an event and deliver it to matching subscribers. */
  async publishEvent(event: LifecycleEvent): Promise<LifecycleEvent> {
    await this.store.events.create(event);

    for (const sub of this.subscriptions) {
      if (!this.matchesSubscription(event, sub)) continue;
      try {
        sub.callback(event);
      } catch (err) {
        this.logger.warn('Lifecycle subscriber threw', {
          subscriptionId: sub.id,
          eventType: event.type,
          error: err instanceof Error ? err.message : String(err),
        });
      }
    }

    return event;
  }

  /** Subscribe to events. Returns the unsubscribe function. */
  subscribe(subscription: LifecycleSubscription): () => void {
    this.subscriptions.push(subscription);
    return () => {
      this.subscriptions = this.subscriptions.filter((s) => s.id !== subscription.id);
    };
  }

  /** Query events for one report. */
  async getEventsByReport(reportId: string, eventTypes?: LifecycleEventType[]): Promise<LifecycleEvent[]> {
    return this.store.events.listByReport(reportId, { eventTypes, limit: Number.MAX_SAFE_INTEGER });
  }

  private matchesSubscription(event: LifecycleEvent, sub: LifecycleSubscription): boolean {
    if (sub.reportId && event.reportId !== sub.reportId) return false;
    if (sub.eventTypes?.length && !sub.eventTypes.includes(event.type)) return false;
    return true;
  }
}
