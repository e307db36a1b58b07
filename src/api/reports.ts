/**
 * Report API routes.
 *
 * GET /reports: List sweep reports, newest first
 * GET /reports/:reportId: Get one report
 * GET /reports/:reportId/events: Lifecycle events of a report
 */

import { Router } from 'express';
import { LifecycleEventType } from '../domain/events';
import { apiError, notFoundError } from '../domain/errors';
import { LifecyclePublisher } from '../data-plane/publisher';
import { Store } from '../storage/store';
import { pagination, queryString } from './query';

const LIFECYCLE_EVENT_TYPES: readonly LifecycleEventType[] = [
  'sweep.started',
  'sweep.completed',
  'scenario.started',
  'scenario.phase',
  'scenario.completed',
  'resource.release_failed',
];

function isLifecycleEventType(value: string): value is LifecycleEventType {
  return LIFECYCLE_EVENT_TYPES.some((type) => type === value);
}

export function createReportRoutes(store: Store, publisher: LifecyclePublisher): Router {
  const router = Router();

  router.get('/', async (req, res, next) => {
    try {
      const { limit, offset } = pagination(req);
      const reports = await store.reports.list({ suiteId: queryString(req, 'suiteId'), limit, offset });
      res.json({ reports, limit, offset });
    } catch (err) {
      next(err);
    }
  });

  router.get('/:reportId', async (req, res, next) => {
    try {
      const report = await store.reports.getById(req.params.reportId);
      if (!report) {
        res.status(404).json(apiError(notFoundError('Report', req.params.reportId)));
        return;
      }
      res.json({ report });
    } catch (err) {
      next(err);
    }
  });

  /**
   * GET /reports/:reportId/events?types=scenario.completed,sweep.completed
   * Unknown type names are ignored.
   */
  router.get('/:reportId/events', async (req, res, next) => {
    try {
      const report = await store.reports.getById(req.params.reportId);
      if (!report) {
        res.status(404).json(apiError(notFoundError('Report', req.params.reportId)));
        return;
      }

      const types = queryString(req, 'types');
      const eventTypes = types ? types.split(',').filter(isLifecycleEventType) : undefined;
      const events = await publisher.getEventsByReport(req.params.reportId, eventTypes);
      res.json({ events, total: events.length });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
