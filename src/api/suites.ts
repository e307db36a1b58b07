/**
 * Suite API routes.
 *
 * GET /suites: List registered suites
 * POST /suites/:suiteId/sweeps: Start a sweep of a suite
 */

import { Router } from 'express';
import { apiError, describeThrown, notFoundError } from '../domain/errors';
import { logger } from '../logger';
import { SuiteRegistry } from '../suites/registry';
import { SuiteRunner } from '../suites/runner';

export function createSuiteRoutes(registry: SuiteRegistry, runner: SuiteRunner): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    const suites = registry.list();
    res.json({ suites, total: suites.length });
  });

  /**
   * POST /suites/:suiteId/sweeps
   * Responds 202 with the running report; poll GET /reports/:reportId.
   */
  router.post('/:suiteId/sweeps', async (req, res, next) => {
    const { suiteId } = req.params;
    if (!registry.has(suiteId)) {
      res.status(404).json(apiError(notFoundError('Suite', suiteId)));
      return;
    }

    try {
      const started = await runner.start(suiteId);
      // Runs in the background; progress lands in the report store.
      started.completion.catch((err) => {
        logger.error('Background sweep failed', { suiteId, reportId: started.record.id, error: describeThrown(err) });
      });
      res.status(202).json({ report: started.record });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
