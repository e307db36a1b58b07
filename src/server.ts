/**
 * Express server configuration.
 *
 * Assembles the report explorer: suites can be listed and swept, and the
 * resulting reports and lifecycle events browsed.
 */

import express from 'express';
import { HarnessConfig, loadHarnessConfig } from './config';
import { LifecyclePublisher } from './data-plane/publisher';
import { errorHandler } from './api/middleware';
import { createReportRoutes } from './api/reports';
import { createSuiteRoutes } from './api/suites';
import { createBuiltinRegistry } from './simulation/device-suites';
import { createMemoryStore } from './storage/memory-store';
import { Store } from './storage/store';
import { SuiteRegistry } from './suites/registry';
import { SuiteRunner } from './suites/runner';

const startTime = Date.now();

export const HARNESS_VERSION = '0.1.0';

/** Application context containing all services. */
export interface AppContext {
  config: HarnessConfig;
  store: Store;
  publisher: LifecyclePublisher;
  registry: SuiteRegistry;
  runner: SuiteRunner;
}

export interface AppContextOptions {
  config?: HarnessConfig;
  store?: Store;
  registry?: SuiteRegistry;
}

/** Create the application context with all services. */
export function createAppContext(options: AppContextOptions = {}): AppContext {
  const config = options.config ?? loadHarnessConfig();
  const store = options.store ?? createMemoryStore();
  const publisher = new LifecyclePublisher(store);
  const registry = options.registry ?? createBuiltinRegistry();
  const runner = new SuiteRunner(registry, store, publisher, config);

  return { config, store, publisher, registry, runner };
}

/** Create and configure the Express application. */
export function createApp(context?: AppContext): express.Application {
  const ctx = context ?? createAppContext();
  const app = express();

  app.use(express.json({ limit: '1mb' }));

  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      version: HARNESS_VERSION,
      uptimeMs: Date.now() - startTime,
      storage: 'memory',
      suites: ctx.registry.list().length,
    });
  });

  app.use('/api/suites', createSuiteRoutes(ctx.registry, ctx.runner));
  app.use('/api/reports', createReportRoutes(ctx.store, ctx.publisher));

  app.use(errorHandler);

  return app;
}
