/**
 * scenario-harness: bounded-polling verification of asynchronous subsystems.
 *
 * Importing this module gives the library; running it starts the report
 * explorer on PORT.
 */

import { loadHarnessConfig, validateHarnessConfig } from './config';
import { configError } from './domain/errors';
import { logger, setLogLevel } from './logger';
import { createApp, createAppContext } from './server';

// Public exports for programmatic use
export { createApp, createAppContext } from './server';
export * from './config';
export * from './logger';
export * from './domain';
export * from './dsl';
export * from './engine';
export * from './report/scenario-report';
export * from './storage';
export * from './data-plane/publisher';
export * from './suites';
export * from './simulation';

function main(): void {
  const config = loadHarnessConfig();
  const validation = validateHarnessConfig(config);
  if (!validation.valid) {
    const typed = configError(validation.errors);
    logger.error(typed.message, { code: typed.code, errors: validation.errors });
    process.exitCode = 1;
    return;
  }
  for (const warning of validation.warnings) logger.warn(warning);
  setLogLevel(config.logLevel);

  const app = createApp(createAppContext({ config }));
  app.listen(config.port, () => {
    logger.info('Report explorer listening', { port: config.port });
  });
}

if (require.main === module) {
  main();
}
