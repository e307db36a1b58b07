/**
 * API Middleware: error handling.
 */

import { Request, Response, NextFunction } from 'express';
import { HarnessError, TypedError, apiError, createTypedError, describeThrown } from '../domain/errors';
import { logger } from '../logger';

/** Global error handling middleware. */
export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction) {
  if (err instanceof HarnessError) {
    const status = getHttpStatus(err.typedError);
    logger.warn('Request error', { code: err.typedError.code, status });
    res.status(status).json(apiError(err.typedError));
    return;
  }

  // Body parser failures carry their own status.
  if (err instanceof SyntaxError && 'status' in err && err.status === 400) {
    res.status(400).json(
      apiError(createTypedError({ code: 'VALIDATION.SCHEMA', message: 'Malformed JSON body', retryable: false })),
    );
    return;
  }

  logger.error('Unhandled request error', {
    message: describeThrown(err),
    stack: err instanceof Error ? err.stack : undefined,
  });

  const typedError = createTypedError({
    code: 'SYSTEM.INTERNAL',
    message: describeThrown(err),
    retryable: false,
  });

  res.status(500).json(apiError(typedError));
}

export function getHttpStatus(error: TypedError): number {
  if (error.code.includes('NOT_FOUND')) return 404;
  if (error.code.startsWith('VALIDATION.')) return 400;
  if (error.code.startsWith('CONFIG.')) return 400;
  if (error.code.startsWith('SCENARIO.')) return 422;
  return 500;
}
