/**
 * Query-string helpers shared by the list endpoints.
 */

import { Request } from 'express';

const DEFAULT_LIMIT = 100;
const MAX_LIMIT = 1000;

/** First string value of a query parameter, if any. */
export function queryString(req: Request, name: string): string | undefined {
  const value = req.query[name];
  if (typeof value === 'string') return value;
  if (Array.isArray(value) && typeof value[0] === 'string') return value[0];
  return undefined;
}

/** Parse `limit` and `offset`, clamping out-of-range values to the defaults. */
export function pagination(req: Request): { limit: number; offset: number } {
  const rawLimit = parseInt(queryString(req, 'limit') ?? '', 10);
  const rawOffset = parseInt(queryString(req, 'offset') ?? '', 10);
  const limit = Number.isNaN(rawLimit) || rawLimit < 1 ? DEFAULT_LIMIT : Math.min(rawLimit, MAX_LIMIT);
  const offset = Number.isNaN(rawOffset) || rawOffset < 0 ? 0 : rawOffset;
  return { limit, offset };
}
