import type { Request, Response } from 'express';
import { toErrorBody, toHttpStatus } from '@geowarden/core';
import type { Actor, Logger, RequestContext } from '@geowarden/core';
import type { ActorResolver, PageParams } from './types.js';

/** Read `limit` and `offset` from the query string; clamping happens in the service */
export function readPage(req: Request): PageParams {
  const offset = typeof req.query['offset'] === 'string' ? parseInt(req.query['offset'], 10) : undefined;
  const limit = typeof req.query['limit'] === 'string' ? parseInt(req.query['limit'], 10) : undefined;
  return { offset, limit };
}

export function requestContext(req: Request, reason?: string): RequestContext {
  const userAgent = req.headers['user-agent'];
  return {
    ipAddress: req.ip,
    userAgent: typeof userAgent === 'string' ? userAgent : undefined,
    reason,
  };
}

/** The acting identity, or a 401 answer when the auth middleware set none */
export function requireActor(req: Request, res: Response, resolveActor: ActorResolver): Actor | null {
  const actor = resolveActor(req);
  if (!actor) {
    res.status(401).json({ error: 'Authentication required' });
    return null;
  }
  return actor;
}

/** Answer with the status and body for a service error; 5xx are logged */
export function sendError(res: Response, err: unknown, logger: Logger, route: string): void {
  const status = toHttpStatus(err);
  if (status >= 500) {
    logger.error('admin request failed', {
      route,
      status,
      error: err instanceof Error ? err.message : String(err),
    });
  }
  res.status(status).json(toErrorBody(err));
}
