import type { Request, RequestHandler } from 'express';
import { createLogger } from '@geowarden/core';
import type { Actor } from '@geowarden/core';
import { normalizeIp } from '@geowarden/geo';
import type { Decision, GeoAccessMiddlewareConfig } from './types.js';

function firstHeader(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

/**
 * Client address of a request. With `trustForwardedFor` the first
 * X-Forwarded-For entry wins; otherwise, or when that entry is not an
 * address, the socket peer is used. IPv4-mapped IPv6 comes back as IPv4.
 */
export function getClientIp(req: Request, trustForwardedFor: boolean): string | null {
  if (trustForwardedFor) {
    const forwarded = firstHeader(req.headers['x-forwarded-for']);
    const client = normalizeIp(forwarded?.split(',')[0]);
    if (client) return client;
  }
  return normalizeIp(req.socket?.remoteAddress);
}

function isExempt(path: string, exemptPaths: string[]): boolean {
  return exemptPaths.some((prefix) => path.startsWith(prefix));
}

/**
 * Express middleware that runs every authenticated, non-exempt request
 * through the access decision engine.
 *
 * The decision is stored on `res.locals.geoAccess`. Denials answer 403
 * with the reason and resolved location; a policy outage or unexpected
 * failure answers 503 without internal detail.
 */
export function createGeoAccessMiddleware(config: GeoAccessMiddlewareConfig): RequestHandler {
  const exemptPaths = config.exemptPaths ?? [];
  const trustForwardedFor = config.trustForwardedFor ?? true;
  const logger = config.logger ?? createLogger('access');

  return async (req, res, next) => {
    if (isExempt(req.path, exemptPaths)) {
      next();
      return;
    }

    const ip = getClientIp(req, trustForwardedFor);
    let user: Actor | null | undefined;
    let decision: Decision | undefined;
    try {
      user = await config.resolveUser(req);
      if (user) {
        decision = await config.engine.authorize(ip ?? '', user, {
          userAgent: firstHeader(req.headers['user-agent']) ?? null,
          path: req.path,
        });
      }
    } catch (err) {
      logger.error('access check failed', {
        path: req.path,
        ip,
        error: err instanceof Error ? err.message : String(err),
      });
      res.status(503).json({ error: 'Service unavailable' });
      return;
    }

    if (!decision) {
      next();
      return;
    }

    res.locals['geoAccess'] = decision;

    if (decision.allow) {
      next();
      return;
    }

    if (decision.reason === 'POLICY_UNAVAILABLE') {
      res.status(503).json({ error: 'Service unavailable' });
      return;
    }

    res.status(403).json({
      error: 'Access blocked',
      reason: decision.reason,
      ip,
      country: decision.geo?.countryName ?? null,
      countryCode: decision.geo?.countryCode ?? null,
      city: decision.geo?.city ?? null,
    });
  };
}
