import { LookupUnavailableError, NotActiveError } from '@geowarden/core';
import type { Actor, Logger } from '@geowarden/core';
import { usesAnonymizer } from '@geowarden/geo';
import type { ResolvedGeo } from '@geowarden/geo';
import { isCountryAllowed } from '@geowarden/policy';
import type { SecurityPolicy } from '@geowarden/policy';
import { AttemptType } from '@geowarden/detector';
import type { EscalationDecision } from '@geowarden/detector';
import type { AccessContext, AccessDecisionEngine, AccessEngineConfig, Decision } from './types.js';

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Create the access decision engine.
 *
 * Order of checks: policy readable, enforcement on, location resolved,
 * country allowed, active exception. Anything left is blocked and
 * recorded as a suspicious attempt.
 */
export function createEngine(config: AccessEngineConfig & { logger: Logger }): AccessDecisionEngine {
  const { policy: policies, geo: resolver, exceptions, detector, logger } = config;
  const failOpen = config.failOpen ?? false;

  async function tryException(user: Actor, geo: ResolvedGeo): Promise<Decision | null> {
    const exception = await exceptions.findActive(user.id, geo.countryCode);
    if (!exception) return null;

    try {
      await exceptions.recordUsage(exception.id);
    } catch (err) {
      // Expired or revoked between the lookup and the usage update
      if (err instanceof NotActiveError) return null;
      throw err;
    }

    logger.info('access allowed by exception', {
      userId: user.id,
      country: geo.countryCode,
      exceptionId: exception.id,
    });
    return { allow: true, reason: 'EXCEPTION_ACTIVE', geo, exceptionId: exception.id };
  }

  async function block(user: Actor, geo: ResolvedGeo, context: AccessContext): Promise<Decision> {
    const decision: Decision = { allow: false, reason: 'COUNTRY_BLOCKED', geo };

    try {
      const attempt = await detector.recordAttempt({
        userId: user.id,
        ipAddress: geo.ipAddress,
        countryCode: geo.countryCode,
        geoRecordId: geo.id,
        attemptType: usesAnonymizer(geo) ? AttemptType.PROXY_DETECTED : AttemptType.BLOCKED_COUNTRY,
        userAgent: context.userAgent ?? null,
        details: {
          path: context.path ?? null,
          city: geo.city,
          region: geo.region,
          isp: geo.isp,
          threatScore: geo.threatScore,
          threatLevel: geo.threatLevel,
        },
      });
      decision.attemptId = attempt.id;
      decision.escalation = detector.evaluate(attempt).catch((err: unknown): EscalationDecision | null => {
        logger.error('escalation evaluation failed', { attemptId: attempt.id, error: errorMessage(err) });
        return null;
      });
    } catch (err) {
      logger.error('failed to record blocked attempt', { userId: user.id, ip: geo.ipAddress, error: errorMessage(err) });
    }

    logger.info('access blocked', { userId: user.id, ip: geo.ipAddress, country: geo.countryCode });
    return decision;
  }

  return {
    async authorize(ip: string, user: Actor, context: AccessContext = {}): Promise<Decision> {
      let policy: SecurityPolicy;
      try {
        policy = await policies.get();
      } catch (err) {
        logger.error('security policy unavailable, denying access', { userId: user.id, error: errorMessage(err) });
        return { allow: false, reason: 'POLICY_UNAVAILABLE', geo: null };
      }

      if (!policy.enforcementEnabled) {
        return { allow: true, reason: 'ENFORCEMENT_OFF', geo: null };
      }

      let geo: ResolvedGeo;
      try {
        geo = await resolver.resolve(ip);
      } catch (err) {
        if (!(err instanceof LookupUnavailableError)) throw err;
        logger.warn(failOpen ? 'geo lookup unavailable, allowing' : 'geo lookup unavailable, denying', {
          userId: user.id,
          ip,
          error: err.message,
        });
        return { allow: failOpen, reason: 'GEO_UNAVAILABLE', geo: null };
      }

      if (isCountryAllowed(policy, geo.countryCode)) {
        logger.debug('access allowed', { userId: user.id, country: geo.countryCode });
        return { allow: true, reason: 'COUNTRY_ALLOWED', geo };
      }

      return (await tryException(user, geo)) ?? (await block(user, geo, context));
    },
  };
}
