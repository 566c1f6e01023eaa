import type { Request } from 'express';
import type { Actor, Logger } from '@geowarden/core';
import type { GeoResolver, ResolvedGeo } from '@geowarden/geo';
import type { PolicyStore } from '@geowarden/policy';
import type { ExceptionManager } from '@geowarden/exceptions';
import type { EscalationDecision, SuspiciousActivityDetector } from '@geowarden/detector';

export type DecisionReason =
  | 'ENFORCEMENT_OFF'
  | 'COUNTRY_ALLOWED'
  | 'EXCEPTION_ACTIVE'
  | 'COUNTRY_BLOCKED'
  | 'GEO_UNAVAILABLE'
  | 'POLICY_UNAVAILABLE';

/** Request metadata the engine records with a blocked attempt */
export interface AccessContext {
  userAgent?: string | null;
  path?: string;
}

export interface Decision {
  allow: boolean;
  reason: DecisionReason;
  /** Resolved location, null when the lookup was skipped or failed */
  geo: ResolvedGeo | null;
  /** Set on COUNTRY_BLOCKED when the attempt was recorded */
  attemptId?: string;
  /** Set on EXCEPTION_ACTIVE */
  exceptionId?: string;
  /**
   * Detector outcome for a blocked attempt. Runs in the background and
   * never rejects; resolves to null if evaluation failed.
   */
  escalation?: Promise<EscalationDecision | null>;
}

export interface AccessEngineConfig {
  policy: Pick<PolicyStore, 'get'>;
  geo: Pick<GeoResolver, 'resolve'>;
  exceptions: Pick<ExceptionManager, 'findActive' | 'recordUsage'>;
  detector: Pick<SuspiciousActivityDetector, 'recordAttempt' | 'evaluate'>;
  /** Allow requests whose location cannot be resolved (default: false) */
  failOpen?: boolean;
  logger?: Logger;
}

export interface AccessDecisionEngine {
  authorize(ip: string, user: Actor, context?: AccessContext): Promise<Decision>;
}

export type UserResolver = (req: Request) => Actor | null | undefined | Promise<Actor | null | undefined>;

export interface GeoAccessMiddlewareConfig {
  engine: AccessDecisionEngine;
  /** Authenticated user of the request; unauthenticated requests pass through */
  resolveUser: UserResolver;
  /** Path prefixes that are never checked */
  exemptPaths?: string[];
  /** Take the client address from X-Forwarded-For (default: true) */
  trustForwardedFor?: boolean;
  logger?: Logger;
}
