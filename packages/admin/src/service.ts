import { NotFoundError, ValidationError, createLogger, systemClock } from '@geowarden/core';
import type { Actor, RequestContext } from '@geowarden/core';
import type { AuditEntry, VerificationReport, VerificationResult } from '@geowarden/audit';
import { allowedCountries, isCountryAllowed } from '@geowarden/policy';
import type { PolicyChanges, PolicyUpdateResult, SecurityPolicy } from '@geowarden/policy';
import type { AccessException, ExceptionDecision } from '@geowarden/exceptions';
import type { SuspiciousAccessAttempt } from '@geowarden/detector';
import type {
  AdminConfig,
  AdminService,
  AttemptListParams,
  AuditListParams,
  ExceptionListParams,
  GeoLookupResult,
  Page,
  PageParams,
  SelfExceptionRequest,
  SystemStatus,
} from './types.js';

const DAY_MS = 24 * 60 * 60 * 1000;
const STATUS_WINDOW_DAYS = 30;
const RECENT_CHANGES = 10;

export function clampLimit(limit: number | undefined, max = 100, defaultVal = 20): number {
  if (limit === undefined || Number.isNaN(limit) || limit < 1) return defaultVal;
  return Math.min(limit, max);
}

export function clampOffset(offset: number | undefined): number {
  if (offset === undefined || Number.isNaN(offset) || offset < 0) return 0;
  return offset;
}

function page(params: PageParams): { limit: number; offset: number } {
  return { limit: clampLimit(params.limit), offset: clampOffset(params.offset) };
}

/**
 * Create the AdminService over the GeoWarden services.
 */
export function createAdminService(config: AdminConfig): AdminService {
  const { policy, ledger, exceptions, detector, geo } = config;
  const logger = config.logger ?? createLogger('admin');
  const clock = config.clock ?? systemClock;
  const attemptExceptionMs = (config.attemptExceptionDays ?? 7) * DAY_MS;

  return {
    getPolicy(): Promise<SecurityPolicy> {
      return policy.get();
    },

    updatePolicy(changes: PolicyChanges, actor: Actor, context: RequestContext): Promise<PolicyUpdateResult> {
      return policy.update(changes, actor, context);
    },

    async listExceptions(params: ExceptionListParams): Promise<Page<AccessException>> {
      const { limit, offset } = page(params);
      const items = await exceptions.list({ userId: params.userId, status: params.status, limit, offset });
      return { items, offset, limit };
    },

    decideException(id: string, decision: ExceptionDecision, actor: Actor, notes?: string): Promise<AccessException> {
      return exceptions.decide(id, decision, actor, notes);
    },

    revokeException(id: string, actor: Actor, notes?: string): Promise<AccessException> {
      return exceptions.revoke(id, actor, notes);
    },

    async listAudit(params: AuditListParams): Promise<Page<AuditEntry>> {
      const { limit, offset } = page(params);
      const items = await ledger.query({
        changeType: params.changeType,
        actorId: params.actorId,
        startDate: params.startDate,
        endDate: params.endDate,
        limit,
        offset,
      });
      return { items, offset, limit };
    },

    verifyEntry(id: string): Promise<VerificationResult> {
      return ledger.verifyById(id);
    },

    verifyAll(): Promise<VerificationReport> {
      return ledger.verifyAll();
    },

    async listAttempts(params: AttemptListParams): Promise<Page<SuspiciousAccessAttempt>> {
      const { limit, offset } = page(params);
      const items = await detector.list({ userId: params.userId, resolved: params.resolved, limit, offset });
      return { items, offset, limit };
    },

    resolveAttempt(id: string, actor: Actor, notes?: string): Promise<SuspiciousAccessAttempt> {
      return detector.resolve(id, actor, notes);
    },

    async openExceptionForAttempt(id: string, actor: Actor, reason?: string): Promise<AccessException> {
      const attempt = await detector.get(id);
      if (!attempt) throw new NotFoundError('Suspicious access attempt', id);
      if (!attempt.countryCode) {
        throw new ValidationError(`Suspicious access attempt ${id} has no resolved country`);
      }

      const now = clock();
      const exception = await exceptions.request({
        userId: attempt.userId,
        destinationCountry: attempt.countryCode,
        startsAt: now,
        endsAt: new Date(now.getTime() + attemptExceptionMs),
        reason: reason?.trim() || `Raised from blocked access attempt ${id}`,
        requestedBy: actor.id,
        sourceAttemptId: id,
      });
      logger.info('access exception opened from attempt', { attemptId: id, exceptionId: exception.id, actorId: actor.id });
      return exception;
    },

    async status(): Promise<SystemStatus> {
      const current = await policy.get();
      const since = new Date(clock().getTime() - STATUS_WINDOW_DAYS * DAY_MS);
      const [stats, blockedAttempts, recentChanges] = await Promise.all([
        geo.stats(),
        detector.countBlockedSince(since),
        ledger.query({ limit: RECENT_CHANGES }),
      ]);

      return {
        allowedCountries: [...allowedCountries(current)].sort(),
        enforcementEnabled: current.enforcementEnabled,
        totalIps: stats.totalIps,
        uniqueCountries: stats.uniqueCountries,
        blockedAttempts,
        recentChanges,
      };
    },

    async lookup(ip: string): Promise<GeoLookupResult> {
      const [record, current] = await Promise.all([geo.resolve(ip), policy.get()]);
      return {
        ip: record.ipAddress,
        countryCode: record.countryCode,
        countryName: record.countryName,
        city: record.city,
        threatLevel: record.threatLevel,
        allowed: isCountryAllowed(current, record.countryCode),
      };
    },

    requestException(user: Actor, request: SelfExceptionRequest): Promise<AccessException> {
      return exceptions.request({ ...request, userId: user.id, requestedBy: user.id });
    },

    async listOwnExceptions(user: Actor, params: PageParams): Promise<Page<AccessException>> {
      const { limit, offset } = page(params);
      const items = await exceptions.list({ userId: user.id, limit, offset });
      return { items, offset, limit };
    },
  };
}
