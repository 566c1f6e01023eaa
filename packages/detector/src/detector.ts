import { randomUUID } from 'node:crypto';
import { Op } from 'sequelize';
import type { InferAttributes, WhereOptions } from 'sequelize';
import { ConflictError, NotFoundError, deliver } from '@geowarden/core';
import type { Actor, Clock, Logger, Notifier } from '@geowarden/core';
import { AttemptType } from './types.js';
import type {
  AttemptInput,
  AttemptListFilters,
  EscalationDecision,
  EscalationReason,
  SuspiciousAccessAttempt,
  SuspiciousActivityDetector,
  SuspiciousAttemptInstance,
  SuspiciousAttemptModel,
} from './types.js';

type AttemptAttributes = InferAttributes<SuspiciousAttemptInstance>;

function toAttempt(row: SuspiciousAttemptInstance): SuspiciousAccessAttempt {
  const data = row.get({ plain: true });
  const optionalDate = (value: Date | null | undefined) => (value ? new Date(value) : null);
  return {
    id: data.id,
    createdAt: new Date(data.createdAt),
    userId: data.userId,
    ipAddress: data.ipAddress,
    geoRecordId: data.geoRecordId ?? null,
    countryCode: data.countryCode ?? null,
    attemptType: data.attemptType,
    wasBlocked: Boolean(data.wasBlocked),
    userAgent: data.userAgent ?? null,
    details: data.details ?? null,
    itNotified: Boolean(data.itNotified),
    itNotifiedAt: optionalDate(data.itNotifiedAt),
    resolved: Boolean(data.resolved),
    resolvedBy: data.resolvedBy ?? null,
    resolvedAt: optionalDate(data.resolvedAt),
    resolutionNotes: data.resolutionNotes ?? null,
  };
}

function describeReasons(reasons: EscalationReason[], blockedCount: number, windowMs: number): string[] {
  const hours = Math.round(windowMs / (60 * 60 * 1000));
  return reasons.map((reason) =>
    reason === 'REPEATED_ATTEMPTS'
      ? `${blockedCount} blocked attempts in the last ${hours} hours`
      : 'Request arrived through a proxy, VPN or Tor exit',
  );
}

interface DetectorDeps {
  Attempt: SuspiciousAttemptModel;
  notifier: Notifier;
  resolveContacts: () => Promise<string[]>;
  threshold: number;
  windowMs: number;
  logger: Logger;
  clock: Clock;
}

/**
 * Create the detector over the suspicious_access_attempts table.
 */
export function createDetector(deps: DetectorDeps): SuspiciousActivityDetector {
  const { Attempt, notifier, threshold, windowMs, logger, clock } = deps;

  async function securityRecipients(): Promise<string[]> {
    try {
      return await deps.resolveContacts();
    } catch (err) {
      logger.error('failed to resolve security contacts', {
        error: err instanceof Error ? err.message : String(err),
      });
      return [];
    }
  }

  async function alert(
    attempt: SuspiciousAccessAttempt,
    reasons: EscalationReason[],
    blockedCount: number,
  ): Promise<boolean> {
    const outcome = await deliver(notifier, {
      recipients: await securityRecipients(),
      subject: `Suspicious access attempt by ${attempt.userId} from ${attempt.countryCode ?? 'unknown country'}`,
      body: [
        `User ${attempt.userId} was blocked at ${attempt.createdAt.toISOString()}.`,
        `IP address: ${attempt.ipAddress}`,
        `Country: ${attempt.countryCode ?? 'unknown'}`,
        '',
        ...describeReasons(reasons, blockedCount, windowMs).map((line) => `- ${line}`),
        '',
        `Attempt id: ${attempt.id}`,
      ].join('\n'),
      priority: 'URGENT',
    });

    if (!outcome.delivered) {
      logger.error('escalation alert was not delivered', { attemptId: attempt.id, error: outcome.error });
      return false;
    }

    await Attempt.update({ itNotified: true, itNotifiedAt: clock() }, { where: { id: attempt.id } });
    return true;
  }

  return {
    async recordAttempt(input: AttemptInput): Promise<SuspiciousAccessAttempt> {
      const row = await Attempt.create({
        id: randomUUID(),
        createdAt: clock(),
        userId: input.userId,
        ipAddress: input.ipAddress,
        geoRecordId: input.geoRecordId ?? null,
        countryCode: input.countryCode,
        attemptType: input.attemptType,
        wasBlocked: input.wasBlocked ?? true,
        userAgent: input.userAgent ?? null,
        details: input.details ?? null,
      });
      logger.warn('suspicious access attempt recorded', {
        attemptId: row.id,
        userId: input.userId,
        ip: input.ipAddress,
        country: input.countryCode,
        attemptType: input.attemptType,
      });
      return toAttempt(row);
    },

    async evaluate(attempt: SuspiciousAccessAttempt): Promise<EscalationDecision> {
      const blockedCount = await Attempt.count({
        where: {
          userId: attempt.userId,
          wasBlocked: true,
          createdAt: {
            [Op.gte]: new Date(attempt.createdAt.getTime() - windowMs),
            [Op.lte]: attempt.createdAt,
          },
        },
      });

      const reasons: EscalationReason[] = [];
      if (blockedCount >= threshold) reasons.push('REPEATED_ATTEMPTS');
      if (attempt.attemptType === AttemptType.PROXY_DETECTED) reasons.push('ANONYMIZER_DETECTED');

      if (reasons.length === 0) {
        return { escalate: false, reasons, blockedCount, notified: false };
      }

      const notified = await alert(attempt, reasons, blockedCount);
      logger.warn('suspicious activity escalated', {
        attemptId: attempt.id,
        userId: attempt.userId,
        reasons,
        blockedCount,
        notified,
      });
      return { escalate: true, reasons, blockedCount, notified };
    },

    async get(id: string): Promise<SuspiciousAccessAttempt | null> {
      const row = await Attempt.findByPk(id);
      return row ? toAttempt(row) : null;
    },

    async list(filters: AttemptListFilters = {}): Promise<SuspiciousAccessAttempt[]> {
      const conditions: WhereOptions<AttemptAttributes>[] = [];
      if (filters.userId) conditions.push({ userId: filters.userId });
      if (filters.resolved !== undefined) conditions.push({ resolved: filters.resolved });
      if (filters.since) conditions.push({ createdAt: { [Op.gte]: filters.since } });

      const rows = await Attempt.findAll({
        where: conditions.length > 0 ? { [Op.and]: conditions } : {},
        order: [['created_at', 'DESC'], ['id', 'ASC']],
        limit: filters.limit ?? 20,
        offset: filters.offset ?? 0,
      });
      return rows.map(toAttempt);
    },

    async resolve(id: string, actor: Actor, notes?: string): Promise<SuspiciousAccessAttempt> {
      const [affected] = await Attempt.update(
        {
          resolved: true,
          resolvedBy: actor.id,
          resolvedAt: clock(),
          resolutionNotes: notes?.trim() || null,
        },
        { where: { id, resolved: false } },
      );

      const row = await Attempt.findByPk(id);
      if (!row) throw new NotFoundError('Suspicious access attempt', id);
      if (affected === 0) {
        throw new ConflictError(`Suspicious access attempt ${id} is already resolved`);
      }

      logger.info('suspicious access attempt resolved', { attemptId: id, actorId: actor.id });
      return toAttempt(row);
    },

    countBlockedSince(since: Date): Promise<number> {
      return Attempt.count({ where: { wasBlocked: true, createdAt: { [Op.gte]: since } } });
    },
  };
}
