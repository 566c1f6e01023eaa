import { randomUUID } from 'node:crypto';
import { Op, UniqueConstraintError } from 'sequelize';
import type { InferAttributes, Sequelize, WhereOptions } from 'sequelize';
import { z } from 'zod';
import {
  ConflictError,
  InvalidTransitionError,
  NotActiveError,
  NotFoundError,
  ValidationError,
  deliver,
  normalizeCountryCode,
} from '@geowarden/core';
import type { Actor, Clock, CountryCode, Logger, Notifier } from '@geowarden/core';
import { OPEN_STATUSES, effectiveStatus, isTerminal } from './state.js';
import type {
  AccessException,
  AccessExceptionInstance,
  AccessExceptionModel,
  ExceptionDecision,
  ExceptionListFilters,
  ExceptionManager,
  ExceptionRequest,
  ExceptionStatus,
  UserContactResolver,
} from './types.js';

const requestSchema = z
  .object({
    userId: z.string().trim().min(1, 'is required'),
    destinationCountry: z.string().transform((value, ctx) => {
      const code = normalizeCountryCode(value);
      if (!code) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must be a two-letter ISO 3166-1 country code' });
        return z.NEVER;
      }
      return code;
    }),
    startsAt: z.date({ invalid_type_error: 'must be a valid date' }),
    endsAt: z.date({ invalid_type_error: 'must be a valid date' }),
    reason: z.string().trim().min(1, 'is required').max(2000),
    requestedBy: z.string().trim().min(1).optional(),
    sourceAttemptId: z.string().uuid().optional(),
  })
  .refine((r) => r.endsAt.getTime() > r.startsAt.getTime(), {
    message: 'must be after startsAt',
    path: ['endsAt'],
  });

type ExceptionAttributes = InferAttributes<AccessExceptionInstance>;

type DecisionFields = Pick<
  AccessException,
  'decidedBy' | 'decidedAt' | 'decisionNotes' | 'revokedBy' | 'revokedAt' | 'revocationNotes'
>;

interface Snapshot {
  id: string;
  status: ExceptionStatus;
  startsAt: Date;
  endsAt: Date;
}

function toException(row: AccessExceptionInstance, now: Date): AccessException {
  const data = row.get({ plain: true });
  const optionalDate = (value: Date | null | undefined) => (value ? new Date(value) : null);
  const endsAt = new Date(data.endsAt);
  return {
    id: data.id,
    userId: data.userId,
    destinationCountry: data.destinationCountry,
    reason: data.reason,
    startsAt: new Date(data.startsAt),
    endsAt,
    status: effectiveStatus({ status: data.status, endsAt }, now),
    requestedBy: data.requestedBy ?? null,
    sourceAttemptId: data.sourceAttemptId ?? null,
    decidedBy: data.decidedBy ?? null,
    decidedAt: optionalDate(data.decidedAt),
    decisionNotes: data.decisionNotes ?? null,
    revokedBy: data.revokedBy ?? null,
    revokedAt: optionalDate(data.revokedAt),
    revocationNotes: data.revocationNotes ?? null,
    usageCount: Number(data.usageCount),
    lastUsedAt: optionalDate(data.lastUsedAt),
    createdAt: new Date(data.createdAt),
    updatedAt: new Date(data.updatedAt),
  };
}

interface ManagerDeps {
  sequelize: Sequelize;
  AccessException: AccessExceptionModel;
  notifier: Notifier;
  resolveUserContact: UserContactResolver;
  logger: Logger;
  clock: Clock;
}

/**
 * Create the exception manager. Every transition is a conditional update
 * on the expected stored status, so concurrent deciders cannot both win.
 */
export function createManager(deps: ManagerDeps): ExceptionManager {
  const { sequelize, AccessException: Exception, notifier, resolveUserContact, logger, clock } = deps;

  async function load(id: string): Promise<AccessExceptionInstance> {
    const row = await Exception.findByPk(id);
    if (!row) throw new NotFoundError('Access exception', id);
    return row;
  }

  function snapshot(row: AccessExceptionInstance): Snapshot {
    return {
      id: row.id,
      status: row.status,
      startsAt: new Date(row.startsAt),
      endsAt: new Date(row.endsAt),
    };
  }

  /**
   * Move `current` from its stored status to `to`. Fails with
   * InvalidTransitionError when another writer changed the status first.
   */
  async function transition(
    current: Snapshot,
    to: ExceptionStatus,
    fields: Partial<DecisionFields> = {},
  ): Promise<AccessException> {
    const [affected] = await Exception.update(
      { ...fields, status: to, openSlot: isTerminal(to) ? null : 1 },
      { where: { id: current.id, status: current.status } },
    );
    const row = await load(current.id);
    if (affected === 0) {
      throw new InvalidTransitionError(effectiveStatus(snapshot(row), clock()), to);
    }
    return toException(row, clock());
  }

  /** Write EXPIRED for an open exception whose window has passed */
  async function persistExpiry(current: Snapshot): Promise<void> {
    const [affected] = await Exception.update(
      { status: 'EXPIRED', openSlot: null },
      { where: { id: current.id, status: current.status } },
    );
    if (affected > 0) {
      logger.info('access exception expired', { exceptionId: current.id, from: current.status });
    }
  }

  /** Load and settle a lazily expired status; returns the effective status */
  async function settle(id: string): Promise<{ current: Snapshot; status: ExceptionStatus }> {
    const current = snapshot(await load(id));
    const status = effectiveStatus(current, clock());
    if (status === 'EXPIRED' && current.status !== 'EXPIRED') {
      await persistExpiry(current);
    }
    return { current, status };
  }

  async function notifyApproval(exception: AccessException): Promise<void> {
    let recipient: string | null;
    try {
      recipient = await resolveUserContact(exception.userId);
    } catch (err) {
      logger.warn('could not resolve user contact', {
        userId: exception.userId,
        error: err instanceof Error ? err.message : String(err),
      });
      recipient = null;
    }

    const outcome = await deliver(notifier, {
      recipients: recipient ? [recipient] : [],
      subject: `Travel access to ${exception.destinationCountry} approved`,
      body: [
        `Your request to access the system from ${exception.destinationCountry} was approved.`,
        `Valid from ${exception.startsAt.toISOString()} until ${exception.endsAt.toISOString()}.`,
        ...(exception.decisionNotes ? ['', `Notes: ${exception.decisionNotes}`] : []),
      ].join('\n'),
      priority: 'MEDIUM',
    });

    if (!outcome.delivered) {
      logger.warn('approval notice not delivered', { exceptionId: exception.id, error: outcome.error });
    }
  }

  return {
    async request(input: ExceptionRequest): Promise<AccessException> {
      const parsed = requestSchema.safeParse(input);
      if (!parsed.success) {
        throw new ValidationError(
          'Invalid exception request',
          parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
        );
      }
      const req = parsed.data;
      const now = clock();
      if (req.endsAt.getTime() <= now.getTime()) {
        throw new ValidationError('Invalid exception request', ['endsAt: must be in the future']);
      }

      // Free the slot held by an open exception that has already lapsed
      const [lapsed] = await Exception.update(
        { status: 'EXPIRED', openSlot: null },
        {
          where: {
            userId: req.userId,
            destinationCountry: req.destinationCountry,
            openSlot: 1,
            endsAt: { [Op.lt]: now },
          },
        },
      );
      if (lapsed > 0) {
        logger.info('lapsed access exception expired', { userId: req.userId, country: req.destinationCountry });
      }

      try {
        const row = await Exception.create({
          id: randomUUID(),
          userId: req.userId,
          destinationCountry: req.destinationCountry,
          reason: req.reason,
          startsAt: req.startsAt,
          endsAt: req.endsAt,
          status: 'PENDING',
          requestedBy: req.requestedBy ?? req.userId,
          sourceAttemptId: req.sourceAttemptId ?? null,
          openSlot: 1,
        });
        logger.info('access exception requested', {
          exceptionId: row.id,
          userId: req.userId,
          country: req.destinationCountry,
        });
        return toException(row, now);
      } catch (err) {
        if (err instanceof UniqueConstraintError) {
          throw new ConflictError(
            `An open access exception already exists for ${req.userId} in ${req.destinationCountry}`,
          );
        }
        throw err;
      }
    },

    async decide(id: string, decision: ExceptionDecision, actor: Actor, notes?: string): Promise<AccessException> {
      const to: ExceptionStatus = decision === 'approve' ? 'APPROVED' : 'DENIED';
      const { current, status } = await settle(id);
      if (status !== 'PENDING') {
        throw new InvalidTransitionError(status, to);
      }

      const updated = await transition(current, to, {
        decidedBy: actor.id,
        decidedAt: clock(),
        decisionNotes: notes?.trim() || null,
      });
      logger.info('access exception decided', { exceptionId: id, decision: to, actorId: actor.id });

      if (to === 'APPROVED') {
        await notifyApproval(updated);
      }
      return updated;
    },

    async revoke(id: string, actor: Actor, notes?: string): Promise<AccessException> {
      const { current, status } = await settle(id);
      if (status !== 'APPROVED') {
        throw new InvalidTransitionError(status, 'REVOKED');
      }

      const updated = await transition(current, 'REVOKED', {
        revokedBy: actor.id,
        revokedAt: clock(),
        revocationNotes: notes?.trim() || null,
      });
      logger.info('access exception revoked', { exceptionId: id, actorId: actor.id });
      return updated;
    },

    async recordUsage(id: string): Promise<AccessException> {
      const now = clock();
      const [affected] = await Exception.update(
        { usageCount: sequelize.literal('usage_count + 1'), lastUsedAt: now },
        {
          where: {
            id,
            status: 'APPROVED',
            startsAt: { [Op.lte]: now },
            endsAt: { [Op.gte]: now },
          },
        },
      );

      if (affected === 0) {
        const { status } = await settle(id);
        throw new NotActiveError(`Access exception ${id} is not active (${status})`);
      }
      return toException(await load(id), now);
    },

    async findActive(userId: string, countryCode: CountryCode): Promise<AccessException | null> {
      const now = clock();
      const row = await Exception.findOne({
        where: {
          userId,
          destinationCountry: countryCode.toUpperCase(),
          status: 'APPROVED',
          startsAt: { [Op.lte]: now },
          endsAt: { [Op.gte]: now },
        },
      });
      return row ? toException(row, now) : null;
    },

    async get(id: string): Promise<AccessException | null> {
      const row = await Exception.findByPk(id);
      return row ? toException(row, clock()) : null;
    },

    async list(filters: ExceptionListFilters = {}): Promise<AccessException[]> {
      const now = clock();
      const conditions: WhereOptions<ExceptionAttributes>[] = [];

      if (filters.userId) {
        conditions.push({ userId: filters.userId });
      }

      if (filters.status === 'EXPIRED') {
        conditions.push({
          [Op.or]: [
            { status: 'EXPIRED' },
            { status: { [Op.in]: [...OPEN_STATUSES] }, endsAt: { [Op.lt]: now } },
          ],
        });
      } else if (filters.status && OPEN_STATUSES.includes(filters.status)) {
        conditions.push({ status: filters.status, endsAt: { [Op.gte]: now } });
      } else if (filters.status) {
        conditions.push({ status: filters.status });
      }

      const rows = await Exception.findAll({
        where: conditions.length > 0 ? { [Op.and]: conditions } : {},
        order: [['created_at', 'DESC'], ['id', 'ASC']],
        limit: filters.limit ?? 20,
        offset: filters.offset ?? 0,
      });
      return rows.map((row) => toException(row, now));
    },

    async expireStale(): Promise<number> {
      const now = clock();
      const lapsed = await Exception.findAll({
        where: {
          status: { [Op.in]: [...OPEN_STATUSES] },
          endsAt: { [Op.lt]: now },
        },
      });

      if (lapsed.length === 0) {
        return 0;
      }

      let expired = 0;
      for (const row of lapsed) {
        const [affected] = await Exception.update(
          { status: 'EXPIRED', openSlot: null },
          { where: { id: row.id, status: row.status } },
        );
        expired += affected;
      }

      logger.info('expired stale access exceptions', { expired });
      return expired;
    },
  };
}
