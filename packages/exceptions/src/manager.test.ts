import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Sequelize, DataTypes } from 'sequelize';
import {
  ConflictError,
  InvalidTransitionError,
  NotActiveError,
  NotFoundError,
  ValidationError,
  createLogger,
} from '@geowarden/core';
import type { Notifier } from '@geowarden/core';
import { createExceptionManager } from './index.js';
import { exceptionMigrations } from './migrations/index.js';
import { defineAccessExceptionModel } from './models/accessException.js';
import type { ExceptionManager, ExceptionManagerConfig, ExceptionRequest } from './types.js';

const HOUR = 60 * 60 * 1000;
const DAY = 24 * HOUR;
const admin = { id: 'admin-1' };

describe('ExceptionManager (SQLite)', () => {
  let sequelize: Sequelize;
  let notifier: Notifier;
  let manager: ExceptionManager;
  let now: Date;

  function build(overrides: Partial<ExceptionManagerConfig> = {}): ExceptionManager {
    return createExceptionManager({
      database: sequelize,
      notifier,
      logger: createLogger('exceptions-test', { silent: true }),
      clock: () => now,
      ...overrides,
    });
  }

  function travel(overrides: Partial<ExceptionRequest> = {}): ExceptionRequest {
    return {
      userId: 'u-42',
      destinationCountry: 'fr',
      startsAt: new Date(now.getTime() - HOUR),
      endsAt: new Date(now.getTime() + 7 * DAY),
      reason: 'Conference in Paris',
      ...overrides,
    };
  }

  beforeEach(async () => {
    sequelize = new Sequelize({ dialect: 'sqlite', storage: ':memory:', logging: false });
    await exceptionMigrations.up(sequelize.getQueryInterface(), DataTypes);
    notifier = { send: vi.fn().mockResolvedValue(undefined) };
    now = new Date('2026-06-01T00:00:00.000Z');
    manager = build();
  });

  afterEach(async () => {
    await sequelize.close();
  });

  describe('request', () => {
    it('creates a pending exception', async () => {
      const exception = await manager.request(travel());

      expect(exception).toMatchObject({
        userId: 'u-42',
        destinationCountry: 'FR',
        status: 'PENDING',
        requestedBy: 'u-42',
        sourceAttemptId: null,
        usageCount: 0,
      });
    });

    it('rejects blank reasons and bad countries', async () => {
      const err: unknown = await manager
        .request(travel({ reason: '  ', destinationCountry: 'France' }))
        .catch((e: unknown) => e);

      expect(err).toBeInstanceOf(ValidationError);
      expect((err as ValidationError).issues.sort()).toEqual([
        'destinationCountry: must be a two-letter ISO 3166-1 country code',
        'reason: is required',
      ]);
    });

    it('rejects an inverted window', async () => {
      const err: unknown = await manager
        .request(travel({ startsAt: new Date(now.getTime() + 2 * DAY), endsAt: new Date(now.getTime() + DAY) }))
        .catch((e: unknown) => e);

      expect((err as ValidationError).issues).toEqual(['endsAt: must be after startsAt']);
    });

    it('rejects a window that is already over', async () => {
      await expect(
        manager.request(travel({ startsAt: new Date(now.getTime() - 2 * DAY), endsAt: new Date(now.getTime() - DAY) })),
      ).rejects.toThrow(ValidationError);
    });

    it('allows one open exception per user and destination', async () => {
      const first = await manager.request(travel());

      await expect(manager.request(travel())).rejects.toBeInstanceOf(ConflictError);
      await expect(manager.request(travel({ destinationCountry: 'DE' }))).resolves.toMatchObject({ status: 'PENDING' });

      await manager.decide(first.id, 'deny', admin, 'not justified');
      await expect(manager.request(travel())).resolves.toMatchObject({ status: 'PENDING' });
    });

    it('frees the slot of a lapsed open exception', async () => {
      const lapsed = await manager.request(travel({ endsAt: new Date(now.getTime() + DAY) }));
      now = new Date(now.getTime() + 2 * DAY);

      const fresh = await manager.request(travel());

      expect(fresh.status).toBe('PENDING');
      expect((await manager.get(lapsed.id))?.status).toBe('EXPIRED');
    });
  });

  describe('decide', () => {
    it('approves and notifies the user', async () => {
      const pending = await manager.request(travel());

      const approved = await manager.decide(pending.id, 'approve', admin, 'ok');

      expect(approved).toMatchObject({
        status: 'APPROVED',
        decidedBy: 'admin-1',
        decisionNotes: 'ok',
      });
      expect(approved.decidedAt).toEqual(now);
      const notice = vi.mocked(notifier.send).mock.calls[0]![0];
      expect(notice.recipients).toEqual(['u-42']);
      expect(notice.priority).toBe('MEDIUM');
      expect(notice.subject).toBe('Travel access to FR approved');
    });

    it('resolves the user address through the configured resolver', async () => {
      manager = build({ resolveUserContact: async (userId) => `${userId}@example.org` });
      const pending = await manager.request(travel());

      await manager.decide(pending.id, 'approve', admin);

      expect(vi.mocked(notifier.send).mock.calls[0]![0].recipients).toEqual(['u-42@example.org']);
    });

    it('keeps the approval when the notice fails', async () => {
      vi.mocked(notifier.send).mockRejectedValue(new Error('SMTP down'));
      const pending = await manager.request(travel());

      await expect(manager.decide(pending.id, 'approve', admin)).resolves.toMatchObject({ status: 'APPROVED' });
    });

    it('lets exactly one of two concurrent approvals win', async () => {
      const pending = await manager.request(travel());

      const results = await Promise.allSettled([
        manager.decide(pending.id, 'approve', admin),
        manager.decide(pending.id, 'approve', { id: 'admin-2' }),
      ]);

      expect(results.filter((r) => r.status === 'fulfilled')).toHaveLength(1);
      const rejected = results.filter((r): r is PromiseRejectedResult => r.status === 'rejected');
      expect(rejected).toHaveLength(1);
      expect(rejected[0]!.reason).toBeInstanceOf(InvalidTransitionError);
      expect(notifier.send).toHaveBeenCalledTimes(1);
    });

    it('does not reopen a denied exception', async () => {
      const pending = await manager.request(travel());
      await manager.decide(pending.id, 'deny', admin);

      const err: unknown = await manager.decide(pending.id, 'approve', admin).catch((e: unknown) => e);

      expect(err).toBeInstanceOf(InvalidTransitionError);
      expect((err as InvalidTransitionError).from).toBe('DENIED');
      await expect(manager.revoke(pending.id, admin)).rejects.toBeInstanceOf(InvalidTransitionError);
    });

    it('cannot approve a request whose window has passed', async () => {
      const pending = await manager.request(travel({ endsAt: new Date(now.getTime() + DAY) }));
      now = new Date(now.getTime() + 2 * DAY);

      const err: unknown = await manager.decide(pending.id, 'approve', admin).catch((e: unknown) => e);

      expect((err as InvalidTransitionError).from).toBe('EXPIRED');
      const Exception = defineAccessExceptionModel(sequelize);
      expect((await Exception.findByPk(pending.id))?.status).toBe('EXPIRED');
    });

    it('reports unknown ids', async () => {
      await expect(manager.decide('00000000-0000-4000-8000-000000000000', 'approve', admin)).rejects.toBeInstanceOf(
        NotFoundError,
      );
    });
  });

  describe('usage', () => {
    it('counts uses of an active exception', async () => {
      const pending = await manager.request(travel());
      await manager.decide(pending.id, 'approve', admin);

      await manager.recordUsage(pending.id);
      now = new Date(now.getTime() + HOUR);
      const used = await manager.recordUsage(pending.id);

      expect(used.usageCount).toBe(2);
      expect(used.lastUsedAt).toEqual(now);
    });

    it('rejects usage of a pending or not yet started exception', async () => {
      const pending = await manager.request(travel());
      await expect(manager.recordUsage(pending.id)).rejects.toBeInstanceOf(NotActiveError);

      const later = await manager.request(
        travel({
          destinationCountry: 'DE',
          startsAt: new Date(now.getTime() + DAY),
          endsAt: new Date(now.getTime() + 2 * DAY),
        }),
      );
      await manager.decide(later.id, 'approve', admin);
      await expect(manager.recordUsage(later.id)).rejects.toBeInstanceOf(NotActiveError);
      expect(await manager.findActive('u-42', 'DE')).toBeNull();
    });

    it('stays active up to and including the end of the window', async () => {
      const endsAt = new Date(now.getTime() + DAY);
      const pending = await manager.request(travel({ endsAt }));
      await manager.decide(pending.id, 'approve', admin);

      now = endsAt;
      await expect(manager.recordUsage(pending.id)).resolves.toMatchObject({ usageCount: 1 });
      expect((await manager.findActive('u-42', 'fr'))?.id).toBe(pending.id);

      now = new Date(endsAt.getTime() + 1);
      expect((await manager.get(pending.id))?.status).toBe('EXPIRED');
      expect(await manager.findActive('u-42', 'FR')).toBeNull();
      await expect(manager.recordUsage(pending.id)).rejects.toBeInstanceOf(NotActiveError);

      const Exception = defineAccessExceptionModel(sequelize);
      const stored = await Exception.findByPk(pending.id);
      expect(stored?.status).toBe('EXPIRED');
      expect(stored?.usageCount).toBe(1);
    });

    it('ends usage on revocation', async () => {
      const pending = await manager.request(travel());
      await manager.decide(pending.id, 'approve', admin);

      const revoked = await manager.revoke(pending.id, { id: 'admin-2' }, 'trip cancelled');

      expect(revoked).toMatchObject({ status: 'REVOKED', revokedBy: 'admin-2', revocationNotes: 'trip cancelled' });
      await expect(manager.recordUsage(pending.id)).rejects.toBeInstanceOf(NotActiveError);
      await expect(manager.request(travel())).resolves.toMatchObject({ status: 'PENDING' });
    });
  });

  describe('listing and sweeps', () => {
    it('filters by effective status', async () => {
      const fr = await manager.request(travel({ endsAt: new Date(now.getTime() + DAY) }));
      const de = await manager.request(travel({ destinationCountry: 'DE' }));
      await manager.decide(de.id, 'approve', admin);
      now = new Date(now.getTime() + 2 * DAY);

      expect((await manager.list({ status: 'EXPIRED' })).map((e) => e.id)).toEqual([fr.id]);
      expect((await manager.list({ status: 'PENDING' })).map((e) => e.id)).toEqual([]);
      expect((await manager.list({ status: 'APPROVED', userId: 'u-42' })).map((e) => e.id)).toEqual([de.id]);
      expect(await manager.list({ userId: 'someone-else' })).toEqual([]);
    });

    it('persists expiry for every lapsed open exception', async () => {
      const a = await manager.request(travel({ endsAt: new Date(now.getTime() + DAY) }));
      const b = await manager.request(travel({ destinationCountry: 'DE', endsAt: new Date(now.getTime() + DAY) }));
      await manager.decide(b.id, 'approve', admin);
      await manager.request(travel({ destinationCountry: 'IT' }));
      now = new Date(now.getTime() + 2 * DAY);

      await expect(manager.expireStale()).resolves.toBe(2);
      await expect(manager.expireStale()).resolves.toBe(0);

      const Exception = defineAccessExceptionModel(sequelize);
      expect((await Exception.findByPk(a.id))?.status).toBe('EXPIRED');
      expect((await Exception.findByPk(b.id))?.openSlot).toBeNull();
    });
  });
});
