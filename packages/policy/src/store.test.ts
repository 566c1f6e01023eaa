import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Sequelize, DataTypes, ValidationError as SequelizeValidationError } from 'sequelize';
import {
  ConflictError,
  PolicyUnavailableError,
  ValidationError,
  createLogger,
} from '@geowarden/core';
import type { Notifier } from '@geowarden/core';
import { AuditChangeType, auditMigrations, createAuditLedger } from '@geowarden/audit';
import type { AuditLedger } from '@geowarden/audit';
import { createPolicyStore } from './index.js';
import { policyMigrations } from './migrations/index.js';
import { defineSecurityPolicyModel } from './models/securityPolicy.js';
import type { PolicyStore, PolicyStoreConfig } from './types.js';

const admin = { id: 'admin-1', username: 'alex' };
const silent = createLogger('policy-test', { silent: true });

describe('PolicyStore (SQLite)', () => {
  let sequelize: Sequelize;
  let ledger: AuditLedger;
  let notifier: Notifier;
  let store: PolicyStore;
  let now: Date;

  function build(overrides: Partial<PolicyStoreConfig> = {}): PolicyStore {
    return createPolicyStore({
      database: sequelize,
      ledger,
      notifier,
      cacheMs: 500,
      logger: silent,
      clock: () => now,
      ...overrides,
    });
  }

  beforeEach(async () => {
    sequelize = new Sequelize({ dialect: 'sqlite', storage: ':memory:', logging: false });
    await auditMigrations.up(sequelize.getQueryInterface(), DataTypes);
    await policyMigrations.up(sequelize.getQueryInterface(), DataTypes);
    now = new Date('2026-04-01T10:00:00.000Z');
    notifier = { send: vi.fn().mockResolvedValue(undefined) };
    ledger = createAuditLedger({
      database: sequelize,
      checksumSecret: 'test-secret-0123456789',
      notifier,
      logger: silent,
      clock: () => now,
    });
    store = build();
  });

  afterEach(async () => {
    await sequelize.close();
  });

  describe('bootstrap', () => {
    it('creates the default policy once', async () => {
      const first = await store.initialize();
      const second = await build().initialize();

      expect(first).toMatchObject({
        id: 1,
        primaryCountry: 'US',
        secondaryCountry: null,
        enforcementEnabled: false,
        setupCompleted: false,
        version: 1,
      });
      expect(second.createdAt).toEqual(first.createdAt);
    });

    it('bootstraps on first read', async () => {
      const policy = await store.get();
      expect(policy.primaryCountry).toBe('US');
    });

    it('refuses a second policy row', async () => {
      await store.initialize();

      await expect(store.create({ primaryCountry: 'CA' })).rejects.toBeInstanceOf(ConflictError);

      const Policy = defineSecurityPolicyModel(sequelize);
      await expect(
        Policy.create({
          id: 2,
          primaryCountry: 'CA',
          secondaryCountry: null,
          enforcementEnabled: false,
          adminEmail: null,
          itEmail: null,
          securityEmail: null,
        }),
      ).rejects.toBeInstanceOf(SequelizeValidationError);
      expect(await Policy.count()).toBe(1);
    });

    it('reports storage failures as PolicyUnavailableError', async () => {
      const bare = new Sequelize({ dialect: 'sqlite', storage: ':memory:', logging: false });
      const broken = createPolicyStore({ database: bare, ledger, notifier, logger: silent });

      await expect(broken.get()).rejects.toBeInstanceOf(PolicyUnavailableError);
      await bare.close();
    });
  });

  describe('update', () => {
    beforeEach(async () => {
      await store.initialize();
    });

    it('rejects primary equal to secondary without writing anything', async () => {
      const err: unknown = await store
        .update({ secondaryCountry: 'us' }, admin, { reason: 'typo' })
        .catch((e: unknown) => e);

      expect(err).toBeInstanceOf(ValidationError);
      expect((err as ValidationError).message).toBe('Primary and secondary countries must differ');
      expect(await ledger.query({})).toEqual([]);
      store.invalidate();
      expect((await store.get()).secondaryCountry).toBeNull();
    });

    it('rejects malformed country codes', async () => {
      const err: unknown = await store.update({ primaryCountry: 'USA' }, admin, { reason: 'x' }).catch((e: unknown) => e);

      expect(err).toBeInstanceOf(ValidationError);
      expect((err as ValidationError).issues).toEqual(['primaryCountry: must be a two-letter ISO 3166-1 country code']);
    });

    it('requires a justification to change countries', async () => {
      await expect(store.update({ primaryCountry: 'CA' }, admin)).rejects.toThrow(
        'A justification is required to change allowed countries',
      );
    });

    it('requires a security contact before enforcement', async () => {
      await expect(store.update({ enforcementEnabled: true }, admin)).rejects.toThrow(
        'A security contact is required before enforcement can be enabled',
      );
    });

    it('applies changes, notifies leadership and audits each field', async () => {
      const result = await store.update(
        {
          secondaryCountry: 'ca',
          enforcementEnabled: true,
          adminEmail: 'admin@example.org',
          securityEmail: 'security@example.org',
        },
        admin,
        { reason: 'Toronto office', ipAddress: '198.51.100.20', userAgent: 'test-agent' },
      );

      expect(result.warnings).toEqual([]);
      expect(result.policy).toMatchObject({
        secondaryCountry: 'CA',
        enforcementEnabled: true,
        version: 2,
        setupCompleted: true,
        setupCompletedBy: 'admin-1',
        previousSecondaryCountry: null,
        secondaryCountryChangedBy: 'admin-1',
        previousPrimaryCountry: null,
      });
      expect(result.policy.setupCompletedAt).toEqual(now);

      expect(result.auditEntries.map((e) => [e.changeType, e.oldValue, e.newValue])).toEqual([
        [AuditChangeType.SECONDARY_COUNTRY, null, 'CA'],
        [AuditChangeType.ENFORCEMENT_TOGGLE, 'false', 'true'],
        [AuditChangeType.ADMIN_CONTACT, null, 'admin@example.org'],
        [AuditChangeType.SECURITY_CONTACT, null, 'security@example.org'],
      ]);
      for (const entry of result.auditEntries) {
        expect(entry).toMatchObject({
          actorId: 'admin-1',
          justification: 'Toronto office',
          ipAddress: '198.51.100.20',
          userAgent: 'test-agent',
          notificationSent: true,
          recipientCount: 2,
        });
        await expect(ledger.verifyById(entry.id)).resolves.toEqual({ entryId: entry.id, status: 'VALID' });
      }

      expect(notifier.send).toHaveBeenCalledTimes(1);
      const notice = vi.mocked(notifier.send).mock.calls[0]![0];
      expect(notice.recipients).toEqual(['admin@example.org', 'security@example.org']);
      expect(notice.priority).toBe('HIGH');
      expect(notice.body).toContain('secondaryCountry: (none) -> CA');
    });

    it('keeps the change and warns when leadership cannot be notified', async () => {
      vi.mocked(notifier.send).mockRejectedValue(new Error('SMTP down'));

      const result = await store.update(
        { primaryCountry: 'CA', adminEmail: 'admin@example.org' },
        admin,
        { reason: 'relocation' },
      );

      expect(result.warnings).toEqual(['LEADERSHIP_NOT_NOTIFIED']);
      expect(result.policy.primaryCountry).toBe('CA');
      expect(result.policy.previousPrimaryCountry).toBe('US');
      expect(result.auditEntries.every((e) => !e.notificationSent && e.recipientCount === 0)).toBe(true);
    });

    it('stops waiting on a stalled leadership notice', async () => {
      vi.mocked(notifier.send).mockImplementation(() => new Promise<void>(() => undefined));
      const impatient = build({ notifyTimeoutMs: 20 });

      const result = await impatient.update(
        { primaryCountry: 'CA', adminEmail: 'admin@example.org' },
        admin,
        { reason: 'relocation' },
      );

      expect(result.warnings).toEqual(['LEADERSHIP_NOT_NOTIFIED']);
      expect(result.policy.primaryCountry).toBe('CA');
      expect(result.auditEntries.map((e) => e.notificationSent)).toEqual([false, false]);
    });

    it('warns when there is nobody to notify', async () => {
      const result = await store.update({ primaryCountry: 'MX' }, admin, { reason: 'relocation' });

      expect(result.warnings).toEqual(['NO_LEADERSHIP_CONTACTS']);
      expect(notifier.send).not.toHaveBeenCalled();
      expect(result.auditEntries).toHaveLength(1);
    });

    it('does not announce contact-only changes', async () => {
      const result = await store.update({ itEmail: 'it@example.org' }, admin);

      expect(notifier.send).not.toHaveBeenCalled();
      expect(result.warnings).toEqual([]);
      expect(result.auditEntries[0]).toMatchObject({
        changeType: AuditChangeType.IT_CONTACT,
        notificationSent: false,
        justification: null,
      });
    });

    it('treats an update without differences as a no-op', async () => {
      const result = await store.update({ primaryCountry: 'US' }, admin);

      expect(result.auditEntries).toEqual([]);
      expect(result.policy.version).toBe(1);
    });

    it('ignores fields passed as undefined', async () => {
      await store.update({ secondaryCountry: 'CA' }, admin, { reason: 'second office' });

      const result = await store.update({ secondaryCountry: undefined, adminEmail: 'boss@example.org' }, admin);

      expect(result.auditEntries.map((e) => e.changeType)).toEqual([AuditChangeType.ADMIN_CONTACT]);
      expect(result.policy.secondaryCountry).toBe('CA');

      store.invalidate();
      const stored = await store.get();
      expect(stored.secondaryCountry).toBe('CA');
      expect(stored.adminEmail).toBe('boss@example.org');

      const countryEntries = await ledger.query({ changeType: AuditChangeType.SECONDARY_COUNTRY });
      expect(countryEntries).toHaveLength(1);
      expect(countryEntries[0]?.newValue).toBe('CA');
    });

    it('bootstraps with defaults for fields passed as undefined', async () => {
      await sequelize.getQueryInterface().bulkDelete('security_policies', {});
      store.invalidate();

      const created = await store.create({ primaryCountry: undefined, secondaryCountry: 'CA' });

      expect(created.primaryCountry).toBe('US');
      expect(created.secondaryCountry).toBe('CA');
    });

    it('rolls the policy back when the audit append fails', async () => {
      const failing: AuditLedger = { ...ledger, append: vi.fn().mockRejectedValue(new Error('disk full')) };
      const fragile = build({ ledger: failing });

      await expect(fragile.update({ itEmail: 'it@example.org' }, admin)).rejects.toThrow('disk full');

      store.invalidate();
      const policy = await store.get();
      expect(policy.itEmail).toBeNull();
      expect(policy.version).toBe(1);
    });
  });

  describe('snapshot reads', () => {
    it('serves a snapshot until it is older than cacheMs', async () => {
      await store.get();
      await build().update({ itEmail: 'it@example.org' }, admin);

      expect((await store.get()).itEmail).toBeNull();

      now = new Date(now.getTime() + 501);
      expect((await store.get()).itEmail).toBe('it@example.org');
    });
  });
});
