import { describe, it, expect, vi, beforeEach } from 'vitest';
import { createLogger } from '@geowarden/core';
import type { Notifier } from '@geowarden/core';
import { maskIpAddress, createLedgerImpl } from './ledger.js';
import { computeChecksum } from './checksum.js';
import { AuditChangeType } from './types.js';
import type { AuditEntryModel, AuditLedger, TamperNoteModel } from './types.js';

// ─── maskIpAddress ───────────────────────────────────────────────

describe('maskIpAddress', () => {
  it('masks last octet of IPv4 address', () => {
    expect(maskIpAddress('192.168.1.100')).toBe('192.168.1.0');
    expect(maskIpAddress('10.0.0.255')).toBe('10.0.0.0');
  });

  it('masks the last group of an IPv6 address', () => {
    expect(maskIpAddress('2001:db8::1')).toBe('2001:db8::0');
  });

  it('handles IPv4-mapped IPv6 addresses', () => {
    expect(maskIpAddress('::ffff:192.168.1.1')).toBe('::ffff:192.168.1.0');
  });

  it('returns null for missing or invalid input', () => {
    expect(maskIpAddress(undefined)).toBeNull();
    expect(maskIpAddress('   ')).toBeNull();
    expect(maskIpAddress('not-an-ip')).toBeNull();
  });
});

// ─── createLedgerImpl ────────────────────────────────────────────

const SECRET = 'test-secret-0123456789';
const NOW = new Date('2026-03-01T12:00:00.000Z');

function createMocks() {
  const AuditEntry = {
    create: vi.fn().mockResolvedValue({}),
    findByPk: vi.fn().mockResolvedValue(null),
    findAll: vi.fn().mockResolvedValue([]),
  };
  const TamperNote = {
    create: vi.fn().mockResolvedValue({}),
    findAll: vi.fn().mockResolvedValue([]),
  };
  const notifier: Notifier = { send: vi.fn().mockResolvedValue(undefined) };
  return { AuditEntry, TamperNote, notifier };
}

describe('createLedgerImpl', () => {
  let mocks: ReturnType<typeof createMocks>;
  let ledger: AuditLedger;

  function build(maskIpAddresses = false): AuditLedger {
    return createLedgerImpl({
      AuditEntry: mocks.AuditEntry as unknown as AuditEntryModel,
      TamperNote: mocks.TamperNote as unknown as TamperNoteModel,
      secret: SECRET,
      notifier: mocks.notifier,
      resolveSecurityContacts: async () => ['soc@example.org'],
      maskIpAddresses,
      logger: createLogger('audit-test', { silent: true }),
      clock: () => NOW,
    });
  }

  beforeEach(() => {
    mocks = createMocks();
    ledger = build();
  });

  it('stamps id, timestamp and checksum on append', async () => {
    const entry = await ledger.append({
      actorId: 'admin-1',
      changeType: AuditChangeType.PRIMARY_COUNTRY,
      oldValue: 'US',
      newValue: 'CA',
      justification: 'office move',
      ipAddress: ' 203.0.113.9 ',
    });

    expect(entry.id).toMatch(/^[0-9a-f-]{36}$/);
    expect(entry.createdAt).toEqual(NOW);
    expect(entry.ipAddress).toBe('203.0.113.9');
    expect(entry.notificationSent).toBe(false);
    expect(entry.recipientCount).toBe(0);
    expect(entry.checksum).toBe(computeChecksum(entry, SECRET));
    expect(mocks.AuditEntry.create).toHaveBeenCalledWith(entry, { transaction: undefined });
  });

  it('masks the stored IP address when configured', async () => {
    ledger = build(true);
    const entry = await ledger.append({
      changeType: AuditChangeType.IT_CONTACT,
      ipAddress: '203.0.113.9',
    });

    expect(entry.ipAddress).toBe('203.0.113.0');
    expect(entry.checksum).toBe(computeChecksum(entry, SECRET));
  });

  it('accepts an untouched entry without alerting', async () => {
    const entry = await ledger.append({ changeType: AuditChangeType.ENFORCEMENT_TOGGLE, newValue: 'true' });

    await expect(ledger.verify(entry)).resolves.toBe(true);
    expect(mocks.notifier.send).not.toHaveBeenCalled();
    expect(mocks.TamperNote.create).not.toHaveBeenCalled();
  });

  it('records a tamper note and sends an urgent alert on mismatch', async () => {
    const entry = await ledger.append({ changeType: AuditChangeType.PRIMARY_COUNTRY, newValue: 'US' });
    const tampered = { ...entry, newValue: 'RU' };

    await expect(ledger.verify(tampered)).resolves.toBe(false);

    expect(mocks.TamperNote.create).toHaveBeenCalledWith({
      entryId: entry.id,
      storedChecksum: entry.checksum,
      computedChecksum: computeChecksum(tampered, SECRET),
      detectedBy: 'verify',
      detectedAt: NOW,
    });
    const notification = vi.mocked(mocks.notifier.send).mock.calls[0]![0];
    expect(notification.priority).toBe('URGENT');
    expect(notification.recipients).toEqual(['soc@example.org']);
    expect(notification.body).toContain(`- ${entry.id}`);
  });

  it('still reports the failure when the alert cannot be delivered', async () => {
    vi.mocked(mocks.notifier.send).mockRejectedValue(new Error('SMTP down'));
    const entry = await ledger.append({ changeType: AuditChangeType.SECURITY_CONTACT, newValue: 'a@example.org' });

    await expect(ledger.verify({ ...entry, actorId: 'intruder' })).resolves.toBe(false);
    expect(mocks.TamperNote.create).toHaveBeenCalledTimes(1);
  });

  it('distinguishes a missing entry from a tampered one', async () => {
    await expect(ledger.verifyById('missing')).resolves.toEqual({ entryId: 'missing', status: 'NOT_FOUND' });
    expect(mocks.notifier.send).not.toHaveBeenCalled();
  });
});
