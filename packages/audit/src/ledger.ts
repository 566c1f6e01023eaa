import { randomUUID } from 'node:crypto';
import { Op } from 'sequelize';
import type { WhereOptions } from 'sequelize';
import { deliver } from '@geowarden/core';
import type { Clock, Logger, Notifier } from '@geowarden/core';
import { computeChecksum, isEntryIntact } from './checksum.js';
import type {
  AppendInput,
  AppendOptions,
  AuditEntry,
  AuditEntryInstance,
  AuditEntryModel,
  AuditLedger,
  AuditQueryFilters,
  ChecksumFields,
  TamperDetectionSource,
  TamperNote,
  TamperNoteModel,
  VerificationReport,
  VerificationResult,
} from './types.js';

const VERIFY_BATCH_SIZE = 500;

/**
 * Mask an IP address for privacy.
 *
 * IPv4: zeroes the last octet       → 192.168.1.100 → 192.168.1.0
 * IPv6: replaces the last group     → 2001:db8::1   → 2001:db8::0
 * Invalid or missing: returns null.
 */
export function maskIpAddress(ip: string | undefined | null): string | null {
  if (!ip) return null;

  const trimmed = ip.trim();
  if (!trimmed) return null;

  if (trimmed.includes('.') && !trimmed.includes(':')) {
    const parts = trimmed.split('.');
    if (parts.length !== 4) return null;
    parts[3] = '0';
    return parts.join('.');
  }

  // IPv4-mapped IPv6 (e.g. ::ffff:192.168.1.1)
  if (trimmed.includes(':') && trimmed.includes('.')) {
    const lastColon = trimmed.lastIndexOf(':');
    const parts = trimmed.substring(lastColon + 1).split('.');
    if (parts.length !== 4) return null;
    parts[3] = '0';
    return trimmed.substring(0, lastColon + 1) + parts.join('.');
  }

  if (trimmed.includes(':')) {
    return trimmed.substring(0, trimmed.lastIndexOf(':')) + ':0';
  }

  return null;
}

function toEntry(row: AuditEntryInstance): AuditEntry {
  const data = row.get({ plain: true });
  // SQLite hands back 0/1 for booleans on some paths; the checksum
  // depends on the exact JSON types, so coerce here.
  return {
    id: data.id,
    createdAt: new Date(data.createdAt),
    actorId: data.actorId ?? null,
    changeType: data.changeType,
    oldValue: data.oldValue ?? null,
    newValue: data.newValue ?? null,
    justification: data.justification ?? null,
    ipAddress: data.ipAddress ?? null,
    userAgent: data.userAgent ?? null,
    notificationSent: Boolean(data.notificationSent),
    recipientCount: Number(data.recipientCount),
    checksum: data.checksum,
  };
}

export interface LedgerDependencies {
  AuditEntry: AuditEntryModel;
  TamperNote: TamperNoteModel;
  secret: string;
  notifier: Notifier;
  resolveSecurityContacts: () => Promise<string[]>;
  maskIpAddresses: boolean;
  logger: Logger;
  clock: Clock;
}

interface Failure {
  entry: AuditEntry;
  computed: string;
}

/**
 * Create the ledger implementation over the two append-only models.
 */
export function createLedgerImpl(deps: LedgerDependencies): AuditLedger {
  const { AuditEntry: AuditEntryModel, TamperNote: TamperNoteModel, secret, logger, clock } = deps;

  async function securityRecipients(): Promise<string[]> {
    try {
      return await deps.resolveSecurityContacts();
    } catch (err) {
      logger.error('failed to resolve security contacts', {
        error: err instanceof Error ? err.message : String(err),
      });
      return [];
    }
  }

  async function reportFailures(failures: Failure[], detectedBy: TamperDetectionSource): Promise<void> {
    const detectedAt = clock();

    for (const { entry, computed } of failures) {
      logger.error('audit entry failed integrity verification', {
        severity: 'CRITICAL',
        entryId: entry.id,
        changeType: entry.changeType,
        detectedBy,
      });
      try {
        await TamperNoteModel.create({
          entryId: entry.id,
          storedChecksum: entry.checksum.slice(0, 64),
          computedChecksum: computed,
          detectedBy,
          detectedAt,
        });
      } catch (err) {
        logger.error('failed to record tamper note', {
          severity: 'CRITICAL',
          entryId: entry.id,
          error: err instanceof Error ? err.message : String(err),
        });
      }
    }

    const ids = failures.map((f) => f.entry.id);
    const outcome = await deliver(deps.notifier, {
      recipients: await securityRecipients(),
      subject: `[CRITICAL] Audit log integrity failure (${ids.length} ${ids.length === 1 ? 'entry' : 'entries'})`,
      body: [
        'Stored checksums no longer match the audit entries listed below.',
        'The records may have been modified outside the application.',
        '',
        ...ids.map((id) => `- ${id}`),
        '',
        `Detected at ${detectedAt.toISOString()} by ${detectedBy}.`,
      ].join('\n'),
      priority: 'URGENT',
    });

    if (!outcome.delivered) {
      logger.error('integrity failure alert was not delivered', {
        severity: 'CRITICAL',
        entryIds: ids,
        error: outcome.error,
      });
    }
  }

  async function check(entry: AuditEntry, detectedBy: TamperDetectionSource): Promise<boolean> {
    if (isEntryIntact(entry, secret)) return true;
    await reportFailures([{ entry, computed: computeChecksum(entry, secret) }], detectedBy);
    return false;
  }

  return {
    async append(input: AppendInput, options: AppendOptions = {}): Promise<AuditEntry> {
      const rawIp = input.ipAddress?.trim() || null;
      const fields: ChecksumFields = {
        id: randomUUID(),
        createdAt: clock(),
        actorId: input.actorId ?? null,
        changeType: input.changeType,
        oldValue: input.oldValue ?? null,
        newValue: input.newValue ?? null,
        justification: input.justification ?? null,
        ipAddress: deps.maskIpAddresses ? maskIpAddress(rawIp) : rawIp,
        userAgent: input.userAgent ?? null,
        notificationSent: input.notificationSent ?? false,
        recipientCount: input.recipientCount ?? 0,
      };
      const entry: AuditEntry = { ...fields, checksum: computeChecksum(fields, secret) };

      await AuditEntryModel.create(entry, { transaction: options.transaction });

      logger.info('audit entry appended', {
        entryId: entry.id,
        changeType: entry.changeType,
        actorId: entry.actorId,
      });
      return entry;
    },

    verify(entry: AuditEntry): Promise<boolean> {
      return check(entry, 'verify');
    },

    async verifyById(id: string): Promise<VerificationResult> {
      const row = await AuditEntryModel.findByPk(id);
      if (!row) return { entryId: id, status: 'NOT_FOUND' };

      const intact = await check(toEntry(row), 'verifyById');
      return { entryId: id, status: intact ? 'VALID' : 'INTEGRITY_FAILURE' };
    },

    async verifyAll(): Promise<VerificationReport> {
      const failures: Failure[] = [];
      let validCount = 0;

      for (let offset = 0; ; offset += VERIFY_BATCH_SIZE) {
        const rows = await AuditEntryModel.findAll({
          order: [['created_at', 'ASC'], ['id', 'ASC']],
          limit: VERIFY_BATCH_SIZE,
          offset,
        });

        for (const row of rows) {
          const entry = toEntry(row);
          if (isEntryIntact(entry, secret)) {
            validCount++;
          } else {
            failures.push({ entry, computed: computeChecksum(entry, secret) });
          }
        }

        if (rows.length < VERIFY_BATCH_SIZE) break;
      }

      if (failures.length > 0) {
        await reportFailures(failures, 'verifyAll');
      }

      const report: VerificationReport = {
        validCount,
        invalidCount: failures.length,
        invalidEntryIds: failures.map((f) => f.entry.id),
      };
      logger.info('audit integrity sweep finished', { ...report });
      return report;
    },

    async getById(id: string): Promise<AuditEntry | null> {
      const row = await AuditEntryModel.findByPk(id);
      return row ? toEntry(row) : null;
    },

    async query(filters: AuditQueryFilters): Promise<AuditEntry[]> {
      const where: WhereOptions = {};

      if (filters.changeType) {
        if (Array.isArray(filters.changeType)) {
          where['change_type'] = { [Op.in]: filters.changeType };
        } else {
          where['change_type'] = filters.changeType;
        }
      }

      if (filters.actorId) {
        where['actor_id'] = filters.actorId;
      }

      if (filters.startDate || filters.endDate) {
        const dateFilter: Record<symbol, Date> = {};
        if (filters.startDate) {
          dateFilter[Op.gte] = filters.startDate;
        }
        if (filters.endDate) {
          dateFilter[Op.lte] = filters.endDate;
        }
        where['created_at'] = dateFilter;
      }

      const rows = await AuditEntryModel.findAll({
        where,
        order: [['created_at', 'DESC'], ['id', 'DESC']],
        limit: filters.limit ?? 100,
        offset: filters.offset ?? 0,
      });

      return rows.map(toEntry);
    },

    async listTamperNotes(limit = 100, offset = 0): Promise<TamperNote[]> {
      const rows = await TamperNoteModel.findAll({
        order: [['detected_at', 'DESC']],
        limit,
        offset,
      });
      return rows.map((row) => {
        const data = row.get({ plain: true });
        return {
          id: data.id,
          entryId: data.entryId,
          storedChecksum: data.storedChecksum,
          computedChecksum: data.computedChecksum,
          detectedBy: data.detectedBy,
          detectedAt: new Date(data.detectedAt),
        };
      });
    },
  };
}
