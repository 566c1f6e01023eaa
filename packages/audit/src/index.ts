// Types
export { AuditChangeType } from './types.js';
export type {
  AppendInput,
  AppendOptions,
  AuditEntry,
  AuditLedger,
  AuditLedgerConfig,
  AuditQueryFilters,
  ChecksumFields,
  TamperNote,
  TamperDetectionSource,
  VerificationReport,
  VerificationResult,
  VerificationStatus,
} from './types.js';

// Migrations
export { auditMigrations } from './migrations/index.js';

// Models
export { defineAuditEntryModel, AUDIT_ENTRIES_TABLE } from './models/auditEntry.js';
export { defineTamperNoteModel, TAMPER_NOTES_TABLE } from './models/tamperNote.js';

// Checksum and IP masking utilities
export { canonicalize, computeChecksum, checksumsEqual, isEntryIntact } from './checksum.js';
export { maskIpAddress } from './ledger.js';

// Factory
import { createLogger, systemClock } from '@geowarden/core';
import type { AuditLedger, AuditLedgerConfig } from './types.js';
import { defineAuditEntryModel } from './models/auditEntry.js';
import { defineTamperNoteModel } from './models/tamperNote.js';
import { createLedgerImpl } from './ledger.js';

/**
 * Create an AuditLedger instance.
 *
 * Entries are written to `audit_entries` with an HMAC-SHA256 checksum
 * over all of their fields. UPDATE and DELETE are rejected by model
 * hooks and by the triggers created in the migration.
 *
 * @example
 * ```typescript
 * import { createAuditLedger, AuditChangeType } from '@geowarden/audit';
 *
 * const ledger = createAuditLedger({
 *   database: sequelize,
 *   checksumSecret: config.audit.checksumSecret,
 *   notifier,
 *   securityContacts: ['soc@example.org'],
 * });
 *
 * const entry = await ledger.append({
 *   actorId: 'admin-1',
 *   changeType: AuditChangeType.ENFORCEMENT_TOGGLE,
 *   oldValue: 'false',
 *   newValue: 'true',
 * });
 * await ledger.verifyById(entry.id);
 * ```
 */
export function createAuditLedger(config: AuditLedgerConfig): AuditLedger {
  const contacts = config.securityContacts ?? [];
  return createLedgerImpl({
    AuditEntry: defineAuditEntryModel(config.database),
    TamperNote: defineTamperNoteModel(config.database),
    secret: config.checksumSecret,
    notifier: config.notifier,
    resolveSecurityContacts: typeof contacts === 'function' ? contacts : async () => contacts,
    maskIpAddresses: config.maskIpAddresses ?? false,
    logger: config.logger ?? createLogger('audit'),
    clock: config.clock ?? systemClock,
  });
}
