import type {
  Sequelize,
  Model,
  ModelStatic,
  InferAttributes,
  InferCreationAttributes,
  CreationOptional,
  Transaction,
} from 'sequelize';
import type { Clock, Logger, Notifier } from '@geowarden/core';

/** Security-policy fields whose changes are recorded in the ledger */
export enum AuditChangeType {
  /** Primary allowed country changed */
  PRIMARY_COUNTRY = 'PRIMARY_COUNTRY',
  /** Secondary allowed country set, changed or cleared */
  SECONDARY_COUNTRY = 'SECONDARY_COUNTRY',
  /** Geo-enforcement switched on or off */
  ENFORCEMENT_TOGGLE = 'ENFORCEMENT_TOGGLE',
  /** Administrator contact address changed */
  ADMIN_CONTACT = 'ADMIN_CONTACT',
  /** IT contact address changed */
  IT_CONTACT = 'IT_CONTACT',
  /** Security contact address changed */
  SECURITY_CONTACT = 'SECURITY_CONTACT',
}

/** Fields supplied by the caller when appending an entry */
export interface AppendInput {
  /** User who made the change; null for system-initiated changes */
  actorId?: string | null;
  changeType: AuditChangeType;
  oldValue?: string | null;
  newValue?: string | null;
  /** Free-text justification */
  justification?: string | null;
  /** IP address of the administrative request */
  ipAddress?: string | null;
  userAgent?: string | null;
  /** Whether leadership was notified of this change */
  notificationSent?: boolean;
  recipientCount?: number;
}

/** Everything the checksum covers: all immutable fields of an entry */
export interface ChecksumFields {
  id: string;
  createdAt: Date;
  actorId: string | null;
  changeType: AuditChangeType;
  oldValue: string | null;
  newValue: string | null;
  justification: string | null;
  ipAddress: string | null;
  userAgent: string | null;
  notificationSent: boolean;
  recipientCount: number;
}

/** A ledger entry as stored and returned */
export interface AuditEntry extends ChecksumFields {
  /** HMAC-SHA256 over the canonical serialization of the other fields */
  checksum: string;
}

/** Outcome of verifying a single entry by id */
export type VerificationStatus = 'VALID' | 'INTEGRITY_FAILURE' | 'NOT_FOUND';

export interface VerificationResult {
  entryId: string;
  status: VerificationStatus;
}

/** Bulk integrity sweep report */
export interface VerificationReport {
  validCount: number;
  invalidCount: number;
  invalidEntryIds: string[];
}

/** Which verification path detected a tamper */
export type TamperDetectionSource = 'verify' | 'verifyById' | 'verifyAll';

/** Separate, simpler record written whenever verification fails */
export interface TamperNote {
  id: string;
  entryId: string;
  storedChecksum: string;
  computedChecksum: string;
  detectedBy: TamperDetectionSource;
  detectedAt: Date;
}

/** Filters for querying the ledger */
export interface AuditQueryFilters {
  /** Filter by change type(s) */
  changeType?: AuditChangeType | AuditChangeType[];
  /** Filter by actor ID */
  actorId?: string;
  /** Entries at or after this date */
  startDate?: Date;
  /** Entries at or before this date */
  endDate?: Date;
  /** Maximum number of results (default 100) */
  limit?: number;
  /** Number of results to skip */
  offset?: number;
}

/** Options for writing inside a caller's transaction */
export interface AppendOptions {
  transaction?: Transaction;
}

/** Configuration for creating a ledger */
export interface AuditLedgerConfig {
  /** Sequelize instance connected to the database */
  database: Sequelize;
  /** Server-side HMAC secret; never sent to clients */
  checksumSecret: string;
  /** Delivers integrity-failure alerts */
  notifier: Notifier;
  /**
   * Recipients of integrity-failure alerts. A function is resolved at
   * detection time so contact changes in the policy take effect.
   */
  securityContacts?: string[] | (() => Promise<string[]>);
  /** Zero the host part of stored IP addresses (default: false) */
  maskIpAddresses?: boolean;
  logger?: Logger;
  clock?: Clock;
}

/** Append-only, checksummed ledger of security-policy changes */
export interface AuditLedger {
  /** Append an entry; computes id, timestamp and checksum */
  append(input: AppendInput, options?: AppendOptions): Promise<AuditEntry>;
  /** Recompute the checksum of an entry; reports and alerts on mismatch */
  verify(entry: AuditEntry): Promise<boolean>;
  /** Verify a stored entry, distinguishing a tamper from a missing id */
  verifyById(id: string): Promise<VerificationResult>;
  /** Verify every stored entry */
  verifyAll(): Promise<VerificationReport>;
  getById(id: string): Promise<AuditEntry | null>;
  query(filters: AuditQueryFilters): Promise<AuditEntry[]>;
  listTamperNotes(limit?: number, offset?: number): Promise<TamperNote[]>;
}

/** Sequelize instance type for audit_entries */
export interface AuditEntryInstance
  extends Model<InferAttributes<AuditEntryInstance>, InferCreationAttributes<AuditEntryInstance>> {
  id: string;
  createdAt: Date;
  actorId: string | null;
  changeType: AuditChangeType;
  oldValue: string | null;
  newValue: string | null;
  justification: string | null;
  ipAddress: string | null;
  userAgent: string | null;
  notificationSent: boolean;
  recipientCount: number;
  checksum: string;
}

/** Sequelize instance type for audit_tamper_notes */
export interface TamperNoteInstance
  extends Model<InferAttributes<TamperNoteInstance>, InferCreationAttributes<TamperNoteInstance>> {
  id: CreationOptional<string>;
  entryId: string;
  storedChecksum: string;
  computedChecksum: string;
  detectedBy: TamperDetectionSource;
  detectedAt: Date;
}

export type AuditEntryModel = ModelStatic<AuditEntryInstance>;
export type TamperNoteModel = ModelStatic<TamperNoteInstance>;
