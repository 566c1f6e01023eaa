import type {
  Sequelize,
  Model,
  ModelStatic,
  InferAttributes,
  InferCreationAttributes,
  CreationOptional,
} from 'sequelize';
import type { Actor, Clock, CountryCode, Logger, Notifier, RequestContext } from '@geowarden/core';
import type { AuditEntry, AuditLedger } from '@geowarden/audit';

/** The id of the only policy row */
export const POLICY_ID = 1;

/** System-wide geographic access policy (singleton) */
export interface SecurityPolicy {
  id: number;
  primaryCountry: CountryCode;
  secondaryCountry: CountryCode | null;
  enforcementEnabled: boolean;
  adminEmail: string | null;
  itEmail: string | null;
  securityEmail: string | null;
  setupCompleted: boolean;
  setupCompletedBy: string | null;
  setupCompletedAt: Date | null;
  previousPrimaryCountry: CountryCode | null;
  primaryCountryChangedAt: Date | null;
  primaryCountryChangedBy: string | null;
  previousSecondaryCountry: CountryCode | null;
  secondaryCountryChangedAt: Date | null;
  secondaryCountryChangedBy: string | null;
  /** Incremented on every applied update */
  version: number;
  createdAt: Date;
  updatedAt: Date;
}

/** Fields an administrator may change. Omitted fields stay as they are. */
export interface PolicyChanges {
  primaryCountry?: string;
  /** null clears the secondary country */
  secondaryCountry?: string | null;
  enforcementEnabled?: boolean;
  adminEmail?: string | null;
  itEmail?: string | null;
  securityEmail?: string | null;
}

export type PolicyWarning = 'LEADERSHIP_NOT_NOTIFIED' | 'NO_LEADERSHIP_CONTACTS';

export interface PolicyUpdateResult {
  policy: SecurityPolicy;
  /** One entry per changed field, in field order */
  auditEntries: AuditEntry[];
  warnings: PolicyWarning[];
}

/**
 * LEADERSHIP: administrator and security contacts, told about policy changes.
 * SECURITY: security and IT contacts, told about suspicious activity and tampering.
 */
export type ContactAudience = 'LEADERSHIP' | 'SECURITY';

export interface PolicyStoreConfig {
  database: Sequelize;
  ledger: AuditLedger;
  notifier: Notifier;
  /** Maximum age of the in-process snapshot served by get() (default: 500) */
  cacheMs?: number;
  /** Longest wait for the leadership notice while the policy row is locked (default: 5000) */
  notifyTimeoutMs?: number;
  logger?: Logger;
  clock?: Clock;
}

export interface PolicyStore {
  /** Create the default policy if none exists; safe to call repeatedly */
  initialize(): Promise<SecurityPolicy>;
  /** Current policy, possibly from a snapshot up to `cacheMs` old */
  get(): Promise<SecurityPolicy>;
  /** Apply changes, notify leadership and append audit entries atomically */
  update(changes: PolicyChanges, actor: Actor, context?: RequestContext): Promise<PolicyUpdateResult>;
  /** Insert the policy row; ConflictError if it already exists */
  create(initial?: PolicyChanges): Promise<SecurityPolicy>;
  /** Drop the snapshot so the next get() reads storage */
  invalidate(): void;
}

export interface SecurityPolicyInstance
  extends Model<InferAttributes<SecurityPolicyInstance>, InferCreationAttributes<SecurityPolicyInstance>> {
  id: number;
  primaryCountry: string;
  secondaryCountry: string | null;
  enforcementEnabled: boolean;
  adminEmail: string | null;
  itEmail: string | null;
  securityEmail: string | null;
  setupCompleted: CreationOptional<boolean>;
  setupCompletedBy: CreationOptional<string | null>;
  setupCompletedAt: CreationOptional<Date | null>;
  previousPrimaryCountry: CreationOptional<string | null>;
  primaryCountryChangedAt: CreationOptional<Date | null>;
  primaryCountryChangedBy: CreationOptional<string | null>;
  previousSecondaryCountry: CreationOptional<string | null>;
  secondaryCountryChangedAt: CreationOptional<Date | null>;
  secondaryCountryChangedBy: CreationOptional<string | null>;
  version: CreationOptional<number>;
  createdAt: CreationOptional<Date>;
  updatedAt: CreationOptional<Date>;
}

export type SecurityPolicyModel = ModelStatic<SecurityPolicyInstance>;
