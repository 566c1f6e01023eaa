import type { Sequelize, Model, ModelStatic, CreationOptional, InferAttributes, InferCreationAttributes } from 'sequelize';
import type { Actor, Clock, CountryCode, Logger, Notifier } from '@geowarden/core';

/** Why an access attempt was recorded */
export enum AttemptType {
  /** Request from a country outside the policy without an exception */
  BLOCKED_COUNTRY = 'BLOCKED_COUNTRY',
  /** Blocked request arriving through a proxy, VPN or Tor */
  PROXY_DETECTED = 'PROXY_DETECTED',
}

export type EscalationReason = 'REPEATED_ATTEMPTS' | 'ANONYMIZER_DETECTED';

export interface SuspiciousAccessAttempt {
  id: string;
  createdAt: Date;
  userId: string;
  ipAddress: string;
  geoRecordId: number | null;
  countryCode: CountryCode | null;
  attemptType: AttemptType;
  wasBlocked: boolean;
  userAgent: string | null;
  details: Record<string, unknown> | null;
  itNotified: boolean;
  itNotifiedAt: Date | null;
  resolved: boolean;
  resolvedBy: string | null;
  resolvedAt: Date | null;
  resolutionNotes: string | null;
}

export interface AttemptInput {
  userId: string;
  ipAddress: string;
  countryCode: CountryCode | null;
  attemptType: AttemptType;
  geoRecordId?: number | null;
  /** Default: true */
  wasBlocked?: boolean;
  userAgent?: string | null;
  details?: Record<string, unknown> | null;
}

export interface EscalationDecision {
  escalate: boolean;
  reasons: EscalationReason[];
  /** Blocked attempts by the user inside the window, this one included */
  blockedCount: number;
  /** Whether the security team received the alert */
  notified: boolean;
}

export interface AttemptListFilters {
  userId?: string;
  resolved?: boolean;
  since?: Date;
  /** Default 20 */
  limit?: number;
  offset?: number;
}

export interface DetectorConfig {
  database: Sequelize;
  notifier: Notifier;
  /** Security and IT contacts, resolved when an alert goes out */
  resolveContacts: () => Promise<string[]>;
  /** Blocked attempts within the window that trigger escalation (default: 3) */
  threshold?: number;
  /** Rolling window (default: 24 hours) */
  windowMs?: number;
  logger?: Logger;
  clock?: Clock;
}

export interface SuspiciousActivityDetector {
  recordAttempt(input: AttemptInput): Promise<SuspiciousAccessAttempt>;
  /** Decide whether an attempt warrants alerting the security team, and alert */
  evaluate(attempt: SuspiciousAccessAttempt): Promise<EscalationDecision>;
  get(id: string): Promise<SuspiciousAccessAttempt | null>;
  list(filters?: AttemptListFilters): Promise<SuspiciousAccessAttempt[]>;
  /** Close an attempt after review; ConflictError when already resolved */
  resolve(id: string, actor: Actor, notes?: string): Promise<SuspiciousAccessAttempt>;
  countBlockedSince(since: Date): Promise<number>;
}

export interface SuspiciousAttemptInstance
  extends Model<InferAttributes<SuspiciousAttemptInstance>, InferCreationAttributes<SuspiciousAttemptInstance>> {
  id: string;
  createdAt: Date;
  userId: string;
  ipAddress: string;
  geoRecordId: number | null;
  countryCode: string | null;
  attemptType: AttemptType;
  wasBlocked: boolean;
  userAgent: string | null;
  details: Record<string, unknown> | null;
  itNotified: CreationOptional<boolean>;
  itNotifiedAt: CreationOptional<Date | null>;
  resolved: CreationOptional<boolean>;
  resolvedBy: CreationOptional<string | null>;
  resolvedAt: CreationOptional<Date | null>;
  resolutionNotes: CreationOptional<string | null>;
}

export type SuspiciousAttemptModel = ModelStatic<SuspiciousAttemptInstance>;
