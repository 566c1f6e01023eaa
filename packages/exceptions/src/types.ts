import type { Sequelize, Model, ModelStatic, CreationOptional, InferAttributes, InferCreationAttributes } from 'sequelize';
import type { Actor, Clock, CountryCode, Logger, Notifier } from '@geowarden/core';

/** Lifecycle of a travel exception */
export type ExceptionStatus =
  | 'PENDING'
  | 'APPROVED'
  | 'DENIED'
  | 'EXPIRED'
  | 'REVOKED';

export type ExceptionDecision = 'approve' | 'deny';

/** Time-boxed permission for one user to access from one otherwise blocked country */
export interface AccessException {
  id: string;
  userId: string;
  destinationCountry: CountryCode;
  reason: string;
  startsAt: Date;
  endsAt: Date;
  /** Effective status: PENDING/APPROVED past `endsAt` reads as EXPIRED */
  status: ExceptionStatus;
  requestedBy: string | null;
  /** Suspicious attempt the exception was raised from, if any */
  sourceAttemptId: string | null;
  decidedBy: string | null;
  decidedAt: Date | null;
  decisionNotes: string | null;
  revokedBy: string | null;
  revokedAt: Date | null;
  revocationNotes: string | null;
  usageCount: number;
  lastUsedAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface ExceptionRequest {
  userId: string;
  destinationCountry: string;
  startsAt: Date;
  endsAt: Date;
  reason: string;
  /** Who filed the request when it is not the user (e.g. an admin) */
  requestedBy?: string;
  sourceAttemptId?: string;
}

export interface ExceptionListFilters {
  userId?: string;
  status?: ExceptionStatus;
  /** Default 20 */
  limit?: number;
  offset?: number;
}

/** Resolve a user id to a notification address; null when unknown */
export type UserContactResolver = (userId: string) => Promise<string | null>;

export interface ExceptionManagerConfig {
  database: Sequelize;
  notifier: Notifier;
  /** Default: the user id itself is the address */
  resolveUserContact?: UserContactResolver;
  logger?: Logger;
  clock?: Clock;
}

export interface ExceptionManager {
  request(input: ExceptionRequest): Promise<AccessException>;
  decide(id: string, decision: ExceptionDecision, actor: Actor, notes?: string): Promise<AccessException>;
  revoke(id: string, actor: Actor, notes?: string): Promise<AccessException>;
  /** Count one use of an active exception */
  recordUsage(id: string): Promise<AccessException>;
  /** The approved, in-window exception for (user, country), if any */
  findActive(userId: string, countryCode: CountryCode): Promise<AccessException | null>;
  get(id: string): Promise<AccessException | null>;
  list(filters?: ExceptionListFilters): Promise<AccessException[]>;
  /** Persist EXPIRED for every open exception past its window; returns the count */
  expireStale(): Promise<number>;
}

export interface AccessExceptionInstance
  extends Model<InferAttributes<AccessExceptionInstance>, InferCreationAttributes<AccessExceptionInstance>> {
  id: string;
  userId: string;
  destinationCountry: string;
  reason: string;
  startsAt: Date;
  endsAt: Date;
  status: ExceptionStatus;
  requestedBy: string | null;
  sourceAttemptId: string | null;
  decidedBy: CreationOptional<string | null>;
  decidedAt: CreationOptional<Date | null>;
  decisionNotes: CreationOptional<string | null>;
  revokedBy: CreationOptional<string | null>;
  revokedAt: CreationOptional<Date | null>;
  revocationNotes: CreationOptional<string | null>;
  usageCount: CreationOptional<number>;
  lastUsedAt: CreationOptional<Date | null>;
  /** 1 while PENDING or APPROVED, null once terminal */
  openSlot: 1 | null;
  createdAt: CreationOptional<Date>;
  updatedAt: CreationOptional<Date>;
}

export type AccessExceptionModel = ModelStatic<AccessExceptionInstance>;
