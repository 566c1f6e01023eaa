import type { NextFunction, Request, Response } from 'express';
import type { Actor, Clock, CountryCode, Logger, RequestContext } from '@geowarden/core';
import type {
  AuditChangeType,
  AuditEntry,
  AuditLedger,
  VerificationReport,
  VerificationResult,
} from '@geowarden/audit';
import type { GeoResolver, ThreatLevel } from '@geowarden/geo';
import type { PolicyChanges, PolicyStore, PolicyUpdateResult, SecurityPolicy } from '@geowarden/policy';
import type {
  AccessException,
  ExceptionDecision,
  ExceptionManager,
  ExceptionStatus,
} from '@geowarden/exceptions';
import type { SuspiciousAccessAttempt, SuspiciousActivityDetector } from '@geowarden/detector';

export type AuthMiddleware = (req: Request, res: Response, next: NextFunction) => void;

/** Identity established by the auth middleware; null when there is none */
export type ActorResolver = (req: Request) => Actor | null | undefined;

export interface PageParams {
  limit?: number;
  offset?: number;
}

export interface Page<T> {
  items: T[];
  offset: number;
  limit: number;
}

export interface ExceptionListParams extends PageParams {
  userId?: string;
  status?: ExceptionStatus;
}

export interface AuditListParams extends PageParams {
  changeType?: AuditChangeType;
  actorId?: string;
  startDate?: Date;
  endDate?: Date;
}

export interface AttemptListParams extends PageParams {
  userId?: string;
  resolved?: boolean;
}

/** Exception request filed by the user themselves */
export interface SelfExceptionRequest {
  destinationCountry: string;
  startsAt: Date;
  endsAt: Date;
  reason: string;
}

export interface SystemStatus {
  allowedCountries: CountryCode[];
  enforcementEnabled: boolean;
  totalIps: number;
  uniqueCountries: number;
  /** Blocked attempts in the last 30 days */
  blockedAttempts: number;
  /** Last 10 audit entries, newest first */
  recentChanges: AuditEntry[];
}

export interface GeoLookupResult {
  ip: string;
  countryCode: CountryCode;
  countryName: string | null;
  city: string | null;
  threatLevel: ThreatLevel;
  allowed: boolean;
}

export interface AdminConfig {
  policy: PolicyStore;
  ledger: AuditLedger;
  exceptions: ExceptionManager;
  detector: SuspiciousActivityDetector;
  geo: Pick<GeoResolver, 'resolve' | 'stats'>;
  /** Guards every administrative route */
  adminAuth: AuthMiddleware;
  /** Guards the self-service routes */
  userAuth: AuthMiddleware;
  resolveActor: ActorResolver;
  /** Length of an exception opened from a blocked attempt (default: 7) */
  attemptExceptionDays?: number;
  logger?: Logger;
  clock?: Clock;
}

export interface AdminService {
  getPolicy(): Promise<SecurityPolicy>;
  updatePolicy(changes: PolicyChanges, actor: Actor, context: RequestContext): Promise<PolicyUpdateResult>;

  listExceptions(params: ExceptionListParams): Promise<Page<AccessException>>;
  decideException(id: string, decision: ExceptionDecision, actor: Actor, notes?: string): Promise<AccessException>;
  revokeException(id: string, actor: Actor, notes?: string): Promise<AccessException>;

  listAudit(params: AuditListParams): Promise<Page<AuditEntry>>;
  verifyEntry(id: string): Promise<VerificationResult>;
  verifyAll(): Promise<VerificationReport>;

  listAttempts(params: AttemptListParams): Promise<Page<SuspiciousAccessAttempt>>;
  resolveAttempt(id: string, actor: Actor, notes?: string): Promise<SuspiciousAccessAttempt>;
  /** Open a PENDING exception for the attempt's user and country */
  openExceptionForAttempt(id: string, actor: Actor, reason?: string): Promise<AccessException>;

  status(): Promise<SystemStatus>;
  lookup(ip: string): Promise<GeoLookupResult>;

  requestException(user: Actor, request: SelfExceptionRequest): Promise<AccessException>;
  listOwnExceptions(user: Actor, params: PageParams): Promise<Page<AccessException>>;
}
