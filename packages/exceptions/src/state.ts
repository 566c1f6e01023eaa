import type { AccessException, ExceptionStatus } from './types.js';

const TRANSITIONS: Record<ExceptionStatus, readonly ExceptionStatus[]> = {
  PENDING: ['APPROVED', 'DENIED', 'EXPIRED'],
  APPROVED: ['REVOKED', 'EXPIRED'],
  DENIED: [],
  EXPIRED: [],
  REVOKED: [],
};

export const OPEN_STATUSES: readonly ExceptionStatus[] = ['PENDING', 'APPROVED'];

export function canTransition(from: ExceptionStatus, to: ExceptionStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export function isTerminal(status: ExceptionStatus): boolean {
  return TRANSITIONS[status].length === 0;
}

/** Stored status with the expiry override applied */
export function effectiveStatus(
  exception: Pick<AccessException, 'status' | 'endsAt'>,
  now: Date,
): ExceptionStatus {
  if (OPEN_STATUSES.includes(exception.status) && now.getTime() > exception.endsAt.getTime()) {
    return 'EXPIRED';
  }
  return exception.status;
}

/** Approved and `startsAt <= now <= endsAt` */
export function isActive(
  exception: Pick<AccessException, 'status' | 'startsAt' | 'endsAt'>,
  now: Date,
): boolean {
  return (
    effectiveStatus(exception, now) === 'APPROVED' &&
    exception.startsAt.getTime() <= now.getTime() &&
    now.getTime() <= exception.endsAt.getTime()
  );
}
