import { describe, it, expect } from 'vitest';
import { canTransition, effectiveStatus, isActive, isTerminal } from './state.js';
import type { ExceptionStatus } from './types.js';

const now = new Date('2026-06-01T12:00:00.000Z');
const before = new Date(now.getTime() - 1);
const after = new Date(now.getTime() + 1);

describe('exception state machine', () => {
  it('allows only the documented transitions', () => {
    expect(canTransition('PENDING', 'APPROVED')).toBe(true);
    expect(canTransition('PENDING', 'DENIED')).toBe(true);
    expect(canTransition('APPROVED', 'REVOKED')).toBe(true);
    expect(canTransition('APPROVED', 'EXPIRED')).toBe(true);
    expect(canTransition('DENIED', 'APPROVED')).toBe(false);
    expect(canTransition('REVOKED', 'APPROVED')).toBe(false);
    expect(canTransition('PENDING', 'REVOKED')).toBe(false);
  });

  it('treats DENIED, EXPIRED and REVOKED as terminal', () => {
    const all: ExceptionStatus[] = ['PENDING', 'APPROVED', 'DENIED', 'EXPIRED', 'REVOKED'];
    expect(all.filter(isTerminal)).toEqual([
      'DENIED',
      'EXPIRED',
      'REVOKED',
    ]);
  });

  it('derives EXPIRED strictly after the end of the window', () => {
    expect(effectiveStatus({ status: 'APPROVED', endsAt: now }, now)).toBe('APPROVED');
    expect(effectiveStatus({ status: 'APPROVED', endsAt: before }, now)).toBe('EXPIRED');
    expect(effectiveStatus({ status: 'PENDING', endsAt: before }, now)).toBe('EXPIRED');
    expect(effectiveStatus({ status: 'REVOKED', endsAt: before }, now)).toBe('REVOKED');
  });

  it('is active only when approved inside the window', () => {
    expect(isActive({ status: 'APPROVED', startsAt: now, endsAt: now }, now)).toBe(true);
    expect(isActive({ status: 'APPROVED', startsAt: after, endsAt: after }, now)).toBe(false);
    expect(isActive({ status: 'PENDING', startsAt: before, endsAt: after }, now)).toBe(false);
  });
});
