import { createHmac, timingSafeEqual } from 'node:crypto';
import type { AuditEntry, ChecksumFields } from './types.js';

/**
 * Canonical serialization of every immutable field, in a fixed order.
 * A JSON array keeps field boundaries unambiguous.
 */
export function canonicalize(fields: ChecksumFields): string {
  return JSON.stringify([
    fields.id,
    fields.createdAt.toISOString(),
    fields.actorId,
    fields.changeType,
    fields.oldValue,
    fields.newValue,
    fields.justification,
    fields.ipAddress,
    fields.userAgent,
    fields.notificationSent,
    fields.recipientCount,
  ]);
}

/** HMAC-SHA256 of the canonical form, hex encoded */
export function computeChecksum(fields: ChecksumFields, secret: string): string {
  return createHmac('sha256', secret).update(canonicalize(fields)).digest('hex');
}

/** Constant-time comparison of two hex checksums */
export function checksumsEqual(a: string, b: string): boolean {
  const left = Buffer.from(a, 'utf8');
  const right = Buffer.from(b, 'utf8');
  if (left.length !== right.length) return false;
  return timingSafeEqual(left, right);
}

export function isEntryIntact(entry: AuditEntry, secret: string): boolean {
  return checksumsEqual(entry.checksum, computeChecksum(entry, secret));
}
