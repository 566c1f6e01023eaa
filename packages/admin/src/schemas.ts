import { z } from 'zod';
import { ValidationError } from '@geowarden/core';
import { AuditChangeType } from '@geowarden/audit';

const notes = z.string().max(2000).optional();
const optionalText = z.string().trim().min(1).optional();

export const policyUpdateBody = z
  .object({
    primaryCountry: z.string().optional(),
    secondaryCountry: z.string().nullable().optional(),
    enforcementEnabled: z.boolean().optional(),
    adminEmail: z.string().nullable().optional(),
    itEmail: z.string().nullable().optional(),
    securityEmail: z.string().nullable().optional(),
    reason: z.string().max(2000).optional(),
  })
  .strict();

export const decisionBody = z.object({
  decision: z.enum(['approve', 'deny']),
  notes,
});

export const notesBody = z.object({ notes }).default({});

export const attemptExceptionBody = z.object({ reason: z.string().max(2000).optional() }).default({});

export const selfExceptionBody = z.object({
  destinationCountry: z.string(),
  startsAt: z.coerce.date({ invalid_type_error: 'must be a valid date' }),
  endsAt: z.coerce.date({ invalid_type_error: 'must be a valid date' }),
  reason: z.string(),
});

export const exceptionQuery = z.object({
  userId: optionalText,
  status: z.enum(['PENDING', 'APPROVED', 'DENIED', 'EXPIRED', 'REVOKED']).optional(),
});

export const auditQuery = z.object({
  changeType: z.nativeEnum(AuditChangeType).optional(),
  actorId: optionalText,
  startDate: z.coerce.date().optional(),
  endDate: z.coerce.date().optional(),
});

export const attemptQuery = z.object({
  userId: optionalText,
  resolved: z
    .enum(['true', 'false'])
    .transform((v) => v === 'true')
    .optional(),
});

export const lookupQuery = z.object({
  ip: z.string().ip({ message: 'must be an IP address' }),
});

/**
 * Parse a request body or query string, raising ValidationError with one
 * issue per invalid field.
 */
export function parseWith<Output>(schema: z.ZodType<Output, z.ZodTypeDef, unknown>, value: unknown): Output {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new ValidationError(
      'Invalid request',
      parsed.error.issues.map((i) => `${i.path.join('.') || 'body'}: ${i.message}`),
    );
  }
  return parsed.data;
}
