/** Stable machine-readable codes carried by every GeoWarden error */
export type ErrorCode =
  | 'VALIDATION_ERROR'
  | 'CONFLICT'
  | 'INVALID_TRANSITION'
  | 'NOT_ACTIVE'
  | 'NOT_FOUND'
  | 'LOOKUP_UNAVAILABLE'
  | 'IMMUTABLE_RECORD'
  | 'POLICY_UNAVAILABLE';

/**
 * Base class for all typed errors raised by the security subsystem.
 * Callers branch on `code` (or `instanceof`) rather than on message text.
 */
export class GeoWardenError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Malformed input, e.g. a policy update where primary == secondary */
export class ValidationError extends GeoWardenError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = [message]) {
    super('VALIDATION_ERROR', message);
    this.issues = issues;
  }
}

/** Duplicate singleton creation or a duplicate open exception */
export class ConflictError extends GeoWardenError {
  constructor(message: string) {
    super('CONFLICT', message);
  }
}

/** State machine violation on an access exception */
export class InvalidTransitionError extends GeoWardenError {
  readonly from: string;
  readonly to: string;

  constructor(from: string, to: string, message = `Cannot transition from ${from} to ${to}`) {
    super('INVALID_TRANSITION', message);
    this.from = from;
    this.to = to;
  }
}

/** An exception is not approved or its window is not current */
export class NotActiveError extends GeoWardenError {
  constructor(message: string) {
    super('NOT_ACTIVE', message);
  }
}

export class NotFoundError extends GeoWardenError {
  constructor(resource: string, id: string) {
    super('NOT_FOUND', `${resource} not found: ${id}`);
  }
}

/** Geolocation provider timed out, failed, or the address was unusable */
export class LookupUnavailableError extends GeoWardenError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('LOOKUP_UNAVAILABLE', message, options);
  }
}

/** Raised by every update/delete path on an append-only table */
export class ImmutableRecordError extends GeoWardenError {
  constructor(table: string, operation: string) {
    super('IMMUTABLE_RECORD', `${table} is append-only: ${operation} is not permitted`);
  }
}

/** The security policy could not be read from storage */
export class PolicyUnavailableError extends GeoWardenError {
  constructor(options?: { cause?: unknown }) {
    super('POLICY_UNAVAILABLE', 'Security policy is unavailable', options);
  }
}

const STATUS_BY_CODE: Record<ErrorCode, number> = {
  VALIDATION_ERROR: 400,
  CONFLICT: 409,
  INVALID_TRANSITION: 409,
  NOT_ACTIVE: 409,
  NOT_FOUND: 404,
  LOOKUP_UNAVAILABLE: 503,
  IMMUTABLE_RECORD: 405,
  POLICY_UNAVAILABLE: 503,
};

/**
 * Map an error to the HTTP status the Express layers should answer with.
 * Anything that is not a GeoWardenError is a 500.
 */
export function toHttpStatus(err: unknown): number {
  if (err instanceof GeoWardenError) {
    return STATUS_BY_CODE[err.code];
  }
  return 500;
}

/**
 * Client-safe error body. Internal errors are reduced to a generic message
 * so storage or driver details never reach the response.
 */
export function toErrorBody(err: unknown): { error: string; code?: ErrorCode; issues?: string[] } {
  if (err instanceof ValidationError) {
    return { error: err.message, code: err.code, issues: err.issues };
  }
  if (err instanceof GeoWardenError && toHttpStatus(err) < 500) {
    return { error: err.message, code: err.code };
  }
  return { error: 'Internal server error' };
}
