/** Authenticated identity performing an action (user or administrator) */
export interface Actor {
  /** Stable user identifier */
  id: string;
  /** Display name, used only in notification text */
  username?: string;
}

/** Request metadata captured alongside administrative changes */
export interface RequestContext {
  /** Originating client IP address */
  ipAddress?: string;
  /** Client user agent string */
  userAgent?: string;
  /** Free-text justification supplied by the operator */
  reason?: string;
}

/** ISO 3166-1 alpha-2 country code, upper case */
export type CountryCode = string;

const COUNTRY_CODE_PATTERN = /^[A-Z]{2}$/;

/** Upper-case and trim a country code; returns null if it is not two letters */
export function normalizeCountryCode(value: string | null | undefined): CountryCode | null {
  if (!value) return null;
  const code = value.trim().toUpperCase();
  return COUNTRY_CODE_PATTERN.test(code) ? code : null;
}

/** Clock used by services; injected so tests can pin "now" */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();
