import type { CountryCode } from '@geowarden/core';
import type { ContactAudience, SecurityPolicy } from './types.js';

/** Recipients for an audience, blanks dropped and de-duplicated */
export function contactsFor(
  policy: Pick<SecurityPolicy, 'adminEmail' | 'itEmail' | 'securityEmail'>,
  audience: ContactAudience,
): string[] {
  const candidates =
    audience === 'LEADERSHIP' ? [policy.adminEmail, policy.securityEmail] : [policy.securityEmail, policy.itEmail];
  const seen = new Set<string>();
  for (const address of candidates) {
    const trimmed = address?.trim();
    if (trimmed) seen.add(trimmed);
  }
  return [...seen];
}

/** Primary and secondary countries; the two are interchangeable */
export function allowedCountries(policy: Pick<SecurityPolicy, 'primaryCountry' | 'secondaryCountry'>): Set<CountryCode> {
  const allowed = new Set<CountryCode>([policy.primaryCountry]);
  if (policy.secondaryCountry) allowed.add(policy.secondaryCountry);
  return allowed;
}

export function isCountryAllowed(
  policy: Pick<SecurityPolicy, 'primaryCountry' | 'secondaryCountry'>,
  countryCode: CountryCode,
): boolean {
  return allowedCountries(policy).has(countryCode.toUpperCase());
}
