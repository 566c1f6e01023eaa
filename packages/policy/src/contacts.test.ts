import { describe, it, expect } from 'vitest';
import { contactsFor, allowedCountries, isCountryAllowed } from './contacts.js';

const policy = {
  adminEmail: 'admin@example.org',
  itEmail: 'it@example.org',
  securityEmail: 'security@example.org',
};

describe('contactsFor', () => {
  it('addresses leadership as admin plus security', () => {
    expect(contactsFor(policy, 'LEADERSHIP')).toEqual(['admin@example.org', 'security@example.org']);
  });

  it('addresses the security team as security plus IT', () => {
    expect(contactsFor(policy, 'SECURITY')).toEqual(['security@example.org', 'it@example.org']);
  });

  it('drops blanks and duplicates', () => {
    expect(
      contactsFor({ adminEmail: 'ops@example.org', itEmail: ' ', securityEmail: 'ops@example.org' }, 'LEADERSHIP'),
    ).toEqual(['ops@example.org']);
    expect(contactsFor({ adminEmail: null, itEmail: null, securityEmail: null }, 'SECURITY')).toEqual([]);
  });
});

describe('allowed countries', () => {
  it('treats primary and secondary alike', () => {
    const p = { primaryCountry: 'US', secondaryCountry: 'CA' };

    expect([...allowedCountries(p)].sort()).toEqual(['CA', 'US']);
    expect(isCountryAllowed(p, 'CA')).toBe(true);
    expect(isCountryAllowed(p, 'us')).toBe(true);
    expect(isCountryAllowed(p, 'MX')).toBe(false);
  });

  it('allows only the primary without a secondary', () => {
    expect([...allowedCountries({ primaryCountry: 'US', secondaryCountry: null })]).toEqual(['US']);
  });
});
