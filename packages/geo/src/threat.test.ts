import { describe, it, expect } from 'vitest';
import { threatScore, threatLevel, isSuspicious } from './threat.js';

const clean = { isProxy: false, isVpn: false, isTor: false };

describe('threatScore', () => {
  it('weights each anonymizer flag', () => {
    expect(threatScore(clean)).toBe(0);
    expect(threatScore({ ...clean, isTor: true })).toBe(60);
    expect(threatScore({ ...clean, isVpn: true })).toBe(30);
    expect(threatScore({ ...clean, isProxy: true, isVpn: true })).toBe(60);
  });

  it('caps at 100', () => {
    expect(threatScore({ isProxy: true, isVpn: true, isTor: true })).toBe(100);
  });
});

describe('threatLevel', () => {
  it('buckets scores', () => {
    expect(threatLevel(0)).toBe('NONE');
    expect(threatLevel(10)).toBe('LOW');
    expect(threatLevel(30)).toBe('MEDIUM');
    expect(threatLevel(59)).toBe('MEDIUM');
    expect(threatLevel(60)).toBe('HIGH');
  });
});

describe('isSuspicious', () => {
  it('flags anonymizers and high threat levels', () => {
    expect(isSuspicious({ ...clean, threatLevel: 'NONE' })).toBe(false);
    expect(isSuspicious({ ...clean, isProxy: true, threatLevel: 'MEDIUM' })).toBe(true);
    expect(isSuspicious({ ...clean, threatLevel: 'HIGH' })).toBe(true);
  });
});
