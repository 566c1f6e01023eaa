import type { GeoRecord, ThreatLevel } from './types.js';

const TOR_WEIGHT = 60;
const VPN_WEIGHT = 30;
const PROXY_WEIGHT = 30;

export interface AnonymizerFlags {
  isProxy: boolean;
  isVpn: boolean;
  isTor: boolean;
}

export function threatScore(flags: AnonymizerFlags): number {
  let score = 0;
  if (flags.isTor) score += TOR_WEIGHT;
  if (flags.isVpn) score += VPN_WEIGHT;
  if (flags.isProxy) score += PROXY_WEIGHT;
  return Math.min(score, 100);
}

export function threatLevel(score: number): ThreatLevel {
  if (score >= 60) return 'HIGH';
  if (score >= 30) return 'MEDIUM';
  if (score > 0) return 'LOW';
  return 'NONE';
}

export function usesAnonymizer(flags: AnonymizerFlags): boolean {
  return flags.isProxy || flags.isVpn || flags.isTor;
}

/** Any anonymizer flag, or a HIGH threat level */
export function isSuspicious(record: Pick<GeoRecord, 'isProxy' | 'isVpn' | 'isTor' | 'threatLevel'>): boolean {
  return usesAnonymizer(record) || record.threatLevel === 'HIGH';
}
