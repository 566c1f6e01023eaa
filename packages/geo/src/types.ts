import type {
  Sequelize,
  Model,
  ModelStatic,
  InferAttributes,
  InferCreationAttributes,
  CreationOptional,
} from 'sequelize';
import type { Clock, CountryCode, Logger } from '@geowarden/core';

export type ThreatLevel = 'NONE' | 'LOW' | 'MEDIUM' | 'HIGH';

/** Attributes returned by an upstream geolocation provider */
export interface ProviderResult {
  countryCode: CountryCode;
  countryName: string | null;
  region: string | null;
  city: string | null;
  isp: string | null;
  org: string | null;
  lat: number | null;
  lon: number | null;
  isProxy: boolean;
  isVpn: boolean;
  isTor: boolean;
}

/**
 * Upstream IP geolocation lookup. Implementations should honour the
 * abort signal; the resolver gives up when it fires either way.
 */
export interface GeoProvider {
  lookup(ip: string, options: { signal: AbortSignal }): Promise<ProviderResult>;
}

/** Cached geolocation for one IP address */
export interface GeoRecord {
  id: number;
  ipAddress: string;
  countryCode: CountryCode;
  countryName: string | null;
  region: string | null;
  city: string | null;
  isp: string | null;
  organization: string | null;
  latitude: number | null;
  longitude: number | null;
  isProxy: boolean;
  isVpn: boolean;
  isTor: boolean;
  /** 0-100 */
  threatScore: number;
  threatLevel: ThreatLevel;
  /** When the upstream was last consulted for this address */
  lookupDate: Date;
  firstSeenAt: Date;
  lastSeenAt: Date;
  accessCount: number;
}

export interface ResolvedGeo extends GeoRecord {
  /** True only on the first sighting of this address */
  firstSeen: boolean;
}

export interface GeoStats {
  totalIps: number;
  uniqueCountries: number;
}

export interface GeoResolverConfig {
  database: Sequelize;
  provider: GeoProvider;
  /** Upper bound on a single upstream lookup (default: 2000) */
  timeoutMs?: number;
  /** How long a cached lookup stays fresh (default: 24 hours) */
  cacheTtlMs?: number;
  logger?: Logger;
  clock?: Clock;
}

export interface GeoResolver {
  /** Resolve an address, using the cache while fresh; records the sighting */
  resolve(ip: string): Promise<ResolvedGeo>;
  /** Cached record without side effects */
  get(ip: string): Promise<GeoRecord | null>;
  /** Delete records not seen since `before`; returns the number removed */
  purgeStale(before: Date): Promise<number>;
  stats(): Promise<GeoStats>;
}

export interface GeoRecordInstance
  extends Model<InferAttributes<GeoRecordInstance>, InferCreationAttributes<GeoRecordInstance>> {
  id: CreationOptional<number>;
  ipAddress: string;
  countryCode: string;
  countryName: string | null;
  region: string | null;
  city: string | null;
  isp: string | null;
  organization: string | null;
  latitude: number | null;
  longitude: number | null;
  isProxy: boolean;
  isVpn: boolean;
  isTor: boolean;
  threatScore: number;
  threatLevel: ThreatLevel;
  lookupDate: Date;
  firstSeenAt: Date;
  lastSeenAt: Date;
  accessCount: number;
}

export type GeoRecordModel = ModelStatic<GeoRecordInstance>;
