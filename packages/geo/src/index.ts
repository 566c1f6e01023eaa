// Types
export type {
  GeoProvider,
  GeoRecord,
  GeoResolver,
  GeoResolverConfig,
  GeoStats,
  ProviderResult,
  ResolvedGeo,
  ThreatLevel,
} from './types.js';

// Migrations
export { geoMigrations } from './migrations/index.js';

// Model
export { defineGeoRecordModel } from './models/geoRecord.js';

// Threat scoring
export { threatScore, threatLevel, usesAnonymizer, isSuspicious } from './threat.js';
export type { AnonymizerFlags } from './threat.js';

// Providers
export { createHttpGeoProvider } from './httpProvider.js';
export type { HttpGeoProviderOptions } from './httpProvider.js';

export { normalizeIp } from './resolver.js';

// Factory
import { createLogger, systemClock } from '@geowarden/core';
import type { GeoResolver, GeoResolverConfig } from './types.js';
import { defineGeoRecordModel } from './models/geoRecord.js';
import { createResolver } from './resolver.js';

const DEFAULT_TIMEOUT_MS = 2000;
const DEFAULT_CACHE_TTL_MS = 24 * 60 * 60 * 1000;

/**
 * Create a GeoResolver backed by the `geo_records` cache.
 *
 * @example
 * ```typescript
 * const geo = createGeoResolver({
 *   database: sequelize,
 *   provider: createHttpGeoProvider({ baseUrl: 'http://ip-api.com/json', timeoutMs: 2000 }),
 * });
 * const record = await geo.resolve('203.0.113.7');
 * ```
 */
export function createGeoResolver(config: GeoResolverConfig): GeoResolver {
  return createResolver({
    sequelize: config.database,
    GeoRecord: defineGeoRecordModel(config.database),
    provider: config.provider,
    timeoutMs: config.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    cacheTtlMs: config.cacheTtlMs ?? DEFAULT_CACHE_TTL_MS,
    logger: config.logger ?? createLogger('geo'),
    clock: config.clock ?? systemClock,
  });
}
