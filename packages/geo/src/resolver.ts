import { isIP } from 'node:net';
import { Op, UniqueConstraintError } from 'sequelize';
import type { Sequelize } from 'sequelize';
import { LookupUnavailableError } from '@geowarden/core';
import type { Clock, Logger } from '@geowarden/core';
import { threatLevel, threatScore } from './threat.js';
import type {
  GeoProvider,
  GeoRecord,
  GeoRecordInstance,
  GeoRecordModel,
  GeoResolver,
  GeoStats,
  ProviderResult,
  ResolvedGeo,
} from './types.js';

/**
 * Trim an address and unwrap IPv4-mapped IPv6 (::ffff:a.b.c.d).
 * Returns null when the result is not an IP address.
 */
export function normalizeIp(ip: string | null | undefined): string | null {
  if (!ip) return null;
  let address = ip.trim();
  if (address.toLowerCase().startsWith('::ffff:') && isIP(address.slice(7)) === 4) {
    address = address.slice(7);
  }
  return isIP(address) === 0 ? null : address;
}

function toRecord(row: GeoRecordInstance): GeoRecord {
  const data = row.get({ plain: true });
  return {
    id: data.id,
    ipAddress: data.ipAddress,
    countryCode: data.countryCode,
    countryName: data.countryName ?? null,
    region: data.region ?? null,
    city: data.city ?? null,
    isp: data.isp ?? null,
    organization: data.organization ?? null,
    latitude: data.latitude ?? null,
    longitude: data.longitude ?? null,
    isProxy: Boolean(data.isProxy),
    isVpn: Boolean(data.isVpn),
    isTor: Boolean(data.isTor),
    threatScore: Number(data.threatScore),
    threatLevel: data.threatLevel,
    lookupDate: new Date(data.lookupDate),
    firstSeenAt: new Date(data.firstSeenAt),
    lastSeenAt: new Date(data.lastSeenAt),
    accessCount: Number(data.accessCount),
  };
}

function attributesFrom(result: ProviderResult, lookupDate: Date) {
  const score = threatScore(result);
  return {
    countryCode: result.countryCode,
    countryName: result.countryName,
    region: result.region,
    city: result.city,
    isp: result.isp,
    organization: result.org,
    latitude: result.lat,
    longitude: result.lon,
    isProxy: result.isProxy,
    isVpn: result.isVpn,
    isTor: result.isTor,
    threatScore: score,
    threatLevel: threatLevel(score),
    lookupDate,
  };
}

interface ResolverDeps {
  sequelize: Sequelize;
  GeoRecord: GeoRecordModel;
  provider: GeoProvider;
  timeoutMs: number;
  cacheTtlMs: number;
  logger: Logger;
  clock: Clock;
}

/**
 * Create the resolver over the geo_records cache.
 */
export function createResolver(deps: ResolverDeps): GeoResolver {
  const { sequelize, GeoRecord, provider, timeoutMs, cacheTtlMs, logger, clock } = deps;

  async function lookupUpstream(ip: string): Promise<ProviderResult> {
    const controller = new AbortController();
    const timedOut = new Promise<never>((_, reject) => {
      controller.signal.addEventListener(
        'abort',
        () => reject(new LookupUnavailableError(`Geolocation lookup timed out after ${timeoutMs}ms`)),
        { once: true },
      );
    });
    const timer = setTimeout(() => controller.abort(), timeoutMs);

    try {
      return await Promise.race([provider.lookup(ip, { signal: controller.signal }), timedOut]);
    } catch (err) {
      const error =
        err instanceof LookupUnavailableError
          ? err
          : new LookupUnavailableError(`Geolocation lookup failed for ${ip}`, { cause: err });
      logger.warn('geo lookup failed', { ip, reason: error.message });
      throw error;
    } finally {
      clearTimeout(timer);
    }
  }

  /** Count a sighting of an existing row, optionally refreshing its attributes */
  async function recordSighting(
    ipAddress: string,
    now: Date,
    refreshed?: ReturnType<typeof attributesFrom>,
  ): Promise<GeoRecord> {
    await GeoRecord.update(
      {
        ...refreshed,
        accessCount: sequelize.literal('access_count + 1'),
        lastSeenAt: now,
      },
      { where: { ipAddress } },
    );
    const row = await GeoRecord.findOne({ where: { ipAddress } });
    if (!row) {
      throw new LookupUnavailableError(`Geo record disappeared during update: ${ipAddress}`);
    }
    return toRecord(row);
  }

  return {
    async resolve(ip: string): Promise<ResolvedGeo> {
      const ipAddress = normalizeIp(ip);
      if (!ipAddress) {
        throw new LookupUnavailableError(`Not a valid IP address: ${ip}`);
      }

      const now = clock();
      const existing = await GeoRecord.findOne({ where: { ipAddress } });

      if (existing && now.getTime() - new Date(existing.lookupDate).getTime() < cacheTtlMs) {
        return { ...(await recordSighting(ipAddress, now)), firstSeen: false };
      }

      const attributes = attributesFrom(await lookupUpstream(ipAddress), now);

      if (existing) {
        return { ...(await recordSighting(ipAddress, now, attributes)), firstSeen: false };
      }

      try {
        const row = await GeoRecord.create({
          ipAddress,
          ...attributes,
          firstSeenAt: now,
          lastSeenAt: now,
          accessCount: 1,
        });
        logger.info('new IP address seen', { ip: ipAddress, country: attributes.countryCode });
        return { ...toRecord(row), firstSeen: true };
      } catch (err) {
        // Another request inserted the same address first
        if (err instanceof UniqueConstraintError) {
          return { ...(await recordSighting(ipAddress, now, attributes)), firstSeen: false };
        }
        throw err;
      }
    },

    async get(ip: string): Promise<GeoRecord | null> {
      const ipAddress = normalizeIp(ip);
      if (!ipAddress) return null;
      const row = await GeoRecord.findOne({ where: { ipAddress } });
      return row ? toRecord(row) : null;
    },

    async purgeStale(before: Date): Promise<number> {
      const removed = await GeoRecord.destroy({ where: { lastSeenAt: { [Op.lt]: before } } });
      if (removed > 0) {
        logger.info('purged stale geo records', { removed, before: before.toISOString() });
      }
      return removed;
    },

    async stats(): Promise<GeoStats> {
      const totalIps = await GeoRecord.count();
      const uniqueCountries = await GeoRecord.count({ distinct: true, col: 'countryCode' });
      return { totalIps, uniqueCountries };
    },
  };
}
