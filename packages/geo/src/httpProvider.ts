import axios from 'axios';
import type { AxiosInstance } from 'axios';
import { z } from 'zod';
import { LookupUnavailableError, normalizeCountryCode } from '@geowarden/core';
import type { GeoProvider, ProviderResult } from './types.js';

const FIELDS = 'status,message,country,countryCode,regionName,city,isp,org,lat,lon,proxy,vpn,tor';

/** ip-api compatible JSON body. `vpn` and `tor` are optional extensions. */
const responseSchema = z.discriminatedUnion('status', [
  z.object({
    status: z.literal('success'),
    country: z.string().nullish(),
    countryCode: z.string(),
    regionName: z.string().nullish(),
    city: z.string().nullish(),
    isp: z.string().nullish(),
    org: z.string().nullish(),
    lat: z.number().nullish(),
    lon: z.number().nullish(),
    proxy: z.boolean().optional(),
    vpn: z.boolean().optional(),
    tor: z.boolean().optional(),
  }),
  z.object({
    status: z.literal('fail'),
    message: z.string().optional(),
  }),
]);

export interface HttpGeoProviderOptions {
  /** e.g. http://ip-api.com/json */
  baseUrl: string;
  timeoutMs: number;
  /** Preconfigured client, mainly for tests */
  http?: AxiosInstance;
}

/**
 * GeoProvider over an ip-api compatible HTTP endpoint.
 */
export function createHttpGeoProvider(options: HttpGeoProviderOptions): GeoProvider {
  const http = options.http ?? axios.create({ timeout: options.timeoutMs });
  const baseUrl = options.baseUrl.replace(/\/+$/, '');

  return {
    async lookup(ip: string, { signal }: { signal: AbortSignal }): Promise<ProviderResult> {
      const response = await http.get<unknown>(`${baseUrl}/${encodeURIComponent(ip)}`, {
        params: { fields: FIELDS },
        signal,
      });

      const parsed = responseSchema.safeParse(response.data);
      if (!parsed.success) {
        throw new LookupUnavailableError('Malformed response from geolocation provider');
      }

      const body = parsed.data;
      if (body.status === 'fail') {
        throw new LookupUnavailableError(`Geolocation provider refused ${ip}: ${body.message ?? 'unknown reason'}`);
      }

      const countryCode = normalizeCountryCode(body.countryCode);
      if (!countryCode) {
        throw new LookupUnavailableError(`Geolocation provider returned no country for ${ip}`);
      }

      return {
        countryCode,
        countryName: body.country ?? null,
        region: body.regionName ?? null,
        city: body.city ?? null,
        isp: body.isp ?? null,
        org: body.org ?? null,
        lat: body.lat ?? null,
        lon: body.lon ?? null,
        isProxy: body.proxy ?? false,
        isVpn: body.vpn ?? false,
        isTor: body.tor ?? false,
      };
    },
  };
}
