import { z } from 'zod';
import { ValidationError } from './errors.js';

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((v) => v === 'true' || v === '1' || v === 'yes');

const commaList = z
  .string()
  .transform((v) => v.split(',').map((s) => s.trim()).filter((s) => s !== ''));

/** Environment schema. Every value has a default except the checksum secret. */
export const configSchema = z.object({
  DATABASE_URL: z.string().default('postgres://localhost:5432/geowarden'),
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
  GEO_PROVIDER_URL: z.string().url().default('http://ip-api.com/json'),
  GEO_TIMEOUT_MS: z.coerce.number().int().min(100).max(2000).default(2000),
  GEO_CACHE_TTL_HOURS: z.coerce.number().min(0).default(24),
  GEO_FAIL_OPEN: booleanFlag.default('false'),
  ESCALATION_THRESHOLD: z.coerce.number().int().min(1).default(3),
  ESCALATION_WINDOW_HOURS: z.coerce.number().positive().default(24),
  AUDIT_CHECKSUM_SECRET: z.string().min(16, 'must be at least 16 characters'),
  AUDIT_MASK_IP: booleanFlag.default('false'),
  EXEMPT_PATHS: commaList.default('/static/,/media/,/health/,/favicon.ico'),
  TRUST_FORWARDED_FOR: booleanFlag.default('true'),
  INTEGRITY_SWEEP_MINUTES: z.coerce.number().positive().default(60),
  EXCEPTION_SWEEP_MINUTES: z.coerce.number().positive().default(15),
  POLICY_CACHE_MS: z.coerce.number().int().min(0).default(500),
  SECURITY_CONTACTS: commaList.default(''),
});

export type RawConfig = z.infer<typeof configSchema>;

/** Typed runtime configuration */
export interface GeoWardenConfig {
  databaseUrl: string;
  port: number;
  logLevel: RawConfig['LOG_LEVEL'];
  geo: {
    providerUrl: string;
    timeoutMs: number;
    cacheTtlMs: number;
    /** Allow requests when the lookup fails (default: deny) */
    failOpen: boolean;
  };
  escalation: {
    threshold: number;
    windowMs: number;
  };
  audit: {
    checksumSecret: string;
    maskIpAddresses: boolean;
    securityContacts: string[];
    sweepIntervalMs: number;
  };
  access: {
    exemptPaths: string[];
    trustForwardedFor: boolean;
  };
  exceptions: {
    sweepIntervalMs: number;
  };
  policy: {
    cacheMs: number;
  };
}

const HOUR_MS = 60 * 60 * 1000;
const MINUTE_MS = 60 * 1000;

/**
 * Parse configuration from environment variables.
 * Throws ValidationError listing every invalid variable.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): GeoWardenConfig {
  const parsed = configSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new ValidationError('Invalid configuration', issues);
  }

  const c = parsed.data;
  return {
    databaseUrl: c.DATABASE_URL,
    port: c.PORT,
    logLevel: c.LOG_LEVEL,
    geo: {
      providerUrl: c.GEO_PROVIDER_URL,
      timeoutMs: c.GEO_TIMEOUT_MS,
      cacheTtlMs: c.GEO_CACHE_TTL_HOURS * HOUR_MS,
      failOpen: c.GEO_FAIL_OPEN,
    },
    escalation: {
      threshold: c.ESCALATION_THRESHOLD,
      windowMs: c.ESCALATION_WINDOW_HOURS * HOUR_MS,
    },
    audit: {
      checksumSecret: c.AUDIT_CHECKSUM_SECRET,
      maskIpAddresses: c.AUDIT_MASK_IP,
      securityContacts: c.SECURITY_CONTACTS,
      sweepIntervalMs: c.INTEGRITY_SWEEP_MINUTES * MINUTE_MS,
    },
    access: {
      exemptPaths: c.EXEMPT_PATHS,
      trustForwardedFor: c.TRUST_FORWARDED_FOR,
    },
    exceptions: {
      sweepIntervalMs: c.EXCEPTION_SWEEP_MINUTES * MINUTE_MS,
    },
    policy: {
      cacheMs: c.POLICY_CACHE_MS,
    },
  };
}
