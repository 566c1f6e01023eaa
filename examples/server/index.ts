/**
 * Full Integration Example with Express + GeoWarden
 *
 * Wires every package together:
 * - Geographic access middleware in front of the application routes
 * - Security policy with audited, announced changes
 * - Travel exceptions and suspicious-access escalation
 * - Administrative API with periodic integrity and expiry sweeps
 *
 * Run:
 *   AUDIT_CHECKSUM_SECRET=change-me-please-0123 npm run start:example
 *
 * Prerequisites:
 *   - PostgreSQL reachable at DATABASE_URL
 *
 * Identity is taken from the `x-user-id` header and `x-admin: true` marks an
 * administrator. Replace both with your session or JWT handling.
 */
import express from 'express';
import type { NextFunction, Request, Response } from 'express';
import { DataTypes, Sequelize } from 'sequelize';
import { createLogNotifier, createLogger, loadConfig } from '@geowarden/core';
import type { Actor } from '@geowarden/core';
import { auditMigrations, createAuditLedger } from '@geowarden/audit';
import { createGeoResolver, createHttpGeoProvider, geoMigrations } from '@geowarden/geo';
import { contactsFor, createPolicyStore, policyMigrations } from '@geowarden/policy';
import { createExceptionManager, exceptionMigrations } from '@geowarden/exceptions';
import { createSuspiciousActivityDetector, detectorMigrations } from '@geowarden/detector';
import { createAccessDecisionEngine, createGeoAccessMiddleware } from '@geowarden/access';
import { createAdminRouter } from '@geowarden/admin';

// ── Configuration ──────────────────────────────────────────────

const config = loadConfig();
const logger = createLogger('server', { level: config.logLevel });

// ── Database ───────────────────────────────────────────────────

const sequelize = new Sequelize(config.databaseUrl, {
  logging: false,
  dialect: 'postgres',
});

function currentUser(req: Request): Actor | null {
  const id = req.get('x-user-id')?.trim();
  return id ? { id } : null;
}

function requireUser(req: Request, res: Response, next: NextFunction): void {
  if (!currentUser(req)) {
    res.status(401).json({ error: 'Authentication required' });
    return;
  }
  next();
}

function requireAdmin(req: Request, res: Response, next: NextFunction): void {
  if (!currentUser(req) || req.get('x-admin') !== 'true') {
    res.status(403).json({ error: 'Administrator access required' });
    return;
  }
  next();
}

/** Run a sweep on an interval that does not keep the process alive */
function every(intervalMs: number, name: string, task: () => Promise<unknown>): void {
  const timer = setInterval(() => {
    task().catch((err: unknown) => {
      logger.error(`${name} failed`, { error: err instanceof Error ? err.message : String(err) });
    });
  }, intervalMs);
  timer.unref();
}

// ── Initialize Services ────────────────────────────────────────

async function bootstrap() {
  // 1. Run migrations
  await sequelize.authenticate();
  logger.info('database connected');

  const qi = sequelize.getQueryInterface();
  const existing = new Set(await qi.showAllTables());
  const steps = [
    { table: 'audit_entries', migration: auditMigrations },
    { table: 'geo_records', migration: geoMigrations },
    { table: 'security_policies', migration: policyMigrations },
    { table: 'access_exceptions', migration: exceptionMigrations },
    { table: 'suspicious_access_attempts', migration: detectorMigrations },
  ];
  for (const { table, migration } of steps) {
    if (!existing.has(table)) await migration.up(qi, DataTypes);
  }
  logger.info('migrations applied');

  // 2. Notification transport (logs only in this example)
  const notifier = createLogNotifier(createLogger('notifications', { level: config.logLevel }));

  // 3. Policy and its audit ledger
  const securityContacts = async (): Promise<string[]> => {
    const contacts = contactsFor(await policy.get(), 'SECURITY');
    return contacts.length > 0 ? contacts : config.audit.securityContacts;
  };
  const ledger = createAuditLedger({
    database: sequelize,
    checksumSecret: config.audit.checksumSecret,
    notifier,
    maskIpAddresses: config.audit.maskIpAddresses,
    securityContacts,
  });
  const policy = createPolicyStore({ database: sequelize, ledger, notifier, cacheMs: config.policy.cacheMs });
  await policy.initialize();

  // 4. Geolocation, exceptions and escalation
  const geo = createGeoResolver({
    database: sequelize,
    provider: createHttpGeoProvider({ baseUrl: config.geo.providerUrl, timeoutMs: config.geo.timeoutMs }),
    timeoutMs: config.geo.timeoutMs,
    cacheTtlMs: config.geo.cacheTtlMs,
  });
  const exceptions = createExceptionManager({ database: sequelize, notifier });
  const detector = createSuspiciousActivityDetector({
    database: sequelize,
    notifier,
    resolveContacts: securityContacts,
    threshold: config.escalation.threshold,
    windowMs: config.escalation.windowMs,
  });

  // 5. Access decisions
  const engine = createAccessDecisionEngine({
    policy,
    geo,
    exceptions,
    detector,
    failOpen: config.geo.failOpen,
  });

  // 6. Periodic sweeps
  every(config.audit.sweepIntervalMs, 'audit integrity sweep', () => ledger.verifyAll());
  every(config.exceptions.sweepIntervalMs, 'exception expiry sweep', () => exceptions.expireStale());

  // ── Express App ────────────────────────────────────────────────

  const app = express();
  app.set('trust proxy', config.access.trustForwardedFor);

  // Health check
  app.get('/health/', (_req, res) => {
    res.json({ status: 'healthy' });
  });

  // Every authenticated, non-exempt request passes the geographic check
  app.use(
    createGeoAccessMiddleware({
      engine,
      resolveUser: currentUser,
      exemptPaths: config.access.exemptPaths,
      trustForwardedFor: config.access.trustForwardedFor,
    }),
  );

  app.get('/api/v1/reports', requireUser, (_req, res) => {
    res.json({ reports: [] });
  });

  // Administrative and self-service routes
  app.use(
    '/api/v1/security',
    createAdminRouter({
      policy,
      ledger,
      exceptions,
      detector,
      geo,
      adminAuth: requireAdmin,
      userAuth: requireUser,
      resolveActor: currentUser,
    }),
  );

  // Start server
  app.listen(config.port, () => {
    logger.info('GeoWarden example listening', { port: config.port });
  });
}

bootstrap().catch((err: unknown) => {
  logger.error('failed to start', { error: err instanceof Error ? err.message : String(err) });
  process.exit(1);
});
