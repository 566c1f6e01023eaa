import { Router, json } from 'express';
import { createLogger } from '@geowarden/core';
import type { AdminConfig } from './types.js';
import { createAdminService } from './service.js';
import { createAdminController } from './adminController.js';
import { createSelfController } from './selfController.js';

/**
 * Create an Express router with the administrative and self-service endpoints.
 *
 * Routes (adminAuth):
 *   GET  /policy                    - Current security policy
 *   PUT  /policy                    - Change countries, enforcement or contacts
 *   GET  /exceptions                - Paginated access exceptions
 *   POST /exceptions/:id/decision   - Approve or deny a pending exception
 *   POST /exceptions/:id/revoke     - Revoke an approved exception
 *   GET  /audit                     - Paginated audit entries, newest first
 *   GET  /audit/:id/verify          - Verify one entry's checksum
 *   POST /audit/verify              - Verify every entry
 *   GET  /attempts                  - Paginated suspicious access attempts
 *   POST /attempts/:id/resolve      - Close an attempt after review
 *   POST /attempts/:id/exception    - Open a pending exception for the attempt
 *   GET  /status                    - Policy summary and access statistics
 *   GET  /geo/lookup?ip=            - Resolve an address against the policy
 *
 * Routes (userAuth):
 *   POST /self/exceptions           - Request a travel exception
 *   GET  /self/exceptions           - Own exceptions
 *
 * @example
 * ```typescript
 * const app = express();
 * app.use('/api/security', createAdminRouter({
 *   policy, ledger, exceptions, detector, geo,
 *   adminAuth: requireAdmin,
 *   userAuth: requireUser,
 *   resolveActor: (req) => req.user ?? null,
 * }));
 * ```
 */
export function createAdminRouter(config: AdminConfig): Router {
  const router = Router();
  const logger = config.logger ?? createLogger('admin');
  const service = createAdminService({ ...config, logger });
  const admin = createAdminController(service, config.resolveActor, logger);
  const self = createSelfController(service, config.resolveActor, logger);

  router.use(json());

  // ── Policy ──────────────────────────────────────────────────
  router.get('/policy', config.adminAuth, (req, res) => {
    void admin.getPolicy(req, res);
  });
  router.put('/policy', config.adminAuth, (req, res) => {
    void admin.putPolicy(req, res);
  });

  // ── Exceptions ──────────────────────────────────────────────
  router.get('/exceptions', config.adminAuth, (req, res) => {
    void admin.listExceptions(req, res);
  });
  router.post('/exceptions/:id/decision', config.adminAuth, (req, res) => {
    void admin.decideException(req, res);
  });
  router.post('/exceptions/:id/revoke', config.adminAuth, (req, res) => {
    void admin.revokeException(req, res);
  });

  // ── Audit ───────────────────────────────────────────────────
  router.get('/audit', config.adminAuth, (req, res) => {
    void admin.listAudit(req, res);
  });
  router.get('/audit/:id/verify', config.adminAuth, (req, res) => {
    void admin.verifyEntry(req, res);
  });
  router.post('/audit/verify', config.adminAuth, (req, res) => {
    void admin.verifyAll(req, res);
  });

  // ── Suspicious attempts ─────────────────────────────────────
  router.get('/attempts', config.adminAuth, (req, res) => {
    void admin.listAttempts(req, res);
  });
  router.post('/attempts/:id/resolve', config.adminAuth, (req, res) => {
    void admin.resolveAttempt(req, res);
  });
  router.post('/attempts/:id/exception', config.adminAuth, (req, res) => {
    void admin.openException(req, res);
  });

  // ── Overview ────────────────────────────────────────────────
  router.get('/status', config.adminAuth, (req, res) => {
    void admin.status(req, res);
  });
  router.get('/geo/lookup', config.adminAuth, (req, res) => {
    void admin.lookup(req, res);
  });

  // ── Self-service ────────────────────────────────────────────
  router.post('/self/exceptions', config.userAuth, (req, res) => {
    void self.requestException(req, res);
  });
  router.get('/self/exceptions', config.userAuth, (req, res) => {
    void self.listExceptions(req, res);
  });

  return router;
}
