import type { Request, Response } from 'express';
import type { Logger } from '@geowarden/core';
import {
  attemptExceptionBody,
  attemptQuery,
  auditQuery,
  decisionBody,
  exceptionQuery,
  lookupQuery,
  notesBody,
  parseWith,
  policyUpdateBody,
} from './schemas.js';
import { readPage, requestContext, requireActor, sendError } from './http.js';
import type { ActorResolver, AdminService } from './types.js';

/**
 * Create the administrative endpoint handlers.
 */
export function createAdminController(service: AdminService, resolveActor: ActorResolver, logger: Logger) {
  return {
    /** GET /policy */
    async getPolicy(_req: Request, res: Response): Promise<void> {
      try {
        res.json(await service.getPolicy());
      } catch (err) {
        sendError(res, err, logger, 'GET /policy');
      }
    },

    /**
     * PUT /policy
     * Body: changed fields plus `reason`, required when a country changes.
     */
    async putPolicy(req: Request, res: Response): Promise<void> {
      try {
        const actor = requireActor(req, res, resolveActor);
        if (!actor) return;
        const { reason, ...changes } = parseWith(policyUpdateBody, req.body);
        res.json(await service.updatePolicy(changes, actor, requestContext(req, reason)));
      } catch (err) {
        sendError(res, err, logger, 'PUT /policy');
      }
    },

    /**
     * GET /exceptions
     * Query params: userId, status, offset, limit
     */
    async listExceptions(req: Request, res: Response): Promise<void> {
      try {
        const filters = parseWith(exceptionQuery, req.query);
        res.json(await service.listExceptions({ ...filters, ...readPage(req) }));
      } catch (err) {
        sendError(res, err, logger, 'GET /exceptions');
      }
    },

    /**
     * POST /exceptions/:id/decision
     * Body: { decision: 'approve' | 'deny', notes?: string }
     */
    async decideException(req: Request, res: Response): Promise<void> {
      try {
        const actor = requireActor(req, res, resolveActor);
        if (!actor) return;
        const { decision, notes } = parseWith(decisionBody, req.body);
        res.json(await service.decideException(String(req.params['id']), decision, actor, notes));
      } catch (err) {
        sendError(res, err, logger, 'POST /exceptions/:id/decision');
      }
    },

    /** POST /exceptions/:id/revoke */
    async revokeException(req: Request, res: Response): Promise<void> {
      try {
        const actor = requireActor(req, res, resolveActor);
        if (!actor) return;
        const { notes } = parseWith(notesBody, req.body);
        res.json(await service.revokeException(String(req.params['id']), actor, notes));
      } catch (err) {
        sendError(res, err, logger, 'POST /exceptions/:id/revoke');
      }
    },

    /**
     * GET /audit
     * Query params: changeType, actorId, startDate, endDate, offset, limit
     */
    async listAudit(req: Request, res: Response): Promise<void> {
      try {
        const filters = parseWith(auditQuery, req.query);
        res.json(await service.listAudit({ ...filters, ...readPage(req) }));
      } catch (err) {
        sendError(res, err, logger, 'GET /audit');
      }
    },

    /** GET /audit/:id/verify */
    async verifyEntry(req: Request, res: Response): Promise<void> {
      try {
        res.json(await service.verifyEntry(String(req.params['id'])));
      } catch (err) {
        sendError(res, err, logger, 'GET /audit/:id/verify');
      }
    },

    /** POST /audit/verify */
    async verifyAll(_req: Request, res: Response): Promise<void> {
      try {
        res.json(await service.verifyAll());
      } catch (err) {
        sendError(res, err, logger, 'POST /audit/verify');
      }
    },

    /**
     * GET /attempts
     * Query params: userId, resolved, offset, limit
     */
    async listAttempts(req: Request, res: Response): Promise<void> {
      try {
        const filters = parseWith(attemptQuery, req.query);
        res.json(await service.listAttempts({ ...filters, ...readPage(req) }));
      } catch (err) {
        sendError(res, err, logger, 'GET /attempts');
      }
    },

    /** POST /attempts/:id/resolve */
    async resolveAttempt(req: Request, res: Response): Promise<void> {
      try {
        const actor = requireActor(req, res, resolveActor);
        if (!actor) return;
        const { notes } = parseWith(notesBody, req.body);
        res.json(await service.resolveAttempt(String(req.params['id']), actor, notes));
      } catch (err) {
        sendError(res, err, logger, 'POST /attempts/:id/resolve');
      }
    },

    /** POST /attempts/:id/exception */
    async openException(req: Request, res: Response): Promise<void> {
      try {
        const actor = requireActor(req, res, resolveActor);
        if (!actor) return;
        const { reason } = parseWith(attemptExceptionBody, req.body);
        res.status(201).json(await service.openExceptionForAttempt(String(req.params['id']), actor, reason));
      } catch (err) {
        sendError(res, err, logger, 'POST /attempts/:id/exception');
      }
    },

    /** GET /status */
    async status(_req: Request, res: Response): Promise<void> {
      try {
        res.json(await service.status());
      } catch (err) {
        sendError(res, err, logger, 'GET /status');
      }
    },

    /** GET /geo/lookup?ip= */
    async lookup(req: Request, res: Response): Promise<void> {
      try {
        const { ip } = parseWith(lookupQuery, req.query);
        res.json(await service.lookup(ip));
      } catch (err) {
        sendError(res, err, logger, 'GET /geo/lookup');
      }
    },
  };
}
