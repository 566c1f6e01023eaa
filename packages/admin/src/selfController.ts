import type { Request, Response } from 'express';
import type { Logger } from '@geowarden/core';
import { parseWith, selfExceptionBody } from './schemas.js';
import { readPage, requireActor, sendError } from './http.js';
import type { ActorResolver, AdminService } from './types.js';

/**
 * Create the self-service handlers. Users only ever see and file their
 * own exceptions.
 */
export function createSelfController(service: AdminService, resolveActor: ActorResolver, logger: Logger) {
  return {
    /**
     * POST /self/exceptions
     * Body: { destinationCountry, startsAt, endsAt, reason }
     */
    async requestException(req: Request, res: Response): Promise<void> {
      try {
        const user = requireActor(req, res, resolveActor);
        if (!user) return;
        const body = parseWith(selfExceptionBody, req.body);
        res.status(201).json(await service.requestException(user, body));
      } catch (err) {
        sendError(res, err, logger, 'POST /self/exceptions');
      }
    },

    /** GET /self/exceptions */
    async listExceptions(req: Request, res: Response): Promise<void> {
      try {
        const user = requireActor(req, res, resolveActor);
        if (!user) return;
        res.json(await service.listOwnExceptions(user, readPage(req)));
      } catch (err) {
        sendError(res, err, logger, 'GET /self/exceptions');
      }
    },
  };
}
