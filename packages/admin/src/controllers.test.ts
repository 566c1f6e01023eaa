import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { Request, Response } from 'express';
import { InvalidTransitionError, NotFoundError, createLogger } from '@geowarden/core';
import type { Actor } from '@geowarden/core';
import { createAdminController } from './adminController.js';
import { createSelfController } from './selfController.js';
import type { ActorResolver, AdminService } from './types.js';

const logger = createLogger('admin-test', { silent: true });
const admin: Actor = { id: 'admin-1' };

function makeService(): AdminService {
  return {
    getPolicy: vi.fn().mockResolvedValue({ id: 1 }),
    updatePolicy: vi.fn().mockResolvedValue({ policy: { id: 1 }, auditEntries: [], warnings: [] }),
    listExceptions: vi.fn().mockResolvedValue({ items: [], offset: 0, limit: 20 }),
    decideException: vi.fn().mockResolvedValue({ id: 'exc-1', status: 'APPROVED' }),
    revokeException: vi.fn().mockResolvedValue({ id: 'exc-1', status: 'REVOKED' }),
    listAudit: vi.fn().mockResolvedValue({ items: [], offset: 0, limit: 20 }),
    verifyEntry: vi.fn().mockResolvedValue({ entryId: 'entry-1', status: 'VALID' }),
    verifyAll: vi.fn().mockResolvedValue({ validCount: 3, invalidCount: 0, invalidEntryIds: [] }),
    listAttempts: vi.fn().mockResolvedValue({ items: [], offset: 0, limit: 20 }),
    resolveAttempt: vi.fn().mockResolvedValue({ id: 'attempt-1', resolved: true }),
    openExceptionForAttempt: vi.fn().mockResolvedValue({ id: 'exc-2', status: 'PENDING' }),
    status: vi.fn().mockResolvedValue({ enforcementEnabled: true }),
    lookup: vi.fn().mockResolvedValue({ ip: '203.0.113.7', allowed: false }),
    requestException: vi.fn().mockResolvedValue({ id: 'exc-3', status: 'PENDING' }),
    listOwnExceptions: vi.fn().mockResolvedValue({ items: [], offset: 0, limit: 20 }),
  };
}

function makeReq(parts: { body?: unknown; query?: Record<string, string>; params?: Record<string, string> } = {}): Request {
  return {
    body: parts.body ?? {},
    query: parts.query ?? {},
    params: parts.params ?? {},
    headers: { 'user-agent': 'Mozilla/5.0' },
    ip: '192.0.2.10',
  } as unknown as Request;
}

function makeRes() {
  const res = { status: vi.fn(), json: vi.fn() };
  res.status.mockReturnValue(res);
  return { res: res as unknown as Response, status: res.status, json: res.json };
}

describe('admin controller', () => {
  let service: AdminService;
  let resolveActor: ActorResolver;
  let controller: ReturnType<typeof createAdminController>;

  beforeEach(() => {
    service = makeService();
    resolveActor = vi.fn().mockReturnValue(admin);
    controller = createAdminController(service, resolveActor, logger);
  });

  describe('PUT /policy', () => {
    it('separates the justification from the changes', async () => {
      const { res, json } = makeRes();

      await controller.putPolicy(makeReq({ body: { primaryCountry: 'CA', reason: 'Office move' } }), res);

      expect(service.updatePolicy).toHaveBeenCalledWith({ primaryCountry: 'CA' }, admin, {
        ipAddress: '192.0.2.10',
        userAgent: 'Mozilla/5.0',
        reason: 'Office move',
      });
      expect(json).toHaveBeenCalledWith({ policy: { id: 1 }, auditEntries: [], warnings: [] });
    });

    it('rejects unknown fields with 400', async () => {
      const { res, status, json } = makeRes();

      await controller.putPolicy(makeReq({ body: { primaryCountry: 'CA', colour: 'red' } }), res);

      expect(status).toHaveBeenCalledWith(400);
      expect(json).toHaveBeenCalledWith({
        error: 'Invalid request',
        code: 'VALIDATION_ERROR',
        issues: ["body: Unrecognized key(s) in object: 'colour'"],
      });
      expect(service.updatePolicy).not.toHaveBeenCalled();
    });

    it('answers 401 without an authenticated actor', async () => {
      resolveActor = vi.fn().mockReturnValue(null);
      controller = createAdminController(service, resolveActor, logger);
      const { res, status, json } = makeRes();

      await controller.putPolicy(makeReq({ body: { enforcementEnabled: true } }), res);

      expect(status).toHaveBeenCalledWith(401);
      expect(json).toHaveBeenCalledWith({ error: 'Authentication required' });
      expect(service.updatePolicy).not.toHaveBeenCalled();
    });
  });

  describe('exceptions', () => {
    it('passes filters and pagination to the service', async () => {
      const { res } = makeRes();

      await controller.listExceptions(makeReq({ query: { status: 'PENDING', limit: '5', offset: '10' } }), res);

      expect(service.listExceptions).toHaveBeenCalledWith({ status: 'PENDING', limit: 5, offset: 10 });
    });

    it('rejects an unknown status filter', async () => {
      const { res, status } = makeRes();

      await controller.listExceptions(makeReq({ query: { status: 'LOST' } }), res);

      expect(status).toHaveBeenCalledWith(400);
    });

    it('records a decision', async () => {
      const { res, json } = makeRes();

      await controller.decideException(
        makeReq({ params: { id: 'exc-1' }, body: { decision: 'approve', notes: 'Trip confirmed' } }),
        res,
      );

      expect(service.decideException).toHaveBeenCalledWith('exc-1', 'approve', admin, 'Trip confirmed');
      expect(json).toHaveBeenCalledWith({ id: 'exc-1', status: 'APPROVED' });
    });

    it('maps an invalid transition to 409', async () => {
      service.decideException = vi.fn().mockRejectedValue(new InvalidTransitionError('DENIED', 'APPROVED'));
      const { res, status, json } = makeRes();

      await controller.decideException(makeReq({ params: { id: 'exc-1' }, body: { decision: 'approve' } }), res);

      expect(status).toHaveBeenCalledWith(409);
      expect(json).toHaveBeenCalledWith({ error: 'Cannot transition from DENIED to APPROVED', code: 'INVALID_TRANSITION' });
    });

    it('maps a missing exception to 404', async () => {
      service.revokeException = vi.fn().mockRejectedValue(new NotFoundError('Access exception', 'exc-9'));
      const { res, status, json } = makeRes();

      await controller.revokeException(makeReq({ params: { id: 'exc-9' } }), res);

      expect(status).toHaveBeenCalledWith(404);
      expect(json).toHaveBeenCalledWith({ error: 'Access exception not found: exc-9', code: 'NOT_FOUND' });
    });
  });

  describe('audit', () => {
    it('coerces date filters', async () => {
      const { res } = makeRes();

      await controller.listAudit(
        makeReq({ query: { changeType: 'PRIMARY_COUNTRY', startDate: '2026-01-01T00:00:00.000Z' } }),
        res,
      );

      expect(service.listAudit).toHaveBeenCalledWith({
        changeType: 'PRIMARY_COUNTRY',
        startDate: new Date('2026-01-01T00:00:00.000Z'),
        limit: undefined,
        offset: undefined,
      });
    });

    it('hides internal failures behind a generic 500', async () => {
      service.verifyAll = vi.fn().mockRejectedValue(new Error('SQLITE_BUSY: database is locked'));
      const { res, status, json } = makeRes();

      await controller.verifyAll(makeReq(), res);

      expect(status).toHaveBeenCalledWith(500);
      expect(json).toHaveBeenCalledWith({ error: 'Internal server error' });
    });
  });

  describe('attempts', () => {
    it('parses the resolved filter', async () => {
      const { res } = makeRes();

      await controller.listAttempts(makeReq({ query: { resolved: 'false' } }), res);

      expect(service.listAttempts).toHaveBeenCalledWith({ resolved: false, limit: undefined, offset: undefined });
    });

    it('answers 201 for an exception opened from an attempt', async () => {
      const { res, status, json } = makeRes();

      await controller.openException(makeReq({ params: { id: 'attempt-1' }, body: { reason: 'Known trip' } }), res);

      expect(service.openExceptionForAttempt).toHaveBeenCalledWith('attempt-1', admin, 'Known trip');
      expect(status).toHaveBeenCalledWith(201);
      expect(json).toHaveBeenCalledWith({ id: 'exc-2', status: 'PENDING' });
    });
  });

  describe('GET /geo/lookup', () => {
    it('requires a valid address', async () => {
      const { res, status, json } = makeRes();

      await controller.lookup(makeReq({ query: { ip: 'not-an-ip' } }), res);

      expect(status).toHaveBeenCalledWith(400);
      expect(json).toHaveBeenCalledWith({
        error: 'Invalid request',
        code: 'VALIDATION_ERROR',
        issues: ['ip: must be an IP address'],
      });
      expect(service.lookup).not.toHaveBeenCalled();
    });
  });
});

describe('self controller', () => {
  it('files an exception for the authenticated user', async () => {
    const service = makeService();
    const user: Actor = { id: 'u-42' };
    const controller = createSelfController(service, () => user, logger);
    const { res, status } = makeRes();

    await controller.requestException(
      makeReq({
        body: {
          destinationCountry: 'JP',
          startsAt: '2026-07-01T00:00:00.000Z',
          endsAt: '2026-07-10T00:00:00.000Z',
          reason: 'Supplier audit',
        },
      }),
      res,
    );

    expect(service.requestException).toHaveBeenCalledWith(user, {
      destinationCountry: 'JP',
      startsAt: new Date('2026-07-01T00:00:00.000Z'),
      endsAt: new Date('2026-07-10T00:00:00.000Z'),
      reason: 'Supplier audit',
    });
    expect(status).toHaveBeenCalledWith(201);
  });

  it('lists the user own exceptions with pagination', async () => {
    const service = makeService();
    const user: Actor = { id: 'u-42' };
    const controller = createSelfController(service, () => user, logger);
    const { res } = makeRes();

    await controller.listExceptions(makeReq({ query: { limit: '10' } }), res);

    expect(service.listOwnExceptions).toHaveBeenCalledWith(user, { limit: 10, offset: undefined });
  });
});
