import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';
import request from 'supertest';
import express, { type Express, type Response } from 'express';
import type { AccessPolicy } from '../middleware/access.pipeline';
import { createAccessMiddleware } from '../middleware/auth.middleware';
import type { AuthenticatedRequest } from '../types';
import { createFixture, TEST_TTL_SECONDS, type TestFixture } from './helpers';

const careTeam: AccessPolicy = { name: 'careTeam', allowedRoles: new Set([2, 3]) };

describe('access middleware', () => {
  let fixture: TestFixture;
  let app: Express;
  let now: Date;
  let handler: Mock<(req: AuthenticatedRequest, res: Response) => void>;
  let doctorId: number;
  let adminId: number;

  beforeEach(async () => {
    fixture = createFixture();
    now = new Date('2026-03-01T12:00:00.000Z');
    handler = vi.fn((req: AuthenticatedRequest, res: Response) => {
      res.status(200).json({ userId: req.user?.id, roleId: req.user?.role_id });
    });

    const requireAccess = createAccessMiddleware({ ...fixture, clock: () => now });
    app = express();
    app.get('/care', requireAccess(careTeam), handler);

    doctorId = (await fixture.store.createUser({ name: 'Doc', email: 'doc@x.com', password_hash: 'h', role_id: 2 })).id;
    adminId = (await fixture.store.createUser({ name: 'Adm', email: 'adm@x.com', password_hash: 'h', role_id: 1 })).id;
  });

  function tokenFor(userId: number): string {
    return fixture.tokens.issue(userId, now).token;
  }

  it('returns 401 without a token and never reaches the handler', async () => {
    const res = await request(app).get('/care');

    expect(res.status).toBe(401);
    expect(res.body).toEqual({
      success: false,
      error: { code: 'UNAUTHORIZED', message: 'Authentication required. Please log in.' },
    });
    expect(handler).not.toHaveBeenCalled();
  });

  it('returns 401 INVALID_TOKEN for a tampered token', async () => {
    const token = tokenFor(doctorId);

    const res = await request(app).get('/care').set('Authorization', `Bearer ${token}x`);

    expect(res.status).toBe(401);
    expect(res.body.error.code).toBe('INVALID_TOKEN');
    expect(handler).not.toHaveBeenCalled();
  });

  it('returns 401 TOKEN_EXPIRED once the token has aged out', async () => {
    const token = tokenFor(doctorId);
    now = new Date(now.getTime() + TEST_TTL_SECONDS * 1000);

    const res = await request(app).get('/care').set('Authorization', `Bearer ${token}`);

    expect(res.status).toBe(401);
    expect(res.body.error).toEqual({
      code: 'TOKEN_EXPIRED',
      message: 'Your session has expired. Please log in again.',
    });
    expect(handler).not.toHaveBeenCalled();
  });

  it('returns 401 when the user behind a valid token was deleted', async () => {
    const token = tokenFor(doctorId);
    await fixture.store.deleteUser(doctorId);

    const res = await request(app).get('/care').set('Authorization', `Bearer ${token}`);

    expect(res.status).toBe(401);
    expect(res.body.error.code).toBe('UNAUTHORIZED');
  });

  it('returns 403 when the role is not on the allow-list', async () => {
    const res = await request(app).get('/care').set('Authorization', `Bearer ${tokenFor(adminId)}`);

    expect(res.status).toBe(403);
    expect(res.body).toEqual({
      success: false,
      error: { code: 'FORBIDDEN', message: 'You do not have permission to access this resource.' },
    });
    expect(handler).not.toHaveBeenCalled();
  });

  it('invokes the handler exactly once with the user attached', async () => {
    const res = await request(app).get('/care').set('Authorization', `Bearer ${tokenFor(doctorId)}`);

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ userId: doctorId, roleId: 2 });
    expect(handler).toHaveBeenCalledTimes(1);
  });

  it('sees a role change on the next request', async () => {
    const token = tokenFor(adminId);
    await fixture.store.updateUser(adminId, { role_id: 3 });

    const res = await request(app).get('/care').set('Authorization', `Bearer ${token}`);

    expect(res.status).toBe(200);
    expect(res.body.roleId).toBe(3);
  });

  it('answers 500 AUTH_ERROR when the store is unavailable', async () => {
    vi.spyOn(fixture.store, 'findUserById').mockRejectedValue(new Error('connect ECONNREFUSED'));

    const res = await request(app).get('/care').set('Authorization', `Bearer ${tokenFor(doctorId)}`);

    expect(res.status).toBe(500);
    expect(res.body).toEqual({
      success: false,
      error: { code: 'AUTH_ERROR', message: 'Authentication error. Please try again.' },
    });
    expect(handler).not.toHaveBeenCalled();
  });
});
