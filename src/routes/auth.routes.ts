/**
 * Authentication Routes
 *
 * POST /api/auth/register - Create new account, returns a token
 * POST /api/auth/login    - Exchange credentials for a token
 * GET  /api/auth/me       - Current user
 */

import { Router, type Response } from 'express';
import type { AccessMiddleware } from '../middleware/auth.middleware';
import type { AccessPolicy } from '../middleware/access.pipeline';
import type { AuthService } from '../services/auth.service';
import type { AuthenticatedRequest } from '../types';
import { logAuthEvent } from '../utils/audit.utils';
import { InvalidCredentialsError } from '../utils/errors';
import { getRequestOrigin, sendError, sendSuccess } from '../utils/http.utils';

export interface AuthRouterDeps {
  authService: AuthService;
  requireAccess: (policy: AccessPolicy) => AccessMiddleware;
  authenticated: AccessPolicy;
}

export function createAuthRouter(deps: AuthRouterDeps): Router {
  const { authService, requireAccess } = deps;
  const router = Router();

  /**
   * POST /api/auth/register
   */
  router.post('/register', async (req: AuthenticatedRequest, res: Response) => {
    try {
      const result = await authService.register(req.body ?? {});

      logAuthEvent('auth.register', result.user.id, getRequestOrigin(req), true);

      sendSuccess(res, 201, result, req.requestId);
    } catch (error) {
      sendError(res, req, error, 'auth.register_error');
    }
  });

  /**
   * POST /api/auth/login
   */
  router.post('/login', async (req: AuthenticatedRequest, res: Response) => {
    try {
      const result = await authService.login(req.body ?? {});

      logAuthEvent('auth.login', result.user.id, getRequestOrigin(req), true);

      sendSuccess(res, 200, result, req.requestId);
    } catch (error) {
      if (error instanceof InvalidCredentialsError) {
        logAuthEvent('auth.login_failed', undefined, getRequestOrigin(req), false, 'Invalid credentials');
      }
      sendError(res, req, error, 'auth.login_error');
    }
  });

  /**
   * GET /api/auth/me
   */
  router.get('/me', requireAccess(deps.authenticated), async (req: AuthenticatedRequest, res: Response) => {
    sendSuccess(res, 200, { user: req.user }, req.requestId);
  });

  return router;
}
