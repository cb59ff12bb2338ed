/**
 * User Routes
 *
 * GET    /api/users[?role_id=n] - List users (any authenticated user)
 * GET    /api/users/:id         - Get one user (any authenticated user)
 * POST   /api/users             - Create user (admin)
 * PUT    /api/users/:id         - Update supplied fields (admin)
 * PATCH  /api/users/:id         - Same as PUT
 * DELETE /api/users/:id         - Hard delete (admin)
 *
 * GET    /api/doctors           - Doctor directory (doctors and patients)
 */

import { Router, type Response } from 'express';
import type { AccessPolicies } from '../middleware/access.policies';
import type { AccessPolicy } from '../middleware/access.pipeline';
import type { AccessMiddleware } from '../middleware/auth.middleware';
import type { UserService } from '../services/user.service';
import type { AuthenticatedRequest, UserFilter } from '../types';
import { logResourceEvent } from '../utils/audit.utils';
import { ValidationError } from '../utils/errors';
import { getRequestOrigin, sendError, sendSuccess } from '../utils/http.utils';
import { parseIdParam, parsePositiveInt } from '../utils/validation.utils';

export interface UserRouterDeps {
  userService: UserService;
  requireAccess: (policy: AccessPolicy) => AccessMiddleware;
  policies: AccessPolicies;
}

function parseUserFilter(query: AuthenticatedRequest['query']): UserFilter {
  if (query.role_id === undefined) {
    return {};
  }
  const roleId = parsePositiveInt(query.role_id);
  if (roleId === null) {
    throw ValidationError.field('role_id', 'role_id must be a positive integer');
  }
  return { roleId };
}

export function createUserRouter(deps: UserRouterDeps): Router {
  const { userService, requireAccess, policies } = deps;
  const router = Router();

  router.get('/', requireAccess(policies.authenticated), async (req: AuthenticatedRequest, res: Response) => {
    try {
      const users = await userService.list(parseUserFilter(req.query));
      sendSuccess(res, 200, { users }, req.requestId);
    } catch (error) {
      sendError(res, req, error, 'users.list_error');
    }
  });

  router.get('/:id', requireAccess(policies.authenticated), async (req: AuthenticatedRequest, res: Response) => {
    try {
      const user = await userService.get(parseIdParam(req.params.id));
      sendSuccess(res, 200, { user }, req.requestId);
    } catch (error) {
      sendError(res, req, error, 'users.get_error');
    }
  });

  router.post('/', requireAccess(policies.userAdmin), async (req: AuthenticatedRequest, res: Response) => {
    try {
      const user = await userService.create(req.body ?? {});
      logResourceEvent('resource.create', req.user?.id, 'user', user.id, getRequestOrigin(req));
      sendSuccess(res, 201, { user }, req.requestId);
    } catch (error) {
      sendError(res, req, error, 'users.create_error');
    }
  });

  const update = async (req: AuthenticatedRequest, res: Response) => {
    try {
      const user = await userService.update(parseIdParam(req.params.id), req.body ?? {});
      logResourceEvent('resource.update', req.user?.id, 'user', user.id, getRequestOrigin(req));
      sendSuccess(res, 200, { user }, req.requestId);
    } catch (error) {
      sendError(res, req, error, 'users.update_error');
    }
  };
  router.put('/:id', requireAccess(policies.userAdmin), update);
  router.patch('/:id', requireAccess(policies.userAdmin), update);

  router.delete('/:id', requireAccess(policies.userAdmin), async (req: AuthenticatedRequest, res: Response) => {
    try {
      const id = parseIdParam(req.params.id);
      await userService.delete(id);
      logResourceEvent('resource.delete', req.user?.id, 'user', id, getRequestOrigin(req));
      sendSuccess(res, 200, { id, deleted: true }, req.requestId);
    } catch (error) {
      sendError(res, req, error, 'users.delete_error');
    }
  });

  return router;
}

export function createDoctorRouter(deps: UserRouterDeps): Router {
  const { userService, requireAccess, policies } = deps;
  const router = Router();

  router.get('/', requireAccess(policies.careTeam), async (req: AuthenticatedRequest, res: Response) => {
    try {
      const doctors = await userService.listDoctors();
      sendSuccess(res, 200, { doctors }, req.requestId);
    } catch (error) {
      sendError(res, req, error, 'doctors.list_error');
    }
  });

  return router;
}
