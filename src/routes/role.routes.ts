/**
 * Role Routes
 *
 * GET    /api/roles     - List roles (any authenticated user)
 * POST   /api/roles     - Add a role (admin)
 * DELETE /api/roles/:id - Remove an unused, non-seeded role (admin)
 */

import { Router, type Response } from 'express';
import type { AccessPolicies } from '../middleware/access.policies';
import type { AccessPolicy } from '../middleware/access.pipeline';
import type { AccessMiddleware } from '../middleware/auth.middleware';
import type { RoleService } from '../services/role.service';
import type { AuthenticatedRequest } from '../types';
import { logResourceEvent } from '../utils/audit.utils';
import { getRequestOrigin, sendError, sendSuccess } from '../utils/http.utils';
import { parseIdParam } from '../utils/validation.utils';

export interface RoleRouterDeps {
  roleService: RoleService;
  requireAccess: (policy: AccessPolicy) => AccessMiddleware;
  policies: AccessPolicies;
}

export function createRoleRouter(deps: RoleRouterDeps): Router {
  const { roleService, requireAccess, policies } = deps;
  const router = Router();

  router.get('/', requireAccess(policies.authenticated), async (req: AuthenticatedRequest, res: Response) => {
    try {
      sendSuccess(res, 200, { roles: await roleService.list() }, req.requestId);
    } catch (error) {
      sendError(res, req, error, 'roles.list_error');
    }
  });

  router.post('/', requireAccess(policies.roleAdmin), async (req: AuthenticatedRequest, res: Response) => {
    try {
      const role = await roleService.create(req.body?.name);
      logResourceEvent('resource.create', req.user?.id, 'role', role.id, getRequestOrigin(req));
      sendSuccess(res, 201, { role }, req.requestId);
    } catch (error) {
      sendError(res, req, error, 'roles.create_error');
    }
  });

  router.delete('/:id', requireAccess(policies.roleAdmin), async (req: AuthenticatedRequest, res: Response) => {
    try {
      const id = parseIdParam(req.params.id);
      await roleService.delete(id);
      logResourceEvent('resource.delete', req.user?.id, 'role', id, getRequestOrigin(req));
      sendSuccess(res, 200, { id, deleted: true }, req.requestId);
    } catch (error) {
      sendError(res, req, error, 'roles.delete_error');
    }
  });

  return router;
}
