import { Router } from 'express';
import type { AccessPolicies } from '../middleware/access.policies';
import type { AccessPolicy } from '../middleware/access.pipeline';
import type { AccessMiddleware } from '../middleware/auth.middleware';
import type { AuthService } from '../services/auth.service';
import type { RoleService } from '../services/role.service';
import type { UserService } from '../services/user.service';
import { createAuthRouter } from './auth.routes';
import { createRoleRouter } from './role.routes';
import { createDoctorRouter, createUserRouter } from './user.routes';

export interface ApiRouterDeps {
  authService: AuthService;
  userService: UserService;
  roleService: RoleService;
  requireAccess: (policy: AccessPolicy) => AccessMiddleware;
  policies: AccessPolicies;
}

export function createApiRouter(deps: ApiRouterDeps): Router {
  const { requireAccess, policies } = deps;
  const router = Router();

  // Mount route modules
  router.use(
    '/auth',
    createAuthRouter({ authService: deps.authService, requireAccess, authenticated: policies.authenticated })
  );
  router.use('/users', createUserRouter({ userService: deps.userService, requireAccess, policies }));
  router.use('/doctors', createDoctorRouter({ userService: deps.userService, requireAccess, policies }));
  router.use('/roles', createRoleRouter({ roleService: deps.roleService, requireAccess, policies }));

  // Health check endpoint
  router.get('/health', (req, res) => {
    res.status(200).json({
      success: true,
      data: {
        status: 'healthy',
        timestamp: new Date().toISOString(),
      },
    });
  });

  return router;
}
