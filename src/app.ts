/**
 * Express application
 *
 * Built from explicit collaborators so the same wiring runs against
 * PostgreSQL in production and the in-process store in tests.
 */

import express, { type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { v4 as uuidv4 } from 'uuid';
import type { AppConfig } from './config';
import type { AccessPolicies } from './middleware/access.policies';
import { createAccessMiddleware } from './middleware/auth.middleware';
import type { CredentialStore } from './models/credential-store';
import { createApiRouter } from './routes';
import { AuthService } from './services/auth.service';
import { RoleService } from './services/role.service';
import type { TokenCodec } from './services/token.service';
import { UserService } from './services/user.service';
import type { AuthenticatedRequest } from './types';
import type { PasswordHasher } from './utils/hash.utils';
import { getClientIp, sendFailure } from './utils/http.utils';
import { createRequestContext, logDebug, logError } from './utils/logger.utils';

export interface AppDeps {
  config: Pick<AppConfig, 'corsOrigins'>;
  store: CredentialStore;
  hasher: PasswordHasher;
  tokens: TokenCodec;
  policies: AccessPolicies;
  clock?: () => Date;
}

function isClientError(err: unknown): err is Error & { status: number } {
  return (
    err instanceof Error &&
    'status' in err &&
    typeof err.status === 'number' &&
    err.status >= 400 &&
    err.status < 500
  );
}

/**
 * Last error handler. Express recognises error handlers by their four
 * parameters. Details go to the log only.
 */
export function handleUnexpectedError(err: unknown, req: AuthenticatedRequest, res: Response, _next: NextFunction): void {
  if (isClientError(err)) {
    // Body parser failures: malformed JSON, payload too large
    sendFailure(res, err.status, 'INVALID_REQUEST', 'The request body could not be processed.');
    return;
  }

  logError(
    'http.unhandled_error',
    'Unhandled error',
    err,
    createRequestContext(req.requestId, undefined, undefined, undefined, getClientIp(req))
  );
  sendFailure(res, 500, 'INTERNAL_ERROR', 'An unexpected error occurred');
}

export function createApp(deps: AppDeps): express.Express {
  const { config, store, hasher, tokens, policies, clock } = deps;
  const app = express();

  // ======================
  // SECURITY MIDDLEWARE
  // ======================

  // CORS must be registered before Helmet
  app.use(
    cors({
      origin: config.corsOrigins,
      methods: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'Authorization'],
    })
  );
  app.use(helmet());

  // ======================
  // BODY PARSING
  // ======================

  // Limit size to prevent DoS
  app.use(express.json({ limit: '10kb' }));

  // ======================
  // REQUEST ID + ACCESS LOG
  // ======================

  app.use((req: AuthenticatedRequest, res: Response, next: NextFunction) => {
    req.requestId = uuidv4();
    const start = Date.now();
    res.on('finish', () => {
      logDebug('http.request', `${req.method} ${req.path} ${res.statusCode}`, createRequestContext(req.requestId), {
        duration: Date.now() - start,
      });
    });
    next();
  });

  app.set('trust proxy', 1);

  // ======================
  // API ROUTES
  // ======================

  const requireAccess = createAccessMiddleware({ tokens, store, clock });
  app.use(
    '/api',
    createApiRouter({
      authService: new AuthService({ store, hasher, tokens, clock }),
      userService: new UserService(store, hasher),
      roleService: new RoleService(store, Object.values(policies)),
      requireAccess,
      policies,
    })
  );

  // ======================
  // 404 HANDLER
  // ======================

  app.use((req: Request, res: Response) => {
    sendFailure(res, 404, 'NOT_FOUND', `Route ${req.method} ${req.path} not found`);
  });

  // ======================
  // GLOBAL ERROR HANDLER
  // ======================

  app.use(handleUnexpectedError);

  return app;
}
