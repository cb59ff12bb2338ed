/**
 * Authentication Middleware
 *
 * Runs BEFORE protected routes. It feeds the Authorization header through
 * the access pipeline and either rejects the request (401 / 403) or
 * attaches the user to the request and hands over to the route.
 *
 * AUTHORIZATION HEADER FORMAT:
 * Authorization: Bearer <token>
 */

import type { NextFunction, Response } from 'express';
import { v4 as uuidv4 } from 'uuid';
import type { CredentialStore } from '../models/credential-store';
import type { TokenCodec } from '../services/token.service';
import type { AuthenticatedRequest } from '../types';
import { logAccessDenied } from '../utils/audit.utils';
import { getClientIp, getRequestOrigin, sendFailure } from '../utils/http.utils';
import { createRequestContext, logError } from '../utils/logger.utils';
import { type AccessOutcome, type AccessPolicy, createAccessStages, runAccessPipeline } from './access.pipeline';

export interface AccessMiddlewareDeps {
  tokens: TokenCodec;
  store: CredentialStore;
  clock?: () => Date;
}

export type AccessMiddleware = (req: AuthenticatedRequest, res: Response, next: NextFunction) => Promise<void>;

/**
 * Middleware factory: `requireAccess(policies.userAdmin)`
 */
export function createAccessMiddleware(deps: AccessMiddlewareDeps): (policy: AccessPolicy) => AccessMiddleware {
  const stages = createAccessStages(deps);
  const clock = deps.clock ?? (() => new Date());

  return (policy) =>
    async (req, res, next) => {
      // Add request ID for tracing
      req.requestId = req.requestId ?? uuidv4();

      let outcome: AccessOutcome;
      try {
        outcome = await runAccessPipeline(stages, {
          authorization: req.headers.authorization,
          policy,
          now: clock(),
        });
      } catch (error) {
        logError(
          'auth.middleware_error',
          'Authentication middleware encountered an error',
          error,
          createRequestContext(req.requestId, undefined, undefined, undefined, getClientIp(req))
        );
        sendFailure(res, 500, 'AUTH_ERROR', 'Authentication error. Please try again.');
        return;
      }

      if (!outcome.authorized) {
        const { error, reason, userId } = outcome.denial;
        logAccessDenied(
          error.statusCode === 403 ? 'access.denied' : 'access.unauthorized',
          userId,
          getRequestOrigin(req),
          policy.name,
          reason
        );
        sendFailure(res, error.statusCode, error.code, error.message);
        return;
      }

      // Attach user to request for use in route handlers
      req.user = outcome.user;
      next();
    };
}
