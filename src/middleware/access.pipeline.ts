/**
 * Access Pipeline
 *
 * A protected request walks these stages in order:
 *
 *   extractBearer -> decodeToken -> resolveSubject -> checkRole
 *
 * Each stage either continues with the (enriched) context or halts with a
 * denial. The first halt ends the walk: later stages and the route handler
 * never run. Nothing here knows about Express; see auth.middleware.ts.
 */

import type { CredentialStore } from '../models/credential-store';
import type { TokenCodec } from '../services/token.service';
import type { UserPublic } from '../types';
import { toUserPublic } from '../types';
import {
  type AppError,
  ExpiredTokenError,
  ForbiddenError,
  InvalidTokenError,
  UnauthorizedError,
} from '../utils/errors';

/**
 * Route gate. An empty allow-list admits any authenticated user.
 */
export interface AccessPolicy {
  readonly name: string;
  readonly allowedRoles: ReadonlySet<number>;
}

export interface AccessContext {
  authorization?: string;
  policy: AccessPolicy;
  now: Date;
  token?: string;
  subjectId?: number;
  user?: UserPublic;
}

export interface AccessDenial {
  error: AppError;
  /** For the audit trail only, never sent to the client */
  reason: string;
  userId?: number;
}

export type StageResult =
  | { outcome: 'continue'; context: AccessContext }
  | { outcome: 'halt'; denial: AccessDenial };

export type AccessStage = (context: AccessContext) => Promise<StageResult>;

export type AccessOutcome =
  | { authorized: true; user: UserPublic }
  | { authorized: false; denial: AccessDenial };

const BEARER_PATTERN = /^Bearer\s+(\S+)$/i;

function proceed(context: AccessContext): StageResult {
  return { outcome: 'continue', context };
}

function halt(error: AppError, reason: string, userId?: number): StageResult {
  return { outcome: 'halt', denial: { error, reason, userId } };
}

export function extractBearer(): AccessStage {
  return async (context) => {
    if (!context.authorization) {
      return halt(new UnauthorizedError(), 'No token provided');
    }
    const match = BEARER_PATTERN.exec(context.authorization.trim());
    if (!match) {
      return halt(new UnauthorizedError(), 'Malformed authorization header');
    }
    return proceed({ ...context, token: match[1] });
  };
}

export function decodeToken(tokens: TokenCodec): AccessStage {
  return async (context) => {
    if (context.token === undefined) {
      return halt(new UnauthorizedError(), 'No token provided');
    }
    try {
      return proceed({ ...context, subjectId: tokens.decode(context.token, context.now) });
    } catch (error) {
      if (error instanceof ExpiredTokenError || error instanceof InvalidTokenError) {
        return halt(error, error instanceof ExpiredTokenError ? 'Expired token' : 'Invalid token');
      }
      throw error;
    }
  };
}

/**
 * A valid token for a deleted user is still unauthenticated
 */
export function resolveSubject(store: CredentialStore): AccessStage {
  return async (context) => {
    if (context.subjectId === undefined) {
      return halt(new UnauthorizedError(), 'No subject resolved');
    }
    const user = await store.findUserById(context.subjectId);
    if (!user) {
      return halt(new UnauthorizedError(), 'Token subject no longer exists', context.subjectId);
    }
    return proceed({ ...context, user: toUserPublic(user) });
  };
}

export function checkRole(): AccessStage {
  return async (context) => {
    if (!context.user) {
      return halt(new UnauthorizedError(), 'No subject resolved');
    }
    const { allowedRoles, name } = context.policy;
    if (allowedRoles.size > 0 && !allowedRoles.has(context.user.role_id)) {
      return halt(
        new ForbiddenError(),
        `Role ${context.user.role_id} not allowed by policy '${name}'. Required: ${[...allowedRoles].join(' or ')}`,
        context.user.id
      );
    }
    return proceed(context);
  };
}

export function createAccessStages(deps: { tokens: TokenCodec; store: CredentialStore }): AccessStage[] {
  return [extractBearer(), decodeToken(deps.tokens), resolveSubject(deps.store), checkRole()];
}

/**
 * Apply stages in order, stopping at the first halt.
 * Store failures propagate to the caller.
 */
export async function runAccessPipeline(stages: readonly AccessStage[], initial: AccessContext): Promise<AccessOutcome> {
  let context = initial;
  for (const stage of stages) {
    const result = await stage(context);
    if (result.outcome === 'halt') {
      return { authorized: false, denial: result.denial };
    }
    context = result.context;
  }

  if (!context.user) {
    return { authorized: false, denial: { error: new UnauthorizedError(), reason: 'No subject resolved' } };
  }
  return { authorized: true, user: context.user };
}
