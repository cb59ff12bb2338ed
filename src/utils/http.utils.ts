/**
 * HTTP helpers shared by routes and middleware
 */

import type { Request, Response } from 'express';
import type { ApiResponse, AuthenticatedRequest } from '../types';
import type { RequestOrigin } from './audit.utils';
import { isAppError } from './errors';
import { createRequestContext, logError } from './logger.utils';

/**
 * Get client IP address (handles proxies)
 */
export function getClientIp(req: Request): string {
  const forwarded = req.headers['x-forwarded-for'];
  if (forwarded) {
    // Can be comma-separated list, take first
    const ips = Array.isArray(forwarded) ? forwarded[0] : forwarded;
    return ips.split(',')[0].trim();
  }
  return req.ip || req.socket.remoteAddress || 'unknown';
}

export function getRequestOrigin(req: AuthenticatedRequest): RequestOrigin {
  return {
    requestId: req.requestId,
    ipAddress: getClientIp(req),
    userAgent: req.headers['user-agent'],
  };
}

export function sendSuccess<T>(res: Response, statusCode: number, data: T, requestId?: string): void {
  const body: ApiResponse<T> = {
    success: true,
    data,
    meta: {
      timestamp: new Date(),
      requestId,
    },
  };
  res.status(statusCode).json(body);
}

export function sendFailure(res: Response, statusCode: number, code: string, message: string, details?: unknown): void {
  const body: ApiResponse = {
    success: false,
    error: details === undefined ? { code, message } : { code, message, details },
  };
  res.status(statusCode).json(body);
}

/**
 * Expected failures become their envelope; anything else is logged and
 * answered with a generic 500 (no internals leak to the client).
 */
export function sendError(res: Response, req: AuthenticatedRequest, error: unknown, event: string): void {
  if (isAppError(error)) {
    sendFailure(res, error.statusCode, error.code, error.message, error.details);
    return;
  }

  logError(
    event,
    'Request failed with an unexpected error',
    error,
    createRequestContext(req.requestId, req.user?.id, undefined, undefined, getClientIp(req))
  );
  sendFailure(res, 500, 'INTERNAL_ERROR', 'An unexpected error occurred. Please try again.');
}
