// Re-export all types from a single entry point
export * from './user.types';
export * from './audit.types';

import type { Request } from 'express';
import type { UserPublic } from './user.types';

/**
 * Standard API response wrapper
 * All our endpoints return this shape for consistency
 */
export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: {
    code: string;
    message: string;
    details?: unknown;
  };
  meta?: {
    timestamp: Date;
    requestId?: string;
  };
}

/**
 * Express Request with authenticated user
 * After the access middleware runs, request will have this shape
 */
export interface AuthenticatedRequest extends Request {
  user?: UserPublic;
  requestId?: string;
}
