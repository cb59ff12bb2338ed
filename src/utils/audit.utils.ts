/**
 * Audit Trail
 *
 * Security-relevant events go through the structured logger with every
 * identifier hashed, so the trail can be audited without exposing who
 * the user was.
 */

import type { AuditEventInput, AuditEventType } from '../types';
import { createRequestContext, logInfo, logWarning } from './logger.utils';
import { sha256Hash } from './hash.utils';

export interface RequestOrigin {
  requestId?: string;
  ipAddress?: string;
  userAgent?: string;
}

export function recordAuditEvent(input: AuditEventInput, requestId?: string): void {
  const context = createRequestContext(requestId, input.user_id, input.resource_type, input.resource_id, input.ip_address);
  const metadata = {
    ...input.metadata,
    action_result: input.action_result,
    failure_reason: input.failure_reason,
    userAgentHash: input.user_agent ? sha256Hash(input.user_agent) : undefined,
  };

  if (input.action_result === 'success') {
    logInfo(input.event_type, `Audit: ${input.event_type}`, context, metadata);
  } else {
    logWarning(input.event_type, `Audit: ${input.event_type}`, context, metadata);
  }
}

/**
 * Helper to log auth events
 */
export function logAuthEvent(
  eventType: Extract<AuditEventType, 'auth.register' | 'auth.login' | 'auth.login_failed'>,
  userId: number | undefined,
  origin: RequestOrigin,
  success: boolean,
  failureReason?: string
): void {
  recordAuditEvent(
    {
      event_type: eventType,
      user_id: userId,
      ip_address: origin.ipAddress,
      user_agent: origin.userAgent,
      resource_type: 'user',
      resource_id: userId,
      action_result: success ? 'success' : 'failure',
      failure_reason: failureReason,
    },
    origin.requestId
  );
}

/**
 * Helper to log rejected requests on protected routes
 */
export function logAccessDenied(
  eventType: Extract<AuditEventType, 'access.denied' | 'access.unauthorized'>,
  userId: number | undefined,
  origin: RequestOrigin,
  resourceType: string,
  reason: string
): void {
  recordAuditEvent(
    {
      event_type: eventType,
      user_id: userId,
      ip_address: origin.ipAddress,
      user_agent: origin.userAgent,
      resource_type: resourceType,
      action_result: 'denied',
      failure_reason: reason,
    },
    origin.requestId
  );
}

/**
 * Helper to log administrative writes
 */
export function logResourceEvent(
  eventType: Extract<AuditEventType, 'resource.create' | 'resource.update' | 'resource.delete'>,
  actorId: number | undefined,
  resourceType: string,
  resourceId: number,
  origin: RequestOrigin
): void {
  recordAuditEvent(
    {
      event_type: eventType,
      user_id: actorId,
      ip_address: origin.ipAddress,
      user_agent: origin.userAgent,
      resource_type: resourceType,
      resource_id: resourceId,
      action_result: 'success',
    },
    origin.requestId
  );
}
