/**
 * Types of events we audit
 */
export type AuditEventType =
  // Authentication events
  | 'auth.register'
  | 'auth.login'
  | 'auth.login_failed'
  // Access control events
  | 'access.denied'
  | 'access.unauthorized'
  // Resource events
  | 'resource.create'
  | 'resource.update'
  | 'resource.delete';

export type AuditResult = 'success' | 'failure' | 'denied';

/**
 * Input for recording an audit event.
 * Identifiers are hashed before they reach the log.
 */
export interface AuditEventInput {
  event_type: AuditEventType;
  user_id?: number;
  ip_address?: string;
  user_agent?: string;
  resource_type: string;
  resource_id?: number;
  action_result: AuditResult;
  failure_reason?: string;
  metadata?: Record<string, unknown>;
}
