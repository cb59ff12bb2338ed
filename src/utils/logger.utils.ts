/**
 * Structured Logging Utility
 *
 * Emits one JSON object per line on stdout. Logs carry ids, hashes and
 * metadata only: never emails, names, passwords or tokens.
 *
 * WHAT TO LOG:
 * - Hashed user / resource ids and IPs
 * - Event types
 * - Error types and codes (not messages from the storage layer)
 */

import { sha256Hash } from './hash.utils';

/**
 * Log levels matching standard severity
 */
export enum LogLevel {
  ERROR = 'ERROR',
  WARN = 'WARN',
  INFO = 'INFO',
  DEBUG = 'DEBUG',
}

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  [LogLevel.ERROR]: 0,
  [LogLevel.WARN]: 1,
  [LogLevel.INFO]: 2,
  [LogLevel.DEBUG]: 3,
};

/**
 * Structured log entry format
 */
export interface StructuredLog {
  timestamp: string;
  level: LogLevel;
  event: string;
  message: string;
  context?: {
    requestId?: string;
    userIdHash?: string;
    resourceType?: string;
    resourceIdHash?: string;
    ipAddressHash?: string;
  };
  metadata?: Record<string, unknown>;
  error?: {
    code?: string;
    type?: string;
    stack?: string;
  };
}

/**
 * Highest weight that is still written, from LOG_LEVEL.
 * `silent` turns logging off (tests).
 */
function threshold(): number {
  switch ((process.env.LOG_LEVEL || 'info').toLowerCase()) {
    case 'silent':
      return -1;
    case 'error':
      return LEVEL_WEIGHT[LogLevel.ERROR];
    case 'warn':
      return LEVEL_WEIGHT[LogLevel.WARN];
    case 'debug':
      return LEVEL_WEIGHT[LogLevel.DEBUG];
    default:
      return process.env.NODE_ENV === 'development' ? LEVEL_WEIGHT[LogLevel.DEBUG] : LEVEL_WEIGHT[LogLevel.INFO];
  }
}

/**
 * Keep only the error type and code; driver messages can echo query values
 */
function sanitizeError(error: unknown): { code?: string; type?: string; stack?: string } {
  if (error instanceof Error) {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
    return {
      type: error.name,
      code,
      stack: process.env.NODE_ENV === 'development' ? error.stack : undefined,
    };
  }
  return { type: 'UnknownError' };
}

function logStructured(entry: StructuredLog): void {
  if (LEVEL_WEIGHT[entry.level] > threshold()) {
    return;
  }
  console.log(JSON.stringify(entry));
}

function buildEntry(
  level: LogLevel,
  event: string,
  message: string,
  context?: StructuredLog['context'],
  metadata?: Record<string, unknown>
): StructuredLog {
  return {
    timestamp: new Date().toISOString(),
    level,
    event,
    message,
    context,
    metadata,
  };
}

/**
 * Log an error event
 */
export function logError(
  event: string,
  message: string,
  error?: unknown,
  context?: StructuredLog['context'],
  metadata?: Record<string, unknown>
): void {
  const entry = buildEntry(LogLevel.ERROR, event, message, context, metadata);
  entry.error = error ? sanitizeError(error) : undefined;
  logStructured(entry);
}

export function logWarning(
  event: string,
  message: string,
  context?: StructuredLog['context'],
  metadata?: Record<string, unknown>
): void {
  logStructured(buildEntry(LogLevel.WARN, event, message, context, metadata));
}

export function logInfo(
  event: string,
  message: string,
  context?: StructuredLog['context'],
  metadata?: Record<string, unknown>
): void {
  logStructured(buildEntry(LogLevel.INFO, event, message, context, metadata));
}

export function logDebug(
  event: string,
  message: string,
  context?: StructuredLog['context'],
  metadata?: Record<string, unknown>
): void {
  logStructured(buildEntry(LogLevel.DEBUG, event, message, context, metadata));
}

/**
 * Helper to create context from request
 */
export function createRequestContext(
  requestId?: string,
  userId?: number,
  resourceType?: string,
  resourceId?: number,
  ipAddress?: string
): StructuredLog['context'] {
  return {
    requestId,
    userIdHash: userId !== undefined ? sha256Hash(String(userId)) : undefined,
    resourceType,
    resourceIdHash: resourceId !== undefined ? sha256Hash(String(resourceId)) : undefined,
    ipAddressHash: ipAddress ? sha256Hash(ipAddress) : undefined,
  };
}

/**
 * Log system error (no user context)
 */
export function logSystemError(
  event: string,
  message: string,
  error?: unknown,
  metadata?: Record<string, unknown>
): void {
  logError(event, message, error, undefined, metadata);
}
