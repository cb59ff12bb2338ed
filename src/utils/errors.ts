/**
 * Application Errors
 *
 * Every expected failure is an AppError with a stable `code` and the HTTP
 * status it maps to. Route handlers turn these into the standard error
 * envelope; anything else is treated as an internal error.
 */

export type ErrorCode =
  | 'VALIDATION_ERROR'
  | 'INVALID_REFERENCE'
  | 'DUPLICATE_EMAIL'
  | 'DUPLICATE_ROLE'
  | 'ROLE_IN_USE'
  | 'INVALID_CREDENTIALS'
  | 'UNAUTHORIZED'
  | 'INVALID_TOKEN'
  | 'TOKEN_EXPIRED'
  | 'FORBIDDEN'
  | 'NOT_FOUND'
  | 'CONFIGURATION_ERROR';

export interface FieldError {
  field: string;
  message: string;
}

export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly statusCode: number;
  public readonly details?: unknown;

  constructor(message: string, code: ErrorCode, statusCode: number, details?: unknown) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
  }
}

export class ValidationError extends AppError {
  public readonly errors: FieldError[];

  constructor(errors: FieldError[], message: string = 'Please fix the following errors') {
    super(message, 'VALIDATION_ERROR', 400, errors);
    this.name = 'ValidationError';
    this.errors = errors;
  }

  static field(field: string, message: string): ValidationError {
    return new ValidationError([{ field, message }]);
  }
}

export class InvalidReferenceError extends AppError {
  constructor(field: string, value: number) {
    super(`${field} ${value} does not reference an existing record`, 'INVALID_REFERENCE', 400, { field, value });
    this.name = 'InvalidReferenceError';
  }
}

export class DuplicateEmailError extends AppError {
  constructor() {
    super('An account with this email already exists.', 'DUPLICATE_EMAIL', 409);
    this.name = 'DuplicateEmailError';
  }
}

export class DuplicateRoleError extends AppError {
  constructor(name: string) {
    super(`A role named "${name}" already exists.`, 'DUPLICATE_ROLE', 409);
    this.name = 'DuplicateRoleError';
  }
}

export class RoleInUseError extends AppError {
  constructor(roleId: number) {
    super(`Role ${roleId} is still assigned to at least one user.`, 'ROLE_IN_USE', 409);
    this.name = 'RoleInUseError';
  }
}

export class InvalidCredentialsError extends AppError {
  constructor() {
    super('Invalid email or password.', 'INVALID_CREDENTIALS', 401);
    this.name = 'InvalidCredentialsError';
  }
}

export class UnauthorizedError extends AppError {
  constructor(message: string = 'Authentication required. Please log in.') {
    super(message, 'UNAUTHORIZED', 401);
    this.name = 'UnauthorizedError';
  }
}

export class InvalidTokenError extends AppError {
  constructor(message: string = 'Invalid authentication token.') {
    super(message, 'INVALID_TOKEN', 401);
    this.name = 'InvalidTokenError';
  }
}

export class ExpiredTokenError extends AppError {
  constructor() {
    super('Your session has expired. Please log in again.', 'TOKEN_EXPIRED', 401);
    this.name = 'ExpiredTokenError';
  }
}

export class ForbiddenError extends AppError {
  constructor(message: string = 'You do not have permission to access this resource.') {
    super(message, 'FORBIDDEN', 403);
    this.name = 'ForbiddenError';
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string, id?: number) {
    super(id === undefined ? `${resource} not found` : `${resource} ${id} not found`, 'NOT_FOUND', 404);
    this.name = 'NotFoundError';
  }
}

export class ConfigurationError extends AppError {
  constructor(message: string) {
    super(message, 'CONFIGURATION_ERROR', 500);
    this.name = 'ConfigurationError';
  }
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}
