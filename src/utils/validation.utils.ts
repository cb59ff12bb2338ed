/**
 * Input Validation Utilities
 *
 * NEVER trust request bodies. Each validator returns a field error or null;
 * the parse* helpers collect every field error and either throw a single
 * ValidationError or return the narrowed, normalised value.
 */

import type { CreateUserRequest, LoginRequest, RegisterRequest, UpdateUserRequest } from '../types';
import { type FieldError, ValidationError } from './errors';

/**
 * A body whose fields have not been checked yet
 */
export type Untrusted<T> = { [K in keyof T]?: unknown };

export const MAX_FIELD_LENGTH = 255;
export const MIN_PASSWORD_LENGTH = 6;
// bcrypt ignores every byte past the 72nd
export const MAX_PASSWORD_BYTES = 72;
// ids are int4 columns
export const MAX_ID = 2147483647;

const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

/**
 * Length in characters (code points), as VARCHAR counts it
 */
export function characterLength(value: string): number {
  return Array.from(value).length;
}

export function validateName(name: unknown): FieldError | null {
  if (typeof name !== 'string' || name.trim().length === 0) {
    return { field: 'name', message: 'Name is required' };
  }
  if (characterLength(name.trim()) > MAX_FIELD_LENGTH) {
    return { field: 'name', message: `Name must be at most ${MAX_FIELD_LENGTH} characters` };
  }
  return null;
}

export function validateEmail(email: unknown): FieldError | null {
  if (typeof email !== 'string' || email.trim().length === 0) {
    return { field: 'email', message: 'Email is required' };
  }
  // Lower-casing can lengthen a string, so measure what gets stored
  if (characterLength(normalizeEmail(email)) > MAX_FIELD_LENGTH) {
    return { field: 'email', message: `Email must be at most ${MAX_FIELD_LENGTH} characters` };
  }
  if (!EMAIL_PATTERN.test(email.trim())) {
    return { field: 'email', message: 'Email must be a valid email address' };
  }
  return null;
}

export function validatePassword(password: unknown): FieldError | null {
  if (typeof password !== 'string' || password.length < MIN_PASSWORD_LENGTH) {
    return { field: 'password', message: `Password must be at least ${MIN_PASSWORD_LENGTH} characters` };
  }
  if (Buffer.byteLength(password, 'utf8') > MAX_PASSWORD_BYTES) {
    return { field: 'password', message: `Password must be at most ${MAX_PASSWORD_BYTES} bytes` };
  }
  return null;
}

/**
 * Registration only. An absent confirmation is accepted.
 */
export function validatePasswordConfirmation(password: unknown, confirmation: unknown): FieldError | null {
  if (confirmation === undefined) {
    return null;
  }
  if (confirmation !== password) {
    return { field: 'password_confirmation', message: 'Password confirmation does not match' };
  }
  return null;
}

/**
 * Accepts a positive integer or a string of digits, up to MAX_ID
 */
export function parsePositiveInt(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isSafeInteger(value) && value > 0 && value <= MAX_ID ? value : null;
  }
  if (typeof value === 'string' && /^\d+$/.test(value)) {
    const parsed = Number(value);
    return Number.isSafeInteger(parsed) && parsed > 0 && parsed <= MAX_ID ? parsed : null;
  }
  return null;
}

export function validateRoleId(roleId: unknown): FieldError | null {
  if (parsePositiveInt(roleId) === null) {
    return { field: 'role_id', message: 'Role must be a positive integer id' };
  }
  return null;
}

export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

function collect(...results: Array<FieldError | null>): FieldError[] {
  return results.filter((result): result is FieldError => result !== null);
}

function roleIdOf(value: unknown): number {
  const roleId = parsePositiveInt(value);
  if (roleId === null) {
    throw ValidationError.field('role_id', 'Role must be a positive integer id');
  }
  return roleId;
}

/**
 * Field errors of a registration body, in field order
 */
export function registrationErrors(data: Untrusted<RegisterRequest>): FieldError[] {
  return collect(
    validateName(data.name),
    validateEmail(data.email),
    validatePassword(data.password),
    validatePasswordConfirmation(data.password, data.password_confirmation),
    validateRoleId(data.role_id)
  );
}

/**
 * Registration body: every field required, confirmation optional
 */
export function parseRegistration(data: Untrusted<RegisterRequest>): RegisterRequest {
  const errors = registrationErrors(data);
  if (errors.length > 0) {
    throw new ValidationError(errors);
  }
  return {
    name: String(data.name).trim(),
    email: String(data.email).trim(),
    password: String(data.password),
    role_id: roleIdOf(data.role_id),
  };
}

/**
 * Administrative create: same rules as registration, no confirmation
 */
export function parseCreateUser(data: Untrusted<CreateUserRequest>): CreateUserRequest {
  const { name, email, password, role_id } = parseRegistration({
    name: data.name,
    email: data.email,
    password: data.password,
    role_id: data.role_id,
  });
  return { name, email, password, role_id };
}

/**
 * Partial update: only supplied fields are validated
 */
export function parseUserUpdate(data: Untrusted<UpdateUserRequest>): UpdateUserRequest {
  const errors = collect(
    data.name !== undefined ? validateName(data.name) : null,
    data.email !== undefined ? validateEmail(data.email) : null,
    data.password !== undefined ? validatePassword(data.password) : null,
    data.role_id !== undefined ? validateRoleId(data.role_id) : null
  );
  if (errors.length > 0) {
    throw new ValidationError(errors);
  }

  const patch: UpdateUserRequest = {};
  if (data.name !== undefined) patch.name = String(data.name).trim();
  if (data.email !== undefined) patch.email = String(data.email).trim();
  if (data.password !== undefined) patch.password = String(data.password);
  if (data.role_id !== undefined) patch.role_id = roleIdOf(data.role_id);
  return patch;
}

/**
 * Login only checks presence; wrong values are InvalidCredentials
 */
export function parseLogin(data: Untrusted<LoginRequest>): LoginRequest {
  const errors: FieldError[] = [];
  if (typeof data.email !== 'string' || data.email.trim().length === 0) {
    errors.push({ field: 'email', message: 'Email is required' });
  }
  if (typeof data.password !== 'string' || data.password.length === 0) {
    errors.push({ field: 'password', message: 'Password is required' });
  }
  if (errors.length > 0) {
    throw new ValidationError(errors);
  }
  return { email: String(data.email).trim(), password: String(data.password) };
}

export function parseRoleName(name: unknown): string {
  if (typeof name !== 'string' || name.trim().length === 0) {
    throw ValidationError.field('name', 'Role name is required');
  }
  if (characterLength(name.trim()) > MAX_FIELD_LENGTH) {
    throw ValidationError.field('name', `Role name must be at most ${MAX_FIELD_LENGTH} characters`);
  }
  return name.trim();
}

/**
 * Route parameter id
 */
export function parseIdParam(value: unknown, field: string = 'id'): number {
  const id = parsePositiveInt(value);
  if (id === null) {
    throw ValidationError.field(field, `${field} must be a positive integer`);
  }
  return id;
}
