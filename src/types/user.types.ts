/**
 * Roles for RBAC (Role-Based Access Control)
 *
 * - Each user has exactly one ROLE, referenced by id
 * - Routes carry an allow-list of role ids
 * - Server checks the role BEFORE the route handler runs
 */
export interface Role {
  id: number;
  name: string;
}

/**
 * Roles seeded at bootstrap. Default route gating depends on these ids.
 */
export const SEEDED_ROLES = {
  admin: 1,
  doctor: 2,
  patient: 3,
} as const;

export const DEFAULT_ROLES: readonly Role[] = [
  { id: SEEDED_ROLES.admin, name: 'admin' },
  { id: SEEDED_ROLES.doctor, name: 'doctor' },
  { id: SEEDED_ROLES.patient, name: 'patient' },
];

/**
 * User stored in database
 * Note: password_hash, not password! We NEVER store plain passwords.
 */
export interface User {
  id: number;
  name: string;
  email: string;
  password_hash: string;
  role_id: number;
  created_at: Date;
  updated_at: Date;
}

/**
 * What we send to clients (NO password hash!)
 */
export type UserPublic = Omit<User, 'password_hash'>;

/**
 * Fields the credential store needs to create a user
 */
export interface NewUserRecord {
  name: string;
  email: string;
  password_hash: string;
  role_id: number;
}

/**
 * Partial update; omitted fields are left untouched
 */
export type UserRecordPatch = Partial<NewUserRecord>;

export interface UserFilter {
  roleId?: number;
}

/**
 * Registration request body
 */
export interface RegisterRequest {
  name: string;
  email: string;
  password: string;
  password_confirmation?: string;
  role_id: number;
}

/**
 * Login request body
 */
export interface LoginRequest {
  email: string;
  password: string;
}

/**
 * Administrative create/update bodies
 */
export type CreateUserRequest = Omit<RegisterRequest, 'password_confirmation'>;
export type UpdateUserRequest = Partial<CreateUserRequest>;

/**
 * What we return after successful auth
 */
export interface AuthResponse {
  token: string;
  expires_at: Date;
  user: UserPublic;
}

export function toUserPublic(user: User): UserPublic {
  return {
    id: user.id,
    name: user.name,
    email: user.email,
    role_id: user.role_id,
    created_at: user.created_at,
    updated_at: user.updated_at,
  };
}
