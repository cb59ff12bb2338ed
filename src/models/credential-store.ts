/**
 * Credential Store
 *
 * The only way services reach users and roles. Implementations enforce
 * email uniqueness and role references atomically at the storage
 * boundary; callers never check-then-write.
 */

import type { NewUserRecord, Role, User, UserFilter, UserRecordPatch } from '../types';

export interface CredentialStore {
  findUserById(id: number): Promise<User | null>;

  /**
   * Lookup uses the store's email normalisation (trimmed, lower-case)
   */
  findUserByEmail(email: string): Promise<User | null>;

  listUsers(filter?: UserFilter): Promise<User[]>;

  /**
   * @throws DuplicateEmailError email already taken
   * @throws InvalidReferenceError role_id has no role
   */
  createUser(fields: NewUserRecord): Promise<User>;

  /**
   * Writes only the supplied fields. Resolves null when the user does
   * not exist; a rejected write leaves the record unchanged.
   * @throws DuplicateEmailError
   * @throws InvalidReferenceError
   */
  updateUser(id: number, patch: UserRecordPatch): Promise<User | null>;

  /**
   * Hard delete. Resolves false when there was nothing to delete.
   */
  deleteUser(id: number): Promise<boolean>;

  roleExists(roleId: number): Promise<boolean>;

  listRoles(): Promise<Role[]>;

  /**
   * @throws DuplicateRoleError
   */
  createRole(name: string): Promise<Role>;

  /**
   * Resolves false when the role does not exist.
   * @throws RoleInUseError a user still references the role
   */
  deleteRole(id: number): Promise<boolean>;
}
