/**
 * In-process Credential Store
 *
 * Backs tests and local runs without PostgreSQL. Every mutation checks
 * and writes in the same synchronous step, so two concurrent requests
 * can never both pass the uniqueness or role check.
 */

import type { NewUserRecord, Role, User, UserFilter, UserRecordPatch } from '../types';
import { DEFAULT_ROLES } from '../types';
import { DuplicateEmailError, DuplicateRoleError, InvalidReferenceError, RoleInUseError } from '../utils/errors';
import { normalizeEmail } from '../utils/validation.utils';
import type { CredentialStore } from './credential-store';

export class InMemoryCredentialStore implements CredentialStore {
  private readonly users = new Map<number, User>();
  private readonly roles = new Map<number, Role>();
  private nextUserId = 1;
  private nextRoleId = 1;

  constructor(roles: readonly Role[] = DEFAULT_ROLES, private readonly clock: () => Date = () => new Date()) {
    for (const role of roles) {
      this.roles.set(role.id, { ...role });
      this.nextRoleId = Math.max(this.nextRoleId, role.id + 1);
    }
  }

  async findUserById(id: number): Promise<User | null> {
    const user = this.users.get(id);
    return user ? { ...user } : null;
  }

  async findUserByEmail(email: string): Promise<User | null> {
    const user = this.findByNormalizedEmail(normalizeEmail(email));
    return user ? { ...user } : null;
  }

  async listUsers(filter: UserFilter = {}): Promise<User[]> {
    return [...this.users.values()]
      .filter((user) => filter.roleId === undefined || user.role_id === filter.roleId)
      .sort((a, b) => a.id - b.id)
      .map((user) => ({ ...user }));
  }

  async createUser(fields: NewUserRecord): Promise<User> {
    const email = normalizeEmail(fields.email);
    if (!this.roles.has(fields.role_id)) {
      throw new InvalidReferenceError('role_id', fields.role_id);
    }
    if (this.findByNormalizedEmail(email)) {
      throw new DuplicateEmailError();
    }

    const now = this.clock();
    const user: User = {
      id: this.nextUserId++,
      name: fields.name,
      email,
      password_hash: fields.password_hash,
      role_id: fields.role_id,
      created_at: now,
      updated_at: now,
    };
    this.users.set(user.id, user);
    return { ...user };
  }

  async updateUser(id: number, patch: UserRecordPatch): Promise<User | null> {
    const existing = this.users.get(id);
    if (!existing) {
      return null;
    }
    if (patch.role_id !== undefined && !this.roles.has(patch.role_id)) {
      throw new InvalidReferenceError('role_id', patch.role_id);
    }
    const email = patch.email !== undefined ? normalizeEmail(patch.email) : existing.email;
    const holder = this.findByNormalizedEmail(email);
    if (holder && holder.id !== id) {
      throw new DuplicateEmailError();
    }

    const updated: User = {
      ...existing,
      name: patch.name ?? existing.name,
      email,
      password_hash: patch.password_hash ?? existing.password_hash,
      role_id: patch.role_id ?? existing.role_id,
      updated_at: this.clock(),
    };
    this.users.set(id, updated);
    return { ...updated };
  }

  async deleteUser(id: number): Promise<boolean> {
    return this.users.delete(id);
  }

  async roleExists(roleId: number): Promise<boolean> {
    return this.roles.has(roleId);
  }

  async listRoles(): Promise<Role[]> {
    return [...this.roles.values()].sort((a, b) => a.id - b.id).map((role) => ({ ...role }));
  }

  async createRole(name: string): Promise<Role> {
    for (const role of this.roles.values()) {
      if (role.name === name) {
        throw new DuplicateRoleError(name);
      }
    }
    const role: Role = { id: this.nextRoleId++, name };
    this.roles.set(role.id, role);
    return { ...role };
  }

  async deleteRole(id: number): Promise<boolean> {
    if (!this.roles.has(id)) {
      return false;
    }
    for (const user of this.users.values()) {
      if (user.role_id === id) {
        throw new RoleInUseError(id);
      }
    }
    return this.roles.delete(id);
  }

  private findByNormalizedEmail(email: string): User | undefined {
    for (const user of this.users.values()) {
      if (user.email === email) {
        return user;
      }
    }
    return undefined;
  }
}
