/**
 * User Service
 *
 * Administrative CRUD over user records. Every route in front of it is
 * gated by the access middleware. Field rules are the registration rules;
 * role references and email uniqueness are left to the store.
 */

import type { CredentialStore } from '../models/credential-store';
import type { CreateUserRequest, UpdateUserRequest, UserFilter, UserPublic, UserRecordPatch } from '../types';
import { SEEDED_ROLES, toUserPublic } from '../types';
import { NotFoundError } from '../utils/errors';
import type { PasswordHasher } from '../utils/hash.utils';
import { parseCreateUser, parseUserUpdate } from '../utils/validation.utils';
import type { Untrusted } from '../utils/validation.utils';

export class UserService {
  constructor(
    private readonly store: CredentialStore,
    private readonly hasher: PasswordHasher
  ) {}

  async list(filter: UserFilter = {}): Promise<UserPublic[]> {
    const users = await this.store.listUsers(filter);
    return users.map(toUserPublic);
  }

  async listDoctors(): Promise<UserPublic[]> {
    return this.list({ roleId: SEEDED_ROLES.doctor });
  }

  async get(id: number): Promise<UserPublic> {
    const user = await this.store.findUserById(id);
    if (!user) {
      throw new NotFoundError('User', id);
    }
    return toUserPublic(user);
  }

  /**
   * @throws ValidationError
   * @throws DuplicateEmailError
   * @throws InvalidReferenceError unknown role_id
   */
  async create(input: Untrusted<CreateUserRequest>): Promise<UserPublic> {
    const request = parseCreateUser(input);
    const user = await this.store.createUser({
      name: request.name,
      email: request.email,
      password_hash: await this.hasher.hash(request.password),
      role_id: request.role_id,
    });
    return toUserPublic(user);
  }

  /**
   * Only supplied fields are validated and written.
   * @throws NotFoundError
   */
  async update(id: number, input: Untrusted<UpdateUserRequest>): Promise<UserPublic> {
    const request = parseUserUpdate(input);

    const patch: UserRecordPatch = {
      name: request.name,
      email: request.email,
      role_id: request.role_id,
    };
    if (request.password !== undefined) {
      patch.password_hash = await this.hasher.hash(request.password);
    }

    const user = await this.store.updateUser(id, patch);
    if (!user) {
      throw new NotFoundError('User', id);
    }
    return toUserPublic(user);
  }

  /**
   * Hard delete. A second delete of the same id is NotFound.
   */
  async delete(id: number): Promise<void> {
    const deleted = await this.store.deleteUser(id);
    if (!deleted) {
      throw new NotFoundError('User', id);
    }
  }
}
