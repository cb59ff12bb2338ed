/**
 * Role Service
 *
 * Roles are reference data. Seeded roles and roles named by an access
 * policy back the route gating and cannot be removed; any other role can
 * be removed once no user holds it.
 */

import type { AccessPolicy } from '../middleware/access.pipeline';
import type { CredentialStore } from '../models/credential-store';
import type { Role } from '../types';
import { DEFAULT_ROLES } from '../types';
import { ForbiddenError, NotFoundError } from '../utils/errors';
import { parseRoleName } from '../utils/validation.utils';

export class RoleService {
  constructor(
    private readonly store: CredentialStore,
    private readonly policies: readonly AccessPolicy[] = []
  ) {}

  async list(): Promise<Role[]> {
    return this.store.listRoles();
  }

  /**
   * @throws ValidationError
   * @throws DuplicateRoleError
   */
  async create(name: unknown): Promise<Role> {
    return this.store.createRole(parseRoleName(name));
  }

  /**
   * @throws ForbiddenError seeded role, or one an access policy lists
   * @throws RoleInUseError
   * @throws NotFoundError
   */
  async delete(id: number): Promise<void> {
    if (DEFAULT_ROLES.some((role) => role.id === id)) {
      throw new ForbiddenError('Seeded roles cannot be deleted.');
    }
    const policy = this.policies.find((candidate) => candidate.allowedRoles.has(id));
    if (policy) {
      throw new ForbiddenError(`Role ${id} is used by access policy '${policy.name}'.`);
    }
    const deleted = await this.store.deleteRole(id);
    if (!deleted) {
      throw new NotFoundError('Role', id);
    }
  }
}
