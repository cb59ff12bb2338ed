/**
 * Route access policies, resolved once at startup.
 * Role ids that do not exist fail here instead of on a request.
 */

import type { AccessPolicyDefinitions, AccessPolicyName } from '../config';
import type { Role } from '../types';
import { ConfigurationError } from '../utils/errors';
import type { AccessPolicy } from './access.pipeline';

export type AccessPolicies = Readonly<Record<AccessPolicyName, AccessPolicy>>;

export function resolveAccessPolicy(name: string, roleIds: readonly number[], roles: readonly Role[]): AccessPolicy {
  const known = new Set(roles.map((role) => role.id));
  for (const roleId of roleIds) {
    if (!Number.isSafeInteger(roleId) || roleId <= 0) {
      throw new ConfigurationError(`Access policy '${name}' has an invalid role id ${roleId}`);
    }
    if (!known.has(roleId)) {
      throw new ConfigurationError(`Access policy '${name}' references unknown role id ${roleId}`);
    }
  }
  return Object.freeze({ name, allowedRoles: new Set(roleIds) });
}

export function resolveAccessPolicies(definitions: AccessPolicyDefinitions, roles: readonly Role[]): AccessPolicies {
  const resolve = (name: AccessPolicyName) => resolveAccessPolicy(name, definitions[name], roles);
  return Object.freeze({
    authenticated: resolve('authenticated'),
    userAdmin: resolve('userAdmin'),
    roleAdmin: resolve('roleAdmin'),
    careTeam: resolve('careTeam'),
  });
}
