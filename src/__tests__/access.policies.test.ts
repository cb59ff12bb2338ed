import { describe, it, expect } from 'vitest';
import { DEFAULT_ACCESS_POLICIES } from '../config';
import { resolveAccessPolicies, resolveAccessPolicy } from '../middleware/access.policies';
import { DEFAULT_ROLES } from '../types';
import { ConfigurationError } from '../utils/errors';

describe('resolveAccessPolicies', () => {
  it('turns role id lists into frozen sets', () => {
    const policies = resolveAccessPolicies(DEFAULT_ACCESS_POLICIES, DEFAULT_ROLES);

    expect([...policies.careTeam.allowedRoles]).toEqual([2, 3]);
    expect(policies.authenticated.allowedRoles.size).toBe(0);
    expect(policies.userAdmin.name).toBe('userAdmin');
    expect(Object.isFrozen(policies)).toBe(true);
  });

  it('rejects role ids that do not exist', () => {
    expect(() =>
      resolveAccessPolicies({ ...DEFAULT_ACCESS_POLICIES, careTeam: [2, 9] }, DEFAULT_ROLES)
    ).toThrow(new ConfigurationError("Access policy 'careTeam' references unknown role id 9"));
  });

  it('rejects non-integer role ids', () => {
    expect(() => resolveAccessPolicy('custom', [1.5], DEFAULT_ROLES)).toThrow(ConfigurationError);
  });

  it('accepts roles added after seeding', () => {
    const policy = resolveAccessPolicy('nurses', [4], [...DEFAULT_ROLES, { id: 4, name: 'nurse' }]);

    expect(policy.allowedRoles.has(4)).toBe(true);
  });
});
