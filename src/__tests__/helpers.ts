import { DEFAULT_ACCESS_POLICIES } from '../config';
import { resolveAccessPolicies, type AccessPolicies } from '../middleware/access.policies';
import { InMemoryCredentialStore } from '../models/memory.store';
import { TokenCodec } from '../services/token.service';
import { DEFAULT_ROLES } from '../types';
import { BcryptPasswordHasher } from '../utils/hash.utils';

export const TEST_SECRET = 'test-secret';
export const TEST_TTL_SECONDS = 3600;

export interface TestFixture {
  store: InMemoryCredentialStore;
  hasher: BcryptPasswordHasher;
  tokens: TokenCodec;
  policies: AccessPolicies;
}

export function createFixture(): TestFixture {
  return {
    store: new InMemoryCredentialStore(),
    // Lowest cost bcryptjs accepts, keeps tests fast
    hasher: new BcryptPasswordHasher(4),
    tokens: new TokenCodec({ secret: TEST_SECRET, expiresInSeconds: TEST_TTL_SECONDS }),
    policies: resolveAccessPolicies(DEFAULT_ACCESS_POLICIES, DEFAULT_ROLES),
  };
}
