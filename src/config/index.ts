/**
 * Application Configuration
 *
 * Everything process-wide (signing key, token lifetime, hashing cost,
 * database, route allow-lists) is read here once at startup and frozen.
 * Nothing reads process.env per request.
 */

import dotenv from 'dotenv';
import { ConfigurationError } from '../utils/errors';
import { SEEDED_ROLES } from '../types';

export const ACCESS_POLICY_NAMES = ['authenticated', 'userAdmin', 'roleAdmin', 'careTeam'] as const;

export type AccessPolicyName = (typeof ACCESS_POLICY_NAMES)[number];

/**
 * Role ids allowed per policy. An empty list admits any authenticated user.
 */
export type AccessPolicyDefinitions = Record<AccessPolicyName, readonly number[]>;

export const DEFAULT_ACCESS_POLICIES: AccessPolicyDefinitions = {
  authenticated: [],
  userAdmin: [SEEDED_ROLES.admin],
  roleAdmin: [SEEDED_ROLES.admin],
  careTeam: [SEEDED_ROLES.doctor, SEEDED_ROLES.patient],
};

export interface DatabaseConfig {
  host: string;
  port: number;
  database: string;
  user: string;
  password?: string;
}

export interface AppConfig {
  port: number;
  nodeEnv: string;
  jwt: {
    secret: string;
    expiresInSeconds: number;
  };
  bcryptRounds: number;
  db: DatabaseConfig;
  corsOrigins: string[];
  accessPolicies: AccessPolicyDefinitions;
}

type Env = Record<string, string | undefined>;

const DEV_JWT_SECRET = 'development-secret-not-for-production';

function readInt(env: Env, key: string, fallback: number, min: number, max: number): number {
  const raw = env[key];
  if (raw === undefined || raw === '') {
    return fallback;
  }
  if (!/^\d+$/.test(raw.trim())) {
    throw new ConfigurationError(`${key} must be an integer, got "${raw}"`);
  }
  const value = Number(raw.trim());
  if (value < min || value > max) {
    throw new ConfigurationError(`${key} must be between ${min} and ${max}, got ${value}`);
  }
  return value;
}

/**
 * `userAdmin` -> `ACCESS_POLICY_USER_ADMIN`
 */
export function policyEnvKey(name: AccessPolicyName): string {
  return `ACCESS_POLICY_${name.replace(/([A-Z])/g, '_$1').toUpperCase()}`;
}

/**
 * Parse a comma-separated role id list, e.g. "2,3". Empty means any role.
 */
export function parseRoleIdList(key: string, raw: string): number[] {
  const parts = raw
    .split(',')
    .map((part) => part.trim())
    .filter((part) => part.length > 0);

  return parts.map((part) => {
    if (!/^\d+$/.test(part) || Number(part) <= 0) {
      throw new ConfigurationError(`${key} contains an invalid role id "${part}"`);
    }
    return Number(part);
  });
}

function readAccessPolicies(env: Env): AccessPolicyDefinitions {
  const policies: AccessPolicyDefinitions = { ...DEFAULT_ACCESS_POLICIES };
  for (const name of ACCESS_POLICY_NAMES) {
    const key = policyEnvKey(name);
    const raw = env[key];
    if (raw !== undefined) {
      policies[name] = parseRoleIdList(key, raw);
    }
  }
  return policies;
}

function readJwtSecret(env: Env, nodeEnv: string): string {
  const secret = env.JWT_SECRET;
  if (secret) {
    return secret;
  }
  if (nodeEnv === 'production') {
    throw new ConfigurationError('JWT_SECRET must be set in production');
  }
  return DEV_JWT_SECRET;
}

/**
 * Build the configuration from an environment map
 */
export function loadConfig(env: Env = process.env): Readonly<AppConfig> {
  const nodeEnv = env.NODE_ENV || 'development';

  const config: AppConfig = {
    port: readInt(env, 'PORT', 3001, 1, 65535),
    nodeEnv,
    jwt: {
      secret: readJwtSecret(env, nodeEnv),
      expiresInSeconds: readInt(env, 'JWT_EXPIRES_IN_SECONDS', 3600, 1, 60 * 60 * 24 * 30),
    },
    // bcryptjs accepts 4-31; above 15 a single login takes seconds
    bcryptRounds: readInt(env, 'BCRYPT_ROUNDS', 12, 4, 15),
    db: {
      host: env.DB_HOST || 'localhost',
      port: readInt(env, 'DB_PORT', 5432, 1, 65535),
      database: env.DB_NAME || 'rbac_accounts',
      user: env.DB_USER || 'postgres',
      password: env.DB_PASSWORD,
    },
    corsOrigins: (env.CORS_ORIGINS || 'http://localhost:5173,http://localhost:3000')
      .split(',')
      .map((origin) => origin.trim())
      .filter((origin) => origin.length > 0),
    accessPolicies: readAccessPolicies(env),
  };

  return Object.freeze(config);
}

/**
 * Load .env into process.env, then read the configuration
 */
export function loadConfigFromEnvironment(): Readonly<AppConfig> {
  dotenv.config();
  return loadConfig(process.env);
}
