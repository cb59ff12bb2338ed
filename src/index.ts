/**
 * Accounts API server
 *
 * Entry point: load configuration, connect to PostgreSQL, apply the
 * schema, resolve route policies against the stored roles, then listen.
 */

import type { Server } from 'http';
import { createApp } from './app';
import { loadConfigFromEnvironment } from './config';
import { resolveAccessPolicies } from './middleware/access.policies';
import { Database } from './models/db';
import { PgCredentialStore } from './models/user.model';
import { TokenCodec } from './services/token.service';
import { BcryptPasswordHasher } from './utils/hash.utils';
import { logInfo, logSystemError } from './utils/logger.utils';

async function startServer(): Promise<void> {
  const config = loadConfigFromEnvironment();
  const db = new Database(config.db);

  if (!(await db.testConnection())) {
    logSystemError('server.startup_failed', 'Failed to connect to database. Exiting...');
    process.exit(1);
  }
  await db.ensureSchema();

  const store = new PgCredentialStore(db);

  // Unknown role ids in ACCESS_POLICY_* fail here, not per request
  const policies = resolveAccessPolicies(config.accessPolicies, await store.listRoles());

  const app = createApp({
    config,
    store,
    hasher: new BcryptPasswordHasher(config.bcryptRounds),
    tokens: new TokenCodec({ secret: config.jwt.secret, expiresInSeconds: config.jwt.expiresInSeconds }),
    policies,
  });

  const server: Server = app.listen(config.port, () => {
    logInfo('server.started', `Server running on http://localhost:${config.port}`, undefined, {
      environment: config.nodeEnv,
    });
  });

  // ======================
  // GRACEFUL SHUTDOWN
  // ======================

  const shutdown = async (signal: string) => {
    logInfo('server.shutdown', `${signal} received. Shutting down gracefully...`);
    server.close();
    try {
      await db.close();
      process.exit(0);
    } catch (error) {
      logSystemError('server.shutdown_failed', 'Error while closing the database pool', error);
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));
}

startServer().catch((error: unknown) => {
  logSystemError('server.startup_failed', 'Server failed to start', error);
  process.exit(1);
});
