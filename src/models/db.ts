/**
 * Database Configuration
 *
 * We use a "connection pool" instead of single connections:
 * connections stay open and are handed out per query, then returned.
 */

import fs from 'fs/promises';
import path from 'path';
import { Pool } from 'pg';
import type { DatabaseConfig } from '../config';
import { logDebug, logInfo, logSystemError } from '../utils/logger.utils';

export const SCHEMA_PATH = path.resolve(__dirname, '../../db/schema.sql');

export interface QueryResult<T> {
  rows: T[];
  rowCount: number;
}

export interface Queryable {
  query<T = unknown>(text: string, params?: unknown[]): Promise<QueryResult<T>>;
}

export class Database implements Queryable {
  private readonly pool: Pool;

  constructor(config: DatabaseConfig) {
    this.pool = new Pool({
      host: config.host,
      port: config.port,
      database: config.database,
      user: config.user,
      password: config.password,

      max: 20, // Maximum connections in pool
      idleTimeoutMillis: 30000, // Close idle connections after 30s
      connectionTimeoutMillis: 2000, // Fail fast when the server is unreachable
    });

    // Idle client errors (server restart, network drop) must not crash the process
    this.pool.on('error', (err) => {
      logSystemError('db.pool_error', 'Unexpected database pool error', err);
    });
  }

  /**
   * Execute a parameterised query
   */
  async query<T = unknown>(text: string, params?: unknown[]): Promise<QueryResult<T>> {
    const start = Date.now();
    const result = await this.pool.query(text, params);
    const duration = Date.now() - start;

    if (duration > 100) {
      logDebug('db.slow_query', 'Slow query', undefined, { text, duration, rows: result.rowCount });
    }

    return { rows: result.rows, rowCount: result.rowCount ?? 0 };
  }

  async testConnection(): Promise<boolean> {
    try {
      await this.query('SELECT NOW()');
      logInfo('db.connected', 'Database connected');
      return true;
    } catch (error) {
      logSystemError('db.connection_failed', 'Database connection failed', error);
      return false;
    }
  }

  /**
   * Create tables and seed roles; idempotent
   */
  async ensureSchema(schemaPath: string = SCHEMA_PATH): Promise<void> {
    const sql = await fs.readFile(schemaPath, 'utf8');
    await this.pool.query(sql);
    logInfo('db.schema_ready', 'Schema applied', undefined, { schemaPath });
  }

  /**
   * Close all pool connections (for graceful shutdown)
   */
  async close(): Promise<void> {
    await this.pool.end();
    logInfo('db.pool_closed', 'Database pool closed');
  }
}
