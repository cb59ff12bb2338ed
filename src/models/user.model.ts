/**
 * PostgreSQL Credential Store
 *
 * Models are the ONLY place we write SQL queries, always parameterised
 * ($1, $2, ...), never by concatenating input into the SQL text.
 *
 * Email uniqueness and role references are enforced by the schema
 * (UNIQUE on users.email, users.role_id REFERENCES roles ON DELETE
 * RESTRICT). Constraint violations are mapped to domain errors here, so
 * concurrent writers are serialised by the database, not by us.
 */

import type { NewUserRecord, Role, User, UserFilter, UserRecordPatch } from '../types';
import { DuplicateEmailError, DuplicateRoleError, InvalidReferenceError, RoleInUseError } from '../utils/errors';
import { normalizeEmail } from '../utils/validation.utils';
import type { CredentialStore } from './credential-store';
import type { Queryable } from './db';

const UNIQUE_VIOLATION = '23505';
const FOREIGN_KEY_VIOLATION = '23503';

const USER_COLUMNS = 'id, name, email, password_hash, role_id, created_at, updated_at';

function pgErrorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export class PgCredentialStore implements CredentialStore {
  constructor(private readonly db: Queryable) {}

  async findUserById(id: number): Promise<User | null> {
    const sql = `SELECT ${USER_COLUMNS} FROM users WHERE id = $1`;
    const result = await this.db.query<User>(sql, [id]);
    return result.rows[0] ?? null;
  }

  async findUserByEmail(email: string): Promise<User | null> {
    const sql = `SELECT ${USER_COLUMNS} FROM users WHERE email = $1`;
    const result = await this.db.query<User>(sql, [normalizeEmail(email)]);
    return result.rows[0] ?? null;
  }

  async listUsers(filter: UserFilter = {}): Promise<User[]> {
    if (filter.roleId !== undefined) {
      const sql = `SELECT ${USER_COLUMNS} FROM users WHERE role_id = $1 ORDER BY id`;
      return (await this.db.query<User>(sql, [filter.roleId])).rows;
    }
    const sql = `SELECT ${USER_COLUMNS} FROM users ORDER BY id`;
    return (await this.db.query<User>(sql)).rows;
  }

  async createUser(fields: NewUserRecord): Promise<User> {
    const sql = `
      INSERT INTO users (name, email, password_hash, role_id)
      VALUES ($1, $2, $3, $4)
      RETURNING ${USER_COLUMNS}
    `;
    const params = [fields.name, normalizeEmail(fields.email), fields.password_hash, fields.role_id];

    try {
      const result = await this.db.query<User>(sql, params);
      return result.rows[0];
    } catch (error) {
      throw this.mapUserWriteError(error, fields.role_id);
    }
  }

  async updateUser(id: number, patch: UserRecordPatch): Promise<User | null> {
    const assignments: string[] = [];
    const params: unknown[] = [];

    const assign = (column: string, value: unknown) => {
      params.push(value);
      assignments.push(`${column} = $${params.length}`);
    };

    if (patch.name !== undefined) assign('name', patch.name);
    if (patch.email !== undefined) assign('email', normalizeEmail(patch.email));
    if (patch.password_hash !== undefined) assign('password_hash', patch.password_hash);
    if (patch.role_id !== undefined) assign('role_id', patch.role_id);
    assignments.push('updated_at = CURRENT_TIMESTAMP');

    params.push(id);
    const sql = `
      UPDATE users SET ${assignments.join(', ')}
      WHERE id = $${params.length}
      RETURNING ${USER_COLUMNS}
    `;

    try {
      const result = await this.db.query<User>(sql, params);
      return result.rows[0] ?? null;
    } catch (error) {
      throw this.mapUserWriteError(error, patch.role_id);
    }
  }

  async deleteUser(id: number): Promise<boolean> {
    const result = await this.db.query('DELETE FROM users WHERE id = $1', [id]);
    return result.rowCount > 0;
  }

  async roleExists(roleId: number): Promise<boolean> {
    const result = await this.db.query('SELECT 1 FROM roles WHERE id = $1', [roleId]);
    return result.rowCount > 0;
  }

  async listRoles(): Promise<Role[]> {
    const result = await this.db.query<Role>('SELECT id, name FROM roles ORDER BY id');
    return result.rows;
  }

  async createRole(name: string): Promise<Role> {
    try {
      const result = await this.db.query<Role>('INSERT INTO roles (name) VALUES ($1) RETURNING id, name', [name]);
      return result.rows[0];
    } catch (error) {
      if (pgErrorCode(error) === UNIQUE_VIOLATION) {
        throw new DuplicateRoleError(name);
      }
      throw error;
    }
  }

  async deleteRole(id: number): Promise<boolean> {
    try {
      const result = await this.db.query('DELETE FROM roles WHERE id = $1', [id]);
      return result.rowCount > 0;
    } catch (error) {
      if (pgErrorCode(error) === FOREIGN_KEY_VIOLATION) {
        throw new RoleInUseError(id);
      }
      throw error;
    }
  }

  private mapUserWriteError(error: unknown, roleId: number | undefined): unknown {
    const code = pgErrorCode(error);
    if (code === UNIQUE_VIOLATION) {
      return new DuplicateEmailError();
    }
    if (code === FOREIGN_KEY_VIOLATION && roleId !== undefined) {
      return new InvalidReferenceError('role_id', roleId);
    }
    return error;
  }
}
