import { type PoolClient } from 'pg';
import { type User, type UserRepository, DuplicateEmailError } from '@tenantgate/domain';
import { firstRow, isUniqueViolation } from '../client';

interface UserRow {
  id: string;
  email: string;
  password_hash: string;
  full_name: string | null;
  project_id: string | null;
  is_active: boolean;
  created_at: Date;
  updated_at: Date;
}

const USER_COLUMNS =
  'id, email, password_hash, full_name, project_id, is_active, created_at, updated_at';

export class PgUserRepository implements UserRepository<PoolClient> {
  async create(
    client: PoolClient,
    user: {
      id: string;
      email: string;
      passwordHash: string;
      fullName: string | null;
      projectId: string | null;
    },
  ): Promise<User> {
    try {
      const result = await client.query<UserRow>(
        `INSERT INTO users (id, email, password_hash, full_name, project_id)
         VALUES ($1, $2, $3, $4, $5)
         RETURNING ${USER_COLUMNS}`,
        [user.id, user.email, user.passwordHash, user.fullName, user.projectId],
      );
      return mapUserRow(firstRow(result.rows));
    } catch (err) {
      if (isEmailViolation(err)) throw new DuplicateEmailError();
      throw err;
    }
  }

  async findById(client: PoolClient, id: string): Promise<User | null> {
    const result = await client.query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users WHERE id = $1`,
      [id],
    );
    return result.rows[0] ? mapUserRow(result.rows[0]) : null;
  }

  async findByEmail(client: PoolClient, email: string, projectId: string | null): Promise<User | null> {
    // IS NOT DISTINCT FROM matches NULL = NULL for the platform namespace.
    const result = await client.query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users
       WHERE email = $1 AND project_id IS NOT DISTINCT FROM $2`,
      [email, projectId],
    );
    return result.rows[0] ? mapUserRow(result.rows[0]) : null;
  }

  async update(
    client: PoolClient,
    id: string,
    changes: { email?: string; fullName?: string | null; passwordHash?: string },
  ): Promise<User | null> {
    try {
      const result = await client.query<UserRow>(
        `UPDATE users
         SET email = CASE WHEN $2::boolean THEN $3 ELSE email END,
             full_name = CASE WHEN $4::boolean THEN $5 ELSE full_name END,
             password_hash = COALESCE($6, password_hash),
             updated_at = NOW()
         WHERE id = $1
         RETURNING ${USER_COLUMNS}`,
        [
          id,
          changes.email !== undefined,
          changes.email ?? null,
          changes.fullName !== undefined,
          changes.fullName ?? null,
          changes.passwordHash ?? null,
        ],
      );
      return result.rows[0] ? mapUserRow(result.rows[0]) : null;
    } catch (err) {
      if (isEmailViolation(err)) throw new DuplicateEmailError();
      throw err;
    }
  }
}

function isEmailViolation(err: unknown): boolean {
  return (
    isUniqueViolation(err, 'users_platform_email_key') ||
    isUniqueViolation(err, 'users_project_email_key')
  );
}

function mapUserRow(row: UserRow): User {
  return {
    id: row.id,
    email: row.email,
    passwordHash: row.password_hash,
    fullName: row.full_name,
    projectId: row.project_id,
    isActive: row.is_active,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}
