import { type PoolClient } from 'pg';
import { type RefreshToken, type RefreshTokenRepository } from '@tenantgate/domain';
import { firstRow } from '../client';

interface RefreshTokenRow {
  id: string;
  user_id: string;
  token_hash: string;
  family_id: string;
  expires_at: Date;
  revoked_at: Date | null;
  last_used_at: Date | null;
  created_at: Date;
}

const TOKEN_COLUMNS =
  'id, user_id, token_hash, family_id, expires_at, revoked_at, last_used_at, created_at';

export class PgRefreshTokenRepository implements RefreshTokenRepository<PoolClient> {
  async create(
    client: PoolClient,
    token: { id: string; userId: string; tokenHash: string; familyId: string; expiresAt: Date },
  ): Promise<RefreshToken> {
    const result = await client.query<RefreshTokenRow>(
      `INSERT INTO refresh_tokens (id, user_id, token_hash, family_id, expires_at)
       VALUES ($1, $2, $3, $4, $5)
       RETURNING ${TOKEN_COLUMNS}`,
      [token.id, token.userId, token.tokenHash, token.familyId, token.expiresAt],
    );
    return mapRefreshTokenRow(firstRow(result.rows));
  }

  async findByTokenHash(client: PoolClient, hash: string): Promise<RefreshToken | null> {
    const result = await client.query<RefreshTokenRow>(
      `SELECT ${TOKEN_COLUMNS} FROM refresh_tokens WHERE token_hash = $1`,
      [hash],
    );
    return result.rows[0] ? mapRefreshTokenRow(result.rows[0]) : null;
  }

  async consume(client: PoolClient, id: string, at: Date): Promise<boolean> {
    const result = await client.query(
      `UPDATE refresh_tokens SET revoked_at = $2, last_used_at = $2
       WHERE id = $1 AND revoked_at IS NULL`,
      [id, at],
    );
    return result.rowCount === 1;
  }

  async revoke(client: PoolClient, id: string, at: Date): Promise<void> {
    await client.query(
      'UPDATE refresh_tokens SET revoked_at = $2 WHERE id = $1 AND revoked_at IS NULL',
      [id, at],
    );
  }

  async revokeFamily(client: PoolClient, familyId: string, at: Date): Promise<number> {
    const result = await client.query(
      'UPDATE refresh_tokens SET revoked_at = $2 WHERE family_id = $1 AND revoked_at IS NULL',
      [familyId, at],
    );
    return result.rowCount ?? 0;
  }

  async revokeAllForUser(client: PoolClient, userId: string, at: Date): Promise<number> {
    const result = await client.query(
      'UPDATE refresh_tokens SET revoked_at = $2 WHERE user_id = $1 AND revoked_at IS NULL',
      [userId, at],
    );
    return result.rowCount ?? 0;
  }
}

function mapRefreshTokenRow(row: RefreshTokenRow): RefreshToken {
  return {
    id: row.id,
    userId: row.user_id,
    tokenHash: row.token_hash,
    familyId: row.family_id,
    expiresAt: row.expires_at,
    revokedAt: row.revoked_at,
    lastUsedAt: row.last_used_at,
    createdAt: row.created_at,
  };
}
