import { type PoolClient } from 'pg';
import { type ApiKeyRepository, type ProjectApiKey } from '@tenantgate/domain';
import { firstRow } from '../client';

interface ApiKeyRow {
  id: string;
  project_id: string;
  key: string;
  name: string;
  is_active: boolean;
  last_used_at: Date | null;
  created_at: Date;
}

const API_KEY_COLUMNS = 'id, project_id, key, name, is_active, last_used_at, created_at';

export class PgApiKeyRepository implements ApiKeyRepository<PoolClient> {
  async create(
    client: PoolClient,
    apiKey: { id: string; projectId: string; key: string; name: string },
  ): Promise<ProjectApiKey> {
    const result = await client.query<ApiKeyRow>(
      `INSERT INTO project_api_keys (id, project_id, key, name)
       VALUES ($1, $2, $3, $4)
       RETURNING ${API_KEY_COLUMNS}`,
      [apiKey.id, apiKey.projectId, apiKey.key, apiKey.name],
    );
    return mapApiKeyRow(firstRow(result.rows));
  }

  async findByKey(client: PoolClient, key: string): Promise<ProjectApiKey | null> {
    const result = await client.query<ApiKeyRow>(
      `SELECT ${API_KEY_COLUMNS} FROM project_api_keys WHERE key = $1`,
      [key],
    );
    return result.rows[0] ? mapApiKeyRow(result.rows[0]) : null;
  }

  async findById(client: PoolClient, projectId: string, id: string): Promise<ProjectApiKey | null> {
    const result = await client.query<ApiKeyRow>(
      `SELECT ${API_KEY_COLUMNS} FROM project_api_keys WHERE id = $1 AND project_id = $2`,
      [id, projectId],
    );
    return result.rows[0] ? mapApiKeyRow(result.rows[0]) : null;
  }

  async listByProjectId(
    client: PoolClient,
    projectId: string,
    includeInactive: boolean,
  ): Promise<ProjectApiKey[]> {
    const result = await client.query<ApiKeyRow>(
      `SELECT ${API_KEY_COLUMNS} FROM project_api_keys
       WHERE project_id = $1 AND ($2::boolean OR is_active)
       ORDER BY created_at ASC`,
      [projectId, includeInactive],
    );
    return result.rows.map(mapApiKeyRow);
  }

  async deactivate(client: PoolClient, id: string): Promise<void> {
    await client.query('UPDATE project_api_keys SET is_active = FALSE WHERE id = $1', [id]);
  }

  async deactivateAllForProject(client: PoolClient, projectId: string): Promise<void> {
    await client.query(
      'UPDATE project_api_keys SET is_active = FALSE WHERE project_id = $1 AND is_active',
      [projectId],
    );
  }

  async touchLastUsed(client: PoolClient, id: string, at: Date): Promise<void> {
    await client.query('UPDATE project_api_keys SET last_used_at = $2 WHERE id = $1', [id, at]);
  }
}

function mapApiKeyRow(row: ApiKeyRow): ProjectApiKey {
  return {
    id: row.id,
    projectId: row.project_id,
    key: row.key,
    name: row.name,
    isActive: row.is_active,
    lastUsedAt: row.last_used_at,
    createdAt: row.created_at,
  };
}
