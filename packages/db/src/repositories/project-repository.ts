import { type PoolClient } from 'pg';
import {
  type Project,
  type ProjectRepository,
  type ProjectRole,
  type ProjectSummary,
} from '@tenantgate/domain';
import { firstRow } from '../client';

interface ProjectRow {
  id: string;
  name: string;
  description: string | null;
  owner_id: string;
  is_active: boolean;
  created_at: Date;
  updated_at: Date;
  deleted_at: Date | null;
}

interface ProjectSummaryRow {
  id: string;
  name: string;
  description: string | null;
  role: ProjectRole;
}

const PROJECT_COLUMNS =
  'id, name, description, owner_id, is_active, created_at, updated_at, deleted_at';

export class PgProjectRepository implements ProjectRepository<PoolClient> {
  async create(
    client: PoolClient,
    project: { id: string; name: string; description: string | null; ownerId: string },
  ): Promise<Project> {
    const result = await client.query<ProjectRow>(
      `INSERT INTO projects (id, name, description, owner_id)
       VALUES ($1, $2, $3, $4)
       RETURNING ${PROJECT_COLUMNS}`,
      [project.id, project.name, project.description, project.ownerId],
    );
    return mapProjectRow(firstRow(result.rows));
  }

  async findById(client: PoolClient, id: string): Promise<Project | null> {
    const result = await client.query<ProjectRow>(
      `SELECT ${PROJECT_COLUMNS} FROM projects WHERE id = $1 AND deleted_at IS NULL`,
      [id],
    );
    return result.rows[0] ? mapProjectRow(result.rows[0]) : null;
  }

  async update(
    client: PoolClient,
    id: string,
    changes: { name?: string; description?: string | null },
  ): Promise<Project | null> {
    const result = await client.query<ProjectRow>(
      `UPDATE projects
       SET name = COALESCE($2, name),
           description = CASE WHEN $3::boolean THEN $4 ELSE description END,
           updated_at = NOW()
       WHERE id = $1 AND deleted_at IS NULL
       RETURNING ${PROJECT_COLUMNS}`,
      [id, changes.name ?? null, changes.description !== undefined, changes.description ?? null],
    );
    return result.rows[0] ? mapProjectRow(result.rows[0]) : null;
  }

  async softDelete(client: PoolClient, id: string, at: Date): Promise<void> {
    await client.query(
      `UPDATE projects SET deleted_at = $2, is_active = FALSE, updated_at = $2
       WHERE id = $1 AND deleted_at IS NULL`,
      [id, at],
    );
  }

  async listForUser(client: PoolClient, userId: string): Promise<ProjectSummary[]> {
    const result = await client.query<ProjectSummaryRow>(
      `SELECT id, name, description, role FROM (
         SELECT p.id, p.name, p.description, 'OWNER' AS role, p.created_at
         FROM projects p
         WHERE p.owner_id = $1 AND p.deleted_at IS NULL
         UNION ALL
         SELECT p.id, p.name, p.description, m.role, p.created_at
         FROM projects p
         JOIN project_members m ON m.project_id = p.id
         WHERE m.user_id = $1 AND p.owner_id <> $1 AND p.deleted_at IS NULL
       ) visible
       ORDER BY created_at ASC`,
      [userId],
    );
    return result.rows.map((row) => ({
      id: row.id,
      name: row.name,
      description: row.description,
      role: row.role,
    }));
  }
}

function mapProjectRow(row: ProjectRow): Project {
  return {
    id: row.id,
    name: row.name,
    description: row.description,
    ownerId: row.owner_id,
    isActive: row.is_active,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    deletedAt: row.deleted_at,
  };
}
