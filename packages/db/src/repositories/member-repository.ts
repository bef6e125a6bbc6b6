import { type PoolClient } from 'pg';
import { type MemberRepository, type MemberRole, type ProjectMember } from '@tenantgate/domain';

interface MemberRow {
  project_id: string;
  user_id: string;
  role: MemberRole;
  created_at: Date;
}

const MEMBER_COLUMNS = 'project_id, user_id, role, created_at';

export class PgMemberRepository implements MemberRepository<PoolClient> {
  async add(
    client: PoolClient,
    member: { projectId: string; userId: string; role: MemberRole },
  ): Promise<ProjectMember | null> {
    const result = await client.query<MemberRow>(
      `INSERT INTO project_members (project_id, user_id, role)
       VALUES ($1, $2, $3)
       ON CONFLICT (project_id, user_id) DO NOTHING
       RETURNING ${MEMBER_COLUMNS}`,
      [member.projectId, member.userId, member.role],
    );
    return result.rows[0] ? mapMemberRow(result.rows[0]) : null;
  }

  async remove(client: PoolClient, projectId: string, userId: string): Promise<boolean> {
    const result = await client.query(
      'DELETE FROM project_members WHERE project_id = $1 AND user_id = $2',
      [projectId, userId],
    );
    return (result.rowCount ?? 0) > 0;
  }

  async findMember(
    client: PoolClient,
    projectId: string,
    userId: string,
  ): Promise<ProjectMember | null> {
    const result = await client.query<MemberRow>(
      `SELECT ${MEMBER_COLUMNS} FROM project_members WHERE project_id = $1 AND user_id = $2`,
      [projectId, userId],
    );
    return result.rows[0] ? mapMemberRow(result.rows[0]) : null;
  }

  async listByProjectId(client: PoolClient, projectId: string): Promise<ProjectMember[]> {
    const result = await client.query<MemberRow>(
      `SELECT ${MEMBER_COLUMNS} FROM project_members
       WHERE project_id = $1
       ORDER BY created_at ASC`,
      [projectId],
    );
    return result.rows.map(mapMemberRow);
  }

  async updateRole(
    client: PoolClient,
    projectId: string,
    userId: string,
    role: MemberRole,
  ): Promise<ProjectMember | null> {
    const result = await client.query<MemberRow>(
      `UPDATE project_members SET role = $3
       WHERE project_id = $1 AND user_id = $2
       RETURNING ${MEMBER_COLUMNS}`,
      [projectId, userId, role],
    );
    return result.rows[0] ? mapMemberRow(result.rows[0]) : null;
  }

  async removeAllForProject(client: PoolClient, projectId: string): Promise<void> {
    await client.query('DELETE FROM project_members WHERE project_id = $1', [projectId]);
  }
}

function mapMemberRow(row: MemberRow): ProjectMember {
  return {
    projectId: row.project_id,
    userId: row.user_id,
    role: row.role,
    createdAt: row.created_at,
  };
}
