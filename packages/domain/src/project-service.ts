import {
  type Project,
  type ProjectApiKey,
  type ProjectMember,
  type ProjectMemberView,
  type ProjectRole,
  type ProjectSummary,
  type MemberRole,
} from './project';
import {
  type ProjectRepository,
  type ApiKeyRepository,
  type MemberRepository,
  type UserRepository,
  type TokenService,
  type Clock,
  type WithTransaction,
} from './ports';
import {
  resolveProjectRole,
  canViewProject,
  canListMembers,
  canManageProject,
  canManageApiKeys,
  canManageMembers,
  isOwnerTarget,
} from './permissions';

export interface ProjectServiceDeps<Tx> {
  projectRepo: ProjectRepository<Tx>;
  apiKeyRepo: ApiKeyRepository<Tx>;
  memberRepo: MemberRepository<Tx>;
  userRepo: UserRepository<Tx>;
  tokenService: TokenService;
  generateId: () => string;
  withTransaction: WithTransaction<Tx>;
  now: Clock;
}

export const DEFAULT_API_KEY_NAME = 'Default';

interface ProjectAccess {
  project: Project;
  role: ProjectRole;
}

/**
 * Project, API-key and membership management for platform users.
 *
 * Every call re-derives the caller's role from the current rows. Outsiders get
 * NOT_FOUND so a project's existence is never confirmed to them; insiders without
 * the required role get FORBIDDEN.
 */
export class ProjectService<Tx = unknown> {
  constructor(private readonly deps: ProjectServiceDeps<Tx>) {}

  async createProject(
    ownerId: string,
    input: { name: string; description?: string | null },
  ): Promise<{ project: Project; apiKey: ProjectApiKey }> {
    const { projectRepo, apiKeyRepo, tokenService, generateId, now } = this.deps;

    return this.deps.withTransaction(async (tx) => {
      const project = await projectRepo.create(tx, {
        id: generateId(),
        name: input.name,
        description: input.description ?? null,
        ownerId,
      });

      const apiKey = await apiKeyRepo.create(tx, {
        id: generateId(),
        projectId: project.id,
        key: tokenService.generateApiKey(now()),
        name: DEFAULT_API_KEY_NAME,
      });

      return { project, apiKey };
    });
  }

  async listProjects(userId: string): Promise<ProjectSummary[]> {
    return this.deps.withTransaction((tx) => this.deps.projectRepo.listForUser(tx, userId));
  }

  async getProject(userId: string, projectId: string): Promise<ProjectAccess> {
    return this.deps.withTransaction(async (tx) => {
      const access = await this.access(tx, userId, projectId);
      if (!canViewProject(access.role)) {
        throw new ProjectError('FORBIDDEN', 'Not permitted to view this project');
      }
      return access;
    });
  }

  async updateProject(
    userId: string,
    projectId: string,
    changes: { name?: string; description?: string | null },
  ): Promise<Project> {
    return this.deps.withTransaction(async (tx) => {
      const { role } = await this.access(tx, userId, projectId);
      if (!canManageProject(role)) {
        throw new ProjectError('FORBIDDEN', 'Only the project owner can update the project');
      }

      const updated = await this.deps.projectRepo.update(tx, projectId, changes);
      if (!updated) {
        throw new ProjectError('NOT_FOUND', 'Project not found');
      }
      return updated;
    });
  }

  /** Soft delete. Keys are deactivated and member rows removed in the same transaction. */
  async deleteProject(userId: string, projectId: string): Promise<void> {
    const { projectRepo, apiKeyRepo, memberRepo, now } = this.deps;

    return this.deps.withTransaction(async (tx) => {
      const { role } = await this.access(tx, userId, projectId);
      if (!canManageProject(role)) {
        throw new ProjectError('FORBIDDEN', 'Only the project owner can delete the project');
      }

      await projectRepo.softDelete(tx, projectId, now());
      await apiKeyRepo.deactivateAllForProject(tx, projectId);
      await memberRepo.removeAllForProject(tx, projectId);
    });
  }

  async createApiKey(userId: string, projectId: string, name: string): Promise<ProjectApiKey> {
    const { apiKeyRepo, tokenService, generateId, now } = this.deps;

    return this.deps.withTransaction(async (tx) => {
      const { role } = await this.access(tx, userId, projectId);
      if (!canManageApiKeys(role)) {
        throw new ProjectError('FORBIDDEN', 'Only the project owner can manage API keys');
      }

      return apiKeyRepo.create(tx, {
        id: generateId(),
        projectId,
        key: tokenService.generateApiKey(now()),
        name,
      });
    });
  }

  async listApiKeys(
    userId: string,
    projectId: string,
    includeInactive = false,
  ): Promise<ProjectApiKey[]> {
    return this.deps.withTransaction(async (tx) => {
      const { role } = await this.access(tx, userId, projectId);
      if (!canManageApiKeys(role)) {
        throw new ProjectError('FORBIDDEN', 'Only the project owner can manage API keys');
      }
      return this.deps.apiKeyRepo.listByProjectId(tx, projectId, includeInactive);
    });
  }

  /**
   * Forward-only: blocks new logins and registrations through the key, leaves sessions
   * already issued under it untouched.
   */
  async deactivateApiKey(userId: string, projectId: string, keyId: string): Promise<void> {
    const { apiKeyRepo } = this.deps;

    return this.deps.withTransaction(async (tx) => {
      const { role } = await this.access(tx, userId, projectId);
      if (!canManageApiKeys(role)) {
        throw new ProjectError('FORBIDDEN', 'Only the project owner can manage API keys');
      }

      const apiKey = await apiKeyRepo.findById(tx, projectId, keyId);
      if (!apiKey) {
        throw new ProjectError('NOT_FOUND', 'API key not found');
      }
      if (apiKey.isActive) {
        await apiKeyRepo.deactivate(tx, apiKey.id);
      }
    });
  }

  async addMember(
    userId: string,
    projectId: string,
    input: { userId: string; role: MemberRole },
  ): Promise<ProjectMember> {
    const { memberRepo, userRepo } = this.deps;

    return this.deps.withTransaction(async (tx) => {
      const { project, role } = await this.access(tx, userId, projectId);
      if (isOwnerTarget(project, input.userId)) {
        throw new ProjectError('FORBIDDEN', 'The project owner cannot be modified as a member');
      }
      if (!canManageMembers(role)) {
        throw new ProjectError('FORBIDDEN', 'Only the project owner can manage members');
      }

      const target = await userRepo.findById(tx, input.userId);
      if (!target || target.projectId !== null || !target.isActive) {
        throw new ProjectError('NOT_FOUND', 'User not found');
      }

      const member = await memberRepo.add(tx, { projectId, userId: input.userId, role: input.role });
      if (!member) {
        throw new ProjectError('CONFLICT', 'User is already a member of this project');
      }
      return member;
    });
  }

  /** The owner is listed first with its implicit OWNER role. */
  async listMembers(userId: string, projectId: string): Promise<ProjectMemberView[]> {
    return this.deps.withTransaction(async (tx) => {
      const { project, role } = await this.access(tx, userId, projectId);
      if (!canListMembers(role)) {
        throw new ProjectError('FORBIDDEN', 'Not permitted to list members of this project');
      }

      const members = await this.deps.memberRepo.listByProjectId(tx, projectId);
      const owner: ProjectMemberView = {
        projectId,
        userId: project.ownerId,
        role: 'OWNER',
        createdAt: project.createdAt,
      };
      return [owner, ...members.filter((m) => m.userId !== project.ownerId)];
    });
  }

  async removeMember(userId: string, projectId: string, targetUserId: string): Promise<void> {
    return this.deps.withTransaction(async (tx) => {
      const { project, role } = await this.access(tx, userId, projectId);
      if (isOwnerTarget(project, targetUserId)) {
        throw new ProjectError('FORBIDDEN', 'The project owner cannot be removed');
      }
      if (!canManageMembers(role)) {
        throw new ProjectError('FORBIDDEN', 'Only the project owner can manage members');
      }

      const removed = await this.deps.memberRepo.remove(tx, projectId, targetUserId);
      if (!removed) {
        throw new ProjectError('NOT_FOUND', 'Member not found in project');
      }
    });
  }

  async updateMemberRole(
    userId: string,
    projectId: string,
    targetUserId: string,
    newRole: MemberRole,
  ): Promise<ProjectMember> {
    return this.deps.withTransaction(async (tx) => {
      const { project, role } = await this.access(tx, userId, projectId);
      if (isOwnerTarget(project, targetUserId)) {
        throw new ProjectError('FORBIDDEN', "The project owner's role cannot be changed");
      }
      if (!canManageMembers(role)) {
        throw new ProjectError('FORBIDDEN', 'Only the project owner can manage members');
      }

      const updated = await this.deps.memberRepo.updateRole(tx, projectId, targetUserId, newRole);
      if (!updated) {
        throw new ProjectError('NOT_FOUND', 'Member not found in project');
      }
      return updated;
    });
  }

  private async access(tx: Tx, userId: string, projectId: string): Promise<ProjectAccess> {
    const project = await this.deps.projectRepo.findById(tx, projectId);
    if (!project) {
      throw new ProjectError('NOT_FOUND', 'Project not found');
    }

    const member =
      project.ownerId === userId ? null : await this.deps.memberRepo.findMember(tx, projectId, userId);
    const role = resolveProjectRole(project, userId, member);
    if (!role) {
      throw new ProjectError('NOT_FOUND', 'Project not found');
    }
    return { project, role };
  }
}

export class ProjectError extends Error {
  constructor(
    public readonly kind: 'VALIDATION' | 'NOT_FOUND' | 'CONFLICT' | 'FORBIDDEN',
    message: string,
  ) {
    super(message);
    this.name = 'ProjectError';
  }
}
