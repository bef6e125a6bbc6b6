import { type User, type RefreshToken } from '../user';
import {
  type Project,
  type ProjectApiKey,
  type ProjectMember,
  type ProjectSummary,
  type MemberRole,
} from '../project';
import {
  type UserRepository,
  type RefreshTokenRepository,
  type ProjectRepository,
  type ApiKeyRepository,
  type MemberRepository,
  type Clock,
  type Repositories,
  type WithTransaction,
} from '../ports';
import { DuplicateEmailError } from '../auth';

interface StoreData {
  users: Map<string, User>;
  refreshTokens: Map<string, RefreshToken>;
  projects: Map<string, Project>;
  apiKeys: Map<string, ProjectApiKey>;
  /** Keyed by `${projectId}/${userId}`. */
  members: Map<string, ProjectMember>;
}

function emptyData(): StoreData {
  return {
    users: new Map(),
    refreshTokens: new Map(),
    projects: new Map(),
    apiKeys: new Map(),
    members: new Map(),
  };
}

const memberKey = (projectId: string, userId: string) => `${projectId}/${userId}`;

/**
 * Process-local stand-in for the Postgres repositories. A transaction snapshots the
 * whole store and restores it when the callback throws.
 */
export class InMemoryStore {
  data: StoreData = emptyData();

  readonly users: InMemoryUserRepository;
  readonly refreshTokens: InMemoryRefreshTokenRepository;
  readonly projects: InMemoryProjectRepository;
  readonly apiKeys: InMemoryApiKeyRepository;
  readonly members: InMemoryMemberRepository;

  constructor(readonly now: Clock = () => new Date()) {
    this.users = new InMemoryUserRepository(this);
    this.refreshTokens = new InMemoryRefreshTokenRepository(this);
    this.projects = new InMemoryProjectRepository(this);
    this.apiKeys = new InMemoryApiKeyRepository(this);
    this.members = new InMemoryMemberRepository(this);
  }

  withTransaction: WithTransaction<unknown> = async (fn) => {
    const snapshot = structuredClone(this.data);
    try {
      return await fn({});
    } catch (err) {
      this.data = snapshot;
      throw err;
    }
  };

  repositories(): Repositories<unknown> {
    return {
      userRepo: this.users,
      refreshTokenRepo: this.refreshTokens,
      projectRepo: this.projects,
      apiKeyRepo: this.apiKeys,
      memberRepo: this.members,
      withTransaction: this.withTransaction,
    };
  }
}

export class InMemoryUserRepository implements UserRepository<unknown> {
  constructor(private readonly store: InMemoryStore) {}

  async create(
    _tx: unknown,
    input: {
      id: string;
      email: string;
      passwordHash: string;
      fullName: string | null;
      projectId: string | null;
    },
  ): Promise<User> {
    if (this.emailTaken(input.email, input.projectId, null)) {
      throw new DuplicateEmailError();
    }
    const now = this.store.now();
    const user: User = { ...input, isActive: true, createdAt: now, updatedAt: now };
    this.store.data.users.set(user.id, user);
    return { ...user };
  }

  async findById(_tx: unknown, id: string): Promise<User | null> {
    const user = this.store.data.users.get(id);
    return user ? { ...user } : null;
  }

  async findByEmail(_tx: unknown, email: string, projectId: string | null): Promise<User | null> {
    for (const user of this.store.data.users.values()) {
      if (user.email === email && user.projectId === projectId) return { ...user };
    }
    return null;
  }

  async update(
    _tx: unknown,
    id: string,
    changes: { email?: string; fullName?: string | null; passwordHash?: string },
  ): Promise<User | null> {
    const user = this.store.data.users.get(id);
    if (!user) return null;
    if (changes.email !== undefined && this.emailTaken(changes.email, user.projectId, id)) {
      throw new DuplicateEmailError();
    }
    const updated: User = { ...user, ...changes, updatedAt: this.store.now() };
    this.store.data.users.set(id, updated);
    return { ...updated };
  }

  /** Test helper mirroring an operator disabling an account. */
  setActive(id: string, isActive: boolean): void {
    const user = this.store.data.users.get(id);
    if (user) this.store.data.users.set(id, { ...user, isActive });
  }

  private emailTaken(email: string, projectId: string | null, exceptId: string | null): boolean {
    for (const user of this.store.data.users.values()) {
      if (user.id !== exceptId && user.email === email && user.projectId === projectId) {
        return true;
      }
    }
    return false;
  }
}

export class InMemoryRefreshTokenRepository implements RefreshTokenRepository<unknown> {
  constructor(private readonly store: InMemoryStore) {}

  async create(
    _tx: unknown,
    input: { id: string; userId: string; tokenHash: string; familyId: string; expiresAt: Date },
  ): Promise<RefreshToken> {
    const token: RefreshToken = {
      ...input,
      revokedAt: null,
      lastUsedAt: null,
      createdAt: this.store.now(),
    };
    this.store.data.refreshTokens.set(token.id, token);
    return { ...token };
  }

  async findByTokenHash(_tx: unknown, hash: string): Promise<RefreshToken | null> {
    for (const token of this.store.data.refreshTokens.values()) {
      if (token.tokenHash === hash) return { ...token };
    }
    return null;
  }

  async consume(_tx: unknown, id: string, at: Date): Promise<boolean> {
    const token = this.store.data.refreshTokens.get(id);
    if (!token || token.revokedAt) return false;
    this.store.data.refreshTokens.set(id, { ...token, revokedAt: at, lastUsedAt: at });
    return true;
  }

  async revoke(_tx: unknown, id: string, at: Date): Promise<void> {
    const token = this.store.data.refreshTokens.get(id);
    if (token && !token.revokedAt) {
      this.store.data.refreshTokens.set(id, { ...token, revokedAt: at });
    }
  }

  async revokeFamily(_tx: unknown, familyId: string, at: Date): Promise<number> {
    return this.revokeWhere((token) => token.familyId === familyId, at);
  }

  async revokeAllForUser(_tx: unknown, userId: string, at: Date): Promise<number> {
    return this.revokeWhere((token) => token.userId === userId, at);
  }

  /** Every stored row for a user, for assertions. */
  listForUser(userId: string): RefreshToken[] {
    return [...this.store.data.refreshTokens.values()].filter((t) => t.userId === userId);
  }

  private revokeWhere(match: (token: RefreshToken) => boolean, at: Date): number {
    let count = 0;
    for (const token of this.store.data.refreshTokens.values()) {
      if (match(token) && !token.revokedAt) {
        this.store.data.refreshTokens.set(token.id, { ...token, revokedAt: at });
        count++;
      }
    }
    return count;
  }
}

export class InMemoryProjectRepository implements ProjectRepository<unknown> {
  constructor(private readonly store: InMemoryStore) {}

  async create(
    _tx: unknown,
    input: { id: string; name: string; description: string | null; ownerId: string },
  ): Promise<Project> {
    const now = this.store.now();
    const project: Project = {
      ...input,
      isActive: true,
      createdAt: now,
      updatedAt: now,
      deletedAt: null,
    };
    this.store.data.projects.set(project.id, project);
    return { ...project };
  }

  async findById(_tx: unknown, id: string): Promise<Project | null> {
    const project = this.store.data.projects.get(id);
    if (!project || project.deletedAt) return null;
    return { ...project };
  }

  async update(
    _tx: unknown,
    id: string,
    changes: { name?: string; description?: string | null },
  ): Promise<Project | null> {
    const project = this.store.data.projects.get(id);
    if (!project || project.deletedAt) return null;
    const updated: Project = { ...project, ...changes, updatedAt: this.store.now() };
    this.store.data.projects.set(id, updated);
    return { ...updated };
  }

  async softDelete(_tx: unknown, id: string, at: Date): Promise<void> {
    const project = this.store.data.projects.get(id);
    if (project && !project.deletedAt) {
      this.store.data.projects.set(id, { ...project, isActive: false, deletedAt: at, updatedAt: at });
    }
  }

  async listForUser(_tx: unknown, userId: string): Promise<ProjectSummary[]> {
    const summaries: ProjectSummary[] = [];
    for (const project of this.store.data.projects.values()) {
      if (project.deletedAt) continue;
      const role =
        project.ownerId === userId
          ? 'OWNER'
          : this.store.data.members.get(memberKey(project.id, userId))?.role;
      if (role) {
        summaries.push({
          id: project.id,
          name: project.name,
          description: project.description,
          role,
        });
      }
    }
    return summaries;
  }
}

export class InMemoryApiKeyRepository implements ApiKeyRepository<unknown> {
  constructor(private readonly store: InMemoryStore) {}

  /** Set to make `touchLastUsed` fail, to exercise best-effort paths. */
  failTouches = false;

  async create(
    _tx: unknown,
    input: { id: string; projectId: string; key: string; name: string },
  ): Promise<ProjectApiKey> {
    const apiKey: ProjectApiKey = {
      ...input,
      isActive: true,
      lastUsedAt: null,
      createdAt: this.store.now(),
    };
    this.store.data.apiKeys.set(apiKey.id, apiKey);
    return { ...apiKey };
  }

  async findByKey(_tx: unknown, key: string): Promise<ProjectApiKey | null> {
    for (const apiKey of this.store.data.apiKeys.values()) {
      if (apiKey.key === key) return { ...apiKey };
    }
    return null;
  }

  async findById(_tx: unknown, projectId: string, id: string): Promise<ProjectApiKey | null> {
    const apiKey = this.store.data.apiKeys.get(id);
    if (!apiKey || apiKey.projectId !== projectId) return null;
    return { ...apiKey };
  }

  async listByProjectId(
    _tx: unknown,
    projectId: string,
    includeInactive: boolean,
  ): Promise<ProjectApiKey[]> {
    return [...this.store.data.apiKeys.values()]
      .filter((k) => k.projectId === projectId && (includeInactive || k.isActive))
      .map((k) => ({ ...k }));
  }

  async deactivate(_tx: unknown, id: string): Promise<void> {
    const apiKey = this.store.data.apiKeys.get(id);
    if (apiKey) this.store.data.apiKeys.set(id, { ...apiKey, isActive: false });
  }

  async deactivateAllForProject(_tx: unknown, projectId: string): Promise<void> {
    for (const apiKey of this.store.data.apiKeys.values()) {
      if (apiKey.projectId === projectId) {
        this.store.data.apiKeys.set(apiKey.id, { ...apiKey, isActive: false });
      }
    }
  }

  async touchLastUsed(_tx: unknown, id: string, at: Date): Promise<void> {
    if (this.failTouches) {
      throw new Error('touch failed');
    }
    const apiKey = this.store.data.apiKeys.get(id);
    if (apiKey) this.store.data.apiKeys.set(id, { ...apiKey, lastUsedAt: at });
  }
}

export class InMemoryMemberRepository implements MemberRepository<unknown> {
  constructor(private readonly store: InMemoryStore) {}

  async add(
    _tx: unknown,
    input: { projectId: string; userId: string; role: MemberRole },
  ): Promise<ProjectMember | null> {
    const key = memberKey(input.projectId, input.userId);
    if (this.store.data.members.has(key)) return null;
    const member: ProjectMember = { ...input, createdAt: this.store.now() };
    this.store.data.members.set(key, member);
    return { ...member };
  }

  async remove(_tx: unknown, projectId: string, userId: string): Promise<boolean> {
    return this.store.data.members.delete(memberKey(projectId, userId));
  }

  async findMember(_tx: unknown, projectId: string, userId: string): Promise<ProjectMember | null> {
    const member = this.store.data.members.get(memberKey(projectId, userId));
    return member ? { ...member } : null;
  }

  async listByProjectId(_tx: unknown, projectId: string): Promise<ProjectMember[]> {
    return [...this.store.data.members.values()]
      .filter((m) => m.projectId === projectId)
      .map((m) => ({ ...m }));
  }

  async updateRole(
    _tx: unknown,
    projectId: string,
    userId: string,
    role: MemberRole,
  ): Promise<ProjectMember | null> {
    const key = memberKey(projectId, userId);
    const member = this.store.data.members.get(key);
    if (!member) return null;
    const updated: ProjectMember = { ...member, role };
    this.store.data.members.set(key, updated);
    return { ...updated };
  }

  async removeAllForProject(_tx: unknown, projectId: string): Promise<void> {
    for (const [key, member] of this.store.data.members) {
      if (member.projectId === projectId) this.store.data.members.delete(key);
    }
  }
}
