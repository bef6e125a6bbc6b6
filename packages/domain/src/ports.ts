import { type User, type RefreshToken } from './user';
import {
  type Project,
  type ProjectApiKey,
  type ProjectMember,
  type MemberRole,
  type ProjectSummary,
} from './project';
import { type Scope } from './scope';

export type WithTransaction<Tx> = <T>(fn: (tx: Tx) => Promise<T>) => Promise<T>;

export type Clock = () => Date;

export interface LoggerPort {
  warn(meta: Record<string, unknown>, msg: string): void;
}

export interface UserRepository<Tx = unknown> {
  /** Throws `DuplicateEmailError` when the email is taken within the user's scope. */
  create(
    tx: Tx,
    user: {
      id: string;
      email: string;
      passwordHash: string;
      fullName: string | null;
      projectId: string | null;
    },
  ): Promise<User>;
  findById(tx: Tx, id: string): Promise<User | null>;
  /** `projectId = null` searches the platform namespace only. */
  findByEmail(tx: Tx, email: string, projectId: string | null): Promise<User | null>;
  /** Throws `DuplicateEmailError` when the new email is taken within the user's scope. */
  update(
    tx: Tx,
    id: string,
    changes: { email?: string; fullName?: string | null; passwordHash?: string },
  ): Promise<User | null>;
}

export interface RefreshTokenRepository<Tx = unknown> {
  create(
    tx: Tx,
    token: {
      id: string;
      userId: string;
      tokenHash: string;
      familyId: string;
      expiresAt: Date;
    },
  ): Promise<RefreshToken>;
  findByTokenHash(tx: Tx, hash: string): Promise<RefreshToken | null>;
  /** Marks an unrevoked token used and revoked. Returns false if it was already revoked. */
  consume(tx: Tx, id: string, at: Date): Promise<boolean>;
  revoke(tx: Tx, id: string, at: Date): Promise<void>;
  revokeFamily(tx: Tx, familyId: string, at: Date): Promise<number>;
  revokeAllForUser(tx: Tx, userId: string, at: Date): Promise<number>;
}

export interface ProjectRepository<Tx = unknown> {
  create(
    tx: Tx,
    project: { id: string; name: string; description: string | null; ownerId: string },
  ): Promise<Project>;
  /** Deleted projects are never returned. */
  findById(tx: Tx, id: string): Promise<Project | null>;
  update(
    tx: Tx,
    id: string,
    changes: { name?: string; description?: string | null },
  ): Promise<Project | null>;
  softDelete(tx: Tx, id: string, at: Date): Promise<void>;
  listForUser(tx: Tx, userId: string): Promise<ProjectSummary[]>;
}

export interface ApiKeyRepository<Tx = unknown> {
  create(
    tx: Tx,
    apiKey: { id: string; projectId: string; key: string; name: string },
  ): Promise<ProjectApiKey>;
  findByKey(tx: Tx, key: string): Promise<ProjectApiKey | null>;
  findById(tx: Tx, projectId: string, id: string): Promise<ProjectApiKey | null>;
  listByProjectId(tx: Tx, projectId: string, includeInactive: boolean): Promise<ProjectApiKey[]>;
  deactivate(tx: Tx, id: string): Promise<void>;
  deactivateAllForProject(tx: Tx, projectId: string): Promise<void>;
  touchLastUsed(tx: Tx, id: string, at: Date): Promise<void>;
}

export interface MemberRepository<Tx = unknown> {
  /** Returns null when the user is already a member. */
  add(
    tx: Tx,
    member: { projectId: string; userId: string; role: MemberRole },
  ): Promise<ProjectMember | null>;
  remove(tx: Tx, projectId: string, userId: string): Promise<boolean>;
  findMember(tx: Tx, projectId: string, userId: string): Promise<ProjectMember | null>;
  listByProjectId(tx: Tx, projectId: string): Promise<ProjectMember[]>;
  updateRole(
    tx: Tx,
    projectId: string,
    userId: string,
    role: MemberRole,
  ): Promise<ProjectMember | null>;
  removeAllForProject(tx: Tx, projectId: string): Promise<void>;
}

/** Everything a service graph needs from the persistence layer. */
export interface Repositories<Tx = unknown> {
  userRepo: UserRepository<Tx>;
  refreshTokenRepo: RefreshTokenRepository<Tx>;
  projectRepo: ProjectRepository<Tx>;
  apiKeyRepo: ApiKeyRepository<Tx>;
  memberRepo: MemberRepository<Tx>;
  withTransaction: WithTransaction<Tx>;
}

export interface PasswordHasher {
  hash(password: string): Promise<string>;
  /** Never throws: a malformed stored hash verifies as false. */
  verify(password: string, hash: string): Promise<boolean>;
}

export interface AccessTokenClaims {
  subjectId: string;
  scope: Scope;
  issuedAt: Date;
  expiresAt: Date;
}

export type AccessTokenVerification =
  | { ok: true; claims: AccessTokenClaims }
  | { ok: false; reason: 'EXPIRED' | 'INVALID' };

export interface IssuedAccessToken {
  token: string;
  expiresAt: Date;
}

export interface TokenService {
  issueAccessToken(subjectId: string, scope: Scope, now: Date): Promise<IssuedAccessToken>;
  validateAccessToken(token: string, now: Date): Promise<AccessTokenVerification>;
  generateOpaqueToken(): string;
  hashOpaqueToken(token: string): string;
  generateApiKey(now: Date): string;
}
