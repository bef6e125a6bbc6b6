import { type User } from './user';
import { type Project, type ProjectApiKey } from './project';
import {
  type Clock,
  type ProjectRepository,
  type TokenService,
  type WithTransaction,
} from './ports';
import { type PlatformScope, type ProjectScope, projectScope } from './scope';
import { type ApiKeyValidator } from './api-key-validator';
import { type IdentityResolver } from './identity-resolver';
import { AuthError } from './auth';

/** Raw credential material as delivered by the transport. */
export interface CredentialMaterial {
  apiKeyHeader?: string;
  authorizationHeader?: string;
  accessTokenCookie?: string;
}

export type CredentialClass =
  | { kind: 'API_KEY'; key: string }
  | { kind: 'ACCESS_TOKEN'; token: string }
  | { kind: 'MALFORMED' }
  | { kind: 'NONE' };

export type DenialReason = 'AUTHENTICATION_FAILED' | 'AUTHORIZATION_DENIED';

export type AuthState =
  | { state: 'UNAUTHENTICATED' }
  | { state: 'PLATFORM_AUTHENTICATED'; user: User; scope: PlatformScope }
  | {
      state: 'PROJECT_KEY_AUTHENTICATED';
      project: Project;
      apiKey: ProjectApiKey;
      scope: ProjectScope;
    }
  | { state: 'CLIENT_AUTHENTICATED'; user: User; scope: ProjectScope }
  | { state: 'DENIED'; reason: DenialReason; detail: string };

export type AuthStateName = AuthState['state'];

const BEARER_PREFIX = /^Bearer\s+/i;

/**
 * First matching rule wins: API key header, then the Authorization header, then the
 * access-token cookie. A present but unusable credential never falls through to the
 * next rule.
 */
export function classifyCredential(material: CredentialMaterial): CredentialClass {
  if (material.apiKeyHeader !== undefined) {
    const key = material.apiKeyHeader.trim();
    return key ? { kind: 'API_KEY', key } : { kind: 'MALFORMED' };
  }

  if (material.authorizationHeader !== undefined) {
    const header = material.authorizationHeader;
    if (!BEARER_PREFIX.test(header)) return { kind: 'MALFORMED' };
    const token = header.replace(BEARER_PREFIX, '').trim();
    return token ? { kind: 'ACCESS_TOKEN', token } : { kind: 'MALFORMED' };
  }

  if (material.accessTokenCookie) {
    return { kind: 'ACCESS_TOKEN', token: material.accessTokenCookie };
  }

  return { kind: 'NONE' };
}

export interface AuthorizationDispatcherDeps<Tx> {
  apiKeyValidator: ApiKeyValidator<Tx>;
  tokenService: TokenService;
  identityResolver: IdentityResolver<Tx>;
  projectRepo: ProjectRepository<Tx>;
  withTransaction: WithTransaction<Tx>;
  now: Clock;
}

export class AuthorizationDispatcher<Tx = unknown> {
  constructor(private readonly deps: AuthorizationDispatcherDeps<Tx>) {}

  async authenticate(material: CredentialMaterial): Promise<AuthState> {
    const credential = classifyCredential(material);

    switch (credential.kind) {
      case 'NONE':
        return { state: 'UNAUTHENTICATED' };
      case 'MALFORMED':
        return denied('AUTHENTICATION_FAILED', 'malformed credential');
      case 'API_KEY':
        return this.fromApiKey(credential.key);
      case 'ACCESS_TOKEN':
        return this.fromAccessToken(credential.token);
    }
  }

  private async fromApiKey(key: string): Promise<AuthState> {
    const result = await this.deps.apiKeyValidator.validate(key);
    if (!result.ok) {
      return denied('AUTHENTICATION_FAILED', 'api key rejected');
    }
    return {
      state: 'PROJECT_KEY_AUTHENTICATED',
      project: result.project,
      apiKey: result.apiKey,
      scope: projectScope(result.project.id),
    };
  }

  private async fromAccessToken(token: string): Promise<AuthState> {
    const { tokenService, identityResolver, projectRepo, withTransaction, now } = this.deps;

    const verification = await tokenService.validateAccessToken(token, now());
    if (!verification.ok) {
      return denied('AUTHENTICATION_FAILED', `access token ${verification.reason.toLowerCase()}`);
    }

    const { subjectId, scope } = verification.claims;
    try {
      const user = await withTransaction(async (tx) => {
        // Deleted projects revoke their client tokens.
        if (scope.kind === 'project') {
          const project = await projectRepo.findById(tx, scope.projectId);
          if (!project || !project.isActive) throw AuthError.unauthorized('project inactive');
        }
        return identityResolver.resolve(tx, subjectId, scope);
      });
      return scope.kind === 'platform'
        ? { state: 'PLATFORM_AUTHENTICATED', user, scope }
        : { state: 'CLIENT_AUTHENTICATED', user, scope };
    } catch (err) {
      if (err instanceof AuthError) {
        const reason = err.kind === 'FORBIDDEN' ? 'AUTHORIZATION_DENIED' : 'AUTHENTICATION_FAILED';
        return denied(reason, err.reason ?? err.message);
      }
      throw err;
    }
  }
}

function denied(reason: DenialReason, detail: string): AuthState {
  return { state: 'DENIED', reason, detail };
}
