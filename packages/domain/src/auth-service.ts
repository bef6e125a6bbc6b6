import { type User, type UserProfile, toUserProfile } from './user';
import { type Scope, PLATFORM_SCOPE } from './scope';
import {
  type UserRepository,
  type PasswordHasher,
  type TokenService,
  type IssuedAccessToken,
  type Clock,
  type WithTransaction,
} from './ports';
import { type RefreshTokenService, type IssuedRefreshToken } from './refresh-token-service';
import { type IdentityResolver } from './identity-resolver';
import {
  AuthError,
  DuplicateEmailError,
  isPasswordStrong,
  normalizeEmail,
} from './auth';

export interface AuthServiceDeps<Tx> {
  userRepo: UserRepository<Tx>;
  passwordHasher: PasswordHasher;
  tokenService: TokenService;
  refreshTokens: RefreshTokenService<Tx>;
  identityResolver: IdentityResolver<Tx>;
  generateId: () => string;
  withTransaction: WithTransaction<Tx>;
  now: Clock;
}

/** Platform sessions travel in cookies, client sessions in the response body. */
export type TokenTransport = 'COOKIE' | 'BODY';

export interface AuthResult {
  accessToken: string;
  accessTokenExpiresAt: Date;
  refreshToken: string;
  refreshTokenExpiresAt: Date;
  transport: TokenTransport;
  user: UserProfile;
}

export interface RegisterInput {
  email: string;
  password: string;
  fullName?: string | null;
}

export interface Credentials {
  email: string;
  password: string;
}

export interface LogoutResult {
  clearStoredTokens: true;
}

type RefreshOutcome = { ok: true; result: AuthResult } | { ok: false; reason: string };

const DUMMY_PASSWORD = 'tenantgate-unknown-account';

export class AuthService<Tx = unknown> {
  private dummyHash: Promise<string> | undefined;

  constructor(private readonly deps: AuthServiceDeps<Tx>) {}

  async register(scope: Scope, input: RegisterInput): Promise<UserProfile> {
    const { userRepo, passwordHasher, identityResolver, generateId } = this.deps;

    if (!isPasswordStrong(input.password)) {
      throw new AuthError('VALIDATION', 'Password is not strong enough', { field: 'password' });
    }
    const email = normalizeEmail(input.email);

    return this.deps.withTransaction(async (tx) => {
      const existing = await identityResolver.findByEmail(tx, scope, email);
      if (existing) {
        throw AuthError.emailTaken();
      }

      const passwordHash = await passwordHasher.hash(input.password);
      try {
        const user = await userRepo.create(tx, {
          id: generateId(),
          email,
          passwordHash,
          fullName: input.fullName ?? null,
          projectId: scope.kind === 'project' ? scope.projectId : null,
        });
        return toUserProfile(user);
      } catch (err) {
        if (err instanceof DuplicateEmailError) throw AuthError.emailTaken();
        throw err;
      }
    });
  }

  /**
   * Unknown email, inactive account and wrong password are indistinguishable to the
   * caller. The refresh row is committed before the tokens are handed back.
   */
  async login(credentials: Credentials, scope: Scope): Promise<AuthResult> {
    const { passwordHasher, identityResolver } = this.deps;
    const now = this.deps.now();

    return this.deps.withTransaction(async (tx) => {
      const user = await identityResolver.findByEmail(tx, scope, normalizeEmail(credentials.email));
      // Every attempt pays for one verification.
      const valid = await passwordHasher.verify(
        credentials.password,
        user ? user.passwordHash : await this.dummyPasswordHash(),
      );
      if (!user) {
        throw AuthError.unauthorized('unknown email');
      }
      if (!user.isActive) {
        throw AuthError.unauthorized('inactive user');
      }
      if (!valid) {
        throw AuthError.unauthorized('password mismatch');
      }

      const refresh = await this.deps.refreshTokens.issue(tx, user.id, now);
      const access = await this.deps.tokenService.issueAccessToken(user.id, scope, now);
      return toAuthResult(user, scope, access, refresh);
    });
  }

  /**
   * Rotation on use: the presented token is consumed and replaced. A token that was
   * already revoked is treated as replay and takes its whole family down with it.
   */
  async refresh(value: string, scope: Scope): Promise<AuthResult> {
    const { refreshTokens, identityResolver, tokenService } = this.deps;
    const now = this.deps.now();

    const outcome = await this.deps.withTransaction(async (tx): Promise<RefreshOutcome> => {
      const validation = await refreshTokens.validate(tx, value, now);
      if (!validation.ok) {
        if (validation.reason === 'REVOKED' && validation.record) {
          await refreshTokens.revokeFamily(tx, validation.record.familyId, now);
        }
        return { ok: false, reason: `refresh token ${validation.reason.toLowerCase()}` };
      }

      const user = await identityResolver.resolve(tx, validation.record.userId, scope);
      const rotated = await refreshTokens.rotate(tx, validation.record, now);
      if (!rotated) {
        return { ok: false, reason: 'refresh token consumed concurrently' };
      }

      const access = await tokenService.issueAccessToken(user.id, scope, now);
      return { ok: true, result: toAuthResult(user, scope, access, rotated) };
    });

    // Thrown after commit so the family revocation above is kept.
    if (!outcome.ok) {
      throw AuthError.unauthorized(outcome.reason);
    }
    return outcome.result;
  }

  /** Idempotent. Tokens belonging to users outside `scope` are left alone. */
  async logout(value: string | undefined, scope: Scope = PLATFORM_SCOPE): Promise<LogoutResult> {
    const { refreshTokens, identityResolver } = this.deps;

    if (value) {
      const now = this.deps.now();
      await this.deps.withTransaction(async (tx) => {
        const record = await refreshTokens.find(tx, value);
        if (!record) return;
        const owner = await identityResolver.findVisible(tx, scope, record.userId);
        if (!owner) return;
        await refreshTokens.revoke(tx, record, now);
      });
    }

    return { clearStoredTokens: true };
  }

  async logoutAll(userId: string): Promise<number> {
    const now = this.deps.now();
    return this.deps.withTransaction((tx) => this.deps.refreshTokens.revokeAll(tx, userId, now));
  }

  /** Hashed once per service; a failed attempt is retried on the next login. */
  private dummyPasswordHash(): Promise<string> {
    this.dummyHash ??= this.deps.passwordHasher.hash(DUMMY_PASSWORD).catch((err: unknown) => {
      this.dummyHash = undefined;
      throw err;
    });
    return this.dummyHash;
  }
}

function toAuthResult(
  user: User,
  scope: Scope,
  access: IssuedAccessToken,
  refresh: IssuedRefreshToken,
): AuthResult {
  return {
    accessToken: access.token,
    accessTokenExpiresAt: access.expiresAt,
    refreshToken: refresh.value,
    refreshTokenExpiresAt: refresh.record.expiresAt,
    transport: scope.kind === 'platform' ? 'COOKIE' : 'BODY',
    user: toUserProfile(user),
  };
}
