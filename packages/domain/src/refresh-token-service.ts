import { type RefreshToken } from './user';
import { type RefreshTokenRepository, type TokenService } from './ports';
import { addDays, isTokenExpired } from './auth';

export interface RefreshTokenServiceDeps<Tx> {
  refreshTokenRepo: RefreshTokenRepository<Tx>;
  tokenService: TokenService;
  generateId: () => string;
  refreshTokenTtlDays: number;
}

export interface IssuedRefreshToken {
  /** Plaintext value. Only the hash is stored, so this is the one time it is observable. */
  value: string;
  record: RefreshToken;
}

export type RefreshTokenValidation =
  | { ok: true; record: RefreshToken }
  | { ok: false; reason: 'NOT_FOUND' | 'REVOKED' | 'EXPIRED'; record: RefreshToken | null };

/**
 * Stateful, revocable half of the token pair. Tokens are opaque, stored by sha-256
 * hash, and rotated on every use: a rotated token keeps its `familyId`, so presenting
 * a revoked member of a family is treated as replay and revokes the whole family.
 */
export class RefreshTokenService<Tx = unknown> {
  constructor(private readonly deps: RefreshTokenServiceDeps<Tx>) {}

  async issue(tx: Tx, userId: string, now: Date, familyId?: string): Promise<IssuedRefreshToken> {
    const { refreshTokenRepo, tokenService, generateId } = this.deps;
    const value = tokenService.generateOpaqueToken();

    const record = await refreshTokenRepo.create(tx, {
      id: generateId(),
      userId,
      tokenHash: tokenService.hashOpaqueToken(value),
      familyId: familyId ?? generateId(),
      expiresAt: addDays(now, this.deps.refreshTokenTtlDays),
    });

    return { value, record };
  }

  async validate(tx: Tx, value: string, now: Date): Promise<RefreshTokenValidation> {
    const record = await this.find(tx, value);
    if (!record) return { ok: false, reason: 'NOT_FOUND', record: null };
    if (record.revokedAt) return { ok: false, reason: 'REVOKED', record };
    if (isTokenExpired(record.expiresAt, now)) return { ok: false, reason: 'EXPIRED', record };
    return { ok: true, record };
  }

  async find(tx: Tx, value: string): Promise<RefreshToken | null> {
    return this.deps.refreshTokenRepo.findByTokenHash(tx, this.deps.tokenService.hashOpaqueToken(value));
  }

  /**
   * Consumes `record` and issues its successor in the same family. Returns null when
   * a concurrent request consumed the record first.
   */
  async rotate(tx: Tx, record: RefreshToken, now: Date): Promise<IssuedRefreshToken | null> {
    const consumed = await this.deps.refreshTokenRepo.consume(tx, record.id, now);
    if (!consumed) return null;
    return this.issue(tx, record.userId, now, record.familyId);
  }

  async revoke(tx: Tx, record: RefreshToken, now: Date): Promise<void> {
    if (record.revokedAt) return;
    await this.deps.refreshTokenRepo.revoke(tx, record.id, now);
  }

  async revokeFamily(tx: Tx, familyId: string, now: Date): Promise<number> {
    return this.deps.refreshTokenRepo.revokeFamily(tx, familyId, now);
  }

  async revokeAll(tx: Tx, userId: string, now: Date): Promise<number> {
    return this.deps.refreshTokenRepo.revokeAllForUser(tx, userId, now);
  }
}
