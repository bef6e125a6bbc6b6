import { SignJWT, jwtVerify, errors, type JWTPayload } from 'jose';
import { randomBytes, createHash } from 'node:crypto';
import {
  type TokenService,
  type Scope,
  type IssuedAccessToken,
  type AccessTokenVerification,
  formatScope,
  parseScope,
} from '@tenantgate/domain';

interface JwtKey {
  kid: string;
  secret: Uint8Array;
}

export interface TokenServiceConfig {
  activeKid: string;
  keys: Array<{ kid: string; secret: string }>;
  accessTokenTtlSeconds: number;
  issuer: string;
}

const API_KEY_PREFIX = 'tg';
const OPAQUE_TOKEN_BYTES = 32;

class UnknownKeyError extends Error {
  constructor(kid: string | undefined) {
    super(`Unknown JWT key '${kid ?? '<none>'}'`);
    this.name = 'UnknownKeyError';
  }
}

/**
 * HS256 access tokens carrying `{sub, scope, iat, exp, iss}`. Every configured key
 * verifies; only the active one signs. Validation does no I/O.
 */
export class JoseTokenService implements TokenService {
  private readonly keys: Map<string, JwtKey>;
  private readonly activeKey: JwtKey;
  private readonly accessTokenTtlSeconds: number;
  private readonly issuer: string;

  constructor(config: TokenServiceConfig) {
    this.keys = new Map();
    for (const key of config.keys) {
      this.keys.set(key.kid, {
        kid: key.kid,
        secret: new TextEncoder().encode(key.secret),
      });
    }

    const active = this.keys.get(config.activeKid);
    if (!active) {
      throw new Error(`Active JWT key '${config.activeKid}' not found in keys`);
    }
    this.activeKey = active;
    this.accessTokenTtlSeconds = config.accessTokenTtlSeconds;
    this.issuer = config.issuer;
  }

  async issueAccessToken(subjectId: string, scope: Scope, now: Date): Promise<IssuedAccessToken> {
    const issuedAt = Math.floor(now.getTime() / 1000);
    const expiresAt = issuedAt + this.accessTokenTtlSeconds;

    const token = await new SignJWT({ scope: formatScope(scope) })
      .setProtectedHeader({ alg: 'HS256', kid: this.activeKey.kid })
      .setSubject(subjectId)
      .setIssuer(this.issuer)
      .setIssuedAt(issuedAt)
      .setExpirationTime(expiresAt)
      .sign(this.activeKey.secret);

    return { token, expiresAt: new Date(expiresAt * 1000) };
  }

  async validateAccessToken(token: string, now: Date): Promise<AccessTokenVerification> {
    let payload: JWTPayload;
    try {
      ({ payload } = await jwtVerify(
        token,
        async (header) => {
          const key = header.kid ? this.keys.get(header.kid) : undefined;
          if (!key) throw new UnknownKeyError(header.kid);
          return key.secret;
        },
        {
          issuer: this.issuer,
          algorithms: ['HS256'],
          currentDate: now,
        },
      ));
    } catch (err) {
      // jose reports `exp <= now` as expired.
      if (err instanceof errors.JWTExpired) return { ok: false, reason: 'EXPIRED' };
      if (err instanceof errors.JOSEError || err instanceof UnknownKeyError) {
        return { ok: false, reason: 'INVALID' };
      }
      throw err;
    }

    const { sub, iat, exp } = payload;
    const scope = typeof payload['scope'] === 'string' ? parseScope(payload['scope']) : null;
    if (!sub || typeof iat !== 'number' || typeof exp !== 'number' || !scope) {
      return { ok: false, reason: 'INVALID' };
    }

    return {
      ok: true,
      claims: {
        subjectId: sub,
        scope,
        issuedAt: new Date(iat * 1000),
        expiresAt: new Date(exp * 1000),
      },
    };
  }

  generateOpaqueToken(): string {
    return randomBytes(OPAQUE_TOKEN_BYTES).toString('base64url');
  }

  hashOpaqueToken(token: string): string {
    return createHash('sha256').update(token).digest('hex');
  }

  /** `tg_<unix-seconds>_<43 chars of base64url>`. */
  generateApiKey(now: Date): string {
    const issuedAt = Math.floor(now.getTime() / 1000);
    return `${API_KEY_PREFIX}_${issuedAt}_${randomBytes(OPAQUE_TOKEN_BYTES).toString('base64url')}`;
  }
}
