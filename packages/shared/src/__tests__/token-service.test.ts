import { describe, it, expect } from 'vitest';
import { SignJWT } from 'jose';
import { PLATFORM_SCOPE, projectScope } from '@tenantgate/domain';
import { JoseTokenService, type TokenServiceConfig } from '../auth/token-service';

const NOW = new Date('2026-03-01T12:00:00.000Z');
const NOW_SECONDS = 1772366400;

function createService(overrides: Partial<TokenServiceConfig> = {}) {
  return new JoseTokenService({
    activeKid: 'key-1',
    keys: [
      { kid: 'key-1', secret: 'a'.repeat(32) },
      { kid: 'key-2', secret: 'b'.repeat(32) },
    ],
    accessTokenTtlSeconds: 1800,
    issuer: 'tenantgate-test',
    ...overrides,
  });
}

async function signRaw(claims: Record<string, unknown>, kid = 'key-1', secret = 'a'.repeat(32)) {
  return new SignJWT(claims)
    .setProtectedHeader({ alg: 'HS256', kid })
    .setIssuer('tenantgate-test')
    .setIssuedAt(NOW_SECONDS)
    .setExpirationTime(NOW_SECONDS + 60)
    .sign(new TextEncoder().encode(secret));
}

describe('JoseTokenService', () => {
  describe('access tokens', () => {
    it('issues a token that validates with its subject and scope', async () => {
      const service = createService();
      const issued = await service.issueAccessToken('user-123', projectScope('p1'), NOW);

      expect(issued.token.split('.')).toHaveLength(3);
      expect(issued.expiresAt).toEqual(new Date('2026-03-01T12:30:00.000Z'));

      expect(await service.validateAccessToken(issued.token, NOW)).toEqual({
        ok: true,
        claims: {
          subjectId: 'user-123',
          scope: { kind: 'project', projectId: 'p1' },
          issuedAt: NOW,
          expiresAt: new Date('2026-03-01T12:30:00.000Z'),
        },
      });
    });

    it('truncates the issue time to whole seconds', async () => {
      const service = createService();
      const issued = await service.issueAccessToken('u1', PLATFORM_SCOPE, new Date(NOW.getTime() + 900));
      expect(issued.expiresAt).toEqual(new Date('2026-03-01T12:30:00.000Z'));
    });

    it('is valid strictly before exp and expired at exp', async () => {
      const service = createService();
      const { token } = await service.issueAccessToken('u1', PLATFORM_SCOPE, NOW);

      const justBefore = new Date('2026-03-01T12:29:59.999Z');
      const atExpiry = new Date('2026-03-01T12:30:00.000Z');

      expect((await service.validateAccessToken(token, justBefore)).ok).toBe(true);
      expect(await service.validateAccessToken(token, atExpiry)).toEqual({
        ok: false,
        reason: 'EXPIRED',
      });
    });

    it('verifies tokens signed with a non-active configured key', async () => {
      const { token } = await createService({ activeKid: 'key-1' }).issueAccessToken(
        'u1',
        PLATFORM_SCOPE,
        NOW,
      );
      const result = await createService({ activeKid: 'key-2' }).validateAccessToken(token, NOW);
      expect(result.ok).toBe(true);
    });

    it('rejects a token signed with an unknown kid', async () => {
      const foreign = createService({
        activeKid: 'other',
        keys: [{ kid: 'other', secret: 'x'.repeat(32) }],
      });
      const { token } = await foreign.issueAccessToken('u1', PLATFORM_SCOPE, NOW);

      expect(await createService().validateAccessToken(token, NOW)).toEqual({
        ok: false,
        reason: 'INVALID',
      });
    });

    it('rejects a known kid with the wrong secret', async () => {
      const token = await signRaw({ sub: 'u1', scope: 'platform' }, 'key-1', 'z'.repeat(32));
      expect(await createService().validateAccessToken(token, NOW)).toEqual({
        ok: false,
        reason: 'INVALID',
      });
    });

    it('rejects a token from another issuer', async () => {
      const { token } = await createService({ issuer: 'someone-else' }).issueAccessToken(
        'u1',
        PLATFORM_SCOPE,
        NOW,
      );
      expect((await createService().validateAccessToken(token, NOW)).ok).toBe(false);
    });

    it('rejects malformed input', async () => {
      expect(await createService().validateAccessToken('not-a-jwt', NOW)).toEqual({
        ok: false,
        reason: 'INVALID',
      });
    });

    it('rejects a token with an unparseable scope', async () => {
      const token = await signRaw({ sub: 'u1', scope: 'tenant:p1' });
      expect(await createService().validateAccessToken(token, NOW)).toEqual({
        ok: false,
        reason: 'INVALID',
      });
    });

    it('rejects a token without a subject', async () => {
      const token = await signRaw({ scope: 'platform' });
      expect((await createService().validateAccessToken(token, NOW)).ok).toBe(false);
    });
  });

  it('throws if the active kid is not among the keys', () => {
    expect(() => createService({ activeKid: 'nonexistent' })).toThrow(
      "Active JWT key 'nonexistent' not found in keys",
    );
  });

  it('generates 43-character base64url opaque tokens', () => {
    const service = createService();
    const t1 = service.generateOpaqueToken();
    const t2 = service.generateOpaqueToken();

    expect(t1).toMatch(/^[A-Za-z0-9_-]{43}$/);
    expect(t1).not.toBe(t2);
  });

  it('hashes opaque tokens deterministically as hex sha-256', () => {
    const service = createService();
    const hash = service.hashOpaqueToken('test-token');

    expect(hash).toMatch(/^[0-9a-f]{64}$/);
    expect(service.hashOpaqueToken('test-token')).toBe(hash);
    expect(service.hashOpaqueToken('other-token')).not.toBe(hash);
  });

  it('generates API keys with the issue time and a random suffix', () => {
    const key = createService().generateApiKey(NOW);
    expect(key).toMatch(/^tg_1772366400_[A-Za-z0-9_-]{43}$/);
  });
});
