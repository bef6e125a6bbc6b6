import { describe, it, expect, beforeEach, vi } from 'vitest';
import { classifyCredential, AuthorizationDispatcher } from '../dispatcher';
import { ApiKeyValidator } from '../api-key-validator';
import { IdentityResolver } from '../identity-resolver';
import { PLATFORM_SCOPE, projectScope } from '../scope';
import {
  InMemoryStore,
  FakeTokenService,
  createManualClock,
  type ManualClock,
} from '../testing';

describe('classifyCredential', () => {
  it('returns NONE when nothing is presented', () => {
    expect(classifyCredential({})).toEqual({ kind: 'NONE' });
  });

  it('prefers the API key header over everything else', () => {
    expect(
      classifyCredential({
        apiKeyHeader: 'tg_1_key',
        authorizationHeader: 'Bearer jwt',
        accessTokenCookie: 'cookie-jwt',
      }),
    ).toEqual({ kind: 'API_KEY', key: 'tg_1_key' });
  });

  it('treats a blank API key header as malformed', () => {
    expect(classifyCredential({ apiKeyHeader: '   ' })).toEqual({ kind: 'MALFORMED' });
  });

  it('extracts a bearer token case-insensitively', () => {
    expect(classifyCredential({ authorizationHeader: 'bearer  abc.def ' })).toEqual({
      kind: 'ACCESS_TOKEN',
      token: 'abc.def',
    });
  });

  it.each(['Basic dXNlcjpwYXNz', 'Bearer', 'Bearer   ', 'Token abc'])(
    'treats %j as malformed',
    (header) => {
      expect(classifyCredential({ authorizationHeader: header })).toEqual({ kind: 'MALFORMED' });
    },
  );

  it('does not fall back to the cookie when the Authorization header is unusable', () => {
    expect(
      classifyCredential({ authorizationHeader: 'Basic abc', accessTokenCookie: 'cookie-jwt' }),
    ).toEqual({ kind: 'MALFORMED' });
  });

  it('uses the cookie when no Authorization header is present', () => {
    expect(classifyCredential({ accessTokenCookie: 'cookie-jwt' })).toEqual({
      kind: 'ACCESS_TOKEN',
      token: 'cookie-jwt',
    });
  });

  it('ignores an empty cookie', () => {
    expect(classifyCredential({ accessTokenCookie: '' })).toEqual({ kind: 'NONE' });
  });
});

describe('AuthorizationDispatcher', () => {
  const start = new Date('2026-03-01T12:00:00.000Z');
  let clock: ManualClock;
  let store: InMemoryStore;
  let tokens: FakeTokenService;
  let dispatcher: AuthorizationDispatcher;

  beforeEach(async () => {
    clock = createManualClock(start);
    store = new InMemoryStore(clock.now);
    tokens = new FakeTokenService(1800);

    await store.users.create({}, {
      id: 'platform-user',
      email: 'owner@example.com',
      passwordHash: 'fake:x',
      fullName: null,
      projectId: null,
    });
    await store.projects.create({}, { id: 'p1', name: 'Acme', description: null, ownerId: 'platform-user' });
    await store.apiKeys.create({}, { id: 'k1', projectId: 'p1', key: 'tg_1_acme', name: 'Default' });
    await store.users.create({}, {
      id: 'client-user',
      email: 'end@example.com',
      passwordHash: 'fake:x',
      fullName: null,
      projectId: 'p1',
    });

    dispatcher = new AuthorizationDispatcher({
      apiKeyValidator: new ApiKeyValidator({
        apiKeyRepo: store.apiKeys,
        projectRepo: store.projects,
        withTransaction: store.withTransaction,
        now: clock.now,
        logger: { warn: vi.fn() },
      }),
      tokenService: tokens,
      identityResolver: new IdentityResolver({ userRepo: store.users }),
      projectRepo: store.projects,
      withTransaction: store.withTransaction,
      now: clock.now,
    });
  });

  it('is UNAUTHENTICATED without credentials', async () => {
    expect(await dispatcher.authenticate({})).toEqual({ state: 'UNAUTHENTICATED' });
  });

  it('authenticates a project by API key', async () => {
    const state = await dispatcher.authenticate({ apiKeyHeader: 'tg_1_acme' });

    expect(state.state).toBe('PROJECT_KEY_AUTHENTICATED');
    if (state.state !== 'PROJECT_KEY_AUTHENTICATED') return;
    expect(state.project.id).toBe('p1');
    expect(state.apiKey.id).toBe('k1');
    expect(state.scope).toEqual(projectScope('p1'));
  });

  it('denies an unknown API key', async () => {
    const state = await dispatcher.authenticate({ apiKeyHeader: 'tg_1_nope' });
    expect(state).toEqual({
      state: 'DENIED',
      reason: 'AUTHENTICATION_FAILED',
      detail: 'api key rejected',
    });
  });

  it('authenticates a platform user from a bearer token', async () => {
    const { token } = await tokens.issueAccessToken('platform-user', PLATFORM_SCOPE, start);
    const state = await dispatcher.authenticate({ authorizationHeader: `Bearer ${token}` });

    expect(state.state).toBe('PLATFORM_AUTHENTICATED');
    if (state.state !== 'PLATFORM_AUTHENTICATED') return;
    expect(state.user.id).toBe('platform-user');
  });

  it('authenticates a platform user from the cookie', async () => {
    const { token } = await tokens.issueAccessToken('platform-user', PLATFORM_SCOPE, start);
    const state = await dispatcher.authenticate({ accessTokenCookie: token });
    expect(state.state).toBe('PLATFORM_AUTHENTICATED');
  });

  it('authenticates a client user within its project', async () => {
    const { token } = await tokens.issueAccessToken('client-user', projectScope('p1'), start);
    const state = await dispatcher.authenticate({ authorizationHeader: `Bearer ${token}` });

    expect(state.state).toBe('CLIENT_AUTHENTICATED');
    if (state.state !== 'CLIENT_AUTHENTICATED') return;
    expect(state.scope).toEqual(projectScope('p1'));
    expect(state.user.projectId).toBe('p1');
  });

  it('denies a client token once its project is deleted', async () => {
    const { token } = await tokens.issueAccessToken('client-user', projectScope('p1'), start);
    await store.projects.softDelete({}, 'p1', start);

    expect(await dispatcher.authenticate({ authorizationHeader: `Bearer ${token}` })).toEqual({
      state: 'DENIED',
      reason: 'AUTHENTICATION_FAILED',
      detail: 'project inactive',
    });
  });

  it('denies authorization when the token scope does not hold the user', async () => {
    const { token } = await tokens.issueAccessToken('client-user', PLATFORM_SCOPE, start);
    const state = await dispatcher.authenticate({ authorizationHeader: `Bearer ${token}` });

    expect(state.state).toBe('DENIED');
    if (state.state !== 'DENIED') return;
    expect(state.reason).toBe('AUTHORIZATION_DENIED');
  });

  it('denies a token at its exact expiry second', async () => {
    const { token } = await tokens.issueAccessToken('platform-user', PLATFORM_SCOPE, start);

    clock.advance(1800 * 1000 - 1);
    expect((await dispatcher.authenticate({ accessTokenCookie: token })).state).toBe(
      'PLATFORM_AUTHENTICATED',
    );

    clock.advance(1);
    expect(await dispatcher.authenticate({ accessTokenCookie: token })).toEqual({
      state: 'DENIED',
      reason: 'AUTHENTICATION_FAILED',
      detail: 'access token expired',
    });
  });

  it('denies a token whose subject was deactivated', async () => {
    const { token } = await tokens.issueAccessToken('platform-user', PLATFORM_SCOPE, start);
    store.users.setActive('platform-user', false);

    const state = await dispatcher.authenticate({ accessTokenCookie: token });
    expect(state).toEqual({
      state: 'DENIED',
      reason: 'AUTHENTICATION_FAILED',
      detail: 'subject inactive',
    });
  });

  it('denies a malformed Authorization header', async () => {
    expect(await dispatcher.authenticate({ authorizationHeader: 'Basic abc' })).toEqual({
      state: 'DENIED',
      reason: 'AUTHENTICATION_FAILED',
      detail: 'malformed credential',
    });
  });

  it('denies a garbage token', async () => {
    const state = await dispatcher.authenticate({ authorizationHeader: 'Bearer not-a-token' });
    expect(state).toEqual({
      state: 'DENIED',
      reason: 'AUTHENTICATION_FAILED',
      detail: 'access token invalid',
    });
  });
});
