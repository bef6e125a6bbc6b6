import { randomUUID } from 'node:crypto';
import Fastify, { type FastifyInstance } from 'fastify';
import cookie from '@fastify/cookie';
import {
  createLogger,
  Argon2PasswordHasher,
  JoseTokenService,
  type ApiConfig,
} from '@tenantgate/shared';
import {
  ApiKeyValidator,
  AuthService,
  AuthorizationDispatcher,
  IdentityResolver,
  ProjectService,
  RefreshTokenService,
  UserService,
  type Clock,
  type PasswordHasher,
  type Repositories,
} from '@tenantgate/domain';
import { registerErrorHandler } from './plugins/error-handler';
import { createAuthGuards } from './plugins/auth';
import { registerAuthRoutes } from './routes/auth';
import { registerClientAuthRoutes } from './routes/client-auth';
import { registerUserRoutes } from './routes/users';
import { registerProjectRoutes } from './routes/projects';

const logger = createLogger({ name: 'api' });

/** Seams replaced in tests. */
export interface ServerOverrides {
  passwordHasher?: PasswordHasher;
  now?: Clock;
  generateId?: () => string;
}

export async function buildServer<Tx>(
  config: ApiConfig,
  repositories: Repositories<Tx>,
  overrides: ServerOverrides = {},
): Promise<FastifyInstance> {
  const app = Fastify({
    logger: false,
    bodyLimit: 65_536,
  });

  await app.register(cookie);
  registerErrorHandler(app);

  const now = overrides.now ?? (() => new Date());
  const generateId = overrides.generateId ?? (() => randomUUID());
  const passwordHasher = overrides.passwordHasher ?? new Argon2PasswordHasher();
  const tokenService = new JoseTokenService({
    activeKid: config.JWT_ACTIVE_KID,
    keys: config.JWT_KEYS,
    accessTokenTtlSeconds: config.ACCESS_TOKEN_TTL_SECONDS,
    issuer: config.JWT_ISSUER,
  });

  const { userRepo, refreshTokenRepo, projectRepo, apiKeyRepo, memberRepo, withTransaction } =
    repositories;

  const identityResolver = new IdentityResolver({ userRepo });
  const refreshTokens = new RefreshTokenService({
    refreshTokenRepo,
    tokenService,
    generateId,
    refreshTokenTtlDays: config.REFRESH_TOKEN_TTL_DAYS,
  });
  const apiKeyValidator = new ApiKeyValidator({
    apiKeyRepo,
    projectRepo,
    withTransaction,
    now,
    logger: createLogger({ name: 'api:api-key' }),
  });
  const dispatcher = new AuthorizationDispatcher({
    apiKeyValidator,
    tokenService,
    identityResolver,
    projectRepo,
    withTransaction,
    now,
  });

  const authService = new AuthService({
    userRepo,
    passwordHasher,
    tokenService,
    refreshTokens,
    identityResolver,
    generateId,
    withTransaction,
    now,
  });
  const userService = new UserService({
    userRepo,
    passwordHasher,
    identityResolver,
    withTransaction,
  });
  const projectService = new ProjectService({
    projectRepo,
    apiKeyRepo,
    memberRepo,
    userRepo,
    tokenService,
    generateId,
    withTransaction,
    now,
  });

  const guards = createAuthGuards(dispatcher);

  app.get('/health', async () => {
    return { status: 'ok', timestamp: now().toISOString() };
  });

  registerAuthRoutes(app, { authService, guards, cookieSecure: config.COOKIE_SECURE });
  registerClientAuthRoutes(app, { authService, userService, guards });
  registerUserRoutes(app, { userService, guards });
  registerProjectRoutes(app, { projectService, guards });

  app.addHook('onRequest', (request, _reply, done) => {
    logger.debug(
      { method: request.method, url: request.url, requestId: request.id },
      'Incoming request',
    );
    done();
  });

  app.addHook('onResponse', (request, reply, done) => {
    logger.info(
      {
        method: request.method,
        url: request.url,
        statusCode: reply.statusCode,
        requestId: request.id,
        durationMs: Math.round(reply.elapsedTime),
      },
      'Request completed',
    );
    done();
  });

  return app;
}
