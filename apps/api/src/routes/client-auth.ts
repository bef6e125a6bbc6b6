import { type FastifyInstance } from 'fastify';
import { type AuthService, type UserService } from '@tenantgate/domain';
import {
  ClientRefreshRequestSchema,
  LoginRequestSchema,
  RefreshRequestSchema,
  RegisterRequestSchema,
} from '@tenantgate/proto';
import { clientAuth, projectKeyAuth, type AuthGuards } from '../plugins/auth';
import { mapDomainError, parseOrThrow } from '../plugins/domain-errors';
import { serializeSession, serializeUser } from './serializers';

interface ClientAuthRouteDeps<Tx> {
  authService: AuthService<Tx>;
  userService: UserService<Tx>;
  guards: AuthGuards;
}

/** End-user sessions for client apps. Tokens travel in bodies, never in cookies. */
export function registerClientAuthRoutes<Tx>(
  app: FastifyInstance,
  deps: ClientAuthRouteDeps<Tx>,
): void {
  const { authService, userService, guards } = deps;
  const withApiKey = { preHandler: [guards.requireProjectKey] };
  const withClientToken = { preHandler: [guards.requireClient] };

  app.post('/client/auth/register', withApiKey, async (request, reply) => {
    const { scope } = projectKeyAuth(request);
    const body = parseOrThrow(RegisterRequestSchema, request.body, 'Invalid registration data');

    try {
      const user = await authService.register(scope, body);
      return reply.status(201).send(serializeUser(user));
    } catch (err) {
      return mapDomainError(err);
    }
  });

  app.post('/client/auth/login', withApiKey, async (request, reply) => {
    const { scope } = projectKeyAuth(request);
    const body = parseOrThrow(LoginRequestSchema, request.body, 'Invalid login data');

    try {
      const result = await authService.login(body, scope);
      return reply.status(200).send(serializeSession(result));
    } catch (err) {
      return mapDomainError(err);
    }
  });

  app.post('/client/auth/refresh', withApiKey, async (request, reply) => {
    const { scope } = projectKeyAuth(request);
    const body = parseOrThrow(ClientRefreshRequestSchema, request.body, 'Invalid refresh request');

    try {
      const result = await authService.refresh(body.refreshToken, scope);
      return reply.status(200).send(serializeSession(result));
    } catch (err) {
      return mapDomainError(err);
    }
  });

  app.post('/client/auth/logout', withApiKey, async (request, reply) => {
    const { scope } = projectKeyAuth(request);
    const body = parseOrThrow(RefreshRequestSchema, request.body ?? {}, 'Invalid logout request');

    await authService.logout(body.refreshToken, scope);
    return reply.status(200).send({ detail: 'Successfully logged out' });
  });

  app.post('/client/auth/logout-all', withClientToken, async (request, reply) => {
    const { user } = clientAuth(request);

    const revokedSessions = await authService.logoutAll(user.id);
    return reply.status(200).send({ detail: 'Successfully logged out from all devices', revokedSessions });
  });

  app.get('/client/auth/user', withClientToken, async (request, reply) => {
    const { user } = clientAuth(request);
    return reply.status(200).send(serializeUser(userService.getProfile(user)));
  });
}
