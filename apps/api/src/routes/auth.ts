import { type FastifyInstance, type FastifyReply } from 'fastify';
import { AuthError, PLATFORM_SCOPE, type AuthResult, type AuthService } from '@tenantgate/domain';
import { LoginRequestSchema, RefreshRequestSchema, RegisterRequestSchema } from '@tenantgate/proto';
import {
  ACCESS_TOKEN_COOKIE,
  REFRESH_TOKEN_COOKIE,
  platformAuth,
  type AuthGuards,
} from '../plugins/auth';
import { mapDomainError, parseOrThrow } from '../plugins/domain-errors';
import { serializeSession, serializeUser } from './serializers';

interface AuthRouteDeps<Tx> {
  authService: AuthService<Tx>;
  guards: AuthGuards;
  cookieSecure: boolean;
}

const REFRESH_COOKIE_PATH = '/auth';

export function registerAuthRoutes<Tx>(app: FastifyInstance, deps: AuthRouteDeps<Tx>): void {
  const { authService, guards, cookieSecure } = deps;

  function setSessionCookies(reply: FastifyReply, result: AuthResult): void {
    reply.setCookie(ACCESS_TOKEN_COOKIE, result.accessToken, {
      httpOnly: true,
      secure: cookieSecure,
      sameSite: 'lax',
      path: '/',
      expires: result.accessTokenExpiresAt,
    });
    reply.setCookie(REFRESH_TOKEN_COOKIE, result.refreshToken, {
      httpOnly: true,
      secure: cookieSecure,
      sameSite: 'lax',
      path: REFRESH_COOKIE_PATH,
      expires: result.refreshTokenExpiresAt,
    });
  }

  function clearSessionCookies(reply: FastifyReply): void {
    reply.clearCookie(ACCESS_TOKEN_COOKIE, { path: '/' });
    reply.clearCookie(REFRESH_TOKEN_COOKIE, { path: REFRESH_COOKIE_PATH });
  }

  app.post('/auth/register', async (request, reply) => {
    const body = parseOrThrow(RegisterRequestSchema, request.body, 'Invalid registration data');

    try {
      const user = await authService.register(PLATFORM_SCOPE, body);
      return reply.status(201).send(serializeUser(user));
    } catch (err) {
      return mapDomainError(err);
    }
  });

  app.post('/auth/login', async (request, reply) => {
    const body = parseOrThrow(LoginRequestSchema, request.body, 'Invalid login data');

    try {
      const result = await authService.login(body, PLATFORM_SCOPE);
      setSessionCookies(reply, result);
      return reply.status(200).send(serializeSession(result));
    } catch (err) {
      return mapDomainError(err);
    }
  });

  app.post('/auth/refresh', async (request, reply) => {
    const body = parseOrThrow(RefreshRequestSchema, request.body ?? {}, 'Invalid refresh request');
    const value = body.refreshToken ?? request.cookies[REFRESH_TOKEN_COOKIE];

    try {
      if (!value) throw AuthError.unauthorized('refresh token missing');
      const result = await authService.refresh(value, PLATFORM_SCOPE);
      setSessionCookies(reply, result);
      return reply.status(200).send(serializeSession(result));
    } catch (err) {
      return mapDomainError(err);
    }
  });

  app.post('/auth/logout', async (request, reply) => {
    const body = parseOrThrow(RefreshRequestSchema, request.body ?? {}, 'Invalid logout request');
    const value = body.refreshToken ?? request.cookies[REFRESH_TOKEN_COOKIE];

    await authService.logout(value, PLATFORM_SCOPE);
    clearSessionCookies(reply);
    return reply.status(200).send({ detail: 'Successfully logged out' });
  });

  app.post('/auth/logout-all', { preHandler: [guards.requirePlatform] }, async (request, reply) => {
    const { user } = platformAuth(request);

    const revokedSessions = await authService.logoutAll(user.id);
    clearSessionCookies(reply);
    return reply.status(200).send({ detail: 'Successfully logged out from all devices', revokedSessions });
  });
}
