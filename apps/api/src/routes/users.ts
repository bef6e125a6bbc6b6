import { type FastifyInstance } from 'fastify';
import { PLATFORM_SCOPE, type UserService } from '@tenantgate/domain';
import {
  ChangePasswordRequestSchema,
  UpdateMeRequestSchema,
  UserIdParamsSchema,
} from '@tenantgate/proto';
import { platformAuth, projectContextAuth, type AuthGuards } from '../plugins/auth';
import { mapDomainError, parseOrThrow } from '../plugins/domain-errors';
import { serializeUser } from './serializers';

interface UserRouteDeps<Tx> {
  userService: UserService<Tx>;
  guards: AuthGuards;
}

export function registerUserRoutes<Tx>(app: FastifyInstance, deps: UserRouteDeps<Tx>): void {
  const { userService, guards } = deps;

  app.get('/users/me', { preHandler: [guards.requirePlatform] }, async (request, reply) => {
    const { user } = platformAuth(request);
    return reply.status(200).send(serializeUser(userService.getProfile(user)));
  });

  app.patch('/users/me', { preHandler: [guards.requirePlatform] }, async (request, reply) => {
    const { user } = platformAuth(request);
    const body = parseOrThrow(UpdateMeRequestSchema, request.body, 'Invalid profile data');

    try {
      const updated = await userService.updateProfile(user, body);
      return reply.status(200).send(serializeUser(updated));
    } catch (err) {
      return mapDomainError(err);
    }
  });

  app.post('/users/me/password', { preHandler: [guards.requirePlatform] }, async (request, reply) => {
    const { user } = platformAuth(request);
    const body = parseOrThrow(ChangePasswordRequestSchema, request.body, 'Invalid password data');

    try {
      await userService.changePassword(user, body.currentPassword, body.newPassword);
      return reply.status(204).send();
    } catch (err) {
      return mapDomainError(err);
    }
  });

  app.get('/users/:userId', { preHandler: [guards.requirePlatform] }, async (request, reply) => {
    const { userId } = parseOrThrow(UserIdParamsSchema, request.params, 'Invalid user id');

    try {
      const user = await userService.getVisibleUser(PLATFORM_SCOPE, userId);
      return reply.status(200).send(serializeUser(user));
    } catch (err) {
      return mapDomainError(err);
    }
  });

  app.get(
    '/client/users/:userId',
    { preHandler: [guards.requireProjectContext] },
    async (request, reply) => {
      const { scope } = projectContextAuth(request);
      const { userId } = parseOrThrow(UserIdParamsSchema, request.params, 'Invalid user id');

      try {
        const user = await userService.getVisibleUser(scope, userId);
        return reply.status(200).send(serializeUser(user));
      } catch (err) {
        return mapDomainError(err);
      }
    },
  );
}
