import { type FastifyInstance } from 'fastify';
import { type ProjectService } from '@tenantgate/domain';
import {
  AddMemberRequestSchema,
  ApiKeyParamsSchema,
  CreateApiKeyRequestSchema,
  CreateProjectRequestSchema,
  ListApiKeysQuerySchema,
  MemberParamsSchema,
  ProjectParamsSchema,
  UpdateMemberRoleRequestSchema,
  UpdateProjectRequestSchema,
} from '@tenantgate/proto';
import { platformAuth, type AuthGuards } from '../plugins/auth';
import { mapDomainError, parseOrThrow } from '../plugins/domain-errors';
import {
  serializeApiKey,
  serializeMember,
  serializeProject,
  serializeProjectSummary,
} from './serializers';

interface ProjectRouteDeps<Tx> {
  projectService: ProjectService<Tx>;
  guards: AuthGuards;
}

export function registerProjectRoutes<Tx>(app: FastifyInstance, deps: ProjectRouteDeps<Tx>): void {
  const { projectService, guards } = deps;
  const platformOnly = { preHandler: [guards.requirePlatform] };

  app.post('/projects', platformOnly, async (request, reply) => {
    const { user } = platformAuth(request);
    const body = parseOrThrow(CreateProjectRequestSchema, request.body, 'Invalid project data');

    try {
      const { project, apiKey } = await projectService.createProject(user.id, body);
      return reply.status(201).send({
        ...serializeProject(project),
        apiKey: serializeApiKey(apiKey),
      });
    } catch (err) {
      return mapDomainError(err);
    }
  });

  app.get('/projects', platformOnly, async (request, reply) => {
    const { user } = platformAuth(request);
    const projects = await projectService.listProjects(user.id);
    return reply.status(200).send(projects.map(serializeProjectSummary));
  });

  app.get('/projects/:projectId', platformOnly, async (request, reply) => {
    const { user } = platformAuth(request);
    const { projectId } = parseOrThrow(ProjectParamsSchema, request.params, 'Invalid project id');

    try {
      const { project, role } = await projectService.getProject(user.id, projectId);
      return reply.status(200).send({ ...serializeProject(project), role });
    } catch (err) {
      return mapDomainError(err);
    }
  });

  app.patch('/projects/:projectId', platformOnly, async (request, reply) => {
    const { user } = platformAuth(request);
    const { projectId } = parseOrThrow(ProjectParamsSchema, request.params, 'Invalid project id');
    const body = parseOrThrow(UpdateProjectRequestSchema, request.body, 'Invalid project data');

    try {
      const project = await projectService.updateProject(user.id, projectId, body);
      return reply.status(200).send(serializeProject(project));
    } catch (err) {
      return mapDomainError(err);
    }
  });

  app.delete('/projects/:projectId', platformOnly, async (request, reply) => {
    const { user } = platformAuth(request);
    const { projectId } = parseOrThrow(ProjectParamsSchema, request.params, 'Invalid project id');

    try {
      await projectService.deleteProject(user.id, projectId);
      return reply.status(204).send();
    } catch (err) {
      return mapDomainError(err);
    }
  });

  // API keys

  app.post('/projects/:projectId/api-keys', platformOnly, async (request, reply) => {
    const { user } = platformAuth(request);
    const { projectId } = parseOrThrow(ProjectParamsSchema, request.params, 'Invalid project id');
    const body = parseOrThrow(CreateApiKeyRequestSchema, request.body, 'Invalid API key data');

    try {
      const apiKey = await projectService.createApiKey(user.id, projectId, body.name);
      return reply.status(201).send(serializeApiKey(apiKey));
    } catch (err) {
      return mapDomainError(err);
    }
  });

  app.get('/projects/:projectId/api-keys', platformOnly, async (request, reply) => {
    const { user } = platformAuth(request);
    const { projectId } = parseOrThrow(ProjectParamsSchema, request.params, 'Invalid project id');
    const query = parseOrThrow(ListApiKeysQuerySchema, request.query, 'Invalid query');

    try {
      const keys = await projectService.listApiKeys(user.id, projectId, query.includeInactive);
      return reply.status(200).send(keys.map(serializeApiKey));
    } catch (err) {
      return mapDomainError(err);
    }
  });

  app.delete('/projects/:projectId/api-keys/:keyId', platformOnly, async (request, reply) => {
    const { user } = platformAuth(request);
    const { projectId, keyId } = parseOrThrow(ApiKeyParamsSchema, request.params, 'Invalid key id');

    try {
      await projectService.deactivateApiKey(user.id, projectId, keyId);
      return reply.status(204).send();
    } catch (err) {
      return mapDomainError(err);
    }
  });

  // Members

  app.post('/projects/:projectId/members', platformOnly, async (request, reply) => {
    const { user } = platformAuth(request);
    const { projectId } = parseOrThrow(ProjectParamsSchema, request.params, 'Invalid project id');
    const body = parseOrThrow(AddMemberRequestSchema, request.body, 'Invalid member data');

    try {
      const member = await projectService.addMember(user.id, projectId, body);
      return reply.status(201).send(serializeMember(member));
    } catch (err) {
      return mapDomainError(err);
    }
  });

  app.get('/projects/:projectId/members', platformOnly, async (request, reply) => {
    const { user } = platformAuth(request);
    const { projectId } = parseOrThrow(ProjectParamsSchema, request.params, 'Invalid project id');

    try {
      const members = await projectService.listMembers(user.id, projectId);
      return reply.status(200).send(members.map(serializeMember));
    } catch (err) {
      return mapDomainError(err);
    }
  });

  app.delete('/projects/:projectId/members/:userId', platformOnly, async (request, reply) => {
    const { user } = platformAuth(request);
    const params = parseOrThrow(MemberParamsSchema, request.params, 'Invalid member id');

    try {
      await projectService.removeMember(user.id, params.projectId, params.userId);
      return reply.status(204).send();
    } catch (err) {
      return mapDomainError(err);
    }
  });

  app.put('/projects/:projectId/members/:userId/role', platformOnly, async (request, reply) => {
    const { user } = platformAuth(request);
    const params = parseOrThrow(MemberParamsSchema, request.params, 'Invalid member id');
    const body = parseOrThrow(UpdateMemberRoleRequestSchema, request.body, 'Invalid role');

    try {
      const member = await projectService.updateMemberRole(
        user.id,
        params.projectId,
        params.userId,
        body.role,
      );
      return reply.status(200).send(serializeMember(member));
    } catch (err) {
      return mapDomainError(err);
    }
  });
}
