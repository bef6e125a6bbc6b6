import {
  type AuthResult,
  type Project,
  type ProjectApiKey,
  type ProjectMember,
  type ProjectMemberView,
  type ProjectSummary,
  type UserProfile,
} from '@tenantgate/domain';

export function serializeUser(user: UserProfile) {
  return {
    id: user.id,
    email: user.email,
    fullName: user.fullName,
    projectId: user.projectId,
    isActive: user.isActive,
    createdAt: user.createdAt.toISOString(),
    updatedAt: user.updatedAt.toISOString(),
  };
}

export function serializeSession(result: AuthResult) {
  return {
    accessToken: result.accessToken,
    refreshToken: result.refreshToken,
    tokenType: 'bearer',
    accessTokenExpiresAt: result.accessTokenExpiresAt.toISOString(),
    refreshTokenExpiresAt: result.refreshTokenExpiresAt.toISOString(),
    user: serializeUser(result.user),
  };
}

export function serializeProject(project: Project) {
  return {
    id: project.id,
    name: project.name,
    description: project.description,
    ownerId: project.ownerId,
    isActive: project.isActive,
    createdAt: project.createdAt.toISOString(),
    updatedAt: project.updatedAt.toISOString(),
  };
}

export function serializeProjectSummary(summary: ProjectSummary) {
  return {
    id: summary.id,
    name: summary.name,
    description: summary.description,
    role: summary.role,
  };
}

export function serializeApiKey(apiKey: ProjectApiKey) {
  return {
    id: apiKey.id,
    projectId: apiKey.projectId,
    key: apiKey.key,
    name: apiKey.name,
    isActive: apiKey.isActive,
    lastUsedAt: apiKey.lastUsedAt ? apiKey.lastUsedAt.toISOString() : null,
    createdAt: apiKey.createdAt.toISOString(),
  };
}

export function serializeMember(member: ProjectMember | ProjectMemberView) {
  return {
    projectId: member.projectId,
    userId: member.userId,
    role: member.role,
    createdAt: member.createdAt.toISOString(),
  };
}
