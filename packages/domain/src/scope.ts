/**
 * Tenant context a credential is valid within.
 *
 * Encoded in access tokens as `platform` or `project:<projectId>`.
 */
export type Scope = PlatformScope | ProjectScope;

export interface PlatformScope {
  kind: 'platform';
}

export interface ProjectScope {
  kind: 'project';
  projectId: string;
}

const PROJECT_PREFIX = 'project:';

export const PLATFORM_SCOPE: PlatformScope = { kind: 'platform' };

export function projectScope(projectId: string): ProjectScope {
  return { kind: 'project', projectId };
}

export function formatScope(scope: Scope): string {
  return scope.kind === 'platform' ? 'platform' : `${PROJECT_PREFIX}${scope.projectId}`;
}

export function parseScope(raw: string): Scope | null {
  if (raw === 'platform') return PLATFORM_SCOPE;
  if (!raw.startsWith(PROJECT_PREFIX)) return null;
  const projectId = raw.slice(PROJECT_PREFIX.length);
  if (projectId.length === 0 || projectId.includes(':')) return null;
  return projectScope(projectId);
}

/** The scope a user's credentials are minted for, derived from its `projectId`. */
export function scopeOfUser(user: { projectId: string | null }): Scope {
  return user.projectId === null ? PLATFORM_SCOPE : projectScope(user.projectId);
}

export function userMatchesScope(user: { projectId: string | null }, scope: Scope): boolean {
  if (scope.kind === 'platform') return user.projectId === null;
  return user.projectId === scope.projectId;
}

export function scopeProjectId(scope: Scope): string | null {
  return scope.kind === 'project' ? scope.projectId : null;
}
