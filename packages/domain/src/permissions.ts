import { type Project, type ProjectMember, type ProjectRole } from './project';

const ROLE_HIERARCHY: Record<ProjectRole, number> = {
  OWNER: 3,
  ADMIN: 2,
  MEMBER: 1,
};

export function hasRole(userRole: ProjectRole, requiredRole: ProjectRole): boolean {
  return ROLE_HIERARCHY[userRole] >= ROLE_HIERARCHY[requiredRole];
}

/**
 * The caller's effective role in a project, or null for outsiders. The owner is
 * implicit: ownership wins over any member row.
 */
export function resolveProjectRole(
  project: Project,
  userId: string,
  member: ProjectMember | null,
): ProjectRole | null {
  if (project.ownerId === userId) return 'OWNER';
  return member?.role ?? null;
}

export function canViewProject(role: ProjectRole | null): boolean {
  return role !== null && hasRole(role, 'MEMBER');
}

export function canListMembers(role: ProjectRole | null): boolean {
  return role !== null && hasRole(role, 'MEMBER');
}

export function canManageProject(role: ProjectRole | null): boolean {
  return role !== null && hasRole(role, 'OWNER');
}

export function canManageApiKeys(role: ProjectRole | null): boolean {
  return role !== null && hasRole(role, 'OWNER');
}

export function canManageMembers(role: ProjectRole | null): boolean {
  return role !== null && hasRole(role, 'OWNER');
}

/** The owner is never added, removed or re-roled through member operations. */
export function isOwnerTarget(project: Project, targetUserId: string): boolean {
  return project.ownerId === targetUserId;
}

