export type ProjectRole = 'OWNER' | 'ADMIN' | 'MEMBER';

/** Roles a member row can hold. The owner is implicit and never stored. */
export type MemberRole = Exclude<ProjectRole, 'OWNER'>;

export interface Project {
  id: string;
  name: string;
  description: string | null;
  ownerId: string;
  isActive: boolean;
  createdAt: Date;
  updatedAt: Date;
  deletedAt: Date | null;
}

export interface ProjectApiKey {
  id: string;
  projectId: string;
  key: string;
  name: string;
  isActive: boolean;
  lastUsedAt: Date | null;
  createdAt: Date;
}

export interface ProjectMember {
  projectId: string;
  userId: string;
  role: MemberRole;
  createdAt: Date;
}

export interface ProjectMemberView {
  projectId: string;
  userId: string;
  role: ProjectRole;
  createdAt: Date;
}

export interface ProjectSummary {
  id: string;
  name: string;
  description: string | null;
  role: ProjectRole;
}
