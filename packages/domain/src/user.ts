export interface User {
  id: string;
  email: string;
  passwordHash: string;
  fullName: string | null;
  /** `null` for platform users; set for project end-users. */
  projectId: string | null;
  isActive: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export interface RefreshToken {
  id: string;
  userId: string;
  tokenHash: string;
  familyId: string;
  expiresAt: Date;
  revokedAt: Date | null;
  lastUsedAt: Date | null;
  createdAt: Date;
}

export interface UserProfile {
  id: string;
  email: string;
  fullName: string | null;
  projectId: string | null;
  isActive: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export function toUserProfile(user: User): UserProfile {
  return {
    id: user.id,
    email: user.email,
    fullName: user.fullName,
    projectId: user.projectId,
    isActive: user.isActive,
    createdAt: user.createdAt,
    updatedAt: user.updatedAt,
  };
}
