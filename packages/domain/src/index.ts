export type { User, RefreshToken, UserProfile } from './user';
export { toUserProfile } from './user';
export type {
  Project,
  ProjectApiKey,
  ProjectMember,
  ProjectMemberView,
  ProjectRole,
  ProjectSummary,
  MemberRole,
} from './project';
export {
  type Scope,
  type PlatformScope,
  type ProjectScope,
  PLATFORM_SCOPE,
  projectScope,
  formatScope,
  parseScope,
  scopeOfUser,
  userMatchesScope,
  scopeProjectId,
} from './scope';
export {
  type AuthErrorKind,
  AuthError,
  DuplicateEmailError,
  INVALID_CREDENTIALS,
  NOT_PERMITTED,
  isTokenExpired,
  isPasswordStrong,
  normalizeEmail,
  addDays,
} from './auth';
export type {
  WithTransaction,
  Clock,
  LoggerPort,
  UserRepository,
  RefreshTokenRepository,
  ProjectRepository,
  ApiKeyRepository,
  MemberRepository,
  Repositories,
  PasswordHasher,
  AccessTokenClaims,
  AccessTokenVerification,
  IssuedAccessToken,
  TokenService,
} from './ports';
export {
  RefreshTokenService,
  type RefreshTokenServiceDeps,
  type IssuedRefreshToken,
  type RefreshTokenValidation,
} from './refresh-token-service';
export {
  ApiKeyValidator,
  type ApiKeyValidatorDeps,
  type ApiKeyValidation,
} from './api-key-validator';
export { IdentityResolver, type IdentityResolverDeps } from './identity-resolver';
export {
  AuthorizationDispatcher,
  classifyCredential,
  type AuthorizationDispatcherDeps,
  type AuthState,
  type AuthStateName,
  type CredentialClass,
  type CredentialMaterial,
  type DenialReason,
} from './dispatcher';
export {
  hasRole,
  resolveProjectRole,
  canViewProject,
  canListMembers,
  canManageProject,
  canManageApiKeys,
  canManageMembers,
  isOwnerTarget,
} from './permissions';
export {
  AuthService,
  type AuthServiceDeps,
  type AuthResult,
  type TokenTransport,
  type RegisterInput,
  type Credentials,
  type LogoutResult,
} from './auth-service';
export { UserService, type UserServiceDeps, type ProfileChanges } from './user-service';
export {
  ProjectService,
  ProjectError,
  DEFAULT_API_KEY_NAME,
  type ProjectServiceDeps,
} from './project-service';
