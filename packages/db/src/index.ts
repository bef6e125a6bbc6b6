export {
  initPool,
  closePool,
  getPool,
  withTransaction,
  isUniqueViolation,
  UNIQUE_VIOLATION,
} from './client';
export { createPgRepositories } from './repositories';
export { PgUserRepository } from './repositories/user-repository';
export { PgRefreshTokenRepository } from './repositories/refresh-token-repository';
export { PgProjectRepository } from './repositories/project-repository';
export { PgApiKeyRepository } from './repositories/api-key-repository';
export { PgMemberRepository } from './repositories/member-repository';
