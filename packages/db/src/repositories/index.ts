import { type PoolClient } from 'pg';
import { type Repositories } from '@tenantgate/domain';
import { withTransaction } from '../client';
import { PgUserRepository } from './user-repository';
import { PgRefreshTokenRepository } from './refresh-token-repository';
import { PgProjectRepository } from './project-repository';
import { PgApiKeyRepository } from './api-key-repository';
import { PgMemberRepository } from './member-repository';

/** Repository set backed by the shared pool. Call `initPool` first. */
export function createPgRepositories(): Repositories<PoolClient> {
  return {
    userRepo: new PgUserRepository(),
    refreshTokenRepo: new PgRefreshTokenRepository(),
    projectRepo: new PgProjectRepository(),
    apiKeyRepo: new PgApiKeyRepository(),
    memberRepo: new PgMemberRepository(),
    withTransaction,
  };
}
