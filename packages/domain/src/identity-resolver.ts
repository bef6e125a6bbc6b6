import { type User } from './user';
import { type UserRepository } from './ports';
import { type Scope, formatScope, scopeProjectId, userMatchesScope } from './scope';
import { AuthError } from './auth';

export interface IdentityResolverDeps<Tx> {
  userRepo: UserRepository<Tx>;
}

/**
 * Turns a `(subjectId, scope)` pair into a user row, refusing to cross tenants.
 *
 * A missing or inactive user is an authentication failure. A user that exists but
 * lives outside the scope is an authorization failure: the credential was valid,
 * its scope just does not grant that identity.
 */
export class IdentityResolver<Tx = unknown> {
  constructor(private readonly deps: IdentityResolverDeps<Tx>) {}

  async resolve(tx: Tx, subjectId: string, scope: Scope): Promise<User> {
    const user = await this.deps.userRepo.findById(tx, subjectId);
    if (!user) {
      throw AuthError.unauthorized('subject not found');
    }
    if (!user.isActive) {
      throw AuthError.unauthorized('subject inactive');
    }
    if (!userMatchesScope(user, scope)) {
      throw AuthError.forbidden(`subject outside scope ${formatScope(scope)}`);
    }
    return user;
  }

  async findByEmail(tx: Tx, scope: Scope, email: string): Promise<User | null> {
    return this.deps.userRepo.findByEmail(tx, email, scopeProjectId(scope));
  }

  /** Users outside `scope` are reported as absent. */
  async findVisible(tx: Tx, scope: Scope, userId: string): Promise<User | null> {
    const user = await this.deps.userRepo.findById(tx, userId);
    if (!user || !userMatchesScope(user, scope)) return null;
    return user;
  }
}
