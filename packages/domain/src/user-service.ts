import { type User, type UserProfile, toUserProfile } from './user';
import { type Scope, scopeOfUser } from './scope';
import { type UserRepository, type PasswordHasher, type WithTransaction } from './ports';
import { type IdentityResolver } from './identity-resolver';
import { AuthError, DuplicateEmailError, isPasswordStrong, normalizeEmail } from './auth';

export interface UserServiceDeps<Tx> {
  userRepo: UserRepository<Tx>;
  passwordHasher: PasswordHasher;
  identityResolver: IdentityResolver<Tx>;
  withTransaction: WithTransaction<Tx>;
}

export interface ProfileChanges {
  email?: string;
  fullName?: string | null;
  password?: string;
}

export class UserService<Tx = unknown> {
  constructor(private readonly deps: UserServiceDeps<Tx>) {}

  getProfile(user: User): UserProfile {
    return toUserProfile(user);
  }

  async updateProfile(user: User, changes: ProfileChanges): Promise<UserProfile> {
    const { userRepo, passwordHasher, identityResolver } = this.deps;

    if (changes.password !== undefined && !isPasswordStrong(changes.password)) {
      throw new AuthError('VALIDATION', 'Password is not strong enough', { field: 'password' });
    }

    return this.deps.withTransaction(async (tx) => {
      const update: { email?: string; fullName?: string | null; passwordHash?: string } = {};

      if (changes.email !== undefined) {
        const email = normalizeEmail(changes.email);
        if (email !== user.email) {
          const taken = await identityResolver.findByEmail(tx, scopeOfUser(user), email);
          if (taken) throw AuthError.emailTaken();
          update.email = email;
        }
      }
      if (changes.fullName !== undefined) {
        update.fullName = changes.fullName;
      }
      if (changes.password !== undefined) {
        update.passwordHash = await passwordHasher.hash(changes.password);
      }

      try {
        const updated = await userRepo.update(tx, user.id, update);
        if (!updated) {
          throw new AuthError('NOT_FOUND', 'User not found');
        }
        return toUserProfile(updated);
      } catch (err) {
        if (err instanceof DuplicateEmailError) throw AuthError.emailTaken();
        throw err;
      }
    });
  }

  async changePassword(user: User, currentPassword: string, newPassword: string): Promise<void> {
    const { userRepo, passwordHasher } = this.deps;

    const valid = await passwordHasher.verify(currentPassword, user.passwordHash);
    if (!valid) {
      throw new AuthError('VALIDATION', 'Current password is incorrect', { field: 'currentPassword' });
    }
    if (currentPassword === newPassword) {
      throw new AuthError('VALIDATION', 'New password must be different from current password', {
        field: 'newPassword',
      });
    }
    if (!isPasswordStrong(newPassword)) {
      throw new AuthError('VALIDATION', 'New password is not strong enough', { field: 'newPassword' });
    }

    const passwordHash = await passwordHasher.hash(newPassword);
    await this.deps.withTransaction(async (tx) => {
      const updated = await userRepo.update(tx, user.id, { passwordHash });
      if (!updated) {
        throw new AuthError('NOT_FOUND', 'User not found');
      }
    });
  }

  /** Users outside the caller's tenant are reported as not found. */
  async getVisibleUser(scope: Scope, userId: string): Promise<UserProfile> {
    const user = await this.deps.withTransaction((tx) =>
      this.deps.identityResolver.findVisible(tx, scope, userId),
    );
    if (!user) {
      throw new AuthError('NOT_FOUND', 'User not found');
    }
    return toUserProfile(user);
  }
}
