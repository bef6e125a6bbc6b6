export type AuthErrorKind = 'UNAUTHORIZED' | 'FORBIDDEN' | 'CONFLICT' | 'VALIDATION' | 'NOT_FOUND';

export const INVALID_CREDENTIALS = 'Invalid credentials';
export const NOT_PERMITTED = 'You are not permitted to perform this action';

export class AuthError extends Error {
  public readonly field: string | undefined;
  /** Internal detail for logs. Never sent to the caller. */
  public readonly reason: string | undefined;

  constructor(
    public readonly kind: AuthErrorKind,
    message: string,
    options: { field?: string; reason?: string } = {},
  ) {
    super(message);
    this.name = 'AuthError';
    this.field = options.field;
    this.reason = options.reason;
  }

  static unauthorized(reason: string): AuthError {
    return new AuthError('UNAUTHORIZED', INVALID_CREDENTIALS, { reason });
  }

  static forbidden(reason: string): AuthError {
    return new AuthError('FORBIDDEN', NOT_PERMITTED, { reason });
  }

  static emailTaken(): AuthError {
    return new AuthError('CONFLICT', 'Email already registered', { field: 'email' });
  }
}

/** Raised by user repositories when an email is already taken within its scope. */
export class DuplicateEmailError extends Error {
  constructor() {
    super('Email already registered');
    this.name = 'DuplicateEmailError';
  }
}

export function isTokenExpired(expiresAt: Date, now: Date): boolean {
  return expiresAt.getTime() <= now.getTime();
}

export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

const PASSWORD_RULES: RegExp[] = [/[a-z]/, /[A-Z]/, /[0-9]/, /[^A-Za-z0-9]/];

export function isPasswordStrong(password: string): boolean {
  if (password.length < 8) return false;
  return PASSWORD_RULES.every((rule) => rule.test(password));
}

export function addDays(from: Date, days: number): Date {
  return new Date(from.getTime() + days * 24 * 60 * 60 * 1000);
}
