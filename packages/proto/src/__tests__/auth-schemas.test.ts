import { describe, it, expect } from 'vitest';
import {
  EmailSchema,
  NewPasswordSchema,
  RegisterRequestSchema,
  LoginRequestSchema,
  RefreshRequestSchema,
  ClientRefreshRequestSchema,
} from '../api/auth';

describe('EmailSchema', () => {
  it('trims and lower-cases', () => {
    expect(EmailSchema.parse('  Alice@Example.COM ')).toBe('alice@example.com');
  });

  it('rejects malformed addresses', () => {
    expect(EmailSchema.safeParse('alice').success).toBe(false);
    expect(EmailSchema.safeParse('alice@').success).toBe(false);
  });
});

describe('NewPasswordSchema', () => {
  it('requires at least 8 characters', () => {
    expect(NewPasswordSchema.safeParse('Sh0rt!').success).toBe(false);
    expect(NewPasswordSchema.parse('Secret123!')).toBe('Secret123!');
  });

  it('rejects overly long passwords', () => {
    expect(NewPasswordSchema.safeParse('Aa1!'.repeat(33)).success).toBe(false);
  });
});

describe('RegisterRequestSchema', () => {
  it('accepts a matching confirmation', () => {
    const result = RegisterRequestSchema.parse({
      email: 'A@X.com',
      password: 'Secret123!',
      confirmPassword: 'Secret123!',
      fullName: ' Ada ',
    });
    expect(result).toEqual({
      email: 'a@x.com',
      password: 'Secret123!',
      confirmPassword: 'Secret123!',
      fullName: 'Ada',
    });
  });

  it('reports a mismatched confirmation on confirmPassword', () => {
    const result = RegisterRequestSchema.safeParse({
      email: 'a@x.com',
      password: 'Secret123!',
      confirmPassword: 'Secret123?',
    });

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.issues).toHaveLength(1);
    expect(result.error.issues[0]?.path).toEqual(['confirmPassword']);
    expect(result.error.issues[0]?.message).toBe('Passwords do not match');
  });
});

describe('LoginRequestSchema', () => {
  it('does not apply the new-password length rule', () => {
    expect(LoginRequestSchema.safeParse({ email: 'a@x.com', password: 'x' }).success).toBe(true);
  });

  it('requires a password', () => {
    expect(LoginRequestSchema.safeParse({ email: 'a@x.com', password: '' }).success).toBe(false);
  });
});

describe('refresh schemas', () => {
  it('platform refresh may omit the token', () => {
    expect(RefreshRequestSchema.parse({})).toEqual({});
  });

  it('client refresh requires the token', () => {
    expect(ClientRefreshRequestSchema.safeParse({}).success).toBe(false);
    expect(ClientRefreshRequestSchema.parse({ refreshToken: 'opaque' })).toEqual({ refreshToken: 'opaque' });
  });
});
