import { z } from 'zod';

export const EmailSchema = z
  .string()
  .trim()
  .toLowerCase()
  .min(3, 'Email is required')
  .max(254, 'Email must be at most 254 characters')
  .email('Email is not valid');

/** Shape only. Strength is a domain rule and is checked there. */
export const PasswordSchema = z
  .string()
  .min(1, 'Password is required')
  .max(128, 'Password must be at most 128 characters');

export const NewPasswordSchema = PasswordSchema.pipe(
  z.string().min(8, 'Password must be at least 8 characters'),
);

export const FullNameSchema = z.string().trim().min(1).max(100);

/** Row ids are UUIDs. */
export const IdSchema = z.string().uuid('Id must be a UUID');

export const RegisterRequestSchema = z
  .object({
    email: EmailSchema,
    password: NewPasswordSchema,
    confirmPassword: z.string(),
    fullName: FullNameSchema.optional(),
  })
  .refine((body) => body.password === body.confirmPassword, {
    message: 'Passwords do not match',
    path: ['confirmPassword'],
  });

export const LoginRequestSchema = z.object({
  email: EmailSchema,
  password: PasswordSchema,
});

/** Platform clients may rely on the cookie instead of a body. */
export const RefreshRequestSchema = z.object({
  refreshToken: z.string().min(1).optional(),
});

export const ClientRefreshRequestSchema = z.object({
  refreshToken: z.string().min(1, 'Refresh token is required'),
});

export type RegisterRequest = z.infer<typeof RegisterRequestSchema>;
export type LoginRequest = z.infer<typeof LoginRequestSchema>;
export type RefreshRequest = z.infer<typeof RefreshRequestSchema>;
export type ClientRefreshRequest = z.infer<typeof ClientRefreshRequestSchema>;
