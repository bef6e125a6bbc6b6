import { z } from 'zod';
import { EmailSchema, FullNameSchema, IdSchema, NewPasswordSchema, PasswordSchema } from './auth';

export const UpdateMeRequestSchema = z
  .object({
    email: EmailSchema.optional(),
    fullName: FullNameSchema.nullable().optional(),
    password: NewPasswordSchema.optional(),
  })
  .refine((body) => Object.values(body).some((value) => value !== undefined), {
    message: 'At least one field must be provided',
  });

export const ChangePasswordRequestSchema = z.object({
  currentPassword: PasswordSchema,
  newPassword: NewPasswordSchema,
});

export const UserIdParamsSchema = z.object({
  userId: IdSchema,
});

export type UpdateMeRequest = z.infer<typeof UpdateMeRequestSchema>;
export type ChangePasswordRequest = z.infer<typeof ChangePasswordRequestSchema>;
