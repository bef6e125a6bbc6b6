import { z } from 'zod';
import { IdSchema } from './auth';

export const ProjectNameSchema = z
  .string()
  .trim()
  .min(1, 'Project name is required')
  .max(50, 'Project name must be at most 50 characters');

export const ProjectDescriptionSchema = z
  .string()
  .trim()
  .max(200, 'Description must be at most 200 characters');

export const CreateProjectRequestSchema = z.object({
  name: ProjectNameSchema,
  description: ProjectDescriptionSchema.nullable().optional(),
});

export const UpdateProjectRequestSchema = z
  .object({
    name: ProjectNameSchema.optional(),
    description: ProjectDescriptionSchema.nullable().optional(),
  })
  .refine((body) => body.name !== undefined || body.description !== undefined, {
    message: 'At least one field must be provided',
  });

export const CreateApiKeyRequestSchema = z.object({
  name: z.string().trim().min(1, 'Key name is required').max(50, 'Key name must be at most 50 characters'),
});

export const ListApiKeysQuerySchema = z.object({
  includeInactive: z
    .enum(['true', 'false'])
    .default('false')
    .transform((value) => value === 'true'),
});

export const MemberRoleSchema = z.enum(['ADMIN', 'MEMBER']);

export const AddMemberRequestSchema = z.object({
  userId: IdSchema,
  role: MemberRoleSchema.default('MEMBER'),
});

export const UpdateMemberRoleRequestSchema = z.object({
  role: MemberRoleSchema,
});

export const ProjectParamsSchema = z.object({
  projectId: IdSchema,
});

export const ApiKeyParamsSchema = ProjectParamsSchema.extend({
  keyId: IdSchema,
});

export const MemberParamsSchema = ProjectParamsSchema.extend({
  userId: IdSchema,
});

export type CreateProjectRequest = z.infer<typeof CreateProjectRequestSchema>;
export type UpdateProjectRequest = z.infer<typeof UpdateProjectRequestSchema>;
export type CreateApiKeyRequest = z.infer<typeof CreateApiKeyRequestSchema>;
export type AddMemberRequest = z.infer<typeof AddMemberRequestSchema>;
export type UpdateMemberRoleRequest = z.infer<typeof UpdateMemberRoleRequestSchema>;
