import { z } from 'zod';

export const BaseConfigSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
});

export type BaseConfig = z.infer<typeof BaseConfigSchema>;

export const DatabaseConfigSchema = z.object({
  DATABASE_URL: z.string().min(1),
});

const JwtKeySchema = z.object({
  kid: z.string().min(1),
  secret: z.string().min(32, 'JWT secrets must be at least 32 characters'),
});

export type JwtKeyConfig = z.infer<typeof JwtKeySchema>;

const JwtKeysSchema = z
  .string()
  .transform((raw, ctx) => {
    try {
      const parsed: unknown = JSON.parse(raw);
      return parsed;
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'JWT_KEYS must be a JSON array' });
      return z.NEVER;
    }
  })
  .pipe(z.array(JwtKeySchema).min(1));

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

export const JwtConfigSchema = z.object({
  JWT_ACTIVE_KID: z.string().min(1),
  JWT_KEYS: JwtKeysSchema,
  JWT_ISSUER: z.string().min(1).default('tenantgate'),
  ACCESS_TOKEN_TTL_SECONDS: z.coerce.number().int().positive().default(1800),
  REFRESH_TOKEN_TTL_DAYS: z.coerce.number().int().positive().default(7),
});

export const ApiConfigSchema = BaseConfigSchema.merge(DatabaseConfigSchema)
  .merge(JwtConfigSchema)
  .extend({
    API_HOST: z.string().default('0.0.0.0'),
    API_PORT: z.coerce.number().int().min(1).max(65535).default(3000),
    COOKIE_SECURE: booleanFlag.default('true'),
  })
  .superRefine((config, ctx) => {
    if (!config.JWT_KEYS.some((key) => key.kid === config.JWT_ACTIVE_KID)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['JWT_ACTIVE_KID'],
        message: `No key with kid '${config.JWT_ACTIVE_KID}' in JWT_KEYS`,
      });
    }
    const kids = new Set(config.JWT_KEYS.map((key) => key.kid));
    if (kids.size !== config.JWT_KEYS.length) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['JWT_KEYS'], message: 'Duplicate kid' });
    }
  });

export type ApiConfig = z.infer<typeof ApiConfigSchema>;

export const MigratorConfigSchema = BaseConfigSchema.merge(DatabaseConfigSchema);

export function loadConfig<T extends z.ZodType>(
  schema: T,
  env: Record<string, string | undefined> = process.env,
): z.infer<T> {
  const result = schema.safeParse(env);
  if (!result.success) {
    const formatted = result.error.issues
      .map((issue) => `  ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new Error(`Config validation failed:\n${formatted}`);
  }
  return result.data;
}
