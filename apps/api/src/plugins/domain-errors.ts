import { z } from 'zod';
import { AppError, ErrorCode, createLogger } from '@tenantgate/shared';
import { AuthError, ProjectError, type AuthErrorKind } from '@tenantgate/domain';

const logger = createLogger({ name: 'api:domain' });

const KIND_TO_CODE: Record<AuthErrorKind, ErrorCode> = {
  UNAUTHORIZED: ErrorCode.UNAUTHORIZED,
  FORBIDDEN: ErrorCode.FORBIDDEN,
  CONFLICT: ErrorCode.CONFLICT,
  VALIDATION: ErrorCode.VALIDATION,
  NOT_FOUND: ErrorCode.NOT_FOUND,
};

/** Rethrows domain errors as client-safe `AppError`s; anything else passes through untouched. */
export function mapDomainError(err: unknown): never {
  if (err instanceof AuthError) {
    if (err.reason) {
      logger.warn({ kind: err.kind, reason: err.reason }, 'Request refused');
    }
    throw new AppError(KIND_TO_CODE[err.kind], err.message, err.field ? { field: err.field } : {});
  }
  if (err instanceof ProjectError) {
    throw new AppError(KIND_TO_CODE[err.kind], err.message);
  }
  throw err;
}

/** Parses `input` or throws a 422 listing each issue. */
export function parseOrThrow<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  input: unknown,
  message: string,
): T {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new AppError(ErrorCode.VALIDATION, message, {
      issues: parsed.error.issues.map((i) => ({ path: i.path.join('.'), message: i.message })),
    });
  }
  return parsed.data;
}
