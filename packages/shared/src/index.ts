export { createLogger, redact, type SafeLogger, type LoggerOptions } from './logger';
export { AppError, ErrorCode, INTERNAL_ERROR_MESSAGE } from './errors';
export {
  loadConfig,
  type BaseConfig,
  type ApiConfig,
  type JwtKeyConfig,
  BaseConfigSchema,
  DatabaseConfigSchema,
  JwtConfigSchema,
  ApiConfigSchema,
  MigratorConfigSchema,
} from './config';
export { Argon2PasswordHasher } from './auth/password-hasher';
export { JoseTokenService, type TokenServiceConfig } from './auth/token-service';
