import pino from 'pino';

// Compared after lower-casing and dropping `-` and `_`, so `X-Project-Api-Key`,
// `refresh_token` and `refreshToken` all match.
const SENSITIVE_KEYS = new Set([
  'password',
  'passwordhash',
  'currentpassword',
  'newpassword',
  'confirmpassword',
  'token',
  'accesstoken',
  'refreshtoken',
  'tokenhash',
  'secret',
  'key',
  'apikey',
  'xprojectapikey',
  'authorization',
  'cookie',
  'setcookie',
  'email',
  'ip',
  'ipaddress',
  'remoteaddress',
]);

const REDACTED = '[REDACTED]';
const MAX_DEPTH = 8;

function isSensitiveKey(key: string): boolean {
  return SENSITIVE_KEYS.has(key.toLowerCase().replace(/[-_]/g, ''));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function redactValue(value: unknown, depth: number): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (depth >= MAX_DEPTH) {
    return typeof value === 'object' && value !== null ? '[Truncated]' : value;
  }
  if (Array.isArray(value)) {
    return value.map((item) => redactValue(item, depth + 1));
  }
  if (isRecord(value)) {
    return redact(value, depth + 1);
  }
  return value;
}

/** Copy of `meta` with credential and PII fields masked at any depth. */
export function redact(meta: Record<string, unknown>, depth = 0): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(meta)) {
    result[key] = isSensitiveKey(key) ? REDACTED : redactValue(value, depth);
  }
  return result;
}

export interface SafeLogger {
  info(meta: Record<string, unknown>, msg: string): void;
  warn(meta: Record<string, unknown>, msg: string): void;
  error(meta: Record<string, unknown>, msg: string): void;
  debug(meta: Record<string, unknown>, msg: string): void;
  fatal(meta: Record<string, unknown>, msg: string): void;
  child(bindings: Record<string, unknown>): SafeLogger;
}

class RedactingLogger implements SafeLogger {
  constructor(private readonly inner: pino.Logger) {}

  info(meta: Record<string, unknown>, msg: string): void {
    this.inner.info(redact(meta), msg);
  }

  warn(meta: Record<string, unknown>, msg: string): void {
    this.inner.warn(redact(meta), msg);
  }

  error(meta: Record<string, unknown>, msg: string): void {
    this.inner.error(redact(meta), msg);
  }

  debug(meta: Record<string, unknown>, msg: string): void {
    this.inner.debug(redact(meta), msg);
  }

  fatal(meta: Record<string, unknown>, msg: string): void {
    this.inner.fatal(redact(meta), msg);
  }

  child(bindings: Record<string, unknown>): SafeLogger {
    return new RedactingLogger(this.inner.child(redact(bindings)));
  }
}

export interface LoggerOptions {
  name: string;
  level?: string;
  /** Defaults to stdout. */
  destination?: pino.DestinationStream;
}

export function createLogger(opts: LoggerOptions): SafeLogger {
  const options: pino.LoggerOptions = {
    name: opts.name,
    level: opts.level ?? process.env['LOG_LEVEL'] ?? 'info',
    timestamp: pino.stdTimeFunctions.isoTime,
  };
  const instance = opts.destination ? pino(options, opts.destination) : pino(options);
  return new RedactingLogger(instance);
}
