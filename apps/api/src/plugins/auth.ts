import { type FastifyRequest } from 'fastify';
import { AppError, ErrorCode, createLogger } from '@tenantgate/shared';
import {
  INVALID_CREDENTIALS,
  NOT_PERMITTED,
  type AuthorizationDispatcher,
  type AuthState,
  type AuthStateName,
  type CredentialMaterial,
} from '@tenantgate/domain';

declare module 'fastify' {
  interface FastifyRequest {
    auth?: AuthState;
  }
}

export const API_KEY_HEADER = 'x-project-api-key';
export const ACCESS_TOKEN_COOKIE = 'access_token';
export const REFRESH_TOKEN_COOKIE = 'refresh_token';

export type PlatformAuth = Extract<AuthState, { state: 'PLATFORM_AUTHENTICATED' }>;
export type ProjectKeyAuth = Extract<AuthState, { state: 'PROJECT_KEY_AUTHENTICATED' }>;
export type ClientAuth = Extract<AuthState, { state: 'CLIENT_AUTHENTICATED' }>;

const logger = createLogger({ name: 'api:auth' });

function unauthorized(): AppError {
  return new AppError(ErrorCode.UNAUTHORIZED, INVALID_CREDENTIALS);
}

function forbidden(): AppError {
  return new AppError(ErrorCode.FORBIDDEN, NOT_PERMITTED);
}

function headerValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

export function credentialMaterial(request: FastifyRequest): CredentialMaterial {
  return {
    apiKeyHeader: headerValue(request.headers[API_KEY_HEADER]),
    authorizationHeader: request.headers.authorization,
    accessTokenCookie: request.cookies[ACCESS_TOKEN_COOKIE],
  };
}

/**
 * preHandler guards. Each runs the dispatcher once, stores the resulting state on
 * `request.auth`, and rejects principals of the wrong kind with 403.
 */
export function createAuthGuards<Tx>(dispatcher: AuthorizationDispatcher<Tx>) {
  async function authenticate(request: FastifyRequest): Promise<AuthState> {
    const state = await dispatcher.authenticate(credentialMaterial(request));

    if (state.state === 'DENIED') {
      logger.warn(
        { requestId: request.id, reason: state.reason, detail: state.detail },
        'Credential denied',
      );
      throw state.reason === 'AUTHORIZATION_DENIED' ? forbidden() : unauthorized();
    }
    if (state.state === 'UNAUTHENTICATED') {
      throw unauthorized();
    }

    request.auth = state;
    return state;
  }

  function guard(accepted: AuthStateName[]) {
    return async function requireAuth(request: FastifyRequest): Promise<void> {
      const state = await authenticate(request);
      if (!accepted.includes(state.state)) {
        logger.warn({ requestId: request.id, state: state.state }, 'Wrong principal for route');
        throw forbidden();
      }
    };
  }

  return {
    requirePlatform: guard(['PLATFORM_AUTHENTICATED']),
    requireProjectKey: guard(['PROJECT_KEY_AUTHENTICATED']),
    requireClient: guard(['CLIENT_AUTHENTICATED']),
    requireProjectContext: guard(['PROJECT_KEY_AUTHENTICATED', 'CLIENT_AUTHENTICATED']),
  };
}

export type AuthGuards = ReturnType<typeof createAuthGuards>;

// Accessors for handlers behind the matching guard. Reaching the throw means a
// route was registered without its guard.

export function platformAuth(request: FastifyRequest): PlatformAuth {
  const auth = request.auth;
  if (auth?.state === 'PLATFORM_AUTHENTICATED') return auth;
  throw AppError.internal();
}

export function projectKeyAuth(request: FastifyRequest): ProjectKeyAuth {
  const auth = request.auth;
  if (auth?.state === 'PROJECT_KEY_AUTHENTICATED') return auth;
  throw AppError.internal();
}

export function clientAuth(request: FastifyRequest): ClientAuth {
  const auth = request.auth;
  if (auth?.state === 'CLIENT_AUTHENTICATED') return auth;
  throw AppError.internal();
}

export function projectContextAuth(request: FastifyRequest): ProjectKeyAuth | ClientAuth {
  const auth = request.auth;
  if (auth?.state === 'PROJECT_KEY_AUTHENTICATED' || auth?.state === 'CLIENT_AUTHENTICATED') {
    return auth;
  }
  throw AppError.internal();
}
