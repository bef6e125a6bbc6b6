import { type FastifyInstance } from 'fastify';
import { AppError, ErrorCode, INTERNAL_ERROR_MESSAGE, createLogger } from '@tenantgate/shared';

const logger = createLogger({ name: 'api:error' });

export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((error, request, reply) => {
    if (error instanceof AppError) {
      logger.warn(
        { code: error.code, requestId: request.id, ...error.safeMeta },
        error.message,
      );
      if (error.httpStatus === 401) {
        reply.header('WWW-Authenticate', 'Bearer');
      }
      return reply.status(error.httpStatus).send(error.toJSON());
    }

    // Malformed JSON and oversized bodies come from Fastify itself.
    if (error.statusCode !== undefined && error.statusCode >= 400 && error.statusCode < 500) {
      logger.warn({ code: error.code, requestId: request.id }, error.message);
      return reply.status(error.statusCode).send({
        code: ErrorCode.BAD_REQUEST,
        message: 'Malformed request',
      });
    }

    logger.error({ err: error, requestId: request.id }, 'Unhandled error');

    return reply.status(500).send({
      code: ErrorCode.INTERNAL,
      message: INTERNAL_ERROR_MESSAGE,
    });
  });
}
