import { type FastifyInstance } from 'fastify';
import { AppError, ErrorCode, type SafeLogger } from '@botm/shared';

export function registerErrorHandler(app: FastifyInstance, logger: SafeLogger): void {
  app.setErrorHandler((error, request, reply) => {
    if (error instanceof AppError) {
      logger.warn({ code: error.code, method: request.method, url: request.url }, error.message);
      return reply.status(error.httpStatus).send(error.toJSON());
    }

    // Fastify's own errors (bad JSON, unsupported media type) carry a 4xx status
    if (typeof error.statusCode === 'number' && error.statusCode >= 400 && error.statusCode < 500) {
      return reply.status(error.statusCode).send({ code: ErrorCode.VALIDATION, message: error.message });
    }

    logger.error({ err: error, method: request.method, url: request.url }, 'Unhandled error');

    return reply.status(500).send({
      code: ErrorCode.INTERNAL,
      message: 'Internal server error',
    });
  });
}
