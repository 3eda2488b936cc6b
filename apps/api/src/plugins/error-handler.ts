import { type FastifyInstance } from 'fastify';
import { AppError, ErrorCode, createLogger } from '@contacts/shared';

const logger = createLogger({ name: 'api:error' });

export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((error, request, reply) => {
    if (error instanceof AppError) {
      logger.warn(
        { code: error.code, requestId: request.id, ...error.safeMeta },
        error.message,
      );
      return reply.status(error.httpStatus).send(error.toJSON());
    }

    // Client errors raised by Fastify or its plugins (bad JSON, wrong media type, oversized upload).
    if (error.statusCode !== undefined && error.statusCode < 500) {
      logger.warn({ requestId: request.id, fastifyCode: error.code }, error.message);
      return reply.status(error.statusCode).send({
        code: ErrorCode.BAD_REQUEST,
        message: error.message,
      });
    }

    logger.error({ err: error.message, requestId: request.id }, 'Unhandled error');

    return reply.status(500).send({
      code: ErrorCode.INTERNAL,
      message: 'Internal server error',
    });
  });
}
