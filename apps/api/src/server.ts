import Fastify from 'fastify';
import cors from '@fastify/cors';
import formbody from '@fastify/formbody';
import multipart from '@fastify/multipart';
import { AppError, ErrorCode, createLogger } from '@contacts/shared';
import { type AppContext } from './context';
import { registerErrorHandler } from './plugins/error-handler';
import { createAuthMiddleware } from './plugins/auth';
import { createRateLimiter } from './plugins/rate-limit';
import { registerAuthRoutes } from './routes/auth';
import { registerUserRoutes } from './routes/users';
import { registerContactRoutes } from './routes/contacts';
import { registerHealthRoutes } from './routes/health';

const logger = createLogger({ name: 'api' });

export async function buildServer(ctx: AppContext) {
  const app = Fastify({
    logger: false,
    bodyLimit: 1_048_576,
    ignoreTrailingSlash: true,
    // Emailed links carry a signed token as their last path segment.
    maxParamLength: 2048,
  });

  registerErrorHandler(app);
  app.setNotFoundHandler((request, reply) => {
    const error = new AppError(ErrorCode.NOT_FOUND, `Route ${request.method}:${request.url} not found`);
    return reply.status(error.httpStatus).send(error.toJSON());
  });

  await app.register(cors, { origin: ctx.settings.corsOrigin });
  await app.register(formbody);
  await app.register(multipart, {
    limits: { fileSize: ctx.settings.maxAvatarBytes, files: 1 },
    throwFileSizeLimit: true,
  });

  const authenticate = createAuthMiddleware(ctx.authService);
  const authRateLimit = createRateLimiter({ windowMs: 60_000, maxRequests: 20 });
  const meRateLimit = createRateLimiter({ windowMs: 60_000, maxRequests: 10 });

  app.get('/', async () => {
    return { message: 'Contacts App!' };
  });

  await app.register(
    async (api) => {
      registerHealthRoutes(api, { db: ctx.db });
      registerAuthRoutes(api, {
        authService: ctx.authService,
        userService: ctx.userService,
        authenticate,
        authRateLimit,
      });
      registerUserRoutes(api, { userService: ctx.userService, authenticate, meRateLimit });
      registerContactRoutes(api, { contactService: ctx.contactService, authenticate });
    },
    { prefix: '/api' },
  );

  app.addHook('onRequest', (request, _reply, done) => {
    logger.info({ method: request.method, url: request.url, requestId: request.id }, 'Incoming request');
    done();
  });

  app.addHook('onResponse', (request, reply, done) => {
    logger.info(
      { method: request.method, url: request.url, statusCode: reply.statusCode, requestId: request.id },
      'Request completed',
    );
    done();
  });

  return app;
}
