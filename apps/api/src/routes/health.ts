import { type FastifyInstance } from 'fastify';
import { AppError, ErrorCode, createLogger } from '@contacts/shared';
import { ping, type Queryable } from '@contacts/db';

const logger = createLogger({ name: 'api:health' });

export function registerHealthRoutes(app: FastifyInstance, deps: { db: Queryable }): void {
  app.get('/healthchecker', async (_request, reply) => {
    let healthy = false;
    try {
      healthy = await ping(deps.db);
    } catch (err) {
      logger.error({ err: err instanceof Error ? err.message : String(err) }, 'Database ping failed');
    }

    if (!healthy) {
      throw new AppError(ErrorCode.INTERNAL, 'Error connecting to the database');
    }
    return reply.status(200).send({ message: 'Welcome to Contacts API!' });
  });
}
