import Redis from 'ioredis';
import { createLogger } from './logger';

const logger = createLogger({ name: 'redis' });

export function createRedisClient(url: string): Redis {
  const client = new Redis(url, { lazyConnect: false, maxRetriesPerRequest: 3 });
  client.on('error', (err: Error) => {
    logger.warn({ err: err.message }, 'Redis connection error');
  });
  logger.info({}, 'Redis client initialized');
  return client;
}

export async function closeRedis(client: Redis): Promise<void> {
  await client.quit();
  logger.info({}, 'Redis client closed');
}
