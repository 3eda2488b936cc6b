import { type FastifyRequest, type FastifyReply } from 'fastify';
import { AppError, ErrorCode, createLogger } from '@contacts/shared';

const logger = createLogger({ name: 'api:rate-limit' });

interface RateLimitBucket {
  count: number;
  resetAt: number;
}

export interface RateLimitOptions {
  windowMs: number;
  maxRequests: number;
  now?: () => number;
}

/**
 * Fixed-window in-memory limiter keyed by client IP. Each limiter keeps its
 * own buckets, so endpoints limited separately do not share a budget.
 */
export function createRateLimiter(opts: RateLimitOptions) {
  const buckets = new Map<string, RateLimitBucket>();
  const now = opts.now ?? Date.now;

  setInterval(() => {
    const current = now();
    for (const [key, bucket] of buckets) {
      if (bucket.resetAt <= current) {
        buckets.delete(key);
      }
    }
  }, opts.windowMs).unref();

  return async function rateLimit(request: FastifyRequest, reply: FastifyReply) {
    const key = request.ip || 'unknown';
    const current = now();

    let bucket = buckets.get(key);
    if (!bucket || bucket.resetAt <= current) {
      bucket = { count: 0, resetAt: current + opts.windowMs };
      buckets.set(key, bucket);
    }

    bucket.count++;
    if (bucket.count > opts.maxRequests) {
      logger.warn({ requestId: request.id, url: request.url }, 'Rate limit exceeded');
      reply.header('Retry-After', String(Math.ceil((bucket.resetAt - current) / 1000)));
      throw new AppError(ErrorCode.RATE_LIMITED, 'Too many requests, please try again later');
    }
  };
}
