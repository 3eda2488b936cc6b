import type Redis from 'ioredis';
import { z } from 'zod';
import { type SessionCache, type UserProfile } from '@contacts/domain';

const BLACKLIST_PREFIX = 'bl:';
const USER_PREFIX = 'user:';
const USER_TOKENS_PREFIX = 'user-tokens:';

const CachedUserSchema = z.object({
  id: z.string(),
  username: z.string(),
  email: z.string(),
  avatar: z.string().nullable(),
  confirmed: z.boolean(),
  role: z.enum(['user', 'admin']),
  createdAt: z.coerce.date(),
  updatedAt: z.coerce.date(),
});

function parseCachedUser(raw: string): UserProfile | null {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return null;
  }
  const result = CachedUserSchema.safeParse(json);
  return result.success ? result.data : null;
}

/**
 * Blacklist and user cache in Redis. `bl:{token}` marks a revoked access
 * token, `user:{token}` holds the profile resolved for it. Both expire with
 * the token. `user-tokens:{id}` indexes the cached tokens of one user and
 * lives as long as the longest of them.
 */
export class RedisSessionCache implements SessionCache {
  constructor(private readonly redis: Redis) {}

  async isRevoked(token: string): Promise<boolean> {
    return (await this.redis.exists(`${BLACKLIST_PREFIX}${token}`)) === 1;
  }

  async revoke(token: string, ttlSeconds: number): Promise<void> {
    await this.redis.set(`${BLACKLIST_PREFIX}${token}`, '1', 'EX', ttlSeconds);
    await this.redis.del(`${USER_PREFIX}${token}`);
  }

  // Entries that no longer match the profile shape count as a miss.
  async getUser(token: string): Promise<UserProfile | null> {
    const raw = await this.redis.get(`${USER_PREFIX}${token}`);
    return raw === null ? null : parseCachedUser(raw);
  }

  async setUser(token: string, user: UserProfile, ttlSeconds: number): Promise<void> {
    const indexKey = `${USER_TOKENS_PREFIX}${user.id}`;
    await this.redis.set(`${USER_PREFIX}${token}`, JSON.stringify(user), 'EX', ttlSeconds);
    await this.redis.sadd(indexKey, token);
    if ((await this.redis.ttl(indexKey)) < ttlSeconds) {
      await this.redis.expire(indexKey, ttlSeconds);
    }
  }

  async dropUserSessions(userId: string): Promise<void> {
    const indexKey = `${USER_TOKENS_PREFIX}${userId}`;
    const tokens = await this.redis.smembers(indexKey);
    await this.redis.del(...tokens.map((token) => `${USER_PREFIX}${token}`), indexKey);
  }
}

export class InMemorySessionCache implements SessionCache {
  private readonly entries = new Map<string, { value: string; expiresAt: number }>();
  private readonly userTokens = new Map<string, Set<string>>();

  constructor(private readonly clock: () => number = Date.now) {}

  async isRevoked(token: string): Promise<boolean> {
    return this.read(`${BLACKLIST_PREFIX}${token}`) !== null;
  }

  async revoke(token: string, ttlSeconds: number): Promise<void> {
    this.write(`${BLACKLIST_PREFIX}${token}`, '1', ttlSeconds);
    this.entries.delete(`${USER_PREFIX}${token}`);
  }

  async getUser(token: string): Promise<UserProfile | null> {
    const raw = this.read(`${USER_PREFIX}${token}`);
    return raw === null ? null : parseCachedUser(raw);
  }

  async setUser(token: string, user: UserProfile, ttlSeconds: number): Promise<void> {
    this.write(`${USER_PREFIX}${token}`, JSON.stringify(user), ttlSeconds);
    const tokens = this.userTokens.get(user.id) ?? new Set<string>();
    tokens.add(token);
    this.userTokens.set(user.id, tokens);
  }

  async dropUserSessions(userId: string): Promise<void> {
    for (const token of this.userTokens.get(userId) ?? []) {
      this.entries.delete(`${USER_PREFIX}${token}`);
    }
    this.userTokens.delete(userId);
  }

  private read(key: string): string | null {
    const entry = this.entries.get(key);
    if (!entry) return null;
    if (entry.expiresAt <= this.clock()) {
      this.entries.delete(key);
      return null;
    }
    return entry.value;
  }

  private write(key: string, value: string, ttlSeconds: number): void {
    this.entries.set(key, { value, expiresAt: this.clock() + ttlSeconds * 1000 });
  }
}
