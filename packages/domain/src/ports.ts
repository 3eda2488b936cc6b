import { type User, type UserProfile, type NewUser, type RefreshToken, type NewRefreshToken } from './user';

/**
 * Basic persistence operations shared by every table-backed repository.
 * Each call runs in its own implicit transaction.
 */
export interface Repository<TEntity, TCreate> {
  create(input: TCreate): Promise<TEntity>;
  findAll(): Promise<TEntity[]>;
  findById(id: string): Promise<TEntity | null>;
  delete(id: string): Promise<boolean>;
}

export interface UserRepository extends Repository<User, NewUser> {
  findByUsername(username: string): Promise<User | null>;
  findByEmail(email: string): Promise<User | null>;
  confirmEmail(email: string): Promise<void>;
  updateAvatar(id: string, url: string): Promise<User | null>;
  updatePassword(email: string, passwordHash: string): Promise<void>;
}

export interface RefreshTokenRepository extends Repository<RefreshToken, NewRefreshToken> {
  findByTokenHash(hash: string): Promise<RefreshToken | null>;
  findActiveToken(hash: string, now: Date): Promise<RefreshToken | null>;
  revoke(id: string): Promise<void>;
  deleteExpired(olderThanDays: number): Promise<number>;
}

export interface PasswordHasher {
  hash(password: string): Promise<string>;
  verify(password: string, hash: string): Promise<boolean>;
}

export interface TokenService {
  signAccessToken(subject: string): Promise<string>;
  verifyAccessToken(token: string): Promise<{ subject: string; expiresAt: Date }>;
  signEmailToken(email: string): Promise<string>;
  verifyEmailToken(token: string): Promise<string>;
  generateRefreshToken(): string;
  hashRefreshToken(token: string): string;
}

/**
 * Advisory per-token state: the access-token blacklist and the resolved
 * user cache. Entries expire on their own; `dropUserSessions` forgets the
 * cached profile under every token of one user.
 */
export interface SessionCache {
  isRevoked(token: string): Promise<boolean>;
  revoke(token: string, ttlSeconds: number): Promise<void>;
  getUser(token: string): Promise<UserProfile | null>;
  setUser(token: string, user: UserProfile, ttlSeconds: number): Promise<void>;
  dropUserSessions(userId: string): Promise<void>;
}

export interface Mailer {
  sendEmailConfirmation(input: { to: string; username: string; link: string }): Promise<void>;
  sendPasswordReset(input: { to: string; link: string }): Promise<void>;
}

export interface AvatarStorage {
  uploadAvatar(username: string, body: Buffer, contentType: string): Promise<string>;
}

export interface AvatarResolver {
  defaultAvatarFor(email: string): Promise<string | null>;
}

export interface LoggerPort {
  info(meta: Record<string, unknown>, msg: string): void;
  warn(meta: Record<string, unknown>, msg: string): void;
  error(meta: Record<string, unknown>, msg: string): void;
}
