import { type User, type UserProfile, type ClientInfo, type TokenPair } from './user';
import { isRefreshTokenActive, secondsUntil, toUserProfile } from './auth';
import {
  type UserRepository,
  type RefreshTokenRepository,
  type PasswordHasher,
  type TokenService,
  type SessionCache,
  type AvatarResolver,
  type Mailer,
  type LoggerPort,
} from './ports';

export interface AuthServiceDeps {
  userRepo: UserRepository;
  refreshTokenRepo: RefreshTokenRepository;
  passwordHasher: PasswordHasher;
  tokenService: TokenService;
  sessionCache: SessionCache;
  avatarResolver: AvatarResolver;
  mailer: Mailer;
  logger: LoggerPort;
  refreshTokenTtlDays: number;
  now?: () => Date;
}

const INVALID_CREDENTIALS = 'Incorrect username or password';

export class AuthService {
  constructor(private readonly deps: AuthServiceDeps) {}

  async register(input: { username: string; email: string; password: string }): Promise<User> {
    const { userRepo, passwordHasher, avatarResolver, logger } = this.deps;

    if (await userRepo.findByUsername(input.username)) {
      throw new AuthError('CONFLICT', 'User already exists');
    }
    if (await userRepo.findByEmail(input.email)) {
      throw new AuthError('CONFLICT', 'Email already exists');
    }

    let avatar: string | null = null;
    try {
      avatar = await avatarResolver.defaultAvatarFor(input.email);
    } catch (err) {
      logger.warn(
        { err: err instanceof Error ? err.message : String(err) },
        'Default avatar lookup failed',
      );
    }

    const passwordHash = await passwordHasher.hash(input.password);

    return userRepo.create({
      username: input.username,
      email: input.email,
      passwordHash,
      avatar,
      role: 'user',
    });
  }

  async authenticate(username: string, password: string): Promise<User> {
    const user = await this.deps.userRepo.findByUsername(username);
    if (!user) {
      throw new AuthError('UNAUTHORIZED', INVALID_CREDENTIALS);
    }
    if (!user.confirmed) {
      throw new AuthError('UNAUTHORIZED', 'Email address not confirmed');
    }

    const valid = await this.deps.passwordHasher.verify(password, user.passwordHash);
    if (!valid) {
      throw new AuthError('UNAUTHORIZED', INVALID_CREDENTIALS);
    }

    return user;
  }

  async createAccessToken(username: string): Promise<string> {
    return this.deps.tokenService.signAccessToken(username);
  }

  /** Persists only the hash; the raw secret is handed back exactly once. */
  async createRefreshToken(userId: string, client: ClientInfo): Promise<string> {
    const { tokenService, refreshTokenRepo, refreshTokenTtlDays } = this.deps;

    const raw = tokenService.generateRefreshToken();
    await refreshTokenRepo.create({
      userId,
      tokenHash: tokenService.hashRefreshToken(raw),
      expiresAt: new Date(this.now().getTime() + refreshTokenTtlDays * 24 * 60 * 60 * 1000),
      ipAddress: client.ip,
      userAgent: client.userAgent,
    });
    return raw;
  }

  async decodeAccessToken(token: string): Promise<{ subject: string; expiresAt: Date }> {
    try {
      return await this.deps.tokenService.verifyAccessToken(token);
    } catch {
      throw new AuthError('UNAUTHORIZED', 'Token wrong');
    }
  }

  async getCurrentUser(token: string): Promise<UserProfile> {
    if (await this.isAccessTokenRevoked(token)) {
      throw new AuthError('UNAUTHORIZED', 'Token revoked');
    }

    const cached = await this.readCachedUser(token);
    if (cached) return cached;

    const { subject, expiresAt } = await this.decodeAccessToken(token);
    const user = await this.deps.userRepo.findByUsername(subject);
    if (!user) {
      throw new AuthError('UNAUTHORIZED', 'Could not validate credentials');
    }

    const profile = toUserProfile(user);
    await this.cacheUser(token, profile, expiresAt);
    return profile;
  }

  async validateRefreshToken(raw: string): Promise<User> {
    const { tokenService, refreshTokenRepo, userRepo } = this.deps;

    const now = this.now();
    const stored = await refreshTokenRepo.findActiveToken(tokenService.hashRefreshToken(raw), now);
    if (!stored || !isRefreshTokenActive(stored, now)) {
      throw new AuthError('UNAUTHORIZED', 'Invalid refresh token');
    }

    const user = await userRepo.findById(stored.userId);
    if (!user) {
      throw new AuthError('UNAUTHORIZED', 'Invalid refresh token');
    }
    return user;
  }

  async revokeRefreshToken(raw: string): Promise<void> {
    const { tokenService, refreshTokenRepo, logger } = this.deps;

    const stored = await refreshTokenRepo.findByTokenHash(tokenService.hashRefreshToken(raw));
    if (stored && stored.revokedAt === null) {
      await refreshTokenRepo.revoke(stored.id);
      logger.info({ tokenId: stored.id, userId: stored.userId }, 'Refresh token revoked');
    }
  }

  /** Blacklists the token until the moment it would have expired anyway. */
  async revokeAccessToken(token: string): Promise<void> {
    const { expiresAt } = await this.decodeAccessToken(token);
    await this.blacklist(token, expiresAt);
  }

  async login(credentials: { username: string; password: string }, client: ClientInfo): Promise<TokenPair> {
    const user = await this.authenticate(credentials.username, credentials.password);
    return this.issueTokens(user, client);
  }

  async refresh(rawRefreshToken: string, client: ClientInfo): Promise<TokenPair> {
    const user = await this.validateRefreshToken(rawRefreshToken);
    const pair = await this.issueTokens(user, client);
    await this.revokeRefreshToken(rawRefreshToken);
    return pair;
  }

  /**
   * The refresh token is revoked in the database first. A blacklist write
   * that fails is logged and the access token lives out its short lifetime.
   */
  async logout(accessToken: string, rawRefreshToken: string): Promise<void> {
    await this.revokeRefreshToken(rawRefreshToken);

    const { expiresAt } = await this.decodeAccessToken(accessToken);
    try {
      await this.blacklist(accessToken, expiresAt);
    } catch (err) {
      this.deps.logger.warn(
        { err: err instanceof Error ? err.message : String(err) },
        'Blacklist write failed, access token stays valid until expiry',
      );
    }
  }

  async requestPasswordReset(email: string, baseUrl: string): Promise<void> {
    const { userRepo, tokenService, mailer, logger } = this.deps;

    const user = await userRepo.findByEmail(email);
    if (!user) {
      throw new AuthError('NOT_FOUND', 'User not found');
    }

    const token = await tokenService.signEmailToken(user.email);
    try {
      await mailer.sendPasswordReset({
        to: user.email,
        link: `${baseUrl}api/auth/reset_password/${token}`,
      });
    } catch (err) {
      logger.error(
        { userId: user.id, err: err instanceof Error ? err.message : String(err) },
        'Password reset email failed',
      );
    }
  }

  async verifyResetToken(token: string): Promise<string> {
    try {
      return await this.deps.tokenService.verifyEmailToken(token);
    } catch {
      throw new AuthError('BAD_REQUEST', 'Invalid or expired token');
    }
  }

  async resetPassword(token: string, newPassword: string): Promise<void> {
    const { tokenService, userRepo, passwordHasher } = this.deps;

    let email: string;
    try {
      email = await tokenService.verifyEmailToken(token);
    } catch {
      throw new AuthError('UNAUTHORIZED', 'Token wrong');
    }
    if (!email) {
      throw new AuthError('BAD_REQUEST', 'Invalid token: no email');
    }

    const user = await userRepo.findByEmail(email);
    if (!user) {
      throw new AuthError('NOT_FOUND', 'User not found');
    }

    await userRepo.updatePassword(user.email, await passwordHasher.hash(newPassword));
  }

  private async issueTokens(user: User, client: ClientInfo): Promise<TokenPair> {
    const accessToken = await this.createAccessToken(user.username);
    const refreshToken = await this.createRefreshToken(user.id, client);
    return { accessToken, refreshToken, tokenType: 'bearer' };
  }

  private async blacklist(token: string, expiresAt: Date): Promise<void> {
    const ttl = secondsUntil(expiresAt, this.now());
    if (ttl > 0) {
      await this.deps.sessionCache.revoke(token, ttl);
    }
  }

  private async isAccessTokenRevoked(token: string): Promise<boolean> {
    try {
      return await this.deps.sessionCache.isRevoked(token);
    } catch (err) {
      this.deps.logger.warn(
        { err: err instanceof Error ? err.message : String(err) },
        'Blacklist lookup failed, continuing without cache',
      );
      return false;
    }
  }

  private async readCachedUser(token: string): Promise<UserProfile | null> {
    try {
      return await this.deps.sessionCache.getUser(token);
    } catch (err) {
      this.deps.logger.warn(
        { err: err instanceof Error ? err.message : String(err) },
        'User cache read failed, falling back to database',
      );
      return null;
    }
  }

  private async cacheUser(token: string, user: UserProfile, expiresAt: Date): Promise<void> {
    const ttl = secondsUntil(expiresAt, this.now());
    if (ttl <= 0) return;
    try {
      await this.deps.sessionCache.setUser(token, user, ttl);
    } catch (err) {
      this.deps.logger.warn(
        { userId: user.id, err: err instanceof Error ? err.message : String(err) },
        'User cache write failed',
      );
    }
  }

  private now(): Date {
    return this.deps.now ? this.deps.now() : new Date();
  }
}

export class AuthError extends Error {
  constructor(
    public readonly kind: 'UNAUTHORIZED' | 'CONFLICT' | 'VALIDATION' | 'NOT_FOUND' | 'BAD_REQUEST',
    message: string,
  ) {
    super(message);
    this.name = 'AuthError';
  }
}
