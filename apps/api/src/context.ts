import {
  AuthService,
  UserService,
  ContactService,
  type AvatarUploadPolicy,
} from '@contacts/domain';
import {
  createLogger,
  createRedisClient,
  closeRedis,
  JoseTokenService,
  Argon2PasswordHasher,
  RedisSessionCache,
  PostmarkMailer,
  S3AvatarStorage,
  GravatarAvatarResolver,
  type ApiConfig,
} from '@contacts/shared';
import {
  createPool,
  closePool,
  PgUserRepository,
  PgRefreshTokenRepository,
  PgContactRepository,
  type Queryable,
} from '@contacts/db';

export interface AppSettings {
  corsOrigin: string;
  maxAvatarBytes: number;
}

/**
 * Long-lived collaborators of the HTTP server. Built once at startup and
 * torn down by `close`.
 */
export interface AppContext {
  authService: AuthService;
  userService: UserService;
  contactService: ContactService;
  db: Queryable;
  settings: AppSettings;
  close(): Promise<void>;
}

export async function createAppContext(config: ApiConfig): Promise<AppContext> {
  const pool = createPool(config.DATABASE_URL);
  const redis = createRedisClient(config.REDIS_URL);

  const userRepo = new PgUserRepository(pool);
  const tokenService = new JoseTokenService({
    activeKid: config.JWT_ACTIVE_KID,
    keys: config.JWT_KEYS,
    accessTokenTtlMinutes: config.ACCESS_TOKEN_EXPIRE_MINUTES,
    emailTokenTtlDays: config.EMAIL_TOKEN_EXPIRE_DAYS,
  });
  const sessionCache = new RedisSessionCache(redis);
  const mailer = new PostmarkMailer({
    serverToken: config.POSTMARK_SERVER_TOKEN,
    from: config.MAIL_FROM,
    fromName: config.MAIL_FROM_NAME,
  });
  const avatarStorage = new S3AvatarStorage({
    endpoint: config.S3_ENDPOINT,
    publicUrl: config.S3_PUBLIC_URL,
    region: config.S3_REGION,
    accessKey: config.S3_ACCESS_KEY,
    secretKey: config.S3_SECRET_KEY,
    bucket: config.S3_BUCKET,
  });
  await avatarStorage.ensureBucket();

  const avatarUploadPolicy: AvatarUploadPolicy = config.AVATAR_UPLOAD_POLICY;

  const authService = new AuthService({
    userRepo,
    refreshTokenRepo: new PgRefreshTokenRepository(pool),
    passwordHasher: new Argon2PasswordHasher(),
    tokenService,
    sessionCache,
    avatarResolver: new GravatarAvatarResolver(),
    mailer,
    logger: createLogger({ name: 'auth', level: config.LOG_LEVEL }),
    refreshTokenTtlDays: config.REFRESH_TOKEN_EXPIRE_DAYS,
  });

  const userService = new UserService({
    userRepo,
    tokenService,
    sessionCache,
    mailer,
    avatarStorage,
    logger: createLogger({ name: 'users', level: config.LOG_LEVEL }),
    avatarUploadPolicy,
  });

  const contactService = new ContactService({
    contactRepo: new PgContactRepository(pool),
  });

  return {
    authService,
    userService,
    contactService,
    db: pool,
    settings: {
      corsOrigin: config.CORS_ORIGIN,
      maxAvatarBytes: config.MAX_AVATAR_BYTES,
    },
    async close() {
      await closeRedis(redis);
      await closePool(pool);
    },
  };
}
