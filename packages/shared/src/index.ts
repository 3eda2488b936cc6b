export { createLogger, errorMeta, sanitize, type SafeLogger } from './logger';
export { AppError, ErrorCode, type FieldIssue } from './errors';
export {
  loadConfig,
  type BaseConfig,
  type ApiConfig,
  type WorkerConfig,
  BaseConfigSchema,
  DatabaseConfigSchema,
  RedisConfigSchema,
  JwtConfigSchema,
  MailConfigSchema,
  StorageConfigSchema,
  ApiConfigSchema,
  WorkerConfigSchema,
} from './config';
export { touchHealthFile, startHealthBeat } from './healthcheck';
export { Argon2PasswordHasher, DEFAULT_ARGON2_COST, type Argon2Cost } from './auth/password-hasher';
export { JoseTokenService, type TokenServiceConfig } from './auth/token-service';
export { createRedisClient, closeRedis } from './redis';
export { RedisSessionCache, InMemorySessionCache } from './session-cache';
export {
  PostmarkMailer,
  escapeHtml,
  renderConfirmationEmail,
  renderPasswordResetEmail,
  type PostmarkMailerConfig,
  type PostmarkEmail,
} from './mailer';
export { S3AvatarStorage, avatarKey, type S3AvatarStorageConfig } from './object-storage';
export { GravatarAvatarResolver, gravatarUrl } from './gravatar';
