import { z } from 'zod';

export const BaseConfigSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
});

export type BaseConfig = z.infer<typeof BaseConfigSchema>;

export const DatabaseConfigSchema = z.object({
  DATABASE_URL: z.string().min(1),
});

export const RedisConfigSchema = z.object({
  REDIS_URL: z.string().default('redis://localhost:6379'),
});

const JwtKeySchema = z.object({
  kid: z.string().min(1),
  secret: z.string().min(32, 'JWT secrets must be at least 32 characters'),
});

export const JwtConfigSchema = z.object({
  JWT_ACTIVE_KID: z.string().min(1),
  JWT_KEYS: z
    .string()
    .transform((raw, ctx) => {
      try {
        const parsed: unknown = JSON.parse(raw);
        return parsed;
      } catch {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'JWT_KEYS must be valid JSON' });
        return z.NEVER;
      }
    })
    .pipe(z.array(JwtKeySchema).min(1, 'JWT_KEYS must contain at least one key')),
  ACCESS_TOKEN_EXPIRE_MINUTES: z.coerce.number().int().positive().default(30),
  REFRESH_TOKEN_EXPIRE_DAYS: z.coerce.number().int().positive().default(7),
  EMAIL_TOKEN_EXPIRE_DAYS: z.coerce.number().int().positive().default(7),
});

export const MailConfigSchema = z.object({
  POSTMARK_SERVER_TOKEN: z.string().optional(),
  MAIL_FROM: z.string().email().default('noreply@contacts.local'),
  MAIL_FROM_NAME: z.string().default('Contacts API'),
});

export const StorageConfigSchema = z.object({
  S3_ENDPOINT: z.string().url().default('http://localhost:9000'),
  S3_PUBLIC_URL: z.string().url().optional(),
  S3_REGION: z.string().default('us-east-1'),
  S3_ACCESS_KEY: z.string().min(1).default('minioadmin'),
  S3_SECRET_KEY: z.string().min(1).default('minioadmin'),
  S3_BUCKET: z.string().min(3).default('avatars'),
});

export const ApiConfigSchema = BaseConfigSchema.merge(DatabaseConfigSchema)
  .merge(RedisConfigSchema)
  .merge(JwtConfigSchema)
  .merge(MailConfigSchema)
  .merge(StorageConfigSchema)
  .extend({
    API_HOST: z.string().default('0.0.0.0'),
    API_PORT: z.coerce.number().default(8000),
    CORS_ORIGIN: z.string().default('*'),
    AVATAR_UPLOAD_POLICY: z.enum(['self', 'admin']).default('admin'),
    MAX_AVATAR_BYTES: z.coerce.number().int().positive().default(5 * 1024 * 1024),
  });

export type ApiConfig = z.infer<typeof ApiConfigSchema>;

export const WorkerConfigSchema = BaseConfigSchema.merge(DatabaseConfigSchema).extend({
  REFRESH_TOKEN_RETENTION_DAYS: z.coerce.number().int().min(0).default(30),
  RETENTION_INTERVAL_MS: z.coerce.number().int().positive().default(60 * 60 * 1000),
  WORKER_HEALTHCHECK_PATH: z.string().default('/tmp/.worker-healthy'),
});

export type WorkerConfig = z.infer<typeof WorkerConfigSchema>;

export function loadConfig<T extends z.ZodType>(
  schema: T,
  env: Record<string, string | undefined> = process.env,
): z.infer<T> {
  const result = schema.safeParse(env);
  if (!result.success) {
    const formatted = result.error.issues
      .map((issue) => `  ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new Error(`Config validation failed:\n${formatted}`);
  }
  return result.data;
}
