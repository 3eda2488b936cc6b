import {
  S3Client,
  PutObjectCommand,
  HeadBucketCommand,
  CreateBucketCommand,
} from '@aws-sdk/client-s3';
import { type AvatarStorage } from '@contacts/domain';

export interface S3AvatarStorageConfig {
  endpoint: string;
  region: string;
  accessKey: string;
  secretKey: string;
  bucket: string;
  /** Base URL clients reach the bucket through. Falls back to endpoint if not set. */
  publicUrl?: string;
}

const EXTENSIONS: Record<string, string> = {
  'image/png': 'png',
  'image/jpeg': 'jpg',
  'image/gif': 'gif',
  'image/webp': 'webp',
};

export function avatarKey(username: string, contentType: string): string {
  const extension = EXTENSIONS[contentType];
  const base = `avatars/${encodeURIComponent(username)}`;
  return extension ? `${base}.${extension}` : base;
}

/** S3-compatible avatar store (MinIO locally). Objects are addressed by username. */
export class S3AvatarStorage implements AvatarStorage {
  private readonly client: S3Client;
  private readonly bucket: string;
  private readonly publicUrl: string;

  constructor(config: S3AvatarStorageConfig, client?: S3Client) {
    this.bucket = config.bucket;
    this.publicUrl = (config.publicUrl ?? config.endpoint).replace(/\/+$/, '');
    this.client =
      client ??
      new S3Client({
        region: config.region,
        endpoint: config.endpoint,
        credentials: {
          accessKeyId: config.accessKey,
          secretAccessKey: config.secretKey,
        },
        forcePathStyle: true,
      });
  }

  async uploadAvatar(username: string, body: Buffer, contentType: string): Promise<string> {
    const key = avatarKey(username, contentType);
    await this.client.send(
      new PutObjectCommand({
        Bucket: this.bucket,
        Key: key,
        Body: body,
        ContentType: contentType,
        ContentLength: body.length,
      }),
    );
    return `${this.publicUrl}/${this.bucket}/${key}`;
  }

  async ensureBucket(): Promise<void> {
    try {
      await this.client.send(new HeadBucketCommand({ Bucket: this.bucket }));
    } catch {
      await this.client.send(new CreateBucketCommand({ Bucket: this.bucket }));
    }
  }
}
