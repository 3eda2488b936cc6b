import { SignJWT, jwtVerify } from 'jose';
import { randomBytes, randomUUID, createHash } from 'node:crypto';
import { type TokenService } from '@contacts/domain';

interface JwtKey {
  kid: string;
  secret: Uint8Array;
}

export interface TokenServiceConfig {
  activeKid: string;
  keys: Array<{ kid: string; secret: string }>;
  accessTokenTtlMinutes: number;
  emailTokenTtlDays: number;
  issuer?: string;
  clock?: () => Date;
}

const ACCESS_AUDIENCE = 'access';
const EMAIL_AUDIENCE = 'email';

/**
 * HS256 tokens keyed by `kid`. Any configured key verifies, only the active
 * one signs, so keys can be rotated without invalidating live sessions.
 * Access and email tokens carry different audiences and never stand in for
 * each other.
 */
export class JoseTokenService implements TokenService {
  private readonly keys: Map<string, JwtKey>;
  private readonly activeKey: JwtKey;
  private readonly accessTokenTtlSeconds: number;
  private readonly emailTokenTtlSeconds: number;
  private readonly issuer: string;
  private readonly clock: () => Date;

  constructor(config: TokenServiceConfig) {
    this.keys = new Map();
    for (const key of config.keys) {
      this.keys.set(key.kid, {
        kid: key.kid,
        secret: new TextEncoder().encode(key.secret),
      });
    }

    const active = this.keys.get(config.activeKid);
    if (!active) {
      throw new Error(`Active JWT key '${config.activeKid}' not found in keys`);
    }
    this.activeKey = active;
    this.accessTokenTtlSeconds = config.accessTokenTtlMinutes * 60;
    this.emailTokenTtlSeconds = config.emailTokenTtlDays * 24 * 60 * 60;
    this.issuer = config.issuer ?? 'contacts-api';
    this.clock = config.clock ?? (() => new Date());
  }

  async signAccessToken(subject: string): Promise<string> {
    return this.sign(subject, ACCESS_AUDIENCE, this.accessTokenTtlSeconds);
  }

  async verifyAccessToken(token: string): Promise<{ subject: string; expiresAt: Date }> {
    return this.verify(token, ACCESS_AUDIENCE);
  }

  async signEmailToken(email: string): Promise<string> {
    return this.sign(email, EMAIL_AUDIENCE, this.emailTokenTtlSeconds);
  }

  async verifyEmailToken(token: string): Promise<string> {
    const { subject } = await this.verify(token, EMAIL_AUDIENCE);
    return subject;
  }

  generateRefreshToken(): string {
    return randomBytes(32).toString('base64url');
  }

  hashRefreshToken(token: string): string {
    return createHash('sha256').update(token).digest('hex');
  }

  // `jti` keeps tokens issued to one subject in the same second distinct.
  private async sign(subject: string, audience: string, ttlSeconds: number): Promise<string> {
    const issuedAt = Math.floor(this.clock().getTime() / 1000);
    return new SignJWT({ sub: subject })
      .setProtectedHeader({ alg: 'HS256', kid: this.activeKey.kid })
      .setJti(randomUUID())
      .setIssuedAt(issuedAt)
      .setIssuer(this.issuer)
      .setAudience(audience)
      .setExpirationTime(issuedAt + ttlSeconds)
      .sign(this.activeKey.secret);
  }

  private async verify(token: string, audience: string): Promise<{ subject: string; expiresAt: Date }> {
    const { payload } = await jwtVerify(token, (header) => this.keyFor(header), {
      issuer: this.issuer,
      audience,
      algorithms: ['HS256'],
      currentDate: this.clock(),
    });

    if (!payload.sub) {
      throw new Error('JWT missing sub claim');
    }
    if (payload.exp === undefined) {
      throw new Error('JWT missing exp claim');
    }

    return { subject: payload.sub, expiresAt: new Date(payload.exp * 1000) };
  }

  private keyFor(header: { kid?: string }): Uint8Array {
    if (!header.kid) return this.activeKey.secret;
    const key = this.keys.get(header.kid);
    if (!key) {
      throw new Error(`Unknown JWT key '${header.kid}'`);
    }
    return key.secret;
  }
}
