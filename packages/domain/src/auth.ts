import { type User, type UserProfile, type RefreshToken } from './user';

export function isTokenExpired(expiresAt: Date, now: Date = new Date()): boolean {
  return expiresAt.getTime() <= now.getTime();
}

/** A refresh token is active until it is revoked or runs out, whichever comes first. */
export function isRefreshTokenActive(token: RefreshToken, now: Date = new Date()): boolean {
  return token.revokedAt === null && !isTokenExpired(token.expiresAt, now);
}

export function secondsUntil(expiresAt: Date, now: Date = new Date()): number {
  return Math.floor((expiresAt.getTime() - now.getTime()) / 1000);
}

export function toUserProfile(user: User): UserProfile {
  const { passwordHash: _passwordHash, ...profile } = user;
  return profile;
}
