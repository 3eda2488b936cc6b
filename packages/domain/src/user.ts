export type Role = 'user' | 'admin';

export interface User {
  id: string;
  username: string;
  email: string;
  passwordHash: string;
  avatar: string | null;
  confirmed: boolean;
  role: Role;
  createdAt: Date;
  updatedAt: Date;
}

/** A user as it may leave the process: everything except the password hash. */
export type UserProfile = Omit<User, 'passwordHash'>;

export interface NewUser {
  username: string;
  email: string;
  passwordHash: string;
  avatar: string | null;
  role: Role;
}

export interface RefreshToken {
  id: string;
  userId: string;
  tokenHash: string;
  createdAt: Date;
  expiresAt: Date;
  revokedAt: Date | null;
  ipAddress: string | null;
  userAgent: string | null;
}

export interface NewRefreshToken {
  userId: string;
  tokenHash: string;
  expiresAt: Date;
  ipAddress: string | null;
  userAgent: string | null;
}

export interface ClientInfo {
  ip: string | null;
  userAgent: string | null;
}

export interface TokenPair {
  accessToken: string;
  refreshToken: string;
  tokenType: 'bearer';
}
