import { type FastifyRequest } from 'fastify';
import { AppError, ErrorCode } from '@contacts/shared';
import { AuthError, type AuthService, type UserProfile } from '@contacts/domain';

declare module 'fastify' {
  interface FastifyRequest {
    user?: UserProfile;
    accessToken?: string;
  }
}

const BEARER_PREFIX = 'Bearer ';

export function bearerToken(request: FastifyRequest): string | null {
  const header = request.headers.authorization;
  if (!header || !header.startsWith(BEARER_PREFIX)) return null;
  const token = header.slice(BEARER_PREFIX.length).trim();
  return token || null;
}

/** Resolves the bearer token to the current user and pins both on the request. */
export function createAuthMiddleware(authService: AuthService) {
  return async function authenticate(request: FastifyRequest) {
    const token = bearerToken(request);
    if (!token) {
      throw new AppError(ErrorCode.UNAUTHORIZED, 'Not authenticated');
    }

    try {
      request.user = await authService.getCurrentUser(token);
      request.accessToken = token;
    } catch (err) {
      if (err instanceof AuthError) {
        throw new AppError(ErrorCode.UNAUTHORIZED, err.message);
      }
      throw err;
    }
  };
}

export function requireUser(request: FastifyRequest): { user: UserProfile; accessToken: string } {
  const { user, accessToken } = request;
  if (!user || !accessToken) {
    throw new AppError(ErrorCode.UNAUTHORIZED, 'Not authenticated');
  }
  return { user, accessToken };
}
