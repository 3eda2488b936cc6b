import { type FastifyInstance, type FastifyRequest } from 'fastify';
import { AppError, ErrorCode } from '@contacts/shared';
import { AuthError, type AuthService, type ClientInfo, type UserService } from '@contacts/domain';
import {
  RegisterRequestSchema,
  LoginRequestSchema,
  RefreshRequestSchema,
  RequestEmailSchema,
  ResetPasswordRequestSchema,
  TokenParamsSchema,
  toTokenResponse,
  toUserView,
} from '@contacts/proto';
import { type createAuthMiddleware, requireUser } from '../plugins/auth';
import { type createRateLimiter } from '../plugins/rate-limit';
import { validate } from '../plugins/validation';
import { baseUrlOf } from './base-url';

interface AuthRouteDeps {
  authService: AuthService;
  userService: UserService;
  authenticate: ReturnType<typeof createAuthMiddleware>;
  authRateLimit: ReturnType<typeof createRateLimiter>;
}

function mapAuthError(err: unknown): never {
  if (err instanceof AuthError) {
    const codeMap: Record<AuthError['kind'], ErrorCode> = {
      UNAUTHORIZED: ErrorCode.UNAUTHORIZED,
      CONFLICT: ErrorCode.CONFLICT,
      VALIDATION: ErrorCode.VALIDATION,
      NOT_FOUND: ErrorCode.NOT_FOUND,
      BAD_REQUEST: ErrorCode.BAD_REQUEST,
    };
    throw new AppError(codeMap[err.kind], err.message);
  }
  throw err;
}

function clientInfo(request: FastifyRequest): ClientInfo {
  return {
    ip: request.ip || null,
    userAgent: request.headers['user-agent'] ?? null,
  };
}

export function registerAuthRoutes(app: FastifyInstance, deps: AuthRouteDeps): void {
  const { authService, userService, authenticate, authRateLimit } = deps;

  app.post('/auth/register', { preHandler: [authRateLimit] }, async (request, reply) => {
    const body = validate(RegisterRequestSchema, request.body, 'Invalid registration data');

    try {
      const user = await authService.register(body);
      await userService.sendConfirmationEmail(user, baseUrlOf(request));
      return reply.status(201).send(toUserView(user));
    } catch (err) {
      return mapAuthError(err);
    }
  });

  // Accepts the OAuth2 password form as well as JSON.
  app.post('/auth/login', { preHandler: [authRateLimit] }, async (request, reply) => {
    const body = validate(LoginRequestSchema, request.body, 'Invalid login data');

    try {
      const pair = await authService.login(body, clientInfo(request));
      return reply.status(200).send(toTokenResponse(pair));
    } catch (err) {
      return mapAuthError(err);
    }
  });

  app.post('/auth/refresh', { preHandler: [authRateLimit] }, async (request, reply) => {
    const body = validate(RefreshRequestSchema, request.body, 'Invalid refresh request');

    try {
      const pair = await authService.refresh(body.refresh_token, clientInfo(request));
      return reply.status(200).send(toTokenResponse(pair));
    } catch (err) {
      return mapAuthError(err);
    }
  });

  app.post('/auth/logout', { preHandler: [authenticate] }, async (request, reply) => {
    const { accessToken } = requireUser(request);
    const body = validate(RefreshRequestSchema, request.body, 'Invalid logout request');

    try {
      await authService.logout(accessToken, body.refresh_token);
      return reply.status(204).send();
    } catch (err) {
      return mapAuthError(err);
    }
  });

  app.post('/auth/request-reset-password', { preHandler: [authRateLimit] }, async (request, reply) => {
    const body = validate(RequestEmailSchema, request.body, 'Invalid email');

    try {
      await authService.requestPasswordReset(body.email, baseUrlOf(request));
      return reply.status(200).send({ message: 'Check your email for instructions to reset your password.' });
    } catch (err) {
      return mapAuthError(err);
    }
  });

  app.post('/auth/reset-password', { preHandler: [authRateLimit] }, async (request, reply) => {
    const body = validate(ResetPasswordRequestSchema, request.body, 'Invalid password reset data');

    try {
      await authService.resetPassword(body.token, body.new_password);
      return reply.status(200).send({ message: 'Password successfully changed.' });
    } catch (err) {
      return mapAuthError(err);
    }
  });

  app.get('/auth/reset_password/:token', async (request, reply) => {
    const { token } = validate(TokenParamsSchema, request.params, 'Invalid token');

    try {
      const email = await authService.verifyResetToken(token);
      return reply.status(200).send({ message: 'Token is valid', email });
    } catch (err) {
      return mapAuthError(err);
    }
  });
}
