import { type FastifyInstance } from 'fastify';
import { AppError, ErrorCode } from '@contacts/shared';
import { UserError, type UserService } from '@contacts/domain';
import { RequestEmailSchema, TokenParamsSchema, toUserView } from '@contacts/proto';
import { type createAuthMiddleware, requireUser } from '../plugins/auth';
import { type createRateLimiter } from '../plugins/rate-limit';
import { validate } from '../plugins/validation';
import { baseUrlOf } from './base-url';

interface UserRouteDeps {
  userService: UserService;
  authenticate: ReturnType<typeof createAuthMiddleware>;
  meRateLimit: ReturnType<typeof createRateLimiter>;
}

function mapUserError(err: unknown): never {
  if (err instanceof UserError) {
    const codeMap: Record<UserError['kind'], ErrorCode> = {
      VALIDATION: ErrorCode.VALIDATION,
      BAD_REQUEST: ErrorCode.BAD_REQUEST,
      NOT_FOUND: ErrorCode.NOT_FOUND,
      FORBIDDEN: ErrorCode.FORBIDDEN,
    };
    throw new AppError(codeMap[err.kind], err.message);
  }
  throw err;
}

export function registerUserRoutes(app: FastifyInstance, deps: UserRouteDeps): void {
  const { userService, authenticate, meRateLimit } = deps;

  app.get('/users/me', { preHandler: [meRateLimit, authenticate] }, async (request, reply) => {
    const { user } = requireUser(request);
    return reply.status(200).send(toUserView(user));
  });

  app.get('/users/confirmed_email/:token', async (request, reply) => {
    const { token } = validate(TokenParamsSchema, request.params, 'Invalid token');

    try {
      const { alreadyConfirmed } = await userService.confirmEmail(token);
      const message = alreadyConfirmed ? 'Your email is already confirmed' : 'Email successfully confirmed';
      return reply.status(200).send({ message });
    } catch (err) {
      return mapUserError(err);
    }
  });

  app.post('/users/request_email', async (request, reply) => {
    const body = validate(RequestEmailSchema, request.body, 'Invalid email');

    const outcome = await userService.requestConfirmationEmail(body.email, baseUrlOf(request));
    const message =
      outcome === 'already_confirmed' ? 'Your email is already confirmed' : 'Check your email to confirm your address';
    return reply.status(200).send({ message });
  });

  app.patch('/users/avatar', { preHandler: [authenticate] }, async (request, reply) => {
    const { user } = requireUser(request);

    const file = await request.file();
    if (!file) {
      throw new AppError(ErrorCode.VALIDATION, 'Avatar file is required');
    }
    if (!file.mimetype.startsWith('image/')) {
      throw new AppError(ErrorCode.VALIDATION, 'Avatar must be an image');
    }
    const body = await file.toBuffer();

    try {
      const updated = await userService.updateAvatar(user, { body, contentType: file.mimetype });
      return reply.status(200).send(toUserView(updated));
    } catch (err) {
      return mapUserError(err);
    }
  });
}
