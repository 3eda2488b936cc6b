import { type User, type UserProfile } from './user';
import { toUserProfile } from './auth';
import { canChangeAvatar, type AvatarUploadPolicy } from './permissions';
import {
  type UserRepository,
  type TokenService,
  type SessionCache,
  type Mailer,
  type AvatarStorage,
  type LoggerPort,
} from './ports';

export interface UserServiceDeps {
  userRepo: UserRepository;
  tokenService: TokenService;
  sessionCache: SessionCache;
  mailer: Mailer;
  avatarStorage: AvatarStorage;
  logger: LoggerPort;
  avatarUploadPolicy: AvatarUploadPolicy;
}

export interface AvatarUpload {
  body: Buffer;
  contentType: string;
}

export class UserService {
  constructor(private readonly deps: UserServiceDeps) {}

  /** Mail delivery problems are logged; the caller's flow carries on. */
  async sendConfirmationEmail(user: Pick<User, 'id' | 'email' | 'username'>, baseUrl: string): Promise<void> {
    const { tokenService, mailer, logger } = this.deps;

    const token = await tokenService.signEmailToken(user.email);
    try {
      await mailer.sendEmailConfirmation({
        to: user.email,
        username: user.username,
        link: `${baseUrl}api/users/confirmed_email/${token}`,
      });
    } catch (err) {
      logger.error(
        { userId: user.id, err: err instanceof Error ? err.message : String(err) },
        'Confirmation email failed',
      );
    }
  }

  async confirmEmail(token: string): Promise<{ alreadyConfirmed: boolean }> {
    const { tokenService, userRepo, logger } = this.deps;

    let email: string;
    try {
      email = await tokenService.verifyEmailToken(token);
    } catch {
      throw new UserError('VALIDATION', 'Invalid email verification token');
    }

    const user = await userRepo.findByEmail(email);
    if (!user) {
      throw new UserError('BAD_REQUEST', 'Verification error');
    }
    if (user.confirmed) {
      return { alreadyConfirmed: true };
    }

    await userRepo.confirmEmail(email);
    logger.info({ userId: user.id }, 'Email confirmed');
    return { alreadyConfirmed: false };
  }

  /**
   * Resends the confirmation link. Unknown addresses get the same answer
   * as known ones.
   */
  async requestConfirmationEmail(email: string, baseUrl: string): Promise<'already_confirmed' | 'sent'> {
    const user = await this.deps.userRepo.findByEmail(email);
    if (user?.confirmed) {
      return 'already_confirmed';
    }
    if (user) {
      await this.sendConfirmationEmail(user, baseUrl);
    }
    return 'sent';
  }

  /** Every live session of the actor sees the new avatar on its next request. */
  async updateAvatar(actor: UserProfile, upload: AvatarUpload): Promise<UserProfile> {
    const { userRepo, avatarStorage, sessionCache, logger, avatarUploadPolicy } = this.deps;

    if (!canChangeAvatar(actor.role, avatarUploadPolicy)) {
      throw new UserError('FORBIDDEN', 'Only admins can change the default avatar.');
    }

    const url = await avatarStorage.uploadAvatar(actor.username, upload.body, upload.contentType);
    const updated = await userRepo.updateAvatar(actor.id, url);
    if (!updated) {
      throw new UserError('NOT_FOUND', 'User not found');
    }

    try {
      await sessionCache.dropUserSessions(actor.id);
    } catch (err) {
      logger.warn(
        { userId: actor.id, err: err instanceof Error ? err.message : String(err) },
        'Could not drop cached sessions after avatar change',
      );
    }

    return toUserProfile(updated);
  }
}

export class UserError extends Error {
  constructor(
    public readonly kind: 'VALIDATION' | 'BAD_REQUEST' | 'NOT_FOUND' | 'FORBIDDEN',
    message: string,
  ) {
    super(message);
    this.name = 'UserError';
  }
}
