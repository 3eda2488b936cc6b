export type {
  Role,
  User,
  UserProfile,
  NewUser,
  RefreshToken,
  NewRefreshToken,
  ClientInfo,
  TokenPair,
} from './user';
export type {
  Contact,
  NewContact,
  ContactInput,
  ContactPatch,
  ContactQuery,
  MonthDay,
} from './contact';
export { isTokenExpired, isRefreshTokenActive, secondsUntil, toUserProfile } from './auth';
export { isAdmin, canChangeAvatar, type AvatarUploadPolicy } from './permissions';
export { upcomingBirthdayDates, isLeapYear, UPCOMING_BIRTHDAY_WINDOW_DAYS } from './birthdays';
export type {
  Repository,
  UserRepository,
  RefreshTokenRepository,
  PasswordHasher,
  TokenService,
  SessionCache,
  Mailer,
  AvatarStorage,
  AvatarResolver,
  LoggerPort,
} from './ports';
export type { ContactRepository } from './contact-ports';
export { AuthService, AuthError, type AuthServiceDeps } from './auth-service';
export { UserService, UserError, type UserServiceDeps, type AvatarUpload } from './user-service';
export { ContactService, ContactError, type ContactServiceDeps } from './contact-service';
