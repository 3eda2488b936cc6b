import { type Role } from './user';

/**
 * Who may replace a user's avatar. `admin` restricts uploads to admins,
 * `self` lets every signed-in user change their own.
 */
export type AvatarUploadPolicy = 'self' | 'admin';

export function isAdmin(role: Role): boolean {
  return role === 'admin';
}

export function canChangeAvatar(role: Role, policy: AvatarUploadPolicy): boolean {
  if (policy === 'self') return true;
  return isAdmin(role);
}
