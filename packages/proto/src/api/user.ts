import { z } from 'zod';
import { type UserProfile } from '@contacts/domain';

export const UserViewSchema = z.object({
  id: z.string(),
  username: z.string(),
  email: z.string(),
  avatar: z.string().nullable(),
  role: z.enum(['user', 'admin']),
});

export type UserView = z.infer<typeof UserViewSchema>;

export function toUserView(user: UserProfile): UserView {
  return {
    id: user.id,
    username: user.username,
    email: user.email,
    avatar: user.avatar,
    role: user.role,
  };
}
