import { z } from 'zod';

export const UsernameSchema = z
  .string()
  .trim()
  .min(2, 'Username must be at least 2 characters')
  .max(50, 'Username must be at most 50 characters');

export const EmailSchema = z.string().trim().toLowerCase().email('Invalid email address');

export const PasswordSchema = z
  .string()
  .min(6, 'Password must be at least 6 characters')
  .max(12, 'Password must be at most 12 characters');

export const NewPasswordSchema = z
  .string()
  .min(6, 'Password must be at least 6 characters')
  .max(128, 'Password must be at most 128 characters');

export const RegisterRequestSchema = z.object({
  username: UsernameSchema,
  email: EmailSchema,
  password: PasswordSchema,
});

// Login accepts the OAuth2 password form, so no registration rules apply here.
export const LoginRequestSchema = z.object({
  username: z.string().trim().min(1, 'Username is required'),
  password: z.string().min(1, 'Password is required'),
});

export const TokenResponseSchema = z.object({
  access_token: z.string(),
  refresh_token: z.string(),
  token_type: z.literal('bearer'),
});

export const RefreshRequestSchema = z.object({
  refresh_token: z.string().min(1),
});

export const RequestEmailSchema = z.object({
  email: EmailSchema,
});

export const ResetPasswordRequestSchema = z.object({
  token: z.string().min(1),
  new_password: NewPasswordSchema,
});

export const TokenParamsSchema = z.object({
  token: z.string().min(1),
});

export type RegisterRequest = z.infer<typeof RegisterRequestSchema>;
export type LoginRequest = z.infer<typeof LoginRequestSchema>;
export type TokenResponse = z.infer<typeof TokenResponseSchema>;
export type RefreshRequest = z.infer<typeof RefreshRequestSchema>;
export type RequestEmail = z.infer<typeof RequestEmailSchema>;
export type ResetPasswordRequest = z.infer<typeof ResetPasswordRequestSchema>;

export function toTokenResponse(pair: {
  accessToken: string;
  refreshToken: string;
  tokenType: 'bearer';
}): TokenResponse {
  return {
    access_token: pair.accessToken,
    refresh_token: pair.refreshToken,
    token_type: pair.tokenType,
  };
}
