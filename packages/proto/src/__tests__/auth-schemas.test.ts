import { describe, it, expect } from 'vitest';
import {
  UsernameSchema,
  PasswordSchema,
  RegisterRequestSchema,
  LoginRequestSchema,
  RefreshRequestSchema,
  ResetPasswordRequestSchema,
  RequestEmailSchema,
  toTokenResponse,
} from '../api/auth';
import { toUserView } from '../api/user';

describe('UsernameSchema', () => {
  it('trims surrounding whitespace', () => {
    expect(UsernameSchema.parse('  alice  ')).toBe('alice');
  });

  it('rejects too short', () => {
    expect(() => UsernameSchema.parse('a')).toThrow();
  });

  it('rejects too long', () => {
    expect(() => UsernameSchema.parse('a'.repeat(51))).toThrow();
  });
});

describe('PasswordSchema', () => {
  it('rejects too short', () => {
    expect(() => PasswordSchema.parse('short')).toThrow();
  });

  it('rejects too long', () => {
    expect(() => PasswordSchema.parse('a'.repeat(13))).toThrow();
  });

  it('accepts a password within bounds', () => {
    expect(PasswordSchema.parse('secret1')).toBe('secret1');
  });
});

describe('RegisterRequestSchema', () => {
  it('validates a complete registration', () => {
    const result = RegisterRequestSchema.parse({
      username: 'alice',
      email: 'Alice@Example.com',
      password: 'secret1',
    });
    expect(result).toEqual({ username: 'alice', email: 'alice@example.com', password: 'secret1' });
  });

  it('rejects a malformed email', () => {
    const result = RegisterRequestSchema.safeParse({
      username: 'alice',
      email: 'not-an-email',
      password: 'secret1',
    });
    expect(result.success).toBe(false);
  });
});

describe('LoginRequestSchema', () => {
  it('accepts any non-empty credentials', () => {
    expect(LoginRequestSchema.safeParse({ username: 'a', password: 'b' }).success).toBe(true);
  });

  it('rejects missing password', () => {
    expect(LoginRequestSchema.safeParse({ username: 'alice' }).success).toBe(false);
  });

  it('trims the username the same way registration does', () => {
    expect(LoginRequestSchema.parse({ username: ' alice ', password: 'secret1' }).username).toBe(
      UsernameSchema.parse(' alice '),
    );
  });

  it('rejects a blank username', () => {
    expect(LoginRequestSchema.safeParse({ username: '   ', password: 'secret1' }).success).toBe(false);
  });
});

describe('RefreshRequestSchema', () => {
  it('requires refresh_token', () => {
    expect(RefreshRequestSchema.safeParse({}).success).toBe(false);
    expect(RefreshRequestSchema.parse({ refresh_token: 'r1' }).refresh_token).toBe('r1');
  });
});

describe('ResetPasswordRequestSchema', () => {
  it('allows longer new passwords than registration does', () => {
    const result = ResetPasswordRequestSchema.safeParse({ token: 't', new_password: 'a'.repeat(40) });
    expect(result.success).toBe(true);
  });

  it('rejects a short new password', () => {
    expect(ResetPasswordRequestSchema.safeParse({ token: 't', new_password: '12345' }).success).toBe(false);
  });
});

describe('RequestEmailSchema', () => {
  it('normalizes the address', () => {
    expect(RequestEmailSchema.parse({ email: ' Bob@Example.COM ' }).email).toBe('bob@example.com');
  });
});

describe('toTokenResponse', () => {
  it('renders the pair in snake_case', () => {
    expect(toTokenResponse({ accessToken: 'a1', refreshToken: 'r1', tokenType: 'bearer' })).toEqual({
      access_token: 'a1',
      refresh_token: 'r1',
      token_type: 'bearer',
    });
  });
});

describe('toUserView', () => {
  it('exposes only public fields', () => {
    const view = toUserView({
      id: '1',
      username: 'alice',
      email: 'alice@example.com',
      avatar: null,
      confirmed: true,
      role: 'user',
      createdAt: new Date('2026-01-01'),
      updatedAt: new Date('2026-01-01'),
    });
    expect(view).toEqual({ id: '1', username: 'alice', email: 'alice@example.com', avatar: null, role: 'user' });
  });
});
