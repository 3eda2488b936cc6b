import { expect } from 'vitest';
import { type FastifyInstance } from 'fastify';
import { tokenFromLink } from './in-memory';

export interface Credentials {
  username: string;
  email: string;
  password: string;
}

export const ALICE: Credentials = { username: 'alice', email: 'alice@example.com', password: 'secret1' };
export const BOB: Credentials = { username: 'bob', email: 'bob@example.com', password: 'secret2' };

interface LinkSource {
  lastLink(kind: 'confirmation' | 'reset'): string;
}

/** Registers, confirms and logs in; returns the issued pair. */
export async function signUp(
  app: FastifyInstance,
  mailer: LinkSource,
  user: Credentials,
): Promise<{ accessToken: string; refreshToken: string }> {
  const register = await app.inject({ method: 'POST', url: '/api/auth/register', payload: user });
  expect(register.statusCode).toBe(201);

  const token = tokenFromLink(mailer.lastLink('confirmation'));
  const confirm = await app.inject({ method: 'GET', url: `/api/users/confirmed_email/${token}` });
  expect(confirm.statusCode).toBe(200);

  const login = await app.inject({
    method: 'POST',
    url: '/api/auth/login',
    headers: { 'content-type': 'application/x-www-form-urlencoded' },
    payload: `username=${user.username}&password=${user.password}`,
  });
  expect(login.statusCode).toBe(200);
  const body = login.json<{ access_token: string; refresh_token: string }>();
  return { accessToken: body.access_token, refreshToken: body.refresh_token };
}

export function bearer(accessToken: string): { authorization: string } {
  return { authorization: `Bearer ${accessToken}` };
}
