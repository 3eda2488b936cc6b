import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { type FastifyInstance } from 'fastify';
import { buildServer } from '../server';
import { createTestContext, tokenFromLink } from './support/in-memory';
import { ALICE, bearer, signUp } from './support/session';

const NOW = new Date('2026-03-01T12:00:00.000Z');

describe('session flow', () => {
  let app: FastifyInstance;
  let env: ReturnType<typeof createTestContext>;

  beforeEach(async () => {
    env = createTestContext({ now: () => NOW });
    app = await buildServer(env.ctx);
  });

  afterEach(async () => {
    await app.close();
  });

  it('registers, confirms, rotates tokens, manages a contact and logs out', async () => {
    const register = await app.inject({ method: 'POST', url: '/api/auth/register', payload: ALICE });
    expect(register.statusCode).toBe(201);
    expect(register.json()).toEqual({
      id: '1',
      username: 'alice',
      email: 'alice@example.com',
      avatar: null,
      role: 'user',
    });

    expect(env.mailer.sent).toHaveLength(1);
    const link = env.mailer.lastLink('confirmation');
    expect(link).toMatch(/\/api\/users\/confirmed_email\/[^/]+$/);
    expect(tokenFromLink(link).length).toBeGreaterThan(100);

    const early = await app.inject({
      method: 'POST',
      url: '/api/auth/login',
      payload: { username: 'alice', password: 'secret1' },
    });
    expect(early.statusCode).toBe(401);
    expect(early.json()).toEqual({ code: 'UNAUTHORIZED', message: 'Email address not confirmed' });

    const confirm = await app.inject({ method: 'GET', url: `/api/users/confirmed_email/${tokenFromLink(link)}` });
    expect(confirm.json()).toEqual({ message: 'Email successfully confirmed' });

    const login = await app.inject({
      method: 'POST',
      url: '/api/auth/login',
      headers: { 'content-type': 'application/x-www-form-urlencoded' },
      payload: 'username=alice&password=secret1',
    });
    expect(login.statusCode).toBe(200);
    const first = login.json<{ access_token: string; refresh_token: string; token_type: string }>();
    expect(first.token_type).toBe('bearer');

    const refresh = await app.inject({
      method: 'POST',
      url: '/api/auth/refresh',
      payload: { refresh_token: first.refresh_token },
    });
    expect(refresh.statusCode).toBe(200);
    const second = refresh.json<{ access_token: string; refresh_token: string }>();
    expect(second.refresh_token).not.toBe(first.refresh_token);

    const oldHash = env.tokenService.hashRefreshToken(first.refresh_token);
    expect(await env.refreshTokenRepo.findByTokenHash(oldHash)).toMatchObject({ id: '1', revokedAt: NOW });
    expect(await env.refreshTokenRepo.findActiveToken(oldHash, NOW)).toBeNull();
    expect(env.refreshTokenRepo.tokens.map((t) => t.revokedAt)).toEqual([NOW, null]);

    const replay = await app.inject({
      method: 'POST',
      url: '/api/auth/refresh',
      payload: { refresh_token: first.refresh_token },
    });
    expect(replay.statusCode).toBe(401);
    expect(replay.json()).toEqual({ code: 'UNAUTHORIZED', message: 'Invalid refresh token' });

    const created = await app.inject({
      method: 'POST',
      url: '/api/contacts/',
      headers: bearer(second.access_token),
      payload: {
        first_name: 'Bob',
        last_name: 'Stone',
        email: 'bob@example.com',
        phone_number: '+380501234567',
        birthday: '1990-03-05',
      },
    });
    expect(created.statusCode).toBe(201);
    expect(created.json()).toEqual({
      id: '1',
      first_name: 'Bob',
      last_name: 'Stone',
      email: 'bob@example.com',
      phone_number: '+380501234567',
      birthday: '1990-03-05',
      additional_info: null,
      created_at: '2026-03-01T12:00:00.000Z',
      updated_at: '2026-03-01T12:00:00.000Z',
    });

    const fetched = await app.inject({ method: 'GET', url: '/api/contacts/1', headers: bearer(second.access_token) });
    expect(fetched.statusCode).toBe(200);
    expect(fetched.json()).toMatchObject({ id: '1', email: 'bob@example.com' });

    const logout = await app.inject({
      method: 'POST',
      url: '/api/auth/logout',
      headers: bearer(second.access_token),
      payload: { refresh_token: second.refresh_token },
    });
    expect(logout.statusCode).toBe(204);

    const me = await app.inject({ method: 'GET', url: '/api/users/me', headers: bearer(second.access_token) });
    expect(me.statusCode).toBe(401);
    expect(me.json()).toEqual({ code: 'UNAUTHORIZED', message: 'Token revoked' });

    const afterLogout = await app.inject({
      method: 'POST',
      url: '/api/auth/refresh',
      payload: { refresh_token: second.refresh_token },
    });
    expect(afterLogout.statusCode).toBe(401);
  });

  it('keeps two sessions of one user independent', async () => {
    const sessionA = await signUp(app, env.mailer, ALICE);
    const login = await app.inject({
      method: 'POST',
      url: '/api/auth/login',
      payload: { username: 'alice', password: 'secret1' },
    });
    const sessionB = login.json<{ access_token: string; refresh_token: string }>();

    expect(sessionB.access_token).not.toBe(sessionA.accessToken);

    const logout = await app.inject({
      method: 'POST',
      url: '/api/auth/logout',
      headers: bearer(sessionA.accessToken),
      payload: { refresh_token: sessionA.refreshToken },
    });
    expect(logout.statusCode).toBe(204);

    const meA = await app.inject({ method: 'GET', url: '/api/users/me', headers: bearer(sessionA.accessToken) });
    const meB = await app.inject({ method: 'GET', url: '/api/users/me', headers: bearer(sessionB.access_token) });
    expect(meA.statusCode).toBe(401);
    expect(meB.statusCode).toBe(200);
  });
});
