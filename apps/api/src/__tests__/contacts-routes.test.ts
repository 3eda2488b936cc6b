import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { type FastifyInstance } from 'fastify';
import { buildServer } from '../server';
import { createTestContext } from './support/in-memory';
import { ALICE, BOB, bearer, signUp } from './support/session';

const NOW = new Date('2026-03-01T12:00:00.000Z');

function contactBody(overrides: Record<string, unknown> = {}) {
  return {
    first_name: 'Carol',
    last_name: 'Baker',
    email: 'carol@example.com',
    phone_number: '+15550001111',
    birthday: '1985-07-20',
    additional_info: 'met at the conference',
    ...overrides,
  };
}

describe('contact routes', () => {
  let app: FastifyInstance;
  let env: ReturnType<typeof createTestContext>;
  let token: string;

  async function createContact(overrides: Record<string, unknown> = {}, accessToken = token) {
    const res = await app.inject({
      method: 'POST',
      url: '/api/contacts/',
      headers: bearer(accessToken),
      payload: contactBody(overrides),
    });
    expect(res.statusCode).toBe(201);
    return res.json<{ id: string }>();
  }

  beforeEach(async () => {
    env = createTestContext({ now: () => NOW });
    app = await buildServer(env.ctx);
    token = (await signUp(app, env.mailer, ALICE)).accessToken;
  });

  afterEach(async () => {
    await app.close();
  });

  it('requires authentication', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/contacts/' });

    expect(res.statusCode).toBe(401);
  });

  describe('GET /api/contacts/', () => {
    it('pages through the contacts of the caller', async () => {
      await createContact({ email: 'c1@example.com' });
      await createContact({ email: 'c2@example.com' });
      await createContact({ email: 'c3@example.com' });

      const res = await app.inject({
        method: 'GET',
        url: '/api/contacts/?limit=2&offset=1',
        headers: bearer(token),
      });

      expect(res.statusCode).toBe(200);
      expect(res.json<Array<{ email: string }>>().map((c) => c.email)).toEqual(['c2@example.com', 'c3@example.com']);
    });

    it('matches the search term against names and email', async () => {
      await createContact({ first_name: 'Dmytro', email: 'd@example.com' });
      await createContact({ first_name: 'Erin', email: 'erin@example.com' });

      const res = await app.inject({
        method: 'GET',
        url: '/api/contacts?search=DMY',
        headers: bearer(token),
      });

      expect(res.json<Array<{ first_name: string }>>().map((c) => c.first_name)).toEqual(['Dmytro']);
    });

    it('hides contacts of other users', async () => {
      const bobToken = (await signUp(app, env.mailer, BOB)).accessToken;
      await createContact({ email: 'bobs@example.com' }, bobToken);

      const res = await app.inject({ method: 'GET', url: '/api/contacts/', headers: bearer(token) });

      expect(res.json()).toEqual([]);
    });

    it('rejects a page size above 500', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/contacts/?limit=501', headers: bearer(token) });

      expect(res.statusCode).toBe(422);
      expect(res.json()).toMatchObject({ code: 'VALIDATION', message: 'Invalid query' });
    });
  });

  describe('POST /api/contacts/', () => {
    it('rejects an impossible birthday', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/api/contacts/',
        headers: bearer(token),
        payload: contactBody({ birthday: '1990-02-30' }),
      });

      expect(res.statusCode).toBe(422);
      expect(res.json()).toEqual({
        code: 'VALIDATION',
        message: 'Invalid contact data',
        issues: [{ path: 'birthday', message: 'Birthday is not a valid date' }],
      });
    });

    it('rejects a duplicate email', async () => {
      await createContact();

      const res = await app.inject({
        method: 'POST',
        url: '/api/contacts/',
        headers: bearer(token),
        payload: contactBody(),
      });

      expect(res.statusCode).toBe(409);
      expect(res.json()).toEqual({ code: 'CONFLICT', message: 'Contact with this email already exists' });
    });
  });

  describe('single contact', () => {
    it('updates only the supplied fields', async () => {
      const { id } = await createContact();

      const res = await app.inject({
        method: 'PUT',
        url: `/api/contacts/${id}`,
        headers: bearer(token),
        payload: { phone_number: '+15559998888', additional_info: null },
      });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toMatchObject({
        first_name: 'Carol',
        phone_number: '+15559998888',
        additional_info: null,
      });
    });

    it('deletes and then reports the contact missing', async () => {
      const { id } = await createContact();

      const del = await app.inject({ method: 'DELETE', url: `/api/contacts/${id}`, headers: bearer(token) });
      const get = await app.inject({ method: 'GET', url: `/api/contacts/${id}`, headers: bearer(token) });

      expect(del.statusCode).toBe(204);
      expect(get.statusCode).toBe(404);
      expect(get.json()).toEqual({ code: 'NOT_FOUND', message: 'Contact not found' });
    });

    it('treats a contact of another user as missing', async () => {
      const bobToken = (await signUp(app, env.mailer, BOB)).accessToken;
      const { id } = await createContact({}, bobToken);

      const get = await app.inject({ method: 'GET', url: `/api/contacts/${id}`, headers: bearer(token) });
      const put = await app.inject({
        method: 'PUT',
        url: `/api/contacts/${id}`,
        headers: bearer(token),
        payload: { first_name: 'Mallory' },
      });
      const del = await app.inject({ method: 'DELETE', url: `/api/contacts/${id}`, headers: bearer(token) });

      expect([get.statusCode, put.statusCode, del.statusCode]).toEqual([404, 404, 404]);
      expect(env.contactRepo.contacts[0]).toMatchObject({ firstName: 'Carol' });
    });

    it('rejects a non-numeric id', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/contacts/abc', headers: bearer(token) });

      expect(res.statusCode).toBe(422);
    });

    it('rejects an id beyond the bigint range before it reaches the database', async () => {
      const res = await app.inject({
        method: 'DELETE',
        url: '/api/contacts/99999999999999999999',
        headers: bearer(token),
      });

      expect(res.statusCode).toBe(422);
      expect(res.json()).toEqual({
        code: 'VALIDATION',
        message: 'Invalid contact id',
        issues: [{ path: 'contact_id', message: 'Contact id is out of range' }],
      });
    });
  });

  describe('GET /api/contacts/birthdays/upcoming', () => {
    it('lists contacts whose birthday falls within the next week', async () => {
      await createContact({ first_name: 'Today', email: 't@example.com', birthday: '1990-03-01' });
      await createContact({ first_name: 'Week', email: 'w@example.com', birthday: '1980-03-08' });
      await createContact({ first_name: 'Late', email: 'l@example.com', birthday: '1980-03-09' });
      await createContact({ first_name: 'Past', email: 'p@example.com', birthday: '1980-02-27' });

      const res = await app.inject({
        method: 'GET',
        url: '/api/contacts/birthdays/upcoming',
        headers: bearer(token),
      });

      expect(res.statusCode).toBe(200);
      expect(res.json<Array<{ first_name: string }>>().map((c) => c.first_name)).toEqual(['Today', 'Week']);
    });
  });
});
