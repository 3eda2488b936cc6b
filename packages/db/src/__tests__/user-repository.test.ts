import { describe, it, expect } from 'vitest';
import { PgUserRepository } from '../repositories/user-repository';
import { createFakeDb } from './fake-db';

const USER_ROW = {
  id: '1',
  username: 'alice',
  email: 'alice@example.com',
  password_hash: '$argon2id$hash',
  avatar: null,
  confirmed: false,
  role: 'user',
  created_at: new Date('2026-01-01T00:00:00.000Z'),
  updated_at: new Date('2026-01-01T00:00:00.000Z'),
};

describe('PgUserRepository', () => {
  it('inserts a user and maps the returned row', async () => {
    const { db, calls } = createFakeDb([{ rows: [USER_ROW], rowCount: 1 }]);
    const repo = new PgUserRepository(db);

    const user = await repo.create({
      username: 'alice',
      email: 'alice@example.com',
      passwordHash: '$argon2id$hash',
      avatar: null,
      role: 'user',
    });

    expect(calls[0].text).toBe(
      'INSERT INTO users (username, email, password_hash, avatar, role) VALUES ($1, $2, $3, $4, $5) ' +
        'RETURNING id, username, email, password_hash, avatar, confirmed, role, created_at, updated_at',
    );
    expect(calls[0].values).toEqual(['alice', 'alice@example.com', '$argon2id$hash', null, 'user']);
    expect(user).toEqual({
      id: '1',
      username: 'alice',
      email: 'alice@example.com',
      passwordHash: '$argon2id$hash',
      avatar: null,
      confirmed: false,
      role: 'user',
      createdAt: new Date('2026-01-01T00:00:00.000Z'),
      updatedAt: new Date('2026-01-01T00:00:00.000Z'),
    });
  });

  it('returns null when no user matches', async () => {
    const { db, calls } = createFakeDb();
    const repo = new PgUserRepository(db);

    await expect(repo.findByUsername('ghost')).resolves.toBeNull();
    expect(calls[0].values).toEqual(['ghost']);
    expect(calls[0].text).toContain('WHERE username = $1 LIMIT 1');
  });

  it('updates the avatar and bumps updated_at', async () => {
    const { db, calls } = createFakeDb([
      { rows: [{ ...USER_ROW, avatar: 'http://cdn.test/a.png' }], rowCount: 1 },
    ]);
    const repo = new PgUserRepository(db);

    const user = await repo.updateAvatar('1', 'http://cdn.test/a.png');

    expect(calls[0].text).toContain('UPDATE users SET avatar = $2, updated_at = NOW() WHERE id = $1 RETURNING');
    expect(calls[0].values).toEqual(['1', 'http://cdn.test/a.png']);
    expect(user?.avatar).toBe('http://cdn.test/a.png');
  });

  it('confirms by email', async () => {
    const { db, calls } = createFakeDb();
    await new PgUserRepository(db).confirmEmail('alice@example.com');

    expect(calls[0].text).toBe('UPDATE users SET confirmed = TRUE, updated_at = NOW() WHERE email = $1');
    expect(calls[0].values).toEqual(['alice@example.com']);
  });

  it('reports whether a delete removed anything', async () => {
    const { db } = createFakeDb([{ rows: [], rowCount: 1 }, { rows: [], rowCount: 0 }]);
    const repo = new PgUserRepository(db);

    await expect(repo.delete('1')).resolves.toBe(true);
    await expect(repo.delete('1')).resolves.toBe(false);
  });
});
