import { describe, it, expect } from 'vitest';
import { Argon2PasswordHasher } from '../auth/password-hasher';

const CHEAP = { memoryCost: 1024, timeCost: 1, parallelism: 1 };

describe('Argon2PasswordHasher', () => {
  const hasher = new Argon2PasswordHasher(CHEAP);

  it('produces a salted argon2id hash', async () => {
    const first = await hasher.hash('secret1');
    const second = await hasher.hash('secret1');

    expect(first).toMatch(/^\$argon2id\$v=19\$m=1024,t=1,p=1\$/);
    expect(first).not.toBe(second);
  });

  it('accepts the right password and rejects a wrong one', async () => {
    const stored = await hasher.hash('secret1');

    await expect(hasher.verify('secret1', stored)).resolves.toBe(true);
    await expect(hasher.verify('secret2', stored)).resolves.toBe(false);
  });

  it('verifies a hash made with a different cost', async () => {
    const stored = await new Argon2PasswordHasher({ memoryCost: 2048, timeCost: 2, parallelism: 1 }).hash('secret1');

    await expect(hasher.verify('secret1', stored)).resolves.toBe(true);
  });

  it('treats a malformed stored hash as a mismatch', async () => {
    await expect(hasher.verify('secret1', 'not-a-valid-hash')).resolves.toBe(false);
  });
});
