import { describe, it, expect } from 'vitest';
import { PgContactRepository, escapeLike } from '../repositories/contact-repository';
import { createFakeDb } from './fake-db';

const CONTACT_ROW = {
  id: '7',
  user_id: '1',
  first_name: 'Bob',
  last_name: 'Stone',
  email: 'bob@example.com',
  phone_number: '+380501234567',
  birthday: '1990-03-05',
  additional_info: null,
  created_at: new Date('2026-01-01T00:00:00.000Z'),
  updated_at: new Date('2026-01-01T00:00:00.000Z'),
};

describe('escapeLike', () => {
  it('escapes wildcard characters', () => {
    expect(escapeLike('50%_off\\')).toBe('50\\%\\_off\\\\');
  });
});

describe('PgContactRepository', () => {
  it('searches with a wrapped, escaped pattern', async () => {
    const { db, calls } = createFakeDb([{ rows: [CONTACT_ROW], rowCount: 1 }]);

    const contacts = await new PgContactRepository(db).search('1', { limit: 10, offset: 20, search: 'b_b' });

    expect(calls[0].values).toEqual(['1', '%b\\_b%', 10, 20]);
    expect(calls[0].text).toContain('first_name ILIKE $2 OR last_name ILIKE $2 OR email ILIKE $2');
    expect(contacts).toHaveLength(1);
    expect(contacts[0].birthday).toBe('1990-03-05');
  });

  it('passes a null pattern when there is no search term', async () => {
    const { db, calls } = createFakeDb();

    await new PgContactRepository(db).search('1', { limit: 10, offset: 0 });

    expect(calls[0].values).toEqual(['1', null, 10, 0]);
  });

  it('updates only supplied columns', async () => {
    const { db, calls } = createFakeDb([{ rows: [{ ...CONTACT_ROW, phone_number: '+15550001' }], rowCount: 1 }]);

    const contact = await new PgContactRepository(db).update('7', { phoneNumber: '+15550001' });

    expect(calls[0].text).toContain('UPDATE contacts SET phone_number = $2, updated_at = NOW() WHERE id = $1');
    expect(calls[0].values).toEqual(['7', '+15550001']);
    expect(contact?.phoneNumber).toBe('+15550001');
  });

  it('reads the row back for an empty patch', async () => {
    const { db, calls } = createFakeDb([{ rows: [CONTACT_ROW], rowCount: 1 }]);

    await new PgContactRepository(db).update('7', {});

    expect(calls[0].text).toMatch(/^SELECT .* FROM contacts WHERE id = \$1 LIMIT 1$/);
  });

  it('matches birthdays against month and day arrays', async () => {
    const { db, calls } = createFakeDb([{ rows: [CONTACT_ROW], rowCount: 1 }]);

    await new PgContactRepository(db).findByBirthdayDates('1', [
      { month: 3, day: 4 },
      { month: 3, day: 5 },
    ]);

    expect(calls[0].text).toContain('unnest($2::int[], $3::int[])');
    expect(calls[0].values).toEqual(['1', [3, 3], [4, 5]]);
  });

  it('skips the query for an empty window', async () => {
    const { db, calls } = createFakeDb();

    await expect(new PgContactRepository(db).findByBirthdayDates('1', [])).resolves.toEqual([]);
    expect(calls).toHaveLength(0);
  });
});
