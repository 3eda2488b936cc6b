import {
  type Contact,
  type NewContact,
  type ContactPatch,
  type ContactQuery,
  type ContactRepository,
  type MonthDay,
} from '@contacts/domain';
import { PgRepository, toDate, toNullableString } from '../base-repository';

const CONTACT_COLUMNS = `id, user_id, first_name, last_name, email, phone_number,
  to_char(birthday, 'YYYY-MM-DD') AS birthday, additional_info, created_at, updated_at`;

export function escapeLike(term: string): string {
  return term.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}

export class PgContactRepository extends PgRepository<Contact, NewContact> implements ContactRepository {
  protected readonly table = 'contacts';
  protected readonly columns = CONTACT_COLUMNS;
  protected readonly hasUpdatedAt = true;

  async update(id: string, patch: ContactPatch): Promise<Contact | null> {
    return this.updateById(id, {
      first_name: patch.firstName,
      last_name: patch.lastName,
      email: patch.email,
      phone_number: patch.phoneNumber,
      birthday: patch.birthday,
      additional_info: patch.additionalInfo,
    });
  }

  async findByEmail(email: string): Promise<Contact | null> {
    return this.findOne('email = $1', [email]);
  }

  /** Case-insensitive substring match on first name, last name and email. */
  async search(userId: string, query: ContactQuery): Promise<Contact[]> {
    const pattern = query.search ? `%${escapeLike(query.search)}%` : null;
    const result = await this.db.query(
      `SELECT ${CONTACT_COLUMNS}
       FROM contacts
       WHERE user_id = $1
         AND ($2::text IS NULL
              OR first_name ILIKE $2
              OR last_name ILIKE $2
              OR email ILIKE $2)
       ORDER BY id
       LIMIT $3 OFFSET $4`,
      [userId, pattern, query.limit, query.offset],
    );
    return result.rows.map((row) => this.mapRow(row));
  }

  async findByBirthdayDates(userId: string, dates: MonthDay[]): Promise<Contact[]> {
    if (dates.length === 0) return [];

    const result = await this.db.query(
      `SELECT ${CONTACT_COLUMNS}
       FROM contacts
       WHERE user_id = $1
         AND (EXTRACT(MONTH FROM birthday)::int, EXTRACT(DAY FROM birthday)::int) IN (
           SELECT m, d FROM unnest($2::int[], $3::int[]) AS window_dates(m, d)
         )
       ORDER BY EXTRACT(MONTH FROM birthday), EXTRACT(DAY FROM birthday), id`,
      [userId, dates.map((d) => d.month), dates.map((d) => d.day)],
    );
    return result.rows.map((row) => this.mapRow(row));
  }

  protected toRow(contact: NewContact): Record<string, unknown> {
    return {
      user_id: contact.userId,
      first_name: contact.firstName,
      last_name: contact.lastName,
      email: contact.email,
      phone_number: contact.phoneNumber,
      birthday: contact.birthday,
      additional_info: contact.additionalInfo,
    };
  }

  protected mapRow(row: Record<string, unknown>): Contact {
    return {
      id: String(row.id),
      userId: toNullableString(row.user_id),
      firstName: String(row.first_name),
      lastName: String(row.last_name),
      email: String(row.email),
      phoneNumber: String(row.phone_number),
      birthday: String(row.birthday),
      additionalInfo: toNullableString(row.additional_info),
      createdAt: toDate(row.created_at),
      updatedAt: toDate(row.updated_at),
    };
  }
}
