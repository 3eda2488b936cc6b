import { type Contact, type NewContact, type ContactPatch, type ContactQuery, type MonthDay } from './contact';
import { type Repository } from './ports';

export interface ContactRepository extends Repository<Contact, NewContact> {
  update(id: string, patch: ContactPatch): Promise<Contact | null>;
  findByEmail(email: string): Promise<Contact | null>;
  search(userId: string, query: ContactQuery): Promise<Contact[]>;
  findByBirthdayDates(userId: string, dates: MonthDay[]): Promise<Contact[]>;
}
