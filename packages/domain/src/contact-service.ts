import { type Contact, type ContactInput, type ContactPatch, type ContactQuery } from './contact';
import { type ContactRepository } from './contact-ports';
import { upcomingBirthdayDates } from './birthdays';

export interface ContactServiceDeps {
  contactRepo: ContactRepository;
  now?: () => Date;
}

/**
 * Contact operations scoped to their owner. A contact that belongs to
 * someone else is reported exactly like one that does not exist.
 */
export class ContactService {
  constructor(private readonly deps: ContactServiceDeps) {}

  async create(userId: string, input: ContactInput): Promise<Contact> {
    const { contactRepo } = this.deps;

    if (await contactRepo.findByEmail(input.email)) {
      throw new ContactError('CONFLICT', 'Contact with this email already exists');
    }

    return contactRepo.create({ ...input, userId });
  }

  async list(userId: string, query: ContactQuery): Promise<Contact[]> {
    const search = query.search?.trim();
    return this.deps.contactRepo.search(userId, {
      limit: query.limit,
      offset: query.offset,
      search: search ? search : undefined,
    });
  }

  async get(userId: string, contactId: string): Promise<Contact> {
    const contact = await this.deps.contactRepo.findById(contactId);
    if (!contact || contact.userId !== userId) {
      throw new ContactError('NOT_FOUND', 'Contact not found');
    }
    return contact;
  }

  async update(userId: string, contactId: string, patch: ContactPatch): Promise<Contact> {
    const { contactRepo } = this.deps;

    const current = await this.get(userId, contactId);

    if (patch.email !== undefined && patch.email !== current.email) {
      const taken = await contactRepo.findByEmail(patch.email);
      if (taken && taken.id !== current.id) {
        throw new ContactError('CONFLICT', 'Contact with this email already exists');
      }
    }

    const updated = await contactRepo.update(contactId, patch);
    if (!updated) {
      throw new ContactError('NOT_FOUND', 'Contact not found');
    }
    return updated;
  }

  async remove(userId: string, contactId: string): Promise<Contact> {
    const contact = await this.get(userId, contactId);
    await this.deps.contactRepo.delete(contactId);
    return contact;
  }

  async upcomingBirthdays(userId: string): Promise<Contact[]> {
    const today = this.deps.now ? this.deps.now() : new Date();
    return this.deps.contactRepo.findByBirthdayDates(userId, upcomingBirthdayDates(today));
  }
}

export class ContactError extends Error {
  constructor(
    public readonly kind: 'NOT_FOUND' | 'CONFLICT',
    message: string,
  ) {
    super(message);
    this.name = 'ContactError';
  }
}
