import { z } from 'zod';
import { type Contact, type ContactInput, type ContactPatch } from '@contacts/domain';

export const CONTACTS_PAGE_MAX = 500;
export const CONTACTS_PAGE_DEFAULT = 10;

const DATE_REGEX = /^\d{4}-\d{2}-\d{2}$/;

/** A real calendar date written as `YYYY-MM-DD`. */
export const BirthdaySchema = z
  .string()
  .regex(DATE_REGEX, 'Birthday must be a date in YYYY-MM-DD format')
  .refine((value) => {
    const parsed = new Date(`${value}T00:00:00.000Z`);
    return !Number.isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === value;
  }, 'Birthday is not a valid date');

const NameSchema = z.string().trim().min(2).max(50);
const PhoneSchema = z.string().trim().min(5).max(20);
const NoteSchema = z.string().max(255);

export const ContactCreateSchema = z.object({
  first_name: NameSchema,
  last_name: NameSchema,
  email: z.string().trim().toLowerCase().email().max(100),
  phone_number: PhoneSchema,
  birthday: BirthdaySchema,
  additional_info: NoteSchema.nullable().optional(),
});

export const ContactUpdateSchema = z.object({
  first_name: NameSchema.optional(),
  last_name: NameSchema.optional(),
  email: z.string().trim().toLowerCase().email().max(100).optional(),
  phone_number: PhoneSchema.optional(),
  birthday: BirthdaySchema.optional(),
  additional_info: NoteSchema.nullable().optional(),
});

export const ListContactsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(CONTACTS_PAGE_MAX).default(CONTACTS_PAGE_DEFAULT),
  offset: z.coerce.number().int().min(0).default(0),
  search: z.string().max(100).optional(),
});

const DIGITS_REGEX = /^\d+$/;
// Largest value of a Postgres BIGINT.
const MAX_CONTACT_ID = 9223372036854775807n;

export const ContactIdParamsSchema = z.object({
  contact_id: z
    .string()
    .regex(DIGITS_REGEX, 'Contact id must be a positive integer')
    .refine((value) => !DIGITS_REGEX.test(value) || BigInt(value) <= MAX_CONTACT_ID, 'Contact id is out of range'),
});

export const ContactViewSchema = z.object({
  id: z.string(),
  first_name: z.string(),
  last_name: z.string(),
  email: z.string(),
  phone_number: z.string(),
  birthday: z.string(),
  additional_info: z.string().nullable(),
  created_at: z.string().datetime(),
  updated_at: z.string().datetime(),
});

export type ContactCreate = z.infer<typeof ContactCreateSchema>;
export type ContactUpdate = z.infer<typeof ContactUpdateSchema>;
export type ListContactsQuery = z.infer<typeof ListContactsQuerySchema>;
export type ContactView = z.infer<typeof ContactViewSchema>;

export function toContactInput(body: ContactCreate): ContactInput {
  return {
    firstName: body.first_name,
    lastName: body.last_name,
    email: body.email,
    phoneNumber: body.phone_number,
    birthday: body.birthday,
    additionalInfo: body.additional_info ?? null,
  };
}

/** Only fields present in the body end up in the patch. */
export function toContactPatch(body: ContactUpdate): ContactPatch {
  const patch: ContactPatch = {};
  if (body.first_name !== undefined) patch.firstName = body.first_name;
  if (body.last_name !== undefined) patch.lastName = body.last_name;
  if (body.email !== undefined) patch.email = body.email;
  if (body.phone_number !== undefined) patch.phoneNumber = body.phone_number;
  if (body.birthday !== undefined) patch.birthday = body.birthday;
  if (body.additional_info !== undefined) patch.additionalInfo = body.additional_info;
  return patch;
}

export function toContactView(contact: Contact): ContactView {
  return {
    id: contact.id,
    first_name: contact.firstName,
    last_name: contact.lastName,
    email: contact.email,
    phone_number: contact.phoneNumber,
    birthday: contact.birthday,
    additional_info: contact.additionalInfo,
    created_at: contact.createdAt.toISOString(),
    updated_at: contact.updatedAt.toISOString(),
  };
}
