export interface Contact {
  id: string;
  userId: string | null;
  firstName: string;
  lastName: string;
  email: string;
  phoneNumber: string;
  /** Calendar date, `YYYY-MM-DD`. */
  birthday: string;
  additionalInfo: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface NewContact {
  userId: string;
  firstName: string;
  lastName: string;
  email: string;
  phoneNumber: string;
  birthday: string;
  additionalInfo: string | null;
}

export type ContactInput = Omit<NewContact, 'userId'>;

export type ContactPatch = Partial<ContactInput>;

export interface ContactQuery {
  limit: number;
  offset: number;
  search?: string;
}

export interface MonthDay {
  month: number;
  day: number;
}
