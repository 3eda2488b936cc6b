import { type z } from 'zod';
import { AppError } from '@contacts/shared';

/** Parses `data` or throws a 422 listing each rejected field. */
export function validate<T extends z.ZodTypeAny>(schema: T, data: unknown, message: string): z.infer<T> {
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    throw AppError.validation(
      message,
      parsed.error.issues.map((i) => ({ path: i.path.join('.'), message: i.message })),
    );
  }
  return parsed.data;
}
