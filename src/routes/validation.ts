import { z } from 'zod';
import { NotFoundError, ValidationError } from '../errors.js';

const IdParam = z.coerce.number().int().positive();

// Ids that can't name a row are reported the same way as ids with no row
export function parseId(value: string | undefined, entity: string): number {
  const parsed = IdParam.safeParse(value);
  if (!parsed.success || !/^\d+$/.test(value ?? '')) {
    throw new NotFoundError(`${entity} not found`);
  }
  return parsed.data;
}

export function parseBody<T extends z.ZodTypeAny>(schema: T, body: unknown): z.infer<T> {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((issue) => (issue.path.length ? String(issue.path[0]) : 'body'));
    throw new ValidationError([...new Set(fields)]);
  }
  return parsed.data;
}
