import { z } from 'zod';

export const BookSchema = z.object({
  id: z.coerce.number().int(),
  title: z.string(),
  author: z.string(),
  pages: z.coerce.number().int(),
  summary: z.string(),
  image: z.string(),
});

export type Book = z.infer<typeof BookSchema>;

export const BookInput = z.object({
  title: z.string(),
  author: z.string(),
  pages: z.number().int().nonnegative(),
  summary: z.string(),
  image: z.string(),
});

export type BookInput = z.infer<typeof BookInput>;
