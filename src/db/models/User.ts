import { z } from 'zod';

// SQLite hands booleans back as 0/1
const flag = z.union([z.boolean(), z.number()]).transform((value) => value === true || value === 1);

export const UserSchema = z.object({
  id: z.coerce.number().int(),
  first_name: z.string(),
  last_name: z.string(),
  email: z.string(),
  password: z.string(),
  created_on: z.coerce.date(),
  is_admin: flag,
  token: z.string().nullable(),
  token_exp: z.coerce.date().nullable(),
});

export type User = z.infer<typeof UserSchema>;

export const UserInput = z.object({
  first_name: z.string(),
  last_name: z.string(),
  email: z.string().email(),
  password: z.string().min(1),
  is_admin: z.boolean().optional(),
});

export type UserInput = z.infer<typeof UserInput>;

export interface UserProfile {
  id: number;
  first_name: string;
  last_name: string;
  email: string;
  created_on: string;
  is_admin: boolean;
}

export function toProfile(user: User): UserProfile {
  return {
    id: user.id,
    first_name: user.first_name,
    last_name: user.last_name,
    email: user.email,
    created_on: user.created_on.toISOString(),
    is_admin: user.is_admin,
  };
}
