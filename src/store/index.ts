import { z } from 'zod';
import type { Knex } from 'knex';
import { StoreError } from '../errors.js';
import { UserSchema, type User } from '../db/models/User.js';
import { BookSchema, type Book, type BookInput } from '../db/models/Book.js';

export interface NewUser {
  first_name: string;
  last_name: string;
  email: string;
  password_hash: string;
  is_admin: boolean;
}

export interface UserChanges {
  first_name: string;
  last_name: string;
  email: string;
  password_hash: string;
  is_admin?: boolean;
}

/**
 * Persistence boundary for users and books. Route handlers and the auth
 * middleware only ever see this interface.
 */
export interface EntityStore {
  findUserById(id: number): Promise<User | null>;
  findUserByEmail(email: string): Promise<User | null>;
  findUserByToken(token: string): Promise<User | null>;
  countUsers(): Promise<number>;
  createUser(input: NewUser, now?: Date): Promise<User>;
  /** Returns null when no row has this id. */
  updateUser(id: number, changes: UserChanges): Promise<User | null>;
  /**
   * Stores a new token unless the row already holds one expiring after
   * `replaceBefore`. Returns false when another token was kept.
   */
  setUserToken(id: number, token: string, expiresAt: Date, replaceBefore: Date): Promise<boolean>;
  setUserTokenExpiry(id: number, expiresAt: Date): Promise<void>;
  /** Returns false when no row has this id. */
  deleteUser(id: number): Promise<boolean>;

  listBooks(): Promise<Book[]>;
  findBook(id: number): Promise<Book | null>;
  createBook(input: BookInput): Promise<Book>;
  updateBook(id: number, input: BookInput): Promise<Book | null>;
  deleteBook(id: number): Promise<boolean>;
}

// sqlite returns the new rowid, pg returns { id } when asked to
const InsertedId = z.union([
  z.number(),
  z.object({ id: z.coerce.number() }).transform((row) => row.id),
]);

async function statement<T>(description: string, run: () => PromiseLike<T>): Promise<T> {
  try {
    return await run();
  } catch (error) {
    throw new StoreError(`Failed to ${description}`, error);
  }
}

function parseUser(row: unknown): User | null {
  return row ? UserSchema.parse(row) : null;
}

function parseBook(row: unknown): Book | null {
  return row ? BookSchema.parse(row) : null;
}

export function createKnexStore(db: Knex): EntityStore {
  async function findUserById(id: number): Promise<User | null> {
    const row = await statement('load user', () => db('users').where('id', id).first());
    return parseUser(row);
  }

  async function findBook(id: number): Promise<Book | null> {
    const row = await statement('load book', () => db('books').where('id', id).first());
    return parseBook(row);
  }

  return {
    findUserById,

    async findUserByEmail(email) {
      const row = await statement('load user', () => db('users').where('email', email).first());
      return parseUser(row);
    },

    async findUserByToken(token) {
      const row = await statement('load user', () => db('users').where('token', token).first());
      return parseUser(row);
    },

    async countUsers() {
      const result = await statement('count users', () => db('users').count('id as count').first());
      return Number(result?.count || 0);
    },

    async createUser(input, now = new Date()) {
      const [inserted] = await statement('create user', () =>
        db('users')
          .insert({
            first_name: input.first_name,
            last_name: input.last_name,
            email: input.email,
            password: input.password_hash,
            created_on: now.toISOString(),
            is_admin: input.is_admin,
          })
          .returning('id')
      );
      const user = await findUserById(InsertedId.parse(inserted));
      if (!user) {
        throw new StoreError('Failed to create user', new Error('Inserted user row not found'));
      }
      return user;
    },

    async updateUser(id, changes) {
      const updates: Record<string, unknown> = {
        first_name: changes.first_name,
        last_name: changes.last_name,
        email: changes.email,
        password: changes.password_hash,
      };
      if (changes.is_admin !== undefined) {
        updates.is_admin = changes.is_admin;
      }

      const updated = await statement('update user', () => db('users').where('id', id).update(updates));
      return updated ? findUserById(id) : null;
    },

    async setUserToken(id, token, expiresAt, replaceBefore) {
      const updated = await statement('store token', () =>
        db('users')
          .where('id', id)
          .andWhere((query) =>
            query
              .whereNull('token')
              .orWhereNull('token_exp')
              .orWhere('token_exp', '<=', replaceBefore.toISOString())
          )
          .update({ token, token_exp: expiresAt.toISOString() })
      );
      return updated > 0;
    },

    async setUserTokenExpiry(id, expiresAt) {
      await statement('revoke token', () =>
        db('users').where('id', id).update({ token_exp: expiresAt.toISOString() })
      );
    },

    async deleteUser(id) {
      const deleted = await statement('delete user', () => db('users').where('id', id).del());
      return deleted > 0;
    },

    async listBooks() {
      const rows = await statement('list books', () => db('books').select('*').orderBy('id', 'asc'));
      return z.array(BookSchema).parse(rows);
    },

    findBook,

    async createBook(input) {
      const [inserted] = await statement('create book', () =>
        db('books')
          .insert({
            title: input.title,
            author: input.author,
            pages: input.pages,
            summary: input.summary,
            image: input.image,
          })
          .returning('id')
      );
      const book = await findBook(InsertedId.parse(inserted));
      if (!book) {
        throw new StoreError('Failed to create book', new Error('Inserted book row not found'));
      }
      return book;
    },

    async updateBook(id, input) {
      const updated = await statement('update book', () =>
        db('books').where('id', id).update({
          title: input.title,
          author: input.author,
          pages: input.pages,
          summary: input.summary,
          image: input.image,
        })
      );
      return updated ? findBook(id) : null;
    },

    async deleteBook(id) {
      const deleted = await statement('delete book', () => db('books').where('id', id).del());
      return deleted > 0;
    },
  };
}
