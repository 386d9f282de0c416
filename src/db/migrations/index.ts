import type { Knex } from 'knex';
import * as createUsers from './001_create_users.js';
import * as createBooks from './002_create_books.js';

const migrations: Record<string, Knex.Migration> = {
  '001_create_users': createUsers,
  '002_create_books': createBooks,
};

// Registered statically so the same list runs from src/ (vitest, tsx) and dist/.
export const migrationSource: Knex.MigrationSource<string> = {
  async getMigrations() {
    return Object.keys(migrations).sort();
  },
  getMigrationName(name) {
    return name;
  },
  async getMigration(name) {
    const migration = migrations[name];
    if (!migration) {
      throw new Error(`Unknown migration: ${name}`);
    }
    return migration;
  },
};
