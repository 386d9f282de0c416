import { knex, type Knex } from 'knex';
import path from 'path';
import fs from 'fs';
import type { DatabaseConfig } from '../config/index.js';
import { migrationSource } from './migrations/index.js';

export function createKnexInstance(database: DatabaseConfig): Knex {
  if (database.type === 'postgres' && database.url) {
    return knex({
      client: 'pg',
      connection: database.url,
      pool: { min: 2, max: 10 },
    });
  }

  if (database.path === ':memory:') {
    return knex({
      client: 'better-sqlite3',
      connection: { filename: ':memory:' },
      useNullAsDefault: true,
    });
  }

  // SQLite - ensure data directory exists
  const dbPath = path.resolve(database.path);
  const dataDir = path.dirname(dbPath);
  if (!fs.existsSync(dataDir)) {
    fs.mkdirSync(dataDir, { recursive: true });
  }

  return knex({
    client: 'better-sqlite3',
    connection: { filename: dbPath },
    useNullAsDefault: true,
  });
}

export async function runMigrations(db: Knex): Promise<void> {
  await db.migrate.latest({ migrationSource });
}

export async function closeDatabase(db: Knex): Promise<void> {
  await db.destroy();
}
