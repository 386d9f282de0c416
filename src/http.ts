#!/usr/bin/env node

import { loadConfig } from './config/index.js';
import { createKnexInstance, runMigrations, closeDatabase } from './db/index.js';
import { createKnexStore } from './store/index.js';
import { ensureAdmin } from './services/bootstrap.js';
import { createApp } from './app.js';

async function main(): Promise<void> {
  const config = loadConfig();
  const db = createKnexInstance(config.database);

  // Run database migrations
  console.log('Running database migrations...');
  await runMigrations(db);
  console.log('Migrations complete');

  const store = createKnexStore(db);
  const admin = await ensureAdmin(store, {
    email: config.bootstrap.adminEmail,
    password: config.bootstrap.adminPassword,
    rounds: config.auth.passwordRounds,
  });
  if (admin) {
    console.log(`Created bootstrap admin ${admin.email} with id ${admin.id}`);
  }

  const app = createApp({
    store,
    tokenLifetimeSeconds: config.auth.tokenLifetimeSeconds,
    passwordRounds: config.auth.passwordRounds,
  });

  // Start HTTP server
  const { port, host } = config.server;
  const server = app.listen(port, host, () => {
    console.log(`Bookshelf API running at http://${host}:${port}`);
  });

  // Handle shutdown
  const shutdown = () => {
    console.log('Shutting down...');
    server.close(() => {
      closeDatabase(db)
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          console.error('Error closing database:', error);
          process.exit(1);
        });
    });
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
