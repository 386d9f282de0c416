import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createHarness, seedUser, TEST_ROUNDS, type TestHarness } from '../testing/harness.js';
import { ensureAdmin } from './bootstrap.js';
import { verifyPassword } from './passwords.js';

let harness: TestHarness;

beforeEach(async () => {
  harness = await createHarness();
});

afterEach(async () => {
  await harness.db.destroy();
});

describe('ensureAdmin', () => {
  it('does nothing without credentials', async () => {
    expect(await ensureAdmin(harness.store, { email: 'admin@example.com', rounds: TEST_ROUNDS })).toBeNull();
    expect(await harness.store.countUsers()).toBe(0);
  });

  it('creates an admin in an empty database', async () => {
    const profile = await ensureAdmin(harness.store, {
      email: 'admin@example.com',
      password: 'test-secret',
      rounds: TEST_ROUNDS,
    });

    expect(profile).toMatchObject({ id: 1, email: 'admin@example.com', is_admin: true });
    const stored = await harness.store.findUserByEmail('admin@example.com');
    expect(stored?.password).not.toBe('test-secret');
    expect(await verifyPassword('test-secret', stored?.password ?? '')).toBe(true);
  });

  it('leaves an existing database alone', async () => {
    await seedUser(harness.store);
    const profile = await ensureAdmin(harness.store, {
      email: 'admin@example.com',
      password: 'test-secret',
      rounds: TEST_ROUNDS,
    });

    expect(profile).toBeNull();
    expect(await harness.store.countUsers()).toBe(1);
  });
});
