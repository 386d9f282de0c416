import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createHarness, seedUser, type TestHarness } from '../testing/harness.js';
import { issueToken, revokeToken, resolveToken } from './tokens.js';

const T0 = new Date('2030-01-01T00:00:00.000Z');

function later(seconds: number): Date {
  return new Date(T0.getTime() + seconds * 1000);
}

let harness: TestHarness;

beforeEach(async () => {
  harness = await createHarness();
});

afterEach(async () => {
  await harness.db.destroy();
});

describe('issueToken', () => {
  it('creates a url-safe token with the requested lifetime', async () => {
    const user = await seedUser(harness.store);
    const token = await issueToken(harness.store, user, 3600, T0);

    expect(token).toMatch(/^[A-Za-z0-9_-]{43}$/);
    const stored = await harness.store.findUserById(user.id);
    expect(stored?.token).toBe(token);
    expect(stored?.token_exp?.toISOString()).toBe('2030-01-01T01:00:00.000Z');
  });

  it('reuses a token that outlives the safety margin', async () => {
    const user = await seedUser(harness.store);
    const first = await issueToken(harness.store, user, 3600, T0);

    const reloaded = await harness.store.findUserById(user.id);
    expect(reloaded).not.toBeNull();
    if (!reloaded) return;

    const second = await issueToken(harness.store, reloaded, 3600, later(3539));
    expect(second).toBe(first);
  });

  it('replaces a token within 60 seconds of expiry', async () => {
    const user = await seedUser(harness.store);
    const first = await issueToken(harness.store, user, 100, T0);
    const second = await issueToken(harness.store, user, 100, later(40));

    expect(second).not.toBe(first);
    expect(user.token_exp?.toISOString()).toBe('2030-01-01T00:02:20.000Z');
  });

  it('hands out the token a concurrent issue already stored', async () => {
    const user = await seedUser(harness.store);
    const stale = { ...user };

    const first = await issueToken(harness.store, user, 3600, T0);
    const second = await issueToken(harness.store, stale, 3600, T0);

    expect(second).toBe(first);
    expect(stale.token_exp?.toISOString()).toBe('2030-01-01T01:00:00.000Z');
    expect(await resolveToken(harness.store, first, T0)).not.toBeNull();
  });
});

describe('resolveToken', () => {
  it('returns the owner while the token is valid', async () => {
    const user = await seedUser(harness.store, { email: 'owner@example.com' });
    const token = await issueToken(harness.store, user, 3600, T0);

    const resolved = await resolveToken(harness.store, token, later(3599));
    expect(resolved?.email).toBe('owner@example.com');
  });

  it('returns null once the expiry is reached', async () => {
    const user = await seedUser(harness.store);
    const token = await issueToken(harness.store, user, 3600, T0);

    expect(await resolveToken(harness.store, token, later(3600))).toBeNull();
  });

  it('returns null for an unknown token', async () => {
    await seedUser(harness.store);
    expect(await resolveToken(harness.store, 'not-a-real-token', T0)).toBeNull();
  });
});

describe('revokeToken', () => {
  it('expires the token but keeps its value', async () => {
    const user = await seedUser(harness.store);
    const token = await issueToken(harness.store, user, 3600, T0);

    await revokeToken(harness.store, user, later(10));

    expect(await resolveToken(harness.store, token, later(10))).toBeNull();
    const stored = await harness.store.findUserByToken(token);
    expect(stored?.token).toBe(token);
    expect(stored?.token_exp?.toISOString()).toBe('2029-12-31T23:59:09.000Z');
  });

  it('forces a new token on the next issue', async () => {
    const user = await seedUser(harness.store);
    const first = await issueToken(harness.store, user, 3600, T0);
    await revokeToken(harness.store, user, T0);

    const second = await issueToken(harness.store, user, 3600, T0);
    expect(second).not.toBe(first);
    expect(await resolveToken(harness.store, second, T0)).not.toBeNull();
  });
});
