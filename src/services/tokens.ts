import crypto from 'crypto';
import type { EntityStore } from '../store/index.js';
import type { User } from '../db/models/User.js';

export const DEFAULT_TOKEN_LIFETIME_SECONDS = 86400;

// A token this close to expiry is replaced rather than handed out again
export const REUSE_MARGIN_SECONDS = 60;

// Revocation pushes expiry just past the reuse margin
export const REVOKE_OFFSET_SECONDS = 61;

function addSeconds(date: Date, seconds: number): Date {
  return new Date(date.getTime() + seconds * 1000);
}

/**
 * Returns the user's current token when it stays valid for longer than the
 * reuse margin, otherwise stores and returns a fresh one.
 */
export async function issueToken(
  store: EntityStore,
  user: User,
  lifetimeSeconds: number = DEFAULT_TOKEN_LIFETIME_SECONDS,
  now: Date = new Date()
): Promise<string> {
  const replaceBefore = addSeconds(now, REUSE_MARGIN_SECONDS);
  if (isReusable(user, replaceBefore)) {
    return user.token;
  }

  const token = crypto.randomBytes(32).toString('base64url');
  const expiresAt = addSeconds(now, lifetimeSeconds);
  if (await store.setUserToken(user.id, token, expiresAt, replaceBefore)) {
    user.token = token;
    user.token_exp = expiresAt;
    return token;
  }

  // A concurrent login stored its token first; hand that one out instead
  const current = await store.findUserById(user.id);
  if (!current || !isReusable(current, replaceBefore)) {
    throw new Error(`Token for user ${user.id} changed while issuing`);
  }
  user.token = current.token;
  user.token_exp = current.token_exp;
  return current.token;
}

function isReusable(user: User, replaceBefore: Date): user is User & { token: string; token_exp: Date } {
  return Boolean(user.token && user.token_exp && user.token_exp.getTime() > replaceBefore.getTime());
}

/** Expires the token in place; the value stays on the row. */
export async function revokeToken(store: EntityStore, user: User, now: Date = new Date()): Promise<void> {
  const expiresAt = addSeconds(now, -REVOKE_OFFSET_SECONDS);
  await store.setUserTokenExpiry(user.id, expiresAt);
  user.token_exp = expiresAt;
}

export async function resolveToken(
  store: EntityStore,
  token: string,
  now: Date = new Date()
): Promise<User | null> {
  const user = await store.findUserByToken(token);
  if (!user || !user.token_exp || user.token_exp.getTime() <= now.getTime()) {
    return null;
  }
  return user;
}
