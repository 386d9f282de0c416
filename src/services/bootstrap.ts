import type { EntityStore } from '../store/index.js';
import { toProfile, type UserProfile } from '../db/models/User.js';
import { hashPassword } from './passwords.js';

export interface BootstrapAdmin {
  email?: string;
  password?: string;
  rounds: number;
}

// Registration is admin-gated, so an empty database needs one admin to start from.
export async function ensureAdmin(store: EntityStore, admin: BootstrapAdmin): Promise<UserProfile | null> {
  if (!admin.email || !admin.password) {
    return null;
  }

  if ((await store.countUsers()) > 0) {
    return null;
  }

  const user = await store.createUser({
    first_name: 'Admin',
    last_name: 'Admin',
    email: admin.email,
    password_hash: await hashPassword(admin.password, admin.rounds),
    is_admin: true,
  });

  return toProfile(user);
}
