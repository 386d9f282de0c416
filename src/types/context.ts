import type { EntityStore } from '../store/index.js';

export interface AppContext {
  store: EntityStore;
  tokenLifetimeSeconds: number;
  passwordRounds: number;
}
