import type { OAuthState } from './OAuthManager';

export interface OAuthStateConsumeResult {
  state?: OAuthState;
  found: boolean;
  expired: boolean;
}

export interface OAuthStateStore {
  set(stateKey: string, payload: OAuthState, ttlSeconds: number): void;
  consume(stateKey: string): OAuthStateConsumeResult;
  clearExpired(): void;
}

interface OAuthStateStoreEntry {
  state: OAuthState;
  expiresAt: number;
}

export class MemoryOAuthStateStore implements OAuthStateStore {
  private readonly store = new Map<string, OAuthStateStoreEntry>();

  constructor(private readonly now: () => number = Date.now) {}

  set(stateKey: string, payload: OAuthState, ttlSeconds: number): void {
    const ttl = Math.max(1, ttlSeconds);
    this.store.set(stateKey, { state: payload, expiresAt: this.now() + ttl * 1000 });
  }

  consume(stateKey: string): OAuthStateConsumeResult {
    const entry = this.store.get(stateKey);
    if (!entry) {
      return { found: false, expired: false };
    }

    // States are single use, expired or not.
    this.store.delete(stateKey);
    if (this.now() >= entry.expiresAt) {
      return { found: true, expired: true };
    }

    return { found: true, expired: false, state: entry.state };
  }

  clearExpired(): void {
    const now = this.now();
    for (const [stateKey, entry] of this.store.entries()) {
      if (now >= entry.expiresAt) {
        this.store.delete(stateKey);
      }
    }
  }
}

export const DEFAULT_OAUTH_STATE_TTL_SECONDS = 10 * 60;
