/**
 * Store Client Cache
 *
 * One long-lived client per normalized store address, created lazily. The
 * insert path is synchronous, so on a single event loop two callers can never
 * both build a client for the same key. Authentication is only selected when
 * a client is actually created; a creation that throws inserts nothing.
 */

import type { VaultAuthMethod } from './auth/VaultAuthMethod.js';
import type { SecretStoreClient, StoreClientFactory } from './SecretStoreClient.js';

/**
 * Lower-cases the address and strips one trailing slash.
 */
export function normalizeStoreAddress(address: string): string {
  const lowered = address.toLowerCase();
  return lowered.endsWith('/') ? lowered.slice(0, -1) : lowered;
}

export class StoreClientCache {
  private readonly clients = new Map<string, SecretStoreClient>();

  constructor(private readonly factory: StoreClientFactory) {}

  getOrCreate(
    storeAddress: string,
    selectAuth: () => VaultAuthMethod,
    namespace?: string
  ): SecretStoreClient {
    const key = normalizeStoreAddress(storeAddress);

    const existing = this.clients.get(key);
    if (existing) {
      return existing;
    }

    const client = this.factory({
      address: key,
      auth: selectAuth().getAuthDescriptor(),
      ...(namespace ? { namespace } : {}),
    });
    this.clients.set(key, client);
    return client;
  }

  has(storeAddress: string): boolean {
    return this.clients.has(normalizeStoreAddress(storeAddress));
  }

  /**
   * Drops the cached client so the next call builds (and re-authenticates) a new one.
   */
  invalidate(storeAddress: string): boolean {
    return this.clients.delete(normalizeStoreAddress(storeAddress));
  }

  get size(): number {
    return this.clients.size;
  }
}
