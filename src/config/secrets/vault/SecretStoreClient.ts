/**
 * Secret Store Client Contract
 *
 * The capability a resolver needs from a vendor client: read the payload
 * stored at a path. Implementations own their connection and any login
 * session for one store address.
 */

import type { VaultAuthDescriptor } from './auth/VaultAuthMethod.js';

export type KvVersion = 1 | 2;

export interface ReadSecretRequest {
  /** Secrets engine mount, e.g. "secret" */
  mountPoint: string;

  /** Path inside the mount, e.g. "myapp/config" */
  path: string;

  kvVersion: KvVersion;

  /** Aborted when the caller cancels or the resolver deadline passes */
  signal?: AbortSignal;
}

export interface SecretStoreClient {
  /**
   * @returns The key/value payload, or undefined when nothing is stored at the path
   * @throws On network or authentication failures
   */
  readSecret(request: ReadSecretRequest): Promise<Record<string, unknown> | undefined>;
}

export interface StoreClientSettings {
  /** Normalized store address */
  address: string;
  auth: VaultAuthDescriptor;
  namespace?: string;
}

export type StoreClientFactory = (settings: StoreClientSettings) => SecretStoreClient;
