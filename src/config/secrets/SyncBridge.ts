/**
 * Synchronous Resolution Bridge
 *
 * The synchronous resolver variants block on the asynchronous path by running
 * it in a worker thread (synckit) and waiting on the result. Requests carry
 * only structured-cloneable data: the calling thread selects authentication
 * and the store address, and the worker builds its resolver with the default
 * store clients. Failures come back as serialized errors and are rebuilt into
 * the same error classes on the calling thread.
 */

import { fileURLToPath } from 'url';
import { createSyncFn } from 'synckit';
import { reviveError, type SerializedError } from '../../utils/errors.js';
import type { VaultResolverOptions } from '../schemas/vault.js';
import type { VaultAuthDescriptor } from './vault/auth/VaultAuthMethod.js';

export interface VaultSyncRequest {
  family: 'vault';
  reference: string;
  options: Omit<VaultResolverOptions, 'authMethod'>;
  auth: VaultAuthDescriptor;

  /** Store address picked on the calling thread */
  vaultAddress: string;
}

export interface KeyVaultSyncRequest {
  family: 'keyvault';
  reference: string;
  timeout: number;
}

export type SyncResolveRequest = VaultSyncRequest | KeyVaultSyncRequest;

export type SyncResolveOutcome =
  | { ok: true; value: string }
  | { ok: false; error: SerializedError };

export type SyncResolveBridge = (request: SyncResolveRequest) => string;

let workerBridge: SyncResolveBridge | undefined;

/**
 * Shared bridge backed by one lazily started worker thread.
 *
 * From the compiled package the worker is plain JavaScript. From the source
 * tree synckit finds `sync-worker.ts` instead and loads it through tsx.
 */
export function workerThreadBridge(): SyncResolveBridge {
  if (!workerBridge) {
    const resolveInWorker = createSyncFn<(request: SyncResolveRequest) => Promise<SyncResolveOutcome>>(
      fileURLToPath(new URL('./sync-worker.js', import.meta.url)),
      { tsRunner: 'tsx' }
    );

    workerBridge = (request) => {
      const outcome = resolveInWorker(request);
      if (!outcome.ok) {
        throw reviveError(outcome.error);
      }
      return outcome.value;
    };
  }
  return workerBridge;
}
