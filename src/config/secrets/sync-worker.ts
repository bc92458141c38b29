/**
 * Worker-thread entry for the synchronous resolver variants.
 *
 * Resolvers are kept for the worker's lifetime so repeated blocking calls
 * share store clients and value caches.
 */

import { runAsWorker } from 'synckit';
import { KeyVaultSecretResolver } from './keyvault/KeyVaultSecretResolver.js';
import { serializeError } from '../../utils/errors.js';
import type { SyncResolveOutcome, SyncResolveRequest } from './SyncBridge.js';
import { authMethodFromDescriptor } from './vault/auth/AuthSelector.js';
import { VaultSecretResolver } from './vault/VaultSecretResolver.js';

const vaultResolvers = new Map<string, VaultSecretResolver>();
const keyVaultResolvers = new Map<number, KeyVaultSecretResolver>();

function vaultResolverFor(request: Extract<SyncResolveRequest, { family: 'vault' }>): VaultSecretResolver {
  const key = JSON.stringify([request.options, request.auth]);
  let resolver = vaultResolvers.get(key);
  if (!resolver) {
    resolver = new VaultSecretResolver({
      ...request.options,
      authMethod: authMethodFromDescriptor(request.auth),
    });
    vaultResolvers.set(key, resolver);
  }
  return resolver;
}

function keyVaultResolverFor(timeout: number): KeyVaultSecretResolver {
  let resolver = keyVaultResolvers.get(timeout);
  if (!resolver) {
    resolver = new KeyVaultSecretResolver({ timeout });
    keyVaultResolvers.set(timeout, resolver);
  }
  return resolver;
}

function resolve(request: SyncResolveRequest): Promise<string> {
  switch (request.family) {
    case 'vault':
      return vaultResolverFor(request).resolveSecret(request.reference, {
        vaultAddress: request.vaultAddress,
      });
    case 'keyvault':
      return keyVaultResolverFor(request.timeout).resolveSecret(request.reference);
  }
}

runAsWorker(async (request: SyncResolveRequest): Promise<SyncResolveOutcome> => {
  try {
    return { ok: true, value: await resolve(request) };
  } catch (error) {
    return { ok: false, error: serializeError(error) };
  }
});
