/**
 * HashiCorp Vault Secret Resolver
 *
 * Resolves `@HashiCorp.Vault(...)` and `hashicorp://` references:
 *
 * 1. Reject blank input
 * 2. Return the cached value when caching is enabled
 * 3. Parse the reference
 * 4. Pick the store address (per-call override, then reference, then
 *    configured address; `addressPrecedence: 'configured'` swaps the last two)
 * 5-6. Get or create the store client, selecting authentication on creation
 * 7-8. Work out KV version and mount/path
 * 9. Fetch within `timeout`, linked to the caller's signal
 * 10-11. Cache and return the value, or fail with KeyNotFoundError
 *
 * Nothing is retried; one store round-trip per uncached call.
 *
 * Usage:
 * ```typescript
 * const resolver = new VaultSecretResolver({ authMethod: new TokenAuthMethod('test-token') });
 * const password = await resolver.resolveSecret(
 *   '@HashiCorp.Vault(VaultAddress=https://vault.example.com;SecretPath=secret/data/app;SecretKey=password)'
 * );
 * ```
 */

import {
  ArgumentError,
  ConfigurationError,
  KeyNotFoundError,
  SecretStoreError,
  TimeoutError,
  describeError,
} from '../../../utils/errors.js';
import { isBlank, nonBlank } from '../../../utils/strings.js';
import { runWithTimeout } from '../../../utils/timeout.js';
import {
  parseVaultResolverOptions,
  type VaultResolverOptions,
  type VaultResolverOptionsInput,
} from '../../schemas/vault.js';
import type { ISecretResolver, ResolveOptions } from '../ISecretResolver.js';
import { SecretValueCache } from '../SecretValueCache.js';
import { workerThreadBridge, type SyncResolveBridge } from '../SyncBridge.js';
import { getEffectiveVaultAddress, selectAuthMethod } from './auth/AuthSelector.js';
import { VAULT_ADDR_ENV, processEnvironment, type EnvironmentProbe } from './EnvironmentProbe.js';
import { createNodeVaultStoreClient } from './NodeVaultStoreClient.js';
import { splitSecretPath } from './paths.js';
import type { KvVersion, SecretStoreClient, StoreClientFactory } from './SecretStoreClient.js';
import { StoreClientCache } from './StoreClientCache.js';
import { maskSecretPath, maskVaultReference, parseVaultReference } from './VaultReferenceMatcher.js';
import type { SecretReference } from '../../../core/types.js';

export interface VaultSecretResolverDependencies {
  /** Environment used for address and auth auto-detection (default: process) */
  environment?: EnvironmentProbe;

  /** Builds store clients (default: node-vault) */
  clientFactory?: StoreClientFactory;

  /** Runs the blocking variant (default: shared worker thread) */
  syncBridge?: SyncResolveBridge;
}

/**
 * Renders a payload value as configuration text.
 */
export function renderSecretValue(value: unknown): string {
  if (value === undefined || value === null) {
    return '';
  }
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'object') {
    return JSON.stringify(value);
  }
  return String(value);
}

export class VaultSecretResolver implements ISecretResolver {
  readonly options: VaultResolverOptions;
  private readonly environment: EnvironmentProbe;
  private readonly clients: StoreClientCache;
  private readonly cache = new SecretValueCache();
  private readonly syncBridge?: SyncResolveBridge;
  private readonly hasCustomClientFactory: boolean;

  /**
   * @throws ConfigurationError when options are invalid
   */
  constructor(options?: VaultResolverOptionsInput, dependencies: VaultSecretResolverDependencies = {}) {
    this.options = parseVaultResolverOptions(options);
    this.environment = dependencies.environment ?? processEnvironment;
    this.clients = new StoreClientCache(dependencies.clientFactory ?? createNodeVaultStoreClient);
    this.syncBridge = dependencies.syncBridge;
    this.hasCustomClientFactory = dependencies.clientFactory !== undefined;
  }

  async resolveSecret(reference: string, resolveOptions: ResolveOptions = {}): Promise<string> {
    if (isBlank(reference)) {
      throw new ArgumentError('Secret reference cannot be null or empty.', 'reference');
    }

    const cached = this.getCached(reference);
    if (cached !== undefined) {
      return cached;
    }

    const parsed = parseVaultReference(reference);
    const masked = maskVaultReference(reference);
    const client = this.getOrCreateClient(
      this.getEffectiveAddress(parsed.storeAddress, resolveOptions.vaultAddress)
    );

    console.debug(`[VaultSecretResolver] Resolving secret ${masked}`);

    const value = await runWithTimeout((signal) => this.readSecret(client, parsed, masked, signal), {
      timeout: this.options.timeout,
      signal: resolveOptions.signal,
      onTimeout: () =>
        new TimeoutError(`Timeout resolving secret from ${masked}`, this.options.timeout),
    });

    console.info(`[VaultSecretResolver] Successfully resolved secret from ${masked}`);
    return this.options.enableCaching ? this.cache.getOrInsert(reference, value) : value;
  }

  /**
   * Blocks the calling thread until the secret is resolved in a worker thread.
   * Cache hits are answered without starting the worker.
   *
   * The worker reads through node-vault, so a resolver built with its own
   * client factory needs its own sync bridge too.
   *
   * @throws ConfigurationError when a custom client factory is set without a sync bridge
   */
  resolveSecretSync(reference: string, resolveOptions: Pick<ResolveOptions, 'vaultAddress'> = {}): string {
    if (isBlank(reference)) {
      throw new ArgumentError('Secret reference cannot be null or empty.', 'reference');
    }

    const cached = this.getCached(reference);
    if (cached !== undefined) {
      return cached;
    }

    // Parse and pick auth and address here: the worker sees neither this
    // resolver's environment nor its client factory
    const parsed = parseVaultReference(reference);
    const vaultAddress = this.getEffectiveAddress(parsed.storeAddress, resolveOptions.vaultAddress);
    const auth = selectAuthMethod(this.options, this.environment).getAuthDescriptor();
    const { authMethod: _authMethod, ...options } = this.options;

    if (!this.syncBridge && this.hasCustomClientFactory) {
      throw new ConfigurationError(
        'resolveSecretSync cannot use a custom store client factory; pass a syncBridge or use resolveSecret',
        { reference: maskVaultReference(reference) }
      );
    }

    const bridge = this.syncBridge ?? workerThreadBridge();
    const value = bridge({ family: 'vault', reference, options, auth, vaultAddress });

    return this.options.enableCaching ? this.cache.getOrInsert(reference, value) : value;
  }

  get cachedSecretCount(): number {
    return this.cache.size;
  }

  get effectiveKvVersion(): KvVersion {
    return this.options.kvVersion === 'auto' ? 2 : this.options.kvVersion;
  }

  private getCached(reference: string): string | undefined {
    if (!this.options.enableCaching) {
      return undefined;
    }

    const cached = this.cache.get(reference);
    if (cached !== undefined) {
      console.debug(`[VaultSecretResolver] Returning cached secret for ${maskVaultReference(reference)}`);
    }
    return cached;
  }

  private getEffectiveAddress(referenceAddress: string, override?: string): string {
    const explicit = nonBlank(override);
    if (explicit !== undefined) {
      return explicit;
    }

    if (this.options.addressPrecedence === 'configured') {
      const configured =
        nonBlank(this.options.vaultAddress) ?? nonBlank(this.environment.getVariable(VAULT_ADDR_ENV));
      if (configured !== undefined) {
        return configured;
      }
    }

    return nonBlank(referenceAddress) ?? getEffectiveVaultAddress(this.options, this.environment);
  }

  private getOrCreateClient(address: string): SecretStoreClient {
    return this.clients.getOrCreate(
      address,
      () => selectAuthMethod(this.options, this.environment),
      this.options.namespace
    );
  }

  private async readSecret(
    client: SecretStoreClient,
    reference: SecretReference,
    masked: string,
    signal: AbortSignal
  ): Promise<string> {
    const { mountPoint, path } = splitSecretPath(reference.secretPath);

    let payload: Record<string, unknown> | undefined;
    try {
      payload = await client.readSecret({
        mountPoint: mountPoint || this.options.mountPath,
        path,
        kvVersion: this.effectiveKvVersion,
        signal,
      });
    } catch (error) {
      // Deadline or caller cancellation already settled the call
      if (signal.aborted) {
        throw error;
      }
      throw new SecretStoreError(
        `Failed to read secret from ${masked}: ${describeError(error)}`,
        error,
        { reference: masked }
      );
    }

    if (!payload || !Object.prototype.hasOwnProperty.call(payload, reference.secretKey)) {
      throw new KeyNotFoundError(maskSecretPath(reference.secretPath));
    }

    return renderSecretValue(payload[reference.secretKey]);
  }
}
