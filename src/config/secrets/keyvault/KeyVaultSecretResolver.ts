/**
 * Azure Key Vault Secret Resolver
 *
 * Resolves secret URIs (`https://<vault>.vault.azure.net/secrets/<name>[/<version>]`)
 * with one `SecretClient` per vault. Authentication uses the configured
 * credential or, when none is given, a `DefaultAzureCredential` created on
 * first use.
 */

import { DefaultAzureCredential, type TokenCredential } from '@azure/identity';
import { SecretClient } from '@azure/keyvault-secrets';
import { z } from 'zod';
import {
  ArgumentError,
  ConfigurationError,
  KeyNotFoundError,
  SecretStoreError,
  TimeoutError,
  describeError,
} from '../../../utils/errors.js';
import { isBlank } from '../../../utils/strings.js';
import { runWithTimeout } from '../../../utils/timeout.js';
import {
  parseKeyVaultResolverOptions,
  type KeyVaultResolverOptions,
  type KeyVaultResolverOptionsInput,
} from '../../schemas/keyvault.js';
import type { ISecretResolver, ResolveOptions } from '../ISecretResolver.js';
import { SecretValueCache } from '../SecretValueCache.js';
import { workerThreadBridge, type SyncResolveBridge } from '../SyncBridge.js';
import { maskKeyVaultUri, parseSecretUri } from './KeyVaultReferenceMatcher.js';

/**
 * The subset of `SecretClient` used here
 */
export interface KeyVaultSecretReader {
  getSecret(
    name: string,
    options?: { version?: string; abortSignal?: AbortSignal }
  ): Promise<{ value?: string }>;
}

export type KeyVaultClientFactory = (vaultUrl: string, credential: TokenCredential) => KeyVaultSecretReader;

export interface KeyVaultSecretResolverDependencies {
  clientFactory?: KeyVaultClientFactory;
  syncBridge?: SyncResolveBridge;
}

const NotFoundErrorSchema = z.object({ statusCode: z.literal(404) });

const createSecretClient: KeyVaultClientFactory = (vaultUrl, credential) =>
  new SecretClient(vaultUrl, credential);

export class KeyVaultSecretResolver implements ISecretResolver {
  readonly options: KeyVaultResolverOptions;
  private readonly clientFactory: KeyVaultClientFactory;
  private readonly clients = new Map<string, KeyVaultSecretReader>();
  private readonly cache = new SecretValueCache();
  private readonly syncBridge?: SyncResolveBridge;
  private credential?: TokenCredential;
  private readonly hasCustomClient: boolean;

  constructor(options?: KeyVaultResolverOptionsInput, dependencies: KeyVaultSecretResolverDependencies = {}) {
    this.options = parseKeyVaultResolverOptions(options);
    this.credential = this.options.credential;
    this.clientFactory = dependencies.clientFactory ?? createSecretClient;
    this.syncBridge = dependencies.syncBridge;
    this.hasCustomClient = dependencies.clientFactory !== undefined || this.options.credential !== undefined;
  }

  async resolveSecret(secretUri: string, resolveOptions: ResolveOptions = {}): Promise<string> {
    if (isBlank(secretUri)) {
      throw new ArgumentError('Secret URI cannot be null or empty.', 'secretUri');
    }

    const cached = this.getCached(secretUri);
    if (cached !== undefined) {
      return cached;
    }

    const reference = parseSecretUri(secretUri);
    const masked = maskKeyVaultUri(secretUri);
    const client = this.getOrCreateClient(reference.storeAddress);

    console.debug(`[KeyVaultSecretResolver] Resolving secret ${masked}`);

    const value = await runWithTimeout(
      async (signal) => {
        try {
          const secret = await client.getSecret(reference.secretKey, {
            ...(reference.version ? { version: reference.version } : {}),
            abortSignal: signal,
          });
          return secret.value ?? '';
        } catch (error) {
          if (signal.aborted) {
            throw error;
          }
          if (NotFoundErrorSchema.safeParse(error).success) {
            throw new KeyNotFoundError(masked);
          }
          throw new SecretStoreError(
            `Failed to read secret from ${masked}: ${describeError(error)}`,
            error,
            { reference: masked }
          );
        }
      },
      {
        timeout: this.options.timeout,
        signal: resolveOptions.signal,
        onTimeout: () => new TimeoutError(`Timeout resolving secret from ${masked}`, this.options.timeout),
      }
    );

    console.info(`[KeyVaultSecretResolver] Successfully resolved secret from ${masked}`);
    return this.options.enableCaching ? this.cache.getOrInsert(secretUri, value) : value;
  }

  /**
   * Blocks until the secret is resolved in a worker thread. The worker always
   * authenticates with DefaultAzureCredential through SecretClient.
   *
   * @throws ConfigurationError when a credential or client factory is set without a sync bridge
   */
  resolveSecretSync(secretUri: string): string {
    if (isBlank(secretUri)) {
      throw new ArgumentError('Secret URI cannot be null or empty.', 'secretUri');
    }

    const cached = this.getCached(secretUri);
    if (cached !== undefined) {
      return cached;
    }

    parseSecretUri(secretUri);

    if (!this.syncBridge && this.hasCustomClient) {
      throw new ConfigurationError(
        'resolveSecretSync cannot use a custom credential or client factory; pass a syncBridge or use resolveSecret',
        { reference: maskKeyVaultUri(secretUri) }
      );
    }

    const bridge = this.syncBridge ?? workerThreadBridge();
    const value = bridge({ family: 'keyvault', reference: secretUri, timeout: this.options.timeout });

    return this.options.enableCaching ? this.cache.getOrInsert(secretUri, value) : value;
  }

  get cachedSecretCount(): number {
    return this.cache.size;
  }

  private getCached(secretUri: string): string | undefined {
    if (!this.options.enableCaching) {
      return undefined;
    }

    const cached = this.cache.get(secretUri);
    if (cached !== undefined) {
      console.debug(`[KeyVaultSecretResolver] Returning cached secret for ${maskKeyVaultUri(secretUri)}`);
    }
    return cached;
  }

  private getOrCreateClient(vaultUrl: string): KeyVaultSecretReader {
    const existing = this.clients.get(vaultUrl);
    if (existing) {
      return existing;
    }

    if (!this.credential) {
      this.credential = new DefaultAzureCredential();
    }

    const client = this.clientFactory(vaultUrl, this.credential);
    this.clients.set(vaultUrl, client);
    return client;
  }
}
