/**
 * Unit Tests for KeyVaultSecretResolver
 *
 * SecretClient is replaced through the client factory; no Azure endpoint is
 * contacted.
 */

import type { TokenCredential } from '@azure/identity';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  KeyVaultSecretResolver,
  type KeyVaultClientFactory,
  type KeyVaultSecretReader,
} from '../../../../../src/config/secrets/keyvault/KeyVaultSecretResolver.js';
import type { SyncResolveBridge } from '../../../../../src/config/secrets/SyncBridge.js';
import {
  ArgumentError,
  ConfigurationError,
  InvalidReferenceError,
  KeyNotFoundError,
  SecretStoreError,
  TimeoutError,
} from '../../../../../src/utils/errors.js';

const SECRET_URI = 'https://myvault.vault.azure.net/secrets/db-password';

const credential: TokenCredential = {
  getToken: async () => null,
};

function createReader(secrets: Record<string, string | undefined>) {
  return {
    getSecret: vi.fn<KeyVaultSecretReader['getSecret']>(async (name) => {
      if (name in secrets) {
        return { value: secrets[name] };
      }
      throw Object.assign(new Error(`Secret ${name} not found`), { statusCode: 404 });
    }),
  };
}

describe('KeyVaultSecretResolver', () => {
  beforeEach(() => {
    vi.spyOn(console, 'debug').mockImplementation(() => {});
    vi.spyOn(console, 'info').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should resolve a secret with one client per vault', async () => {
    const reader = createReader({ 'db-password': 'kv-secret', 'api-key': 'kv-api-key' });
    const clientFactory = vi.fn<KeyVaultClientFactory>(() => reader);
    const resolver = new KeyVaultSecretResolver({ credential }, { clientFactory });

    await expect(resolver.resolveSecret(SECRET_URI)).resolves.toBe('kv-secret');
    await expect(resolver.resolveSecret('https://myvault.vault.azure.net/secrets/api-key')).resolves.toBe(
      'kv-api-key'
    );

    expect(clientFactory).toHaveBeenCalledTimes(1);
    expect(clientFactory).toHaveBeenCalledWith('https://myvault.vault.azure.net', credential);
  });

  it('should request the pinned version', async () => {
    const reader = createReader({ 'db-password': 'versioned' });
    const resolver = new KeyVaultSecretResolver({ credential }, { clientFactory: () => reader });

    await resolver.resolveSecret(`${SECRET_URI}/abc123`);

    expect(reader.getSecret).toHaveBeenCalledWith('db-password', {
      version: 'abc123',
      abortSignal: expect.any(AbortSignal),
    });
  });

  it('should cache resolved values', async () => {
    const reader = createReader({ 'db-password': 'kv-secret' });
    const resolver = new KeyVaultSecretResolver({ credential }, { clientFactory: () => reader });

    await resolver.resolveSecret(SECRET_URI);
    await resolver.resolveSecret(SECRET_URI);

    expect(reader.getSecret).toHaveBeenCalledTimes(1);
    expect(resolver.cachedSecretCount).toBe(1);
  });

  it('should fetch every time when caching is disabled', async () => {
    const reader = createReader({ 'db-password': 'kv-secret' });
    const resolver = new KeyVaultSecretResolver(
      { credential, enableCaching: false },
      { clientFactory: () => reader }
    );

    await resolver.resolveSecret(SECRET_URI);
    await resolver.resolveSecret(SECRET_URI);

    expect(reader.getSecret).toHaveBeenCalledTimes(2);
  });

  it('should render a secret without a value as an empty string', async () => {
    const reader = createReader({ 'db-password': undefined });
    const resolver = new KeyVaultSecretResolver({ credential }, { clientFactory: () => reader });

    await expect(resolver.resolveSecret(SECRET_URI)).resolves.toBe('');
  });

  it('should map a 404 to KeyNotFoundError with a masked path', async () => {
    const resolver = new KeyVaultSecretResolver({ credential }, { clientFactory: () => createReader({}) });

    await expect(resolver.resolveSecret(SECRET_URI)).rejects.toThrow(
      new KeyNotFoundError('https://myvault.vault.azure.net/secrets/***')
    );
  });

  it('should wrap other failures in SecretStoreError', async () => {
    const cause = Object.assign(new Error('Forbidden'), { statusCode: 403 });
    const reader: KeyVaultSecretReader = { getSecret: async () => Promise.reject(cause) };
    const resolver = new KeyVaultSecretResolver({ credential }, { clientFactory: () => reader });

    const error = await resolver.resolveSecret(SECRET_URI).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(SecretStoreError);
    expect(error).toHaveProperty(
      'message',
      'Failed to read secret from https://myvault.vault.azure.net/secrets/***: Forbidden'
    );
    expect(error).toHaveProperty('cause', cause);
  });

  it('should time out a slow vault', async () => {
    const reader: KeyVaultSecretReader = {
      getSecret: (_name, options) =>
        new Promise((_resolve, reject) => {
          options?.abortSignal?.addEventListener('abort', () => reject(new Error('aborted')));
        }),
    };
    const resolver = new KeyVaultSecretResolver({ credential, timeout: 20 }, { clientFactory: () => reader });

    await expect(resolver.resolveSecret(SECRET_URI)).rejects.toBeInstanceOf(TimeoutError);
  });

  it('should reject blank and malformed input', async () => {
    const resolver = new KeyVaultSecretResolver({ credential }, { clientFactory: () => createReader({}) });

    await expect(resolver.resolveSecret('')).rejects.toThrow(
      new ArgumentError('Secret URI cannot be null or empty.', 'secretUri')
    );
    await expect(resolver.resolveSecret('https://myvault.vault.azure.net/keys/x')).rejects.toBeInstanceOf(
      InvalidReferenceError
    );
  });

  it('should default to skipping failures', () => {
    expect(new KeyVaultSecretResolver().options).toMatchObject({
      throwOnResolveFailure: false,
      timeout: 30000,
      enableCaching: true,
    });
  });

  it('should reject invalid options', () => {
    expect(() => new KeyVaultSecretResolver({ timeout: 0 })).toThrow(ConfigurationError);
  });

  describe('resolveSecretSync', () => {
    it('should resolve through the bridge and cache the result', () => {
      const bridge = vi.fn<SyncResolveBridge>(() => 'sync-kv-secret');
      const resolver = new KeyVaultSecretResolver({ credential }, { syncBridge: bridge });

      expect(resolver.resolveSecretSync(SECRET_URI)).toBe('sync-kv-secret');
      expect(resolver.resolveSecretSync(SECRET_URI)).toBe('sync-kv-secret');

      expect(bridge).toHaveBeenCalledTimes(1);
      expect(bridge).toHaveBeenCalledWith({ family: 'keyvault', reference: SECRET_URI, timeout: 30000 });
    });

    it('should refuse a custom credential or client factory without a sync bridge', () => {
      const reader = createReader({ 'db-password': 'kv-secret' });

      expect(() => new KeyVaultSecretResolver({ credential }).resolveSecretSync(SECRET_URI)).toThrow(
        ConfigurationError
      );
      expect(() =>
        new KeyVaultSecretResolver({}, { clientFactory: () => reader }).resolveSecretSync(SECRET_URI)
      ).toThrow(ConfigurationError);
      expect(reader.getSecret).not.toHaveBeenCalled();
    });

    it('should validate the URI before starting the bridge', () => {
      const bridge = vi.fn<SyncResolveBridge>(() => 'unused');
      const resolver = new KeyVaultSecretResolver({ credential }, { syncBridge: bridge });

      expect(() => resolver.resolveSecretSync('not a url')).toThrow(InvalidReferenceError);
      expect(bridge).not.toHaveBeenCalled();
    });
  });
});
