/**
 * Unit Tests for the worker-thread sync bridge
 *
 * These run the real synckit worker from the source tree. Requests that fail
 * inside the worker must come back as the same error classes the
 * asynchronous path throws. The only store address used is a closed port on
 * the loopback interface, so the connection is refused locally.
 */

import { describe, it, expect } from 'vitest';
import { parseVaultResolverOptions } from '../../../../src/config/schemas/vault.js';
import { workerThreadBridge } from '../../../../src/config/secrets/SyncBridge.js';
import { TokenAuthMethod } from '../../../../src/config/secrets/vault/auth/TokenAuthMethod.js';
import { VaultSecretResolver } from '../../../../src/config/secrets/vault/VaultSecretResolver.js';
import { createStaticEnvironment } from '../../../../src/testing/index.js';
import {
  ArgumentError,
  InvalidReferenceError,
  SecretStoreError,
} from '../../../../src/utils/errors.js';

const WORKER_TEST_TIMEOUT = 30_000;

const UNREACHABLE_REFERENCE = 'hashicorp://127.0.0.1:1/secret/data/app#pw';

function plainVaultOptions() {
  const { authMethod: _authMethod, ...options } = parseVaultResolverOptions({ timeout: 5000 });
  return options;
}

function captureSync(action: () => unknown): unknown {
  try {
    action();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe('workerThreadBridge', () => {
  it(
    'should rebuild InvalidReferenceError raised in the worker',
    () => {
      const error = captureSync(() =>
        workerThreadBridge()({
          family: 'vault',
          reference: 'not a reference',
          options: plainVaultOptions(),
          auth: { kind: 'token', token: 'test-token' },
          vaultAddress: 'https://vault.test',
        })
      );

      expect(error).toBeInstanceOf(InvalidReferenceError);
      expect(error).toHaveProperty('code', 'INVALID_REFERENCE');
      expect(error).toHaveProperty('message', expect.stringMatching(/^Invalid HashiCorp Vault reference format: \*\*\*/));
    },
    WORKER_TEST_TIMEOUT
  );

  it(
    'should rebuild ArgumentError with its parameter name',
    () => {
      const error = captureSync(() =>
        workerThreadBridge()({ family: 'keyvault', reference: '', timeout: 5000 })
      );

      expect(error).toBeInstanceOf(ArgumentError);
      expect(error).toHaveProperty('paramName', 'secretUri');
      expect(error).toHaveProperty('message', 'Secret URI cannot be null or empty.');
    },
    WORKER_TEST_TIMEOUT
  );

  it(
    'should give resolveSecretSync the same store error class as resolveSecret',
    async () => {
      const resolver = new VaultSecretResolver(
        { authMethod: new TokenAuthMethod('test-token'), timeout: 5000, enableCaching: false },
        { environment: createStaticEnvironment() }
      );

      const asyncError = await resolver.resolveSecret(UNREACHABLE_REFERENCE).catch((caught: unknown) => caught);
      const syncError = captureSync(() => resolver.resolveSecretSync(UNREACHABLE_REFERENCE));

      expect(asyncError).toBeInstanceOf(SecretStoreError);
      expect(syncError).toBeInstanceOf(SecretStoreError);
      expect(syncError).toHaveProperty('message', expect.stringMatching(/^Failed to read secret from hashicorp:\/\/127\.0\.0\.1:1\/\*\*\*#\*\*\*: /));
      expect(syncError).toHaveProperty('details', { reference: 'hashicorp://127.0.0.1:1/***#***' });
      expect(syncError).toHaveProperty('cause', expect.any(Error));
    },
    WORKER_TEST_TIMEOUT
  );
});
