import { describe, it, expect } from 'vitest';
import {
  extractSecretUri,
  isKeyVaultReference,
  maskKeyVaultUri,
  parseSecretUri,
  tryParseKeyVaultReference,
} from '../../../../../src/config/secrets/keyvault/KeyVaultReferenceMatcher.js';
import { InvalidReferenceError } from '../../../../../src/utils/errors.js';

describe('KeyVaultReferenceMatcher', () => {
  describe('extractSecretUri', () => {
    it('should take the URI from the SecretUri form', () => {
      expect(
        extractSecretUri('@Microsoft.KeyVault(SecretUri=https://myvault.vault.azure.net/secrets/db-password)')
      ).toBe('https://myvault.vault.azure.net/secrets/db-password');
    });

    it('should build the URI from the VaultName form', () => {
      expect(extractSecretUri('@Microsoft.KeyVault(VaultName=myvault;SecretName=db-password)')).toBe(
        'https://myvault.vault.azure.net/secrets/db-password'
      );
    });

    it('should append the version from the VaultName form', () => {
      expect(
        extractSecretUri('@microsoft.keyvault(vaultname=myvault;secretname=db-password;secretversion=abc123)')
      ).toBe('https://myvault.vault.azure.net/secrets/db-password/abc123');
    });

    it.each([
      '',
      '   ',
      'https://myvault.vault.azure.net/secrets/db-password',
      '@Microsoft.KeyVault(SecretUri=http://myvault.vault.azure.net/secrets/db-password)',
      '@Microsoft.KeyVault(VaultName=myvault)',
    ])('should not match %j', (value) => {
      expect(extractSecretUri(value)).toBeUndefined();
      expect(isKeyVaultReference(value)).toBe(false);
    });
  });

  describe('parseSecretUri', () => {
    it('should split vault URL, name and version', () => {
      expect(parseSecretUri('https://myvault.vault.azure.net/secrets/db-password/abc123')).toEqual({
        storeAddress: 'https://myvault.vault.azure.net',
        secretPath: 'secrets/db-password',
        secretKey: 'db-password',
        version: 'abc123',
      });
    });

    it('should leave the version out when the URI has none', () => {
      expect(parseSecretUri('https://myvault.vault.azure.net/secrets/db-password')).toEqual({
        storeAddress: 'https://myvault.vault.azure.net',
        secretPath: 'secrets/db-password',
        secretKey: 'db-password',
      });
    });

    it.each(['not a url', 'https://myvault.vault.azure.net/keys/signing', 'https://myvault.vault.azure.net/secrets'])(
      'should reject %j',
      (uri) => {
        expect(() => parseSecretUri(uri)).toThrow(InvalidReferenceError);
      }
    );
  });

  describe('tryParseKeyVaultReference', () => {
    it('should parse a reference into its parts', () => {
      expect(tryParseKeyVaultReference('@Microsoft.KeyVault(VaultName=myvault;SecretName=api-key)')).toEqual({
        storeAddress: 'https://myvault.vault.azure.net',
        secretPath: 'secrets/api-key',
        secretKey: 'api-key',
      });
    });

    it('should return undefined for a reference with an unusable URI', () => {
      expect(
        tryParseKeyVaultReference('@Microsoft.KeyVault(SecretUri=https://myvault.vault.azure.net/keys/x)')
      ).toBeUndefined();
    });
  });

  describe('maskKeyVaultUri', () => {
    it('should hide the secret name and version', () => {
      expect(maskKeyVaultUri('https://myvault.vault.azure.net/secrets/db-password/abc123')).toBe(
        'https://myvault.vault.azure.net/secrets/***'
      );
    });

    it('should mask a full reference', () => {
      expect(maskKeyVaultUri('@Microsoft.KeyVault(VaultName=myvault;SecretName=db-password)')).toBe(
        'https://myvault.vault.azure.net/secrets/***'
      );
    });

    it('should fully mask anything that is not a URL', () => {
      expect(maskKeyVaultUri('plain')).toBe('***');
    });
  });
});
