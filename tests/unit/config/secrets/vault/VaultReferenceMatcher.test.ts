/**
 * Unit Tests for the HashiCorp Vault reference matcher
 *
 * Covers both syntaxes, case-insensitivity, anchoring, the length bound and
 * diagnostic masking.
 */

import { describe, it, expect } from 'vitest';
import {
  EXPECTED_FORMATS,
  MAX_REFERENCE_LENGTH,
  isVaultReference,
  maskSecretPath,
  maskVaultReference,
  parseVaultReference,
  tryParseVaultReference,
  vaultReferenceSyntax,
} from '../../../../../src/config/secrets/vault/VaultReferenceMatcher.js';
import { InvalidReferenceError } from '../../../../../src/utils/errors.js';

describe('VaultReferenceMatcher', () => {
  describe('attribute form', () => {
    it('should parse address, path and key', () => {
      const reference = tryParseVaultReference(
        '@HashiCorp.Vault(VaultAddress=https://vault.example.com;SecretPath=secret/data/myapp;SecretKey=password)'
      );

      expect(reference).toEqual({
        storeAddress: 'https://vault.example.com',
        secretPath: 'secret/data/myapp',
        secretKey: 'password',
      });
    });

    it('should match literal keywords case-insensitively', () => {
      const reference = tryParseVaultReference(
        '@hashicorp.vault(vaultaddress=http://127.0.0.1:8200;secretpath=kv/app;secretkey=pw)'
      );

      expect(reference).toEqual({
        storeAddress: 'http://127.0.0.1:8200',
        secretPath: 'kv/app',
        secretKey: 'pw',
      });
    });

    it('should reject fields in a different order', () => {
      expect(
        isVaultReference('@HashiCorp.Vault(SecretPath=secret/app;VaultAddress=https://v.test;SecretKey=pw)')
      ).toBe(false);
    });

    it('should reject a missing secret key', () => {
      expect(isVaultReference('@HashiCorp.Vault(VaultAddress=https://v.test;SecretPath=secret/app)')).toBe(false);
    });
  });

  describe('URI form', () => {
    it('should rebuild the address as https with the port kept', () => {
      const reference = tryParseVaultReference('hashicorp://vault.example.com:8200/secret/data/myapp#password');

      expect(reference).toEqual({
        storeAddress: 'https://vault.example.com:8200',
        secretPath: 'secret/data/myapp',
        secretKey: 'password',
      });
    });

    it('should accept an upper-case scheme', () => {
      expect(tryParseVaultReference('HASHICORP://host/kv/app#pw')).toEqual({
        storeAddress: 'https://host',
        secretPath: 'kv/app',
        secretKey: 'pw',
      });
    });

    it('should end the path at the first #', () => {
      expect(tryParseVaultReference('hashicorp://host/a/b#c#d')).toEqual({
        storeAddress: 'https://host',
        secretPath: 'a/b',
        secretKey: 'c#d',
      });
    });

    it('should reject a URI without a key', () => {
      expect(isVaultReference('hashicorp://host/secret/app')).toBe(false);
    });

    it('should reject a URI with an empty path', () => {
      expect(isVaultReference('hashicorp://host/#key')).toBe(false);
    });

    it('should reject a # inside the host', () => {
      expect(tryParseVaultReference('hashicorp://h#x/p#k')).toBeUndefined();
    });

    it('should reject a whitespace-only path', () => {
      expect(isVaultReference('hashicorp://h/ #k')).toBe(false);
      expect(isVaultReference('hashicorp://h/\t#k')).toBe(false);
    });
  });

  describe('non-references', () => {
    it.each([
      ['empty string', ''],
      ['whitespace', '   '],
      ['plain text', 'plain'],
      ['https URL', 'https://vault.example.com/secret#key'],
      ['embedded reference', 'prefix hashicorp://host/secret/app#pw'],
      ['trailing text', '@HashiCorp.Vault(VaultAddress=a;SecretPath=b;SecretKey=c) suffix'],
    ])('should not match %s', (_label, value) => {
      expect(isVaultReference(value)).toBe(false);
      expect(tryParseVaultReference(value)).toBeUndefined();
    });

    it('should not match null or undefined', () => {
      expect(isVaultReference(null)).toBe(false);
      expect(isVaultReference(undefined)).toBe(false);
      expect(tryParseVaultReference(null)).toBeUndefined();
    });

    it('should not match values longer than the length bound', () => {
      const value = `hashicorp://host/${'a'.repeat(MAX_REFERENCE_LENGTH)}#key`;

      expect(isVaultReference(value)).toBe(false);
    });

    it('should reject adversarial input quickly', () => {
      const value = `@HashiCorp.Vault(VaultAddress=${'a'.repeat(8000)}`;
      const started = Date.now();

      expect(isVaultReference(value)).toBe(false);
      expect(Date.now() - started).toBeLessThan(1000);
    });
  });

  describe('parseVaultReference', () => {
    it('should throw InvalidReferenceError naming both formats', () => {
      expect(() => parseVaultReference('not-a-reference')).toThrow(InvalidReferenceError);
      expect(() => parseVaultReference('not-a-reference')).toThrow(`Expected format: ${EXPECTED_FORMATS}`);
    });
  });

  describe('maskVaultReference', () => {
    it('should keep only the host of a URI reference', () => {
      expect(maskVaultReference('hashicorp://host/secret/data/app#pw')).toBe('hashicorp://host/***#***');
    });

    it('should keep only the address of an attribute reference', () => {
      expect(
        maskVaultReference('@HashiCorp.Vault(VaultAddress=https://vault.example.com;SecretPath=secret/app;SecretKey=pw)')
      ).toBe('@HashiCorp.Vault(VaultAddress=https://vault.example.com;SecretPath=***;SecretKey=***)');
    });

    it('should fully mask anything else', () => {
      expect(maskVaultReference('some value')).toBe('***');
      expect(maskVaultReference('')).toBe('***');
    });
  });

  describe('maskSecretPath', () => {
    it('should keep the mount segment', () => {
      expect(maskSecretPath('secret/data/app')).toBe('secret/***');
    });

    it('should fully mask a single segment', () => {
      expect(maskSecretPath('simple')).toBe('***');
    });
  });

  describe('vaultReferenceSyntax', () => {
    it('should hand references to the resolver unchanged', () => {
      const value = 'hashicorp://host/secret/app#pw';

      expect(vaultReferenceSyntax.isReference(value)).toBe(true);
      expect(vaultReferenceSyntax.toResolverInput(value)).toBe(value);
    });

    it('should skip non-references', () => {
      expect(vaultReferenceSyntax.toResolverInput('plain')).toBeUndefined();
    });
  });
});
