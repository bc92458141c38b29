/**
 * Azure Key Vault Reference Matcher
 *
 * Accepted forms (case-insensitive):
 *
 * - `@Microsoft.KeyVault(SecretUri=https://<vault>.vault.azure.net/secrets/<name>[/<version>])`
 * - `@Microsoft.KeyVault(VaultName=<vault>;SecretName=<name>[;SecretVersion=<version>])`
 *
 * Both are normalized to a secret URI, which is what the Key Vault resolver
 * consumes.
 */

import type { SecretReference } from '../../../core/types.js';
import { InvalidReferenceError } from '../../../utils/errors.js';
import type { ReferenceSyntax } from '../ISecretResolver.js';
import { MAX_REFERENCE_LENGTH } from '../vault/VaultReferenceMatcher.js';

const SECRET_URI_PATTERN = /^@Microsoft\.KeyVault\(SecretUri=(https:\/\/[^)]+)\)$/i;

const VAULT_NAME_PATTERN =
  /^@Microsoft\.KeyVault\(VaultName=([^;)]+);SecretName=([^;)]+)(?:;SecretVersion=([^)]+))?\)$/i;

export const KEY_VAULT_SECRET_URI_FORMAT =
  'https://{vault}.vault.azure.net/secrets/{secret-name}[/{version}]';

function boundedInput(value: string | null | undefined): string | undefined {
  if (!value || value.trim() === '' || value.length > MAX_REFERENCE_LENGTH) {
    return undefined;
  }
  return value;
}

export function isKeyVaultReference(value: string | null | undefined): boolean {
  return extractSecretUri(value) !== undefined;
}

/**
 * Returns the secret URI named by a reference, or undefined for anything else.
 */
export function extractSecretUri(value: string | null | undefined): string | undefined {
  const input = boundedInput(value);
  if (input === undefined) {
    return undefined;
  }

  const secretUri = SECRET_URI_PATTERN.exec(input);
  if (secretUri) {
    return secretUri[1];
  }

  const vaultName = VAULT_NAME_PATTERN.exec(input);
  if (vaultName) {
    const [, vault, secret, version] = vaultName;
    const uri = `https://${vault}.vault.azure.net/secrets/${secret}`;
    return version ? `${uri}/${version}` : uri;
  }

  return undefined;
}

/**
 * Splits a secret URI into vault URL, secret name and optional version.
 *
 * @throws InvalidReferenceError when the URI is malformed
 */
export function parseSecretUri(secretUri: string): SecretReference {
  let url: URL;
  try {
    url = new URL(secretUri);
  } catch {
    throw invalidSecretUri(secretUri);
  }

  const parts = url.pathname.split('/').filter((part) => part !== '');
  if (parts.length < 2 || parts[0].toLowerCase() !== 'secrets') {
    throw invalidSecretUri(secretUri);
  }

  return {
    storeAddress: `${url.protocol}//${url.host}`,
    secretPath: `secrets/${parts[1]}`,
    secretKey: parts[1],
    ...(parts.length > 2 ? { version: parts[2] } : {}),
  };
}

export function tryParseKeyVaultReference(value: string | null | undefined): SecretReference | undefined {
  const uri = extractSecretUri(value);
  if (uri === undefined) {
    return undefined;
  }
  try {
    return parseSecretUri(uri);
  } catch {
    return undefined;
  }
}

/**
 * Masks the secret name in a secret URI or reference.
 */
export function maskKeyVaultUri(value: string): string {
  const uri = extractSecretUri(value) ?? value;
  try {
    const url = new URL(uri);
    return `${url.protocol}//${url.host}/secrets/***`;
  } catch {
    return '***';
  }
}

function invalidSecretUri(secretUri: string): InvalidReferenceError {
  return new InvalidReferenceError(
    `Invalid Key Vault secret URI format: ${maskKeyVaultUri(secretUri)}. Expected format: ${KEY_VAULT_SECRET_URI_FORMAT}`,
    { reference: maskKeyVaultUri(secretUri) }
  );
}

export const keyVaultReferenceSyntax: ReferenceSyntax = {
  displayName: 'Key Vault',
  isReference: isKeyVaultReference,
  toResolverInput: extractSecretUri,
  mask: maskKeyVaultUri,
};
