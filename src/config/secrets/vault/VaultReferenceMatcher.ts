/**
 * HashiCorp Vault Reference Matcher
 *
 * Recognizes two reference syntaxes, case-insensitively:
 *
 * - Attribute form: `@HashiCorp.Vault(VaultAddress=<addr>;SecretPath=<path>;SecretKey=<key>)`
 * - URI form: `hashicorp://<host>[:<port>]/<path>#<key>`, whose store address
 *   becomes `https://<host>[:<port>]`
 *
 * The whole value must match one of the forms; anything else is not a
 * reference. Both patterns are built from negated character classes only, so
 * matching is linear in the input, and inputs longer than
 * {@link MAX_REFERENCE_LENGTH} are rejected before any pattern runs.
 */

import type { SecretReference } from '../../../core/types.js';
import { InvalidReferenceError } from '../../../utils/errors.js';
import type { ReferenceSyntax } from '../ISecretResolver.js';

export const MAX_REFERENCE_LENGTH = 8192;

const ATTRIBUTE_PATTERN =
  /^@HashiCorp\.Vault\(VaultAddress=([^;)]+);SecretPath=([^;)]+);SecretKey=([^)]+)\)$/i;

const URI_PATTERN = /^hashicorp:\/\/([^/#]+)\/([^#\s][^#]*)#(.+)$/i;

export const EXPECTED_FORMATS =
  '@HashiCorp.Vault(VaultAddress=https://vault.example.com;SecretPath=secret/data/myapp;SecretKey=password) ' +
  'or hashicorp://vault.example.com/secret/data/myapp#password';

function boundedInput(value: string | null | undefined): string | undefined {
  if (!value || value.trim() === '' || value.length > MAX_REFERENCE_LENGTH) {
    return undefined;
  }
  return value;
}

export function isVaultReference(value: string | null | undefined): boolean {
  const input = boundedInput(value);
  if (input === undefined) {
    return false;
  }
  return ATTRIBUTE_PATTERN.test(input) || URI_PATTERN.test(input);
}

export function tryParseVaultReference(value: string | null | undefined): SecretReference | undefined {
  const input = boundedInput(value);
  if (input === undefined) {
    return undefined;
  }

  const attribute = ATTRIBUTE_PATTERN.exec(input);
  if (attribute) {
    const [, storeAddress, secretPath, secretKey] = attribute;
    return { storeAddress, secretPath, secretKey };
  }

  const uri = URI_PATTERN.exec(input);
  if (uri) {
    const [, host, secretPath, secretKey] = uri;
    return { storeAddress: `https://${host}`, secretPath, secretKey };
  }

  return undefined;
}

/**
 * @throws InvalidReferenceError naming both accepted formats
 */
export function parseVaultReference(value: string): SecretReference {
  const reference = tryParseVaultReference(value);
  if (!reference) {
    throw new InvalidReferenceError(
      `Invalid HashiCorp Vault reference format: ${maskVaultReference(value)}. Expected format: ${EXPECTED_FORMATS}`,
      { reference: maskVaultReference(value) }
    );
  }
  return reference;
}

/**
 * Redacts path and key, keeping only the store address or host visible.
 */
export function maskVaultReference(value: string): string {
  const input = boundedInput(value);
  if (input === undefined) {
    return '***';
  }

  const attribute = ATTRIBUTE_PATTERN.exec(input);
  if (attribute) {
    return `@HashiCorp.Vault(VaultAddress=${attribute[1]};SecretPath=***;SecretKey=***)`;
  }

  const uri = URI_PATTERN.exec(input);
  if (uri) {
    return `hashicorp://${uri[1]}/***#***`;
  }

  return '***';
}

/**
 * Keeps the mount segment of a secret path and redacts the rest.
 */
export function maskSecretPath(path: string): string {
  const parts = path.split('/');
  if (parts.length > 1) {
    return `${parts[0]}/***`;
  }
  return '***';
}

export const vaultReferenceSyntax: ReferenceSyntax = {
  displayName: 'HashiCorp Vault',
  isReference: isVaultReference,
  toResolverInput: (value) => (isVaultReference(value) ? (value ?? undefined) : undefined),
  mask: maskVaultReference,
};
