/**
 * Azure Key Vault Resolver Options Schema
 */

import type { TokenCredential } from '@azure/identity';
import { z } from 'zod';
import { ConfigurationError } from '../../utils/errors.js';
import { DEFAULT_RESOLVE_TIMEOUT_MS, formatIssues } from './vault.js';

function isTokenCredential(value: unknown): value is TokenCredential {
  return (
    typeof value === 'object' &&
    value !== null &&
    'getToken' in value &&
    typeof value.getToken === 'function'
  );
}

export const KeyVaultResolverOptionsSchema = z.object({
  credential: z
    .custom<TokenCredential>(isTokenCredential, {
      message: 'credential must implement getToken()',
    })
    .optional()
    .describe('Azure credential; DefaultAzureCredential when unset'),
  throwOnResolveFailure: z.boolean().default(false),
  timeout: z.number().int().positive().default(DEFAULT_RESOLVE_TIMEOUT_MS),
  enableCaching: z.boolean().default(true),
});

export type KeyVaultResolverOptionsInput = z.input<typeof KeyVaultResolverOptionsSchema>;
export type KeyVaultResolverOptions = Readonly<z.output<typeof KeyVaultResolverOptionsSchema>>;

/**
 * @throws ConfigurationError listing every invalid option
 */
export function parseKeyVaultResolverOptions(
  input: KeyVaultResolverOptionsInput = {}
): KeyVaultResolverOptions {
  const result = KeyVaultResolverOptionsSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError(
      `Invalid Azure Key Vault resolver options: ${formatIssues(result.error)}`,
      { issues: result.error.issues }
    );
  }
  return Object.freeze(result.data);
}
