/**
 * Resolver option schemas
 */

export {
  VaultResolverOptionsSchema,
  parseVaultResolverOptions,
  formatIssues,
  DEFAULT_MOUNT_PATH,
  DEFAULT_RESOLVE_TIMEOUT_MS,
  type VaultResolverOptions,
  type VaultResolverOptionsInput,
} from './vault.js';

export {
  KeyVaultResolverOptionsSchema,
  parseKeyVaultResolverOptions,
  type KeyVaultResolverOptions,
  type KeyVaultResolverOptionsInput,
} from './keyvault.js';
