/**
 * Secret Reference Module
 *
 * Reference matchers, resolvers and the resolution pass for HashiCorp Vault
 * and Azure Key Vault references embedded in configuration values.
 */

// Contracts
export type { ISecretResolver, ReferenceSyntax, ResolveOptions } from './ISecretResolver.js';
export { isSecretResolver } from './ISecretResolver.js';
export { SecretValueCache } from './SecretValueCache.js';
export type {
  SyncResolveBridge,
  SyncResolveRequest,
  VaultSyncRequest,
  KeyVaultSyncRequest,
} from './SyncBridge.js';

// Resolution pass
export {
  resolveReferences,
  applyReferenceOverlay,
  addVaultReferenceResolver,
  addKeyVaultReferenceResolver,
  type ResolveReferencesOptions,
  type ReferenceResolverSettings,
} from './ReferenceResolution.js';

// HashiCorp Vault
export {
  MAX_REFERENCE_LENGTH,
  EXPECTED_FORMATS,
  isVaultReference,
  tryParseVaultReference,
  parseVaultReference,
  maskVaultReference,
  maskSecretPath,
  vaultReferenceSyntax,
} from './vault/VaultReferenceMatcher.js';
export {
  VaultSecretResolver,
  renderSecretValue,
  type VaultSecretResolverDependencies,
} from './vault/VaultSecretResolver.js';
export {
  VAULT_ADDR_ENV,
  VAULT_TOKEN_ENV,
  VAULT_ROLE_ID_ENV,
  VAULT_SECRET_ID_ENV,
  DEFAULT_KUBERNETES_TOKEN_PATH,
  processEnvironment,
  type EnvironmentProbe,
} from './vault/EnvironmentProbe.js';
export type {
  KvVersion,
  ReadSecretRequest,
  SecretStoreClient,
  StoreClientFactory,
  StoreClientSettings,
} from './vault/SecretStoreClient.js';
export { StoreClientCache, normalizeStoreAddress } from './vault/StoreClientCache.js';
export {
  NodeVaultStoreClient,
  createNodeVaultClient,
  createNodeVaultStoreClient,
  type VaultHttpClient,
} from './vault/NodeVaultStoreClient.js';
export { splitSecretPath } from './vault/paths.js';

// Vault authentication
export {
  isVaultAuthMethod,
  type VaultAuthMethod,
  type VaultAuthDescriptor,
  type VaultAuthKind,
  type TokenAuthDescriptor,
  type AppRoleAuthDescriptor,
  type KubernetesAuthDescriptor,
} from './vault/auth/VaultAuthMethod.js';
export { TokenAuthMethod } from './vault/auth/TokenAuthMethod.js';
export { AppRoleAuthMethod, DEFAULT_APPROLE_MOUNT } from './vault/auth/AppRoleAuthMethod.js';
export { KubernetesAuthMethod, DEFAULT_KUBERNETES_MOUNT } from './vault/auth/KubernetesAuthMethod.js';
export {
  selectAuthMethod,
  getEffectiveVaultAddress,
  authMethodFromDescriptor,
  type AuthSelectionOptions,
} from './vault/auth/AuthSelector.js';

// Azure Key Vault
export {
  KEY_VAULT_SECRET_URI_FORMAT,
  isKeyVaultReference,
  extractSecretUri,
  parseSecretUri,
  tryParseKeyVaultReference,
  maskKeyVaultUri,
  keyVaultReferenceSyntax,
} from './keyvault/KeyVaultReferenceMatcher.js';
export {
  KeyVaultSecretResolver,
  type KeyVaultSecretReader,
  type KeyVaultClientFactory,
  type KeyVaultSecretResolverDependencies,
} from './keyvault/KeyVaultSecretResolver.js';
