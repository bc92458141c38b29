/**
 * Authentication Selection
 *
 * Picks exactly one authentication method with a fixed priority; the first
 * match wins and strategies are never merged:
 *
 * 1. `authMethod` set explicitly in options
 * 2. VAULT_TOKEN → token auth
 * 3. VAULT_ROLE_ID + VAULT_SECRET_ID → AppRole auth
 * 4. `kubernetesRoleName` + readable service account token → Kubernetes auth
 */

import { ConfigurationError } from '../../../../utils/errors.js';
import { nonBlank } from '../../../../utils/strings.js';
import {
  DEFAULT_KUBERNETES_TOKEN_PATH,
  VAULT_ADDR_ENV,
  type EnvironmentProbe,
} from '../EnvironmentProbe.js';
import { AppRoleAuthMethod } from './AppRoleAuthMethod.js';
import { KubernetesAuthMethod } from './KubernetesAuthMethod.js';
import { TokenAuthMethod } from './TokenAuthMethod.js';
import type { VaultAuthDescriptor, VaultAuthMethod } from './VaultAuthMethod.js';

export interface AuthSelectionOptions {
  authMethod?: VaultAuthMethod;
  kubernetesRoleName?: string;
  kubernetesTokenPath?: string;
}

/**
 * @throws ConfigurationError when no method can be determined
 */
export function selectAuthMethod(
  options: AuthSelectionOptions,
  environment: EnvironmentProbe
): VaultAuthMethod {
  if (options.authMethod) {
    return options.authMethod;
  }

  const token = TokenAuthMethod.tryFromEnvironment(environment);
  if (token) {
    return token;
  }

  const appRole = AppRoleAuthMethod.tryFromEnvironment(environment);
  if (appRole) {
    return appRole;
  }

  const kubernetes = KubernetesAuthMethod.tryFromFile(
    environment,
    options.kubernetesRoleName,
    options.kubernetesTokenPath ?? DEFAULT_KUBERNETES_TOKEN_PATH
  );
  if (kubernetes) {
    return kubernetes;
  }

  throw new ConfigurationError(
    'No authentication method configured. Set the authMethod option, VAULT_TOKEN, ' +
      'VAULT_ROLE_ID + VAULT_SECRET_ID, or configure kubernetesRoleName when running in Kubernetes.'
  );
}

/**
 * Explicit `vaultAddress` option, else VAULT_ADDR.
 *
 * @throws ConfigurationError when neither is set
 */
export function getEffectiveVaultAddress(
  options: { vaultAddress?: string },
  environment: EnvironmentProbe
): string {
  const address = nonBlank(options.vaultAddress) ?? nonBlank(environment.getVariable(VAULT_ADDR_ENV));
  if (address === undefined) {
    throw new ConfigurationError(
      'Vault address not configured. Set the vaultAddress option or VAULT_ADDR environment variable.'
    );
  }
  return address;
}

/**
 * Rebuilds an auth method from its descriptor (used across worker threads).
 */
export function authMethodFromDescriptor(descriptor: VaultAuthDescriptor): VaultAuthMethod {
  switch (descriptor.kind) {
    case 'token':
      return new TokenAuthMethod(descriptor.token);
    case 'approle':
      return new AppRoleAuthMethod(descriptor.roleId, descriptor.secretId, descriptor.mountPoint);
    case 'kubernetes':
      return new KubernetesAuthMethod(descriptor.role, descriptor.jwt, descriptor.mountPoint);
  }
}
