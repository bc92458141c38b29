/**
 * Vault Authentication Methods
 *
 * The supported strategies form a closed set. Each produces a plain-object
 * auth descriptor that a store client constructor consumes; descriptors hold
 * only strings so they can cross a worker-thread boundary.
 */

export interface TokenAuthDescriptor {
  kind: 'token';
  token: string;
}

export interface AppRoleAuthDescriptor {
  kind: 'approle';
  roleId: string;
  secretId: string;
  mountPoint: string;
}

export interface KubernetesAuthDescriptor {
  kind: 'kubernetes';
  role: string;
  jwt: string;
  mountPoint: string;
}

export type VaultAuthDescriptor =
  | TokenAuthDescriptor
  | AppRoleAuthDescriptor
  | KubernetesAuthDescriptor;

export type VaultAuthKind = VaultAuthDescriptor['kind'];

export interface VaultAuthMethod {
  readonly kind: VaultAuthKind;
  getAuthDescriptor(): VaultAuthDescriptor;
}

export function isVaultAuthMethod(value: unknown): value is VaultAuthMethod {
  return (
    typeof value === 'object' &&
    value !== null &&
    'kind' in value &&
    (value.kind === 'token' || value.kind === 'approle' || value.kind === 'kubernetes') &&
    'getAuthDescriptor' in value &&
    typeof value.getAuthDescriptor === 'function'
  );
}
