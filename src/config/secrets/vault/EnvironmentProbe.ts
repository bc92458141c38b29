/**
 * Environment Probe
 *
 * Read-only view of the ambient environment used for address and
 * authentication auto-detection. Tests pass a static probe instead of
 * mutating process.env.
 */

import { readFileSync } from 'fs';

/** Store address */
export const VAULT_ADDR_ENV = 'VAULT_ADDR';

/** Token auth */
export const VAULT_TOKEN_ENV = 'VAULT_TOKEN';

/** AppRole auth */
export const VAULT_ROLE_ID_ENV = 'VAULT_ROLE_ID';
export const VAULT_SECRET_ID_ENV = 'VAULT_SECRET_ID';

/** Where Kubernetes mounts the service account token */
export const DEFAULT_KUBERNETES_TOKEN_PATH = '/var/run/secrets/kubernetes.io/serviceaccount/token';

export interface EnvironmentProbe {
  getVariable(name: string): string | undefined;

  /**
   * Returns the file's contents, or undefined if it does not exist or cannot be read.
   */
  readFile(path: string): string | undefined;
}

function hasErrorCode(error: unknown): error is { code: string } {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    typeof error.code === 'string'
  );
}

/**
 * Probe backed by process.env and the local file system.
 */
export const processEnvironment: EnvironmentProbe = {
  getVariable(name: string): string | undefined {
    return process.env[name];
  },

  readFile(path: string): string | undefined {
    try {
      return readFileSync(path, 'utf-8');
    } catch (error) {
      // Missing or unreadable file means "not available", not a failure
      if (hasErrorCode(error) && ['ENOENT', 'EACCES', 'EISDIR', 'ENOTDIR'].includes(error.code)) {
        return undefined;
      }
      throw error;
    }
  },
};
