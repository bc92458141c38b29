import { ArgumentError, ConfigurationError } from '../../../../utils/errors.js';
import { nonBlank } from '../../../../utils/strings.js';
import {
  VAULT_ROLE_ID_ENV,
  VAULT_SECRET_ID_ENV,
  type EnvironmentProbe,
} from '../EnvironmentProbe.js';
import type { AppRoleAuthDescriptor, VaultAuthMethod } from './VaultAuthMethod.js';

export const DEFAULT_APPROLE_MOUNT = 'approle';

/**
 * AppRole authentication from a role ID / secret ID pair.
 */
export class AppRoleAuthMethod implements VaultAuthMethod {
  readonly kind = 'approle';
  private readonly roleId: string;
  private readonly secretId: string;
  private readonly mountPoint: string;

  constructor(roleId: string, secretId: string, mountPoint: string = DEFAULT_APPROLE_MOUNT) {
    if (nonBlank(roleId) === undefined) {
      throw new ArgumentError('Role ID cannot be null or empty.', 'roleId');
    }
    if (nonBlank(secretId) === undefined) {
      throw new ArgumentError('Secret ID cannot be null or empty.', 'secretId');
    }
    if (nonBlank(mountPoint) === undefined) {
      throw new ArgumentError('Mount point cannot be null or empty.', 'mountPoint');
    }

    this.roleId = roleId;
    this.secretId = secretId;
    this.mountPoint = mountPoint;
  }

  /**
   * @throws ConfigurationError when VAULT_ROLE_ID or VAULT_SECRET_ID is not set
   */
  static fromEnvironment(
    environment: EnvironmentProbe,
    mountPoint: string = DEFAULT_APPROLE_MOUNT
  ): AppRoleAuthMethod {
    const roleId = nonBlank(environment.getVariable(VAULT_ROLE_ID_ENV));
    const secretId = nonBlank(environment.getVariable(VAULT_SECRET_ID_ENV));

    if (roleId === undefined) {
      throw new ConfigurationError(`${VAULT_ROLE_ID_ENV} environment variable is not set.`);
    }
    if (secretId === undefined) {
      throw new ConfigurationError(`${VAULT_SECRET_ID_ENV} environment variable is not set.`);
    }

    return new AppRoleAuthMethod(roleId, secretId, mountPoint);
  }

  /**
   * Returns undefined unless both variables are set.
   */
  static tryFromEnvironment(
    environment: EnvironmentProbe,
    mountPoint: string = DEFAULT_APPROLE_MOUNT
  ): AppRoleAuthMethod | undefined {
    const roleId = nonBlank(environment.getVariable(VAULT_ROLE_ID_ENV));
    const secretId = nonBlank(environment.getVariable(VAULT_SECRET_ID_ENV));

    if (roleId === undefined || secretId === undefined) {
      return undefined;
    }
    return new AppRoleAuthMethod(roleId, secretId, mountPoint);
  }

  getAuthDescriptor(): AppRoleAuthDescriptor {
    return {
      kind: 'approle',
      roleId: this.roleId,
      secretId: this.secretId,
      mountPoint: this.mountPoint,
    };
  }
}
