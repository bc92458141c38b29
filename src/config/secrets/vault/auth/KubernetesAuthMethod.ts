import { ArgumentError, ConfigurationError } from '../../../../utils/errors.js';
import { nonBlank } from '../../../../utils/strings.js';
import { DEFAULT_KUBERNETES_TOKEN_PATH, type EnvironmentProbe } from '../EnvironmentProbe.js';
import type { KubernetesAuthDescriptor, VaultAuthMethod } from './VaultAuthMethod.js';

export const DEFAULT_KUBERNETES_MOUNT = 'kubernetes';

/**
 * Kubernetes authentication using the pod's service account token.
 */
export class KubernetesAuthMethod implements VaultAuthMethod {
  readonly kind = 'kubernetes';
  private readonly roleName: string;
  private readonly jwt: string;
  private readonly mountPoint: string;

  /**
   * @param roleName - Vault role configured for Kubernetes auth
   * @param jwt - Service account token
   */
  constructor(roleName: string, jwt: string, mountPoint: string = DEFAULT_KUBERNETES_MOUNT) {
    if (nonBlank(roleName) === undefined) {
      throw new ArgumentError('Role name cannot be null or empty.', 'roleName');
    }
    if (nonBlank(jwt) === undefined) {
      throw new ArgumentError('JWT cannot be null or empty.', 'jwt');
    }
    if (nonBlank(mountPoint) === undefined) {
      throw new ArgumentError('Mount point cannot be null or empty.', 'mountPoint');
    }

    this.roleName = roleName;
    this.jwt = jwt;
    this.mountPoint = mountPoint;
  }

  /**
   * @throws ConfigurationError when the token file is missing or unreadable
   */
  static fromFile(
    environment: EnvironmentProbe,
    roleName: string,
    tokenPath: string = DEFAULT_KUBERNETES_TOKEN_PATH,
    mountPoint: string = DEFAULT_KUBERNETES_MOUNT
  ): KubernetesAuthMethod {
    const contents = environment.readFile(tokenPath);
    if (contents === undefined) {
      throw new ConfigurationError(`Kubernetes service account token not found at: ${tokenPath}`, {
        tokenPath,
      });
    }
    return new KubernetesAuthMethod(roleName, contents.trim(), mountPoint);
  }

  /**
   * Returns undefined when the role is blank or the token file is missing, unreadable or empty.
   */
  static tryFromFile(
    environment: EnvironmentProbe,
    roleName: string | undefined,
    tokenPath: string = DEFAULT_KUBERNETES_TOKEN_PATH,
    mountPoint: string = DEFAULT_KUBERNETES_MOUNT
  ): KubernetesAuthMethod | undefined {
    const role = nonBlank(roleName);
    if (role === undefined) {
      return undefined;
    }

    const jwt = nonBlank(environment.readFile(tokenPath)?.trim());
    if (jwt === undefined) {
      return undefined;
    }

    return new KubernetesAuthMethod(role, jwt, mountPoint);
  }

  static isRunningInKubernetes(
    environment: EnvironmentProbe,
    tokenPath: string = DEFAULT_KUBERNETES_TOKEN_PATH
  ): boolean {
    return environment.readFile(tokenPath) !== undefined;
  }

  getAuthDescriptor(): KubernetesAuthDescriptor {
    return {
      kind: 'kubernetes',
      role: this.roleName,
      jwt: this.jwt,
      mountPoint: this.mountPoint,
    };
  }
}
