import { ArgumentError, ConfigurationError } from '../../../../utils/errors.js';
import { nonBlank } from '../../../../utils/strings.js';
import { VAULT_TOKEN_ENV, type EnvironmentProbe } from '../EnvironmentProbe.js';
import type { TokenAuthDescriptor, VaultAuthMethod } from './VaultAuthMethod.js';

/**
 * Token-based authentication.
 */
export class TokenAuthMethod implements VaultAuthMethod {
  readonly kind = 'token';
  private readonly token: string;

  constructor(token: string) {
    if (nonBlank(token) === undefined) {
      throw new ArgumentError('Token cannot be null or empty.', 'token');
    }
    this.token = token;
  }

  /**
   * @throws ConfigurationError when VAULT_TOKEN is not set
   */
  static fromEnvironment(environment: EnvironmentProbe): TokenAuthMethod {
    const method = TokenAuthMethod.tryFromEnvironment(environment);
    if (!method) {
      throw new ConfigurationError(`${VAULT_TOKEN_ENV} environment variable is not set.`);
    }
    return method;
  }

  static tryFromEnvironment(environment: EnvironmentProbe): TokenAuthMethod | undefined {
    const token = nonBlank(environment.getVariable(VAULT_TOKEN_ENV));
    return token === undefined ? undefined : new TokenAuthMethod(token);
  }

  getAuthDescriptor(): TokenAuthDescriptor {
    return { kind: 'token', token: this.token };
  }
}
