/**
 * HashiCorp Vault Resolver Options Schema
 *
 * Every field is optional on input and has a stated default on output.
 */

import { z } from 'zod';
import { ConfigurationError } from '../../utils/errors.js';
import { isVaultAuthMethod, type VaultAuthMethod } from '../secrets/vault/auth/VaultAuthMethod.js';
import { DEFAULT_KUBERNETES_TOKEN_PATH } from '../secrets/vault/EnvironmentProbe.js';

export const DEFAULT_MOUNT_PATH = 'secret';
export const DEFAULT_RESOLVE_TIMEOUT_MS = 30_000;

export const VaultResolverOptionsSchema = z.object({
  vaultAddress: z
    .string()
    .url()
    .optional()
    .describe('Store address; falls back to VAULT_ADDR when unset'),
  authMethod: z
    .custom<VaultAuthMethod>(isVaultAuthMethod, {
      message: 'authMethod must be a TokenAuthMethod, AppRoleAuthMethod or KubernetesAuthMethod',
    })
    .optional()
    .describe('Explicit authentication; auto-detected from the environment when unset'),
  kubernetesRoleName: z
    .string()
    .min(1)
    .optional()
    .describe('Vault role for auto-detected Kubernetes auth'),
  kubernetesTokenPath: z.string().min(1).default(DEFAULT_KUBERNETES_TOKEN_PATH),
  mountPath: z
    .string()
    .min(1)
    .default(DEFAULT_MOUNT_PATH)
    .describe('Mount used when a secret path has a single segment'),
  kvVersion: z
    .union([z.literal(1), z.literal(2), z.literal('auto')])
    .default('auto')
    .describe("KV engine version; 'auto' reads KV v2"),
  throwOnResolveFailure: z.boolean().default(true),
  timeout: z
    .number()
    .int()
    .positive()
    .default(DEFAULT_RESOLVE_TIMEOUT_MS)
    .describe('Per-fetch deadline in milliseconds'),
  enableCaching: z.boolean().default(true),
  namespace: z.string().min(1).optional().describe('Vault Enterprise namespace'),
  addressPrecedence: z
    .enum(['reference', 'configured'])
    .default('reference')
    .describe('Whether the reference-embedded or the configured address wins'),
});

export type VaultResolverOptionsInput = z.input<typeof VaultResolverOptionsSchema>;
export type VaultResolverOptions = Readonly<z.output<typeof VaultResolverOptionsSchema>>;

/**
 * @throws ConfigurationError listing every invalid option
 */
export function parseVaultResolverOptions(input: VaultResolverOptionsInput = {}): VaultResolverOptions {
  const result = VaultResolverOptionsSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError(
      `Invalid HashiCorp Vault resolver options: ${formatIssues(result.error)}`,
      { issues: result.error.issues }
    );
  }
  return Object.freeze(result.data);
}

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}
