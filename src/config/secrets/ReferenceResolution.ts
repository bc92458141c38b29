/**
 * Reference Resolution
 *
 * Walks a configuration snapshot, resolves every value that is a secret
 * reference and collects the results into an overlay. The overlay is applied
 * to the builder as a single layer once the whole pass has succeeded, so an
 * aborted pass never leaves a partial overlay behind.
 *
 * Usage:
 * ```typescript
 * const builder = new ConfigurationBuilder().addObject({
 *   database: { password: 'hashicorp://vault.example.com/secret/data/db#password' },
 * });
 * await addVaultReferenceResolver(builder, { authMethod: new TokenAuthMethod('test-token') });
 * const config = builder.build();
 * ```
 */

import type { AuditService } from '../../core/audit-service.js';
import { ResolutionFailedError, describeError } from '../../utils/errors.js';
import type { ConfigurationBuilder } from '../builder.js';
import type { KeyVaultResolverOptionsInput } from '../schemas/keyvault.js';
import type { VaultResolverOptionsInput } from '../schemas/vault.js';
import { isSecretResolver, type ISecretResolver, type ReferenceSyntax } from './ISecretResolver.js';
import { keyVaultReferenceSyntax } from './keyvault/KeyVaultReferenceMatcher.js';
import { KeyVaultSecretResolver } from './keyvault/KeyVaultSecretResolver.js';
import { vaultReferenceSyntax } from './vault/VaultReferenceMatcher.js';
import { VaultSecretResolver } from './vault/VaultSecretResolver.js';

export interface ResolveReferencesOptions {
  /** Which values count as references and how they are masked */
  syntax: ReferenceSyntax;

  /** Abort the pass on the first failure instead of skipping the key */
  throwOnResolveFailure: boolean;

  /** Receives one entry per attempted resolution */
  auditService?: AuditService;

  /** Passed to every resolveSecret call */
  signal?: AbortSignal;
}

/**
 * Settings for the builder helpers. Anything left unset falls back to the
 * resolver's own options.
 */
export interface ReferenceResolverSettings {
  throwOnResolveFailure?: boolean;
  auditService?: AuditService;
  signal?: AbortSignal;
}

const AUDIT_SOURCE = 'secret:resolution';

/**
 * Resolves every reference-shaped value in `entries`.
 *
 * Keys are processed one at a time in snapshot order. Values that are empty
 * or not references are left out of the overlay.
 *
 * @returns Overlay of resolved values, keyed by configuration key
 * @throws ResolutionFailedError on the first failure when `throwOnResolveFailure` is set
 */
export async function resolveReferences(
  entries: Iterable<readonly [string, string | undefined]>,
  resolver: ISecretResolver,
  options: ResolveReferencesOptions
): Promise<Map<string, string>> {
  const { syntax } = options;
  const overlay = new Map<string, string>();

  for (const [key, value] of entries) {
    if (!value) {
      continue;
    }

    const input = syntax.toResolverInput(value);
    if (input === undefined) {
      continue;
    }

    const masked = syntax.mask(value);

    try {
      const resolved = await resolver.resolveSecret(input, { signal: options.signal });
      overlay.set(key, resolved);
      await options.auditService?.log({
        source: AUDIT_SOURCE,
        timestamp: new Date(),
        action: 'resolve',
        success: true,
        metadata: { configurationKey: key, reference: masked, store: syntax.displayName },
      });
    } catch (error) {
      await options.auditService?.log({
        source: AUDIT_SOURCE,
        timestamp: new Date(),
        action: 'resolve',
        success: false,
        reason: options.throwOnResolveFailure ? 'aborted' : 'skipped',
        error: describeError(error),
        metadata: { configurationKey: key, reference: masked, store: syntax.displayName },
      });

      if (options.throwOnResolveFailure) {
        throw new ResolutionFailedError(key, value, masked, error);
      }

      console.warn(
        `[ReferenceResolution] Failed to resolve ${syntax.displayName} secret for configuration key '${key}': ${describeError(error)}`
      );
    }
  }

  return overlay;
}

/**
 * Resolves the builder's current snapshot and appends the overlay as one
 * layer. An empty overlay leaves the builder untouched.
 */
export async function applyReferenceOverlay(
  builder: ConfigurationBuilder,
  resolver: ISecretResolver,
  options: ResolveReferencesOptions
): Promise<ConfigurationBuilder> {
  const overlay = await resolveReferences(builder.build().entries(), resolver, options);

  if (overlay.size === 0) {
    return builder;
  }

  builder.addInMemory(overlay);
  console.info(
    `[ReferenceResolution] Resolved ${overlay.size} ${options.syntax.displayName} secret reference(s) from configuration`
  );
  return builder;
}

/**
 * Resolves `@HashiCorp.Vault(...)` and `hashicorp://` references in the
 * builder's configuration.
 *
 * Pass resolver options to build a {@link VaultSecretResolver}, or any
 * {@link ISecretResolver} (a shared resolver, or a mock in tests).
 */
export async function addVaultReferenceResolver(
  builder: ConfigurationBuilder,
  resolverOrOptions: ISecretResolver | VaultResolverOptionsInput = {},
  settings: ReferenceResolverSettings = {}
): Promise<ConfigurationBuilder> {
  const resolver = isSecretResolver(resolverOrOptions)
    ? resolverOrOptions
    : new VaultSecretResolver(resolverOrOptions);

  const configuredPolicy =
    resolver instanceof VaultSecretResolver ? resolver.options.throwOnResolveFailure : true;

  return applyReferenceOverlay(builder, resolver, {
    syntax: vaultReferenceSyntax,
    throwOnResolveFailure: settings.throwOnResolveFailure ?? configuredPolicy,
    auditService: settings.auditService,
    signal: settings.signal,
  });
}

/**
 * Resolves `@Microsoft.KeyVault(...)` references in the builder's
 * configuration. Failures are skipped unless configured otherwise.
 */
export async function addKeyVaultReferenceResolver(
  builder: ConfigurationBuilder,
  resolverOrOptions: ISecretResolver | KeyVaultResolverOptionsInput = {},
  settings: ReferenceResolverSettings = {}
): Promise<ConfigurationBuilder> {
  const resolver = isSecretResolver(resolverOrOptions)
    ? resolverOrOptions
    : new KeyVaultSecretResolver(resolverOrOptions);

  const configuredPolicy =
    resolver instanceof KeyVaultSecretResolver ? resolver.options.throwOnResolveFailure : false;

  return applyReferenceOverlay(builder, resolver, {
    syntax: keyVaultReferenceSyntax,
    throwOnResolveFailure: settings.throwOnResolveFailure ?? configuredPolicy,
    auditService: settings.auditService,
    signal: settings.signal,
  });
}
