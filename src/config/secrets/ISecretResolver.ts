/**
 * Secret Resolver Interface
 *
 * Contract shared by every resolver family (HashiCorp Vault, Azure Key Vault,
 * the testing mock). The orchestrator in ReferenceResolution.ts only talks to
 * this interface, so any implementation can be plugged into a configuration
 * build.
 */

/**
 * Per-call resolution options
 */
export interface ResolveOptions {
  /** Cancels the fetch. Cancellation is never reported as a timeout. */
  signal?: AbortSignal;

  /**
   * Store address that overrides both the reference-embedded and the
   * configured address for this call. Ignored by stores whose references
   * always carry a full address.
   */
  vaultAddress?: string;
}

/**
 * Resolves a raw reference string into a secret value.
 *
 * @example
 * ```typescript
 * const value = await resolver.resolveSecret('hashicorp://vault.example.com/secret/data/app#password');
 * ```
 */
export interface ISecretResolver {
  /**
   * @throws ArgumentError for blank input
   * @throws InvalidReferenceError when the value is not a reference this resolver understands
   * @throws KeyNotFoundError, TimeoutError, SecretStoreError on fetch failures
   */
  resolveSecret(reference: string, options?: ResolveOptions): Promise<string>;

  /**
   * Blocking variant of {@link resolveSecret}. Prefer the asynchronous form.
   */
  resolveSecretSync(reference: string): string;
}

/**
 * Describes how a resolver family spots references in configuration values.
 */
export interface ReferenceSyntax {
  /** Human-readable family name used in log lines */
  readonly displayName: string;

  isReference(value: string | null | undefined): boolean;

  /**
   * Returns the string handed to the resolver for a configuration value, or
   * undefined when the value is not a reference.
   */
  toResolverInput(value: string | null | undefined): string | undefined;

  /**
   * Renders a value for diagnostics with secret identifiers redacted.
   */
  mask(value: string): string;
}

/**
 * Type guard to check if an object implements ISecretResolver
 */
export function isSecretResolver(obj: unknown): obj is ISecretResolver {
  return (
    typeof obj === 'object' &&
    obj !== null &&
    'resolveSecret' in obj &&
    typeof obj.resolveSecret === 'function' &&
    'resolveSecretSync' in obj &&
    typeof obj.resolveSecretSync === 'function'
  );
}
