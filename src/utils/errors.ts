/**
 * Error taxonomy for reference resolution.
 *
 * Every failure raised by the resolvers derives from {@link VaultReferenceError}
 * so callers can branch on `code` without string matching. Store-client
 * failures are wrapped in {@link SecretStoreError} with the original error kept
 * as `cause`.
 */

export type VaultReferenceErrorCode =
  | 'ARGUMENT_ERROR'
  | 'INVALID_REFERENCE'
  | 'CONFIGURATION_ERROR'
  | 'KEY_NOT_FOUND'
  | 'TIMEOUT'
  | 'SECRET_STORE_ERROR'
  | 'RESOLUTION_FAILED';

export class VaultReferenceError extends Error {
  constructor(
    public readonly code: VaultReferenceErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'VaultReferenceError';

    // Maintain proper stack trace for where error was thrown
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Bad or missing local input. Always a caller bug, never retried.
 */
export class ArgumentError extends VaultReferenceError {
  constructor(
    message: string,
    public readonly paramName: string
  ) {
    super('ARGUMENT_ERROR', message, { paramName });
    this.name = 'ArgumentError';
  }
}

export class InvalidReferenceError extends VaultReferenceError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INVALID_REFERENCE', message, details);
    this.name = 'InvalidReferenceError';
  }
}

/**
 * No usable store address, authentication method or option set.
 */
export class ConfigurationError extends VaultReferenceError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('CONFIGURATION_ERROR', message, details);
    this.name = 'ConfigurationError';
  }
}

export class KeyNotFoundError extends VaultReferenceError {
  constructor(public readonly maskedPath: string) {
    super('KEY_NOT_FOUND', `Secret key not found at path '${maskedPath}'`, { path: maskedPath });
    this.name = 'KeyNotFoundError';
  }
}

/**
 * The bounded-time fetch exceeded its deadline. Cancellation requested by the
 * caller is never reported as a timeout.
 */
export class TimeoutError extends VaultReferenceError {
  constructor(
    message: string,
    public readonly timeoutMs: number
  ) {
    super('TIMEOUT', message, { timeoutMs });
    this.name = 'TimeoutError';
  }
}

export class SecretStoreError extends VaultReferenceError {
  constructor(message: string, cause: unknown, details?: Record<string, unknown>) {
    super('SECRET_STORE_ERROR', message, details, { cause });
    this.name = 'SecretStoreError';
  }
}

/**
 * Raised by the orchestrator when `throwOnResolveFailure` is set and a
 * configuration value could not be resolved.
 *
 * `reference` holds the raw, unresolved configuration value. The message and
 * `toJSON()` only ever carry the masked form.
 */
export class ResolutionFailedError extends VaultReferenceError {
  constructor(
    public readonly configurationKey: string,
    public readonly reference: string,
    maskedReference: string,
    cause: unknown
  ) {
    super(
      'RESOLUTION_FAILED',
      `Failed to resolve secret reference ${maskedReference} for configuration key '${configurationKey}'`,
      { configurationKey, reference: maskedReference },
      { cause }
    );
    this.name = 'ResolutionFailedError';
  }
}

export function isVaultReferenceError(error: unknown): error is VaultReferenceError {
  return error instanceof VaultReferenceError;
}

// Error sanitization for logging
export function sanitizeError(error: unknown): Record<string, unknown> {
  if (error instanceof VaultReferenceError) {
    return {
      type: 'VaultReferenceError',
      code: error.code,
      message: error.message,
      // Don't include details in production to prevent information leakage
      ...(process.env.NODE_ENV !== 'production' && { details: error.details }),
    };
  }

  if (error instanceof Error) {
    return {
      type: 'Error',
      message: error.message,
      name: error.name,
      // Only include stack trace in development
      ...(process.env.NODE_ENV === 'development' && { stack: error.stack }),
    };
  }

  return {
    type: 'Unknown',
    message: 'An unknown error occurred',
  };
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}

// ============================================================================
// Thread-boundary serialization
// ============================================================================

/**
 * Plain-data form of an error, safe to post between worker threads.
 */
export interface SerializedError {
  name: string;
  message: string;
  code?: VaultReferenceErrorCode;
  details?: Record<string, unknown>;
  cause?: { name: string; message: string };
}

export function serializeError(error: unknown): SerializedError {
  if (!(error instanceof Error)) {
    return { name: 'Error', message: describeError(error) };
  }

  return {
    name: error.name,
    message: error.message,
    ...(error instanceof VaultReferenceError
      ? { code: error.code, ...(error.details ? { details: error.details } : {}) }
      : {}),
    ...(error.cause instanceof Error
      ? { cause: { name: error.cause.name, message: error.cause.message } }
      : {}),
  };
}

function detailString(details: Record<string, unknown> | undefined, key: string): string | undefined {
  const value = details?.[key];
  return typeof value === 'string' ? value : undefined;
}

function detailNumber(details: Record<string, unknown> | undefined, key: string): number | undefined {
  const value = details?.[key];
  return typeof value === 'number' ? value : undefined;
}

/**
 * Rebuilds the error class named by `code`. Errors without a code come back
 * as plain `Error`s carrying the original name.
 */
export function reviveError(serialized: SerializedError): Error {
  const { message, details } = serialized;
  const cause = serialized.cause
    ? Object.assign(new Error(serialized.cause.message), { name: serialized.cause.name })
    : undefined;

  switch (serialized.code) {
    case 'ARGUMENT_ERROR':
      return new ArgumentError(message, detailString(details, 'paramName') ?? 'reference');
    case 'INVALID_REFERENCE':
      return new InvalidReferenceError(message, details);
    case 'CONFIGURATION_ERROR':
      return new ConfigurationError(message, details);
    case 'KEY_NOT_FOUND':
      return new KeyNotFoundError(detailString(details, 'path') ?? '***');
    case 'TIMEOUT':
      return new TimeoutError(message, detailNumber(details, 'timeoutMs') ?? 0);
    case 'SECRET_STORE_ERROR':
      return new SecretStoreError(message, cause, details);
    case 'RESOLUTION_FAILED':
      return new VaultReferenceError(serialized.code, message, details, cause ? { cause } : undefined);
    case undefined: {
      const error = new Error(message, cause ? { cause } : undefined);
      error.name = serialized.name;
      return error;
    }
  }
}
