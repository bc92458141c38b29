/**
 * Core Types
 *
 * Types shared by every resolver family. Files in src/core/ do not import
 * from src/config/.
 */

// ============================================================================
// Secret References
// ============================================================================

/**
 * A parsed secret reference.
 *
 * Built per resolution call from the raw configuration value and never
 * persisted. Two references are equal when all four fields are equal.
 */
export interface SecretReference {
  /** Store endpoint, e.g. "https://vault.example.com" */
  storeAddress: string;

  /** Path of the secret inside the store, e.g. "secret/data/myapp" */
  secretPath: string;

  /** Key inside the secret payload (or the secret name for single-value stores) */
  secretKey: string;

  /** Pinned secret version, where the store supports one */
  version?: string;
}

export function referencesEqual(a: SecretReference, b: SecretReference): boolean {
  return (
    a.storeAddress === b.storeAddress &&
    a.secretPath === b.secretPath &&
    a.secretKey === b.secretKey &&
    a.version === b.version
  );
}

// ============================================================================
// Audit Types
// ============================================================================

/**
 * AuditEntry represents a single audit log entry.
 *
 * All audit entries MUST include a source field to track the origin of the
 * entry (e.g. 'secret:resolution').
 */
export interface AuditEntry {
  /** Timestamp when the event occurred */
  timestamp: Date;

  /** MANDATORY: Origin of the audit entry */
  source: string;

  /** Action that was performed */
  action: string;

  /** Whether the action succeeded */
  success: boolean;

  /** Human-readable reason for the result */
  reason?: string;

  /** Error message if the action failed */
  error?: string;

  /** Additional metadata about the event (never secret values) */
  metadata?: Record<string, unknown>;
}
