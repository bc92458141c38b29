/**
 * Audit Service - Secret Access Trail with Null Object Pattern
 *
 * Write-only audit logging for secret resolution events with overflow
 * handling. Disabled unless configured, so resolvers can always hold one.
 */

import type { AuditEntry } from './types.js';

// ============================================================================
// Interfaces
// ============================================================================

/**
 * Configuration for the Audit Service
 */
export interface AuditServiceConfig {
  /** Whether audit logging is enabled (default: false) */
  enabled?: boolean;

  /** Custom storage implementation (default: InMemoryAuditStorage) */
  storage?: AuditStorage;

  /** Maximum entries kept by the default in-memory storage (default: 10000) */
  maxEntries?: number;

  /** Callback invoked with all buffered entries when in-memory storage reaches capacity */
  onOverflow?: (entries: AuditEntry[]) => void;
}

/**
 * Storage interface for audit entries
 *
 * Write-only: querying must be backed by indexed persistence elsewhere.
 */
export interface AuditStorage {
  log(entry: AuditEntry): Promise<void> | void;
}

// ============================================================================
// In-Memory Storage Implementation
// ============================================================================

/**
 * Default in-memory audit storage.
 *
 * Calls onOverflow with a copy of every buffered entry before the oldest one
 * is discarded.
 */
export class InMemoryAuditStorage implements AuditStorage {
  private entries: AuditEntry[] = [];
  private readonly maxEntries: number;
  private readonly onOverflow?: (entries: AuditEntry[]) => void;

  constructor(maxEntries: number = 10000, onOverflow?: (entries: AuditEntry[]) => void) {
    this.maxEntries = maxEntries;
    this.onOverflow = onOverflow;
  }

  log(entry: AuditEntry): void {
    this.entries.push(entry);

    if (this.entries.length > this.maxEntries) {
      if (this.onOverflow) {
        this.onOverflow([...this.entries]);
      }

      // Remove oldest entry
      this.entries.shift();
    }
  }

  /**
   * Get all entries (for testing only)
   * @internal
   */
  getEntries(): AuditEntry[] {
    return [...this.entries];
  }

  /**
   * Clear all entries (for testing only)
   * @internal
   */
  clear(): void {
    this.entries = [];
  }
}

// ============================================================================
// Audit Service (Null Object Pattern)
// ============================================================================

/**
 * Centralized audit logging service
 *
 * Usage:
 * ```typescript
 * // Disabled by default
 * const audit = new AuditService();
 * await audit.log({ ... }); // No-op
 *
 * // Enabled with overflow callback
 * const audit = new AuditService({
 *   enabled: true,
 *   onOverflow: (entries) => shipToSiem(entries),
 * });
 * ```
 */
export class AuditService {
  private readonly enabled: boolean;
  private readonly storage: AuditStorage;

  constructor(config?: AuditServiceConfig) {
    this.enabled = config?.enabled ?? false;
    this.storage =
      config?.storage ?? new InMemoryAuditStorage(config?.maxEntries ?? 10000, config?.onOverflow);
  }

  /**
   * Log an audit entry
   *
   * @throws Error if the entry has no source
   */
  async log(entry: AuditEntry): Promise<void> {
    if (!this.enabled) {
      return;
    }

    if (!entry.source) {
      throw new Error(
        'CRITICAL: AuditEntry missing required field: source. ' +
          'All audit entries must include a source field for audit trail integrity.'
      );
    }

    await this.storage.log(entry);
  }

  isEnabled(): boolean {
    return this.enabled;
  }
}
