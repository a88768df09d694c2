/**
 * Audit Service - Write-only audit trail with Null Object Pattern
 *
 * Records which identifiers were looked up, by which flavor, and how each
 * lookup ended. It works without configuration (disabled = no-op) so the
 * lookup path never has to check for it.
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

  /** Callback invoked when the default storage reaches capacity */
  onOverflow?: (entries: AuditEntry[]) => void;
}

/**
 * Storage interface for audit entries
 *
 * Write-only: there are no query methods. Anything that needs to search the
 * trail should persist it somewhere indexed.
 */
export interface AuditStorage {
  log(entry: AuditEntry): Promise<void> | void;
}

// ============================================================================
// In-Memory Storage Implementation
// ============================================================================

/**
 * Default in-memory audit storage
 *
 * Calls onOverflow with every held entry before dropping the oldest one.
 */
class InMemoryAuditStorage implements AuditStorage {
  private entries: AuditEntry[] = [];
  private readonly maxEntries: number;
  private onOverflow?: (entries: AuditEntry[]) => void;

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

      this.entries.shift();
    }
  }

  /**
   * Get all entries (for testing only - not exposed via AuditService)
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
 * // Enabled, flushing to an external sink on overflow
 * const audit = new AuditService({
 *   enabled: true,
 *   onOverflow: (entries) => sink.write(entries),
 * });
 * ```
 */
export class AuditService {
  private enabled: boolean;
  private storage: AuditStorage;

  constructor(config?: AuditServiceConfig) {
    this.enabled = config?.enabled ?? false;

    if (config?.storage) {
      this.storage = config.storage;
    } else {
      this.storage = new InMemoryAuditStorage(config?.maxEntries ?? 10000, config?.onOverflow);
    }
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

  /**
   * Get internal storage (for testing only)
   * @internal
   */
  _getStorage(): AuditStorage {
    return this.storage;
  }
}

// ============================================================================
// Exports
// ============================================================================

export { InMemoryAuditStorage };
