/**
 * Core Types
 *
 * Shared types for the lookup framework. Nothing in src/core/ imports from
 * src/oci/ or src/lookup/.
 */

// ============================================================================
// Audit Types
// ============================================================================

/**
 * AuditEntry represents a single audit log entry.
 *
 * All audit entries MUST include a source field to track where the entry
 * came from (e.g., 'lookup:secret', 'lookup:auth').
 *
 * Secret payloads are never written to an entry.
 */
export interface AuditEntry {
  /** Timestamp when the event occurred */
  timestamp: Date;

  /** Origin of the audit entry */
  source: string;

  /** Action that was performed */
  action: string;

  /** Whether the action succeeded */
  success: boolean;

  /** Human-readable reason for the result */
  reason?: string;

  /** Error message if the action failed */
  error?: string;

  /** Additional metadata about the event */
  metadata?: Record<string, unknown>;
}

// ============================================================================
// Warning Channel
// ============================================================================

/**
 * Side channel for non-fatal notices.
 *
 * Host engines usually have their own warning display; anything with a
 * `warning(message)` method can be plugged in.
 */
export interface WarningDisplay {
  warning(message: string): void;
}

export const consoleDisplay: WarningDisplay = {
  warning(message: string): void {
    console.warn(`[WARNING] ${message}`);
  },
};
