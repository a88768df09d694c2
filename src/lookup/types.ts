/**
 * Lookup Types
 *
 * A lookup flavor resolves one identifier into a tagged outcome; the
 * aggregator decides what each outcome means under the caller's policy.
 */

// ============================================================================
// Outcomes
// ============================================================================

export type LookupOutcome =
  | { kind: 'resolved'; payloads: string[] }
  | { kind: 'missing' }
  | { kind: 'denied'; reason: string };

export const Outcome = {
  resolved: (payloads: string[]): LookupOutcome => ({ kind: 'resolved', payloads }),
  missing: (): LookupOutcome => ({ kind: 'missing' }),
  denied: (reason: string): LookupOutcome => ({ kind: 'denied', reason }),
} as const;

// ============================================================================
// Flavors
// ============================================================================

export const FLAVOR_NAMES = ['secret', 'instance-credentials', 'windows-password'] as const;

export type FlavorName = (typeof FLAVOR_NAMES)[number];

/** Qualifiers that narrow a search; flavors ignore the ones they don't use */
export interface LookupScope {
  compartmentId?: string;
  vaultId?: string;
  versionNumber?: number;
}

export interface LookupFlavor {
  readonly name: FlavorName;

  /** Noun used in warnings and errors (e.g. "secret") */
  readonly subject: string;

  /**
   * Resolve a single identifier.
   *
   * Service denials and misses come back as outcomes. Only conditions that
   * no policy covers (unexpected responses, transport failures) are thrown.
   */
  resolve(identifier: string, scope: LookupScope): Promise<LookupOutcome>;
}
