/**
 * Lookup Options Schema
 *
 * Keyword options a caller passes to a lookup. Parsed once per invocation,
 * before any client is built.
 */

import { z } from 'zod';

// ============================================================================
// Failure Policy
// ============================================================================

export const POLICY_ACTIONS = ['error', 'warn', 'skip'] as const;

/**
 * What to do with a missing or denied identifier (case-insensitive)
 *
 * - error: abort the whole lookup
 * - warn: emit a warning and continue without a value
 * - skip: continue silently without a value
 */
export const PolicyActionSchema = z.preprocess(
  (value) => (typeof value === 'string' ? value.toLowerCase() : value),
  z.enum(POLICY_ACTIONS)
);

export type PolicyAction = (typeof POLICY_ACTIONS)[number];

export interface PolicyConfig {
  readonly onMissing: PolicyAction;
  readonly onDenied: PolicyAction;
}

// ============================================================================
// Lookup Options
// ============================================================================

export const LookupOptionsSchema = z
  .object({
    oci_profile: z.string().min(1).optional().describe('OCI credentials profile name'),
    compartment_id: z.string().min(1).optional().describe('Compartment OCID of the vault'),
    vault_id: z.string().min(1).optional().describe('Vault OCID of the secret store'),
    version_number: z.coerce
      .number()
      .int()
      .positive()
      .optional()
      .describe('Secret version to fetch (defaults to the current version)'),
    on_missing: PolicyActionSchema.default('error'),
    on_denied: PolicyActionSchema.default('error'),
    join: z
      .unknown()
      .transform((value) => Boolean(value))
      .describe('Concatenate all results into a single value'),
  })
  .strict();

export type LookupOptionsInput = z.input<typeof LookupOptionsSchema>;
export type LookupOptions = z.output<typeof LookupOptionsSchema>;

export function toPolicyConfig(options: LookupOptions): PolicyConfig {
  return {
    onMissing: options.on_missing,
    onDenied: options.on_denied,
  };
}
