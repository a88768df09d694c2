/**
 * Lookup Aggregator
 *
 * Resolves a list of identifiers one at a time, applies the missing/denied
 * policy to every outcome and collects the payloads in input order.
 *
 * Per identifier:
 *
 *   resolved -> payloads appended (warning when a name matched more than once)
 *   missing  -> on_missing: error aborts the run, warn warns, skip says nothing
 *   denied   -> on_denied:  same three behaviours, service message preserved
 *
 * An aborted run returns nothing; partial results are discarded.
 */

import type { AuditService } from '../core/audit-service.js';
import { consoleDisplay, type WarningDisplay } from '../core/types.js';
import type { PolicyAction, PolicyConfig } from '../config/index.js';
import { LookupErrors, type LookupError } from '../utils/errors.js';
import type { LookupFlavor, LookupScope } from './types.js';

export interface LookupAggregatorOptions {
  policy: PolicyConfig;

  /** Where warnings go (default: console) */
  display?: WarningDisplay;

  /** Optional audit trail; payloads are never recorded */
  auditService?: AuditService;
}

/**
 * @throws LookupError (CONFIGURATION_ERROR) unless every term is a non-empty string
 */
export function assertTerms(terms: readonly unknown[]): asserts terms is readonly string[] {
  terms.forEach((term, index) => {
    if (typeof term !== 'string' || term.length === 0) {
      throw LookupErrors.CONFIGURATION_ERROR(
        `Lookup term at position ${index} must be a non-empty string`
      );
    }
  });
}

export class LookupAggregator {
  private readonly policy: PolicyConfig;
  private readonly display: WarningDisplay;
  private readonly auditService?: AuditService;

  constructor(
    private readonly flavor: LookupFlavor,
    options: LookupAggregatorOptions
  ) {
    this.policy = options.policy;
    this.display = options.display ?? consoleDisplay;
    this.auditService = options.auditService;
  }

  /**
   * Resolve every term in order.
   *
   * @returns payloads in input order, or a single concatenated value when join is set
   * @throws LookupError when a policy says error, or on a failure no policy covers
   */
  async run(terms: readonly string[], scope: LookupScope = {}, join = false): Promise<string[]> {
    assertTerms(terms);

    const results: string[] = [];
    const { subject } = this.flavor;

    for (const term of terms) {
      const outcome = await this.flavor.resolve(term, scope);

      switch (outcome.kind) {
        case 'resolved':
          if (outcome.payloads.length > 1) {
            this.display.warning(`More than one ${subject} found with name ${term}`);
          }
          results.push(...outcome.payloads);
          await this.audit(term, true, 'resolved', { matches: outcome.payloads.length });
          break;

        case 'missing':
          await this.audit(term, false, 'missing', { policy: this.policy.onMissing });
          this.apply(
            this.policy.onMissing,
            LookupErrors.RESOURCE_NOT_FOUND(subject, term),
            `Skipping, did not find ${subject} ${term}`
          );
          break;

        case 'denied':
          await this.audit(term, false, 'denied', {
            policy: this.policy.onDenied,
            error: outcome.reason,
          });
          this.apply(
            this.policy.onDenied,
            LookupErrors.ACCESS_DENIED(subject, term, outcome.reason),
            `Skipping, access denied to ${subject} ${term}: ${outcome.reason}`
          );
          break;
      }
    }

    return join ? [results.join('')] : results;
  }

  private apply(action: PolicyAction, failure: LookupError, warning: string): void {
    switch (action) {
      case 'error':
        throw failure;
      case 'warn':
        this.display.warning(warning);
        return;
      case 'skip':
        return;
    }
  }

  private async audit(
    term: string,
    success: boolean,
    reason: string,
    metadata: { matches?: number; policy?: PolicyAction; error?: string }
  ): Promise<void> {
    await this.auditService?.log({
      timestamp: new Date(),
      source: `lookup:${this.flavor.name}`,
      action: `resolve:${term}`,
      success,
      reason,
      error: metadata.error,
      metadata: {
        identifier: term,
        ...(metadata.matches !== undefined && { matches: metadata.matches }),
        ...(metadata.policy && { policy: metadata.policy }),
      },
    });
  }
}
