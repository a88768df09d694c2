import type { AuditService } from '../core/audit-service.js';
import type { WarningDisplay } from '../core/types.js';
import {
  loadEnvironmentConfig,
  parseLookupOptions,
  toPolicyConfig,
  type LookupOptions,
} from '../config/index.js';
import {
  describeAuthContext,
  resolveAuthContext,
  type AuthContext,
  type AuthProviderFactory,
} from '../oci/auth.js';
import { sdkClientFactory, type OciClientFactory } from '../oci/clients.js';
import { LookupErrors, errorMessage } from '../utils/errors.js';
import { LookupAggregator, assertTerms } from './aggregator.js';
import { assertRequiredScope, getFlavorRegistration } from './registry.js';
import type { LookupScope } from './types.js';

/**
 * Collaborators of a lookup. All optional; the defaults talk to OCI using
 * the real process environment.
 */
export interface LookupDependencies {
  /** Environment snapshot (default: process.env) */
  env?: NodeJS.ProcessEnv;
  authFactory?: AuthProviderFactory;
  clientFactory?: OciClientFactory;
  display?: WarningDisplay;
  auditService?: AuditService;
}

export function toLookupScope(options: LookupOptions): LookupScope {
  return {
    compartmentId: options.compartment_id,
    vaultId: options.vault_id,
    versionNumber: options.version_number,
  };
}

/**
 * Resolve identifiers with one lookup flavor.
 *
 * Every configuration problem (unknown flavor, bad option, missing scope,
 * bad environment, empty term) is reported before authentication starts.
 *
 * @example
 * ```typescript
 * const [password] = await lookup('secret', ['db_admin_password'], {
 *   compartment_id: 'ocid1.compartment.oc1..example',
 *   on_missing: 'warn',
 * });
 * ```
 */
export async function lookup(
  flavorName: string,
  terms: readonly string[],
  rawOptions: Record<string, unknown> = {},
  deps: LookupDependencies = {}
): Promise<string[]> {
  const options = parseLookupOptions(rawOptions);
  const registration = getFlavorRegistration(flavorName);
  const scope = toLookupScope(options);
  assertRequiredScope(registration, scope);
  assertTerms(terms);

  const environment = loadEnvironmentConfig(deps.env ?? process.env);
  let auth: AuthContext;
  try {
    auth = await resolveAuthContext(environment, options.oci_profile, deps.authFactory);
  } catch (error) {
    throw LookupErrors.CONFIGURATION_ERROR(
      `Failed to load OCI authentication: ${errorMessage(error)}`,
      { authMode: environment.authMode }
    );
  }

  await deps.auditService?.log({
    timestamp: new Date(),
    source: 'lookup:auth',
    action: 'resolve_auth_context',
    success: true,
    reason: describeAuthContext(auth),
  });

  const flavor = registration.create(auth, deps.clientFactory ?? sdkClientFactory);
  const aggregator = new LookupAggregator(flavor, {
    policy: toPolicyConfig(options),
    display: deps.display,
    auditService: deps.auditService,
  });

  return aggregator.run(terms, scope, options.join);
}
