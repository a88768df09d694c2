/**
 * Lookup Flavor Registry
 *
 * Maps flavor names to the clients they need and the scope they require.
 * Required scope is checked before any client is built, so a bad invocation
 * fails without touching the network.
 */

import type { AuthContext } from '../oci/auth.js';
import type { OciClientFactory } from '../oci/clients.js';
import { LookupErrors } from '../utils/errors.js';
import { SecretLookup } from './flavors/secret-lookup.js';
import {
  InstanceCredentialsLookup,
  WindowsPasswordLookup,
} from './flavors/instance-credentials-lookup.js';
import { FLAVOR_NAMES, type FlavorName, type LookupFlavor, type LookupScope } from './types.js';

export interface FlavorRegistration {
  readonly name: FlavorName;
  readonly description: string;

  /** Scope qualifiers that must be present, with the option that sets each */
  readonly requiredScope: ReadonlyArray<{ key: keyof LookupScope; option: string }>;

  create(auth: AuthContext, clients: OciClientFactory): LookupFlavor;
}

const FLAVORS: Record<FlavorName, FlavorRegistration> = {
  secret: {
    name: 'secret',
    description: 'Secret payloads from OCI Vault, looked up by secret name',
    requiredScope: [{ key: 'compartmentId', option: 'compartment_id' }],
    create: (auth, clients) =>
      new SecretLookup(clients.secretSearch(auth), clients.secretBundles(auth)),
  },
  'instance-credentials': {
    name: 'instance-credentials',
    description: 'Initial Windows credentials of a compute instance, as JSON',
    requiredScope: [],
    create: (auth, clients) => new InstanceCredentialsLookup(clients.compute(auth)),
  },
  'windows-password': {
    name: 'windows-password',
    description: 'Initial Windows password of a compute instance',
    requiredScope: [],
    create: (auth, clients) => new WindowsPasswordLookup(clients.compute(auth)),
  },
};

export function isFlavorName(name: string): name is FlavorName {
  return FLAVOR_NAMES.some((flavor) => flavor === name);
}

/**
 * @throws LookupError (CONFIGURATION_ERROR) for an unknown flavor
 */
export function getFlavorRegistration(name: string): FlavorRegistration {
  if (!isFlavorName(name)) {
    throw LookupErrors.CONFIGURATION_ERROR(
      `Unknown lookup flavor: ${name}. Available: ${FLAVOR_NAMES.join(', ')}`
    );
  }
  return FLAVORS[name];
}

/**
 * @throws LookupError (CONFIGURATION_ERROR) naming the first missing option
 */
export function assertRequiredScope(registration: FlavorRegistration, scope: LookupScope): void {
  for (const { key, option } of registration.requiredScope) {
    if (scope[key] === undefined) {
      throw LookupErrors.CONFIGURATION_ERROR(
        `"${option}" is required for the ${registration.name} lookup`
      );
    }
  }
}

export function listFlavors(): FlavorName[] {
  return [...FLAVOR_NAMES];
}
