/**
 * Lookup Module - Public API
 */

export { lookup, toLookupScope, type LookupDependencies } from './lookup.js';
export { LookupAggregator, assertTerms, type LookupAggregatorOptions } from './aggregator.js';
export {
  getFlavorRegistration,
  assertRequiredScope,
  isFlavorName,
  listFlavors,
  type FlavorRegistration,
} from './registry.js';
export { SecretLookup, decodeSecretContent } from './flavors/secret-lookup.js';
export {
  InstanceCredentialsLookup,
  WindowsPasswordLookup,
} from './flavors/instance-credentials-lookup.js';
export {
  Outcome,
  FLAVOR_NAMES,
  type FlavorName,
  type LookupFlavor,
  type LookupOutcome,
  type LookupScope,
} from './types.js';
