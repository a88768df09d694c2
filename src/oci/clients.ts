/**
 * OCI Client Gateways
 *
 * The three vendor capabilities a lookup needs, each as the narrowest
 * interface the SDK client satisfies. Lookup flavors depend on these
 * interfaces only; tests hand in in-process fakes.
 */

import { VaultsClient } from 'oci-vault';
import { SecretsClient } from 'oci-secrets';
import { ComputeClient } from 'oci-core';
import type { AuthContext } from './auth.js';

// ============================================================================
// Gateway Interfaces
// ============================================================================

export interface SecretSummaryRef {
  id: string;
  secretName?: string;
}

/** Vault service: list secrets by name within a compartment (and vault) */
export interface SecretSearchApi {
  listSecrets(request: {
    compartmentId: string;
    vaultId?: string;
    name?: string;
    page?: string;
  }): Promise<{ items: SecretSummaryRef[]; opcNextPage?: string }>;
}

export interface SecretBundleContent {
  contentType: string;
  content?: string;
}

/** Secret retrieval service: fetch one version of a secret */
export interface SecretBundleApi {
  getSecretBundle(request: {
    secretId: string;
    versionNumber?: number;
  }): Promise<{ secretBundle: { secretBundleContent?: SecretBundleContent } }>;
}

export interface InstanceCredentials {
  username: string;
  password: string;
}

/** Compute service: initial credentials generated for a Windows instance */
export interface InstanceCredentialsApi {
  getWindowsInstanceInitialCredentials(request: {
    instanceId: string;
  }): Promise<{ instanceCredentials: InstanceCredentials }>;
}

// ============================================================================
// Client Factory
// ============================================================================

export interface OciClientFactory {
  secretSearch(auth: AuthContext): SecretSearchApi;
  secretBundles(auth: AuthContext): SecretBundleApi;
  compute(auth: AuthContext): InstanceCredentialsApi;
}

/**
 * Builds real SDK clients. A fresh client per invocation; nothing is pooled
 * or cached between lookups.
 */
export const sdkClientFactory: OciClientFactory = {
  secretSearch(auth: AuthContext): SecretSearchApi {
    return new VaultsClient({ authenticationDetailsProvider: auth.provider });
  },

  secretBundles(auth: AuthContext): SecretBundleApi {
    return new SecretsClient({ authenticationDetailsProvider: auth.provider });
  },

  compute(auth: AuthContext): InstanceCredentialsApi {
    return new ComputeClient({ authenticationDetailsProvider: auth.provider });
  },
};
