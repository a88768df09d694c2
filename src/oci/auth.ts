/**
 * AuthContext Resolver
 *
 * Picks exactly one way to authenticate against OCI for an invocation:
 *
 * 1. OCI_CLI_AUTH=instance_principal: signer derived from the instance's
 *    workload identity. The credential file is never opened.
 * 2. Otherwise a profile from the credential file, chosen as
 *    OCI_CONFIG_PROFILE > oci_profile option > DEFAULT.
 *
 * A missing or malformed credential file surfaces through the SDK's own
 * config loader; nothing here re-validates it.
 */

import * as common from 'oci-common';
import { DEFAULT_PROFILE, type EnvironmentConfig } from '../config/index.js';

export type OciAuthProvider = common.AuthenticationDetailsProvider;

export type AuthContext =
  | {
      kind: 'profile';
      profile: string;
      configFile: string;
      provider: OciAuthProvider;
    }
  | {
      kind: 'instance_principal';
      provider: OciAuthProvider;
    };

/**
 * Builds SDK authentication providers. Swapped out in tests so that nothing
 * touches the filesystem or the instance metadata service.
 */
export interface AuthProviderFactory {
  fromConfigFile(configFile: string, profile: string): OciAuthProvider;
  fromInstancePrincipal(): Promise<OciAuthProvider>;
}

export const sdkAuthProviderFactory: AuthProviderFactory = {
  fromConfigFile(configFile: string, profile: string): OciAuthProvider {
    return new common.ConfigFileAuthenticationDetailsProvider(configFile, profile);
  },

  async fromInstancePrincipal(): Promise<OciAuthProvider> {
    return new common.InstancePrincipalsAuthenticationDetailsProviderBuilder().build();
  },
};

/**
 * Profile precedence: environment override, then the explicit option, then DEFAULT.
 */
export function selectProfile(environment: EnvironmentConfig, profileOption?: string): string {
  return environment.profileOverride ?? profileOption ?? DEFAULT_PROFILE;
}

export async function resolveAuthContext(
  environment: EnvironmentConfig,
  profileOption?: string,
  factory: AuthProviderFactory = sdkAuthProviderFactory
): Promise<AuthContext> {
  if (environment.authMode === 'instance_principal') {
    return {
      kind: 'instance_principal',
      provider: await factory.fromInstancePrincipal(),
    };
  }

  const profile = selectProfile(environment, profileOption);
  return {
    kind: 'profile',
    profile,
    configFile: environment.configFile,
    provider: factory.fromConfigFile(environment.configFile, profile),
  };
}

export function describeAuthContext(auth: AuthContext): string {
  switch (auth.kind) {
    case 'profile':
      return `profile ${auth.profile} (${auth.configFile})`;
    case 'instance_principal':
      return 'instance principal';
  }
}
