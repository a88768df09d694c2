/**
 * Environment Configuration Schema
 *
 * The environment variables a lookup honours, assembled once per invocation
 * into a plain value that is handed to the auth resolver.
 */

import { z } from 'zod';
import { homedir } from 'os';
import { join } from 'path';

export const AUTH_MODES = ['api_key', 'instance_principal'] as const;

export type AuthMode = (typeof AUTH_MODES)[number];

export const DEFAULT_PROFILE = 'DEFAULT';

export function defaultConfigFile(): string {
  return join(homedir(), '.oci', 'config');
}

// Unset and empty variables are treated the same
const optionalVariable = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((value) => (value === '' ? undefined : value), schema.optional());

export const EnvironmentSchema = z.object({
  OCI_CLI_AUTH: optionalVariable(z.enum(AUTH_MODES)),
  OCI_CONFIG_PROFILE: optionalVariable(z.string()),
  OCI_CLI_CONFIG_FILE: optionalVariable(z.string()),
});

export type Environment = z.infer<typeof EnvironmentSchema>;

export interface EnvironmentConfig {
  /** api_key reads a profile from the credential file; instance_principal never does */
  readonly authMode: AuthMode;

  /** Profile name forced by the environment (wins over the oci_profile option) */
  readonly profileOverride?: string;

  /** Credential file location */
  readonly configFile: string;
}

export const EnvironmentConfigSchema = EnvironmentSchema.transform(
  (env): EnvironmentConfig => ({
    authMode: env.OCI_CLI_AUTH ?? 'api_key',
    profileOverride: env.OCI_CONFIG_PROFILE,
    configFile: env.OCI_CLI_CONFIG_FILE ?? defaultConfigFile(),
  })
);
