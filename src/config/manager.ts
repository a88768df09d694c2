import type { z } from 'zod';
import {
  LookupOptionsSchema,
  EnvironmentConfigSchema,
  type LookupOptions,
  type EnvironmentConfig,
} from './schemas/index.js';
import { LookupErrors, type LookupError } from '../utils/errors.js';

const POLICY_OPTIONS = new Set(['on_missing', 'on_denied']);

/**
 * Parse and validate caller-supplied lookup options.
 *
 * @throws LookupError (CONFIGURATION_ERROR) on the first invalid option
 */
export function parseLookupOptions(raw: Record<string, unknown> = {}): LookupOptions {
  const result = LookupOptionsSchema.safeParse(raw);
  if (!result.success) {
    throw toConfigurationError(result.error, raw);
  }
  return result.data;
}

/**
 * Assemble the environment configuration from an environment snapshot.
 *
 * @throws LookupError (CONFIGURATION_ERROR) for an unknown OCI_CLI_AUTH value
 */
export function loadEnvironmentConfig(env: NodeJS.ProcessEnv = process.env): EnvironmentConfig {
  const result = EnvironmentConfigSchema.safeParse(env);
  if (!result.success) {
    throw toConfigurationError(result.error, env);
  }
  return Object.freeze(result.data);
}

function toConfigurationError(error: z.ZodError, raw: Record<string, unknown>): LookupError {
  const issue = error.issues[0];
  const key = issue.path.join('.');

  if (POLICY_OPTIONS.has(key)) {
    return LookupErrors.CONFIGURATION_ERROR(
      `"${key}" must be a string and one of "error", "warn" or "skip", not ${String(raw[key])}`,
      { option: key }
    );
  }

  if (key === '') {
    return LookupErrors.CONFIGURATION_ERROR(`Invalid lookup options: ${issue.message}`);
  }

  return LookupErrors.CONFIGURATION_ERROR(`Invalid value for "${key}": ${issue.message}`, {
    option: key,
  });
}
