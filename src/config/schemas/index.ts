/**
 * Configuration Schemas
 *
 * Lookup options (per call) and environment configuration (per process).
 */

export {
  POLICY_ACTIONS,
  PolicyActionSchema,
  LookupOptionsSchema,
  toPolicyConfig,
  type PolicyAction,
  type PolicyConfig,
  type LookupOptions,
  type LookupOptionsInput,
} from './options.js';

export {
  AUTH_MODES,
  DEFAULT_PROFILE,
  defaultConfigFile,
  EnvironmentSchema,
  EnvironmentConfigSchema,
  type AuthMode,
  type Environment,
  type EnvironmentConfig,
} from './environment.js';
