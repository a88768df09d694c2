/**
 * Configuration Module - Public API
 */

export { parseLookupOptions, loadEnvironmentConfig } from './manager.js';

export {
  POLICY_ACTIONS,
  PolicyActionSchema,
  LookupOptionsSchema,
  toPolicyConfig,
  AUTH_MODES,
  DEFAULT_PROFILE,
  defaultConfigFile,
  EnvironmentSchema,
  EnvironmentConfigSchema,
  type PolicyAction,
  type PolicyConfig,
  type LookupOptions,
  type LookupOptionsInput,
  type AuthMode,
  type Environment,
  type EnvironmentConfig,
} from './schemas/index.js';
