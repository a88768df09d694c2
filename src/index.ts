/**
 * oci-lookup
 *
 * Resolve OCI Vault secrets and compute instance credentials at
 * configuration-evaluation time.
 */

// ============================================================================
// Lookups
// ============================================================================

export * from './lookup/index.js';

// ============================================================================
// Configuration
// ============================================================================

export * from './config/index.js';

// ============================================================================
// OCI Authentication & Clients
// ============================================================================

export {
  resolveAuthContext,
  selectProfile,
  describeAuthContext,
  sdkAuthProviderFactory,
  type AuthContext,
  type AuthProviderFactory,
  type OciAuthProvider,
} from './oci/auth.js';

export {
  sdkClientFactory,
  type OciClientFactory,
  type SecretSearchApi,
  type SecretSummaryRef,
  type SecretBundleApi,
  type SecretBundleContent,
  type InstanceCredentialsApi,
  type InstanceCredentials,
} from './oci/clients.js';

export { asServiceError, isNotFound, type ServiceError } from './oci/service-errors.js';

// ============================================================================
// Core
// ============================================================================

export { AuditService } from './core/audit-service.js';
export type { AuditServiceConfig, AuditStorage } from './core/audit-service.js';
export { consoleDisplay, type AuditEntry, type WarningDisplay } from './core/types.js';

// ============================================================================
// Errors
// ============================================================================

export {
  LookupError,
  LookupErrors,
  createLookupError,
  sanitizeError,
  errorMessage,
  type LookupErrorCode,
} from './utils/errors.js';
