import { asServiceError, isNotFound } from '../../oci/service-errors.js';
import { LookupError, LookupErrors } from '../../utils/errors.js';
import { Outcome, type LookupOutcome } from '../types.js';

/**
 * Turn an error thrown by a service call into a missing/denied outcome.
 *
 * Errors that did not come from the service are rethrown as fatal.
 */
export function classifyFailure(
  error: unknown,
  subject: string,
  identifier: string,
  options: { notFoundIsMissing?: boolean } = {}
): LookupOutcome {
  if (error instanceof LookupError) {
    throw error;
  }

  const serviceError = asServiceError(error);
  if (!serviceError) {
    throw LookupErrors.LOOKUP_FAILED(subject, identifier, error);
  }

  if (options.notFoundIsMissing && isNotFound(serviceError)) {
    return Outcome.missing();
  }

  return Outcome.denied(serviceError.message);
}
