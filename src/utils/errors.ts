/**
 * Lookup error type
 *
 * Every fatal condition a lookup can hit is surfaced as a LookupError carrying a
 * stable code and a human-readable message. Callers that only understand
 * "fatal failure + message" can rely on `message`; everything else is extra.
 */
export class LookupError extends Error {
  constructor(
    public code: LookupErrorCode,
    message: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'LookupError';

    // Maintain proper stack trace for where error was thrown
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, LookupError);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

export type LookupErrorCode =
  | 'CONFIGURATION_ERROR'
  | 'RESOURCE_NOT_FOUND'
  | 'ACCESS_DENIED'
  | 'UNEXPECTED_RESPONSE'
  | 'LOOKUP_FAILED';

export function createLookupError(
  code: LookupErrorCode,
  message: string,
  details?: Record<string, unknown>
): LookupError {
  return new LookupError(code, message, details);
}

// Predefined lookup error types
export const LookupErrors = {
  CONFIGURATION_ERROR: (message: string, details?: Record<string, unknown>) =>
    createLookupError('CONFIGURATION_ERROR', message, details),

  RESOURCE_NOT_FOUND: (subject: string, identifier: string) =>
    createLookupError(
      'RESOURCE_NOT_FOUND',
      `Failed to find ${subject} ${identifier} (ResourceNotFound)`,
      { identifier }
    ),

  ACCESS_DENIED: (subject: string, identifier: string, reason: string) =>
    createLookupError('ACCESS_DENIED', `Failed to retrieve ${subject}: ${reason}`, {
      identifier,
    }),

  UNEXPECTED_RESPONSE: (operation: string, detail: string) =>
    createLookupError(
      'UNEXPECTED_RESPONSE',
      `Something went wrong during ${operation}: ${detail}`
    ),

  LOOKUP_FAILED: (subject: string, identifier: string, cause: unknown) =>
    createLookupError(
      'LOOKUP_FAILED',
      `Failed to retrieve ${subject} ${identifier}: ${errorMessage(cause)}`,
      { identifier }
    ),
} as const;

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

// Error sanitization for logging
export function sanitizeError(error: unknown): Record<string, unknown> {
  if (error instanceof LookupError) {
    return {
      type: 'LookupError',
      code: error.code,
      message: error.message,
      // Don't include details in production to prevent information leakage
      ...(process.env.NODE_ENV !== 'production' && { details: error.details }),
    };
  }

  if (error instanceof Error) {
    return {
      type: 'Error',
      message: error.message,
      name: error.name,
      // Only include stack trace in development
      ...(process.env.NODE_ENV === 'development' && { stack: error.stack }),
    };
  }

  return {
    type: 'Unknown',
    message: 'An unknown error occurred',
  };
}
