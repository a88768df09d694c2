import { z } from 'zod';

/**
 * Shape of an error raised by an OCI service call (the SDK's OciError).
 *
 * Matched structurally so that anything carrying a numeric HTTP status
 * counts, whichever SDK build threw it.
 */
export const ServiceErrorSchema = z.object({
  statusCode: z.number(),
  serviceCode: z.string().optional(),
  message: z.string(),
});

export type ServiceError = z.infer<typeof ServiceErrorSchema>;

export function asServiceError(error: unknown): ServiceError | undefined {
  const parsed = ServiceErrorSchema.safeParse(error);
  return parsed.success ? parsed.data : undefined;
}

/**
 * 404 NotFound only. OCI answers 404 NotAuthorizedOrNotFound when the
 * caller may not see the resource, which is a denial, not a miss.
 */
export function isNotFound(error: ServiceError): boolean {
  return error.statusCode === 404 && error.serviceCode === 'NotFound';
}
