/**
 * Shared Validation Helpers
 */

import { z, type ZodError } from 'zod';

/**
 * zValidator hook that hands failures to the global error handler,
 * so every validation error renders as VALIDATION_ERROR with details
 */
export function throwOnInvalid<T>(
  result: { success: true; data: T } | { success: false; error: ZodError }
): void {
  if (!result.success) {
    throw result.error;
  }
}

/**
 * Corna subdomain: DNS label of lowercase letters, digits and inner hyphens
 */
export const domainNameSchema = z
  .string()
  .regex(/^[a-z0-9](?:[a-z0-9-]{0,61}[a-z0-9])?$/, 'Invalid domain name');

export const domainParamSchema = z.object({
  domain_name: domainNameSchema,
});

/**
 * Uploaded file in a multipart form
 */
export const fileSchema = z.custom<File>(
  (value) => value instanceof Blob && 'name' in value,
  'Expected a file'
);
