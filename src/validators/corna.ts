/**
 * Corna Validation Schemas
 */

import { z } from 'zod';
import { domainNameSchema } from './common';

/**
 * POST /v1/corna/:domain_name
 *
 * An omitted permission list means the public default; an empty list
 * makes the Corna private.
 */
export const createCornaSchema = z.object({
  title: z.string().trim().min(1).max(256),
  about_me: z.string().max(10_000).optional(),
  theme_uuid: z.string().uuid().optional(),
  permissions: z.array(z.string()).optional(),
});

/**
 * GET /v1/corna/domain/available?domain_name=
 */
export const domainAvailableQuerySchema = z.object({
  domain_name: domainNameSchema,
});

export type CreateCornaBody = z.infer<typeof createCornaSchema>;
