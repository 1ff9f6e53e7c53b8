/**
 * Post Validation Schemas
 */

import { z } from 'zod';

/**
 * The editor sends the literal string "null" for empty fields
 */
function stripNullStrings(value: unknown): unknown {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return value;
  }
  return Object.fromEntries(Object.entries(value).filter(([, field]) => field !== 'null'));
}

/**
 * POST /v1/posts/:domain_name/post
 *
 * `type` is checked by the service so the error names the bad value.
 */
export const createPostSchema = z.preprocess(
  stripNullStrings,
  z.object({
    type: z.string().min(1),
    title: z.string().optional(),
    content: z.string().optional(),
    inner_html: z.string().optional(),
    uploaded_images: z.array(z.string().min(1)).default([]),
  })
);

export type CreatePostBody = z.infer<typeof createPostSchema>;
