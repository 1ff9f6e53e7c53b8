/**
 * User Validation Schemas
 */

import { z } from 'zod';

/**
 * PUT /v1/user/avatar
 */
export const avatarSchema = z.object({
  slug: z.string().min(1).max(64),
});
