/**
 * Theme Validation Schemas
 */

import { z } from 'zod';
import { THEME_STATUSES } from '@/services/theme.service';

/**
 * POST /v1/themes
 */
export const createThemeSchema = z.object({
  creator: z.string().min(1),
  name: z.string().trim().min(1).max(128),
  description: z.string().max(2000).optional(),
  path: z.string().min(1).optional(),
  thumbnail: z.string().min(1).optional(),
});

/**
 * PUT /v1/themes/status
 */
export const themeStatusSchema = z.object({
  creator: z.string().min(1),
  name: z.string().min(1),
  path: z.string().min(1).optional(),
  status: z.enum(THEME_STATUSES),
});
