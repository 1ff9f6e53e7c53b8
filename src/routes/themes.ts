/**
 * Theme Routes
 *
 * Routes:
 * - POST /v1/themes
 * - PUT  /v1/themes/status
 * - GET  /v1/themes
 */

import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import type { HonoEnv } from '@/types/hono';
import { requireLogin } from '@/middleware/auth';
import { throwOnInvalid } from '@/validators/common';
import { createThemeSchema, themeStatusSchema } from '@/validators/themes';
import { addTheme, listThemes, updateThemeStatus } from '@/services/theme.service';

const themeRoutes = new Hono<HonoEnv>();

themeRoutes.post('/', requireLogin, zValidator('json', createThemeSchema, throwOnInvalid), async (c) => {
  const id = await addTheme(c.req.valid('json'));
  return c.json({ id }, 201);
});

themeRoutes.put('/status', requireLogin, zValidator('json', themeStatusSchema, throwOnInvalid), async (c) => {
  await updateThemeStatus(c.req.valid('json'));
  return c.body(null, 204);
});

themeRoutes.get('/', async (c) => {
  return c.json(await listThemes());
});

export default themeRoutes;
