/**
 * User Routes
 *
 * Routes:
 * - GET /v1/user
 * - GET /v1/user/roles/created
 * - PUT /v1/user/avatar
 */

import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import type { HonoEnv } from '@/types/hono';
import { requireLogin, sessionUser } from '@/middleware/auth';
import { throwOnInvalid } from '@/validators/common';
import { avatarSchema } from '@/validators/user';
import { getUserDetails, rolesCreatedBy, setAvatar } from '@/services/user.service';

const userRoutes = new Hono<HonoEnv>();

userRoutes.use('*', requireLogin);

userRoutes.get('/', async (c) => {
  const { userId } = sessionUser(c);
  return c.json(await getUserDetails(userId));
});

userRoutes.get('/roles/created', async (c) => {
  const { userId } = sessionUser(c);
  return c.json(await rolesCreatedBy(userId));
});

userRoutes.put('/avatar', zValidator('json', avatarSchema, throwOnInvalid), async (c) => {
  const { userId } = sessionUser(c);
  await setAvatar(userId, c.req.valid('json').slug);
  return c.body(null, 204);
});

export default userRoutes;
