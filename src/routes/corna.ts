/**
 * Corna Routes
 *
 * Routes:
 * - POST /v1/corna/:domain_name
 * - GET  /v1/corna
 * - GET  /v1/corna/domain/available?domain_name=
 */

import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import type { HonoEnv } from '@/types/hono';
import { requireLogin, sessionUser } from '@/middleware/auth';
import { createCornaSchema, domainAvailableQuerySchema } from '@/validators/corna';
import { domainParamSchema, throwOnInvalid } from '@/validators/common';
import { createCorna, getUserCornaDomain, isDomainAvailable } from '@/services/corna.service';

const cornaRoutes = new Hono<HonoEnv>();

/**
 * GET /v1/corna
 *
 * Domain of the caller's own Corna
 */
cornaRoutes.get('/', requireLogin, async (c) => {
  const { userId } = sessionUser(c);
  return c.json({ domain_name: await getUserCornaDomain(userId) });
});

/**
 * GET /v1/corna/domain/available?domain_name=
 */
cornaRoutes.get(
  '/domain/available',
  zValidator('query', domainAvailableQuerySchema, throwOnInvalid),
  async (c) => {
    const { domain_name } = c.req.valid('query');
    return c.json({ domain_name, available: await isDomainAvailable(domain_name) });
  }
);

/**
 * POST /v1/corna/:domain_name
 */
cornaRoutes.post(
  '/:domain_name',
  requireLogin,
  zValidator('param', domainParamSchema, throwOnInvalid),
  zValidator('json', createCornaSchema, throwOnInvalid),
  async (c) => {
    const { userId } = sessionUser(c);
    const { domain_name } = c.req.valid('param');
    const body = c.req.valid('json');

    const created = await createCorna(userId, domain_name, {
      title: body.title,
      aboutMe: body.about_me,
      themeUuid: body.theme_uuid,
      permissions: body.permissions,
    });

    return c.json({ domain_name: created.domainName }, 201);
  }
);

export default cornaRoutes;
