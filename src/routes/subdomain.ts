/**
 * Subdomain Routes
 *
 * Page data for a Corna's own site. The session cookie is optional; the
 * viewer needs read access.
 *
 * Routes:
 * - GET /subdomain/:domain
 * - GET /subdomain/:domain/fragment/:url_extension
 */

import { Hono } from 'hono';
import type { HonoEnv } from '@/types/hono';
import { buildPage, singlePost } from '@/services/subdomain.service';

const subdomainRoutes = new Hono<HonoEnv>();

subdomainRoutes.get('/:domain', async (c) => {
  return c.json(await buildPage(c.req.param('domain'), c.get('username')));
});

subdomainRoutes.get('/:domain/fragment/:url_extension', async (c) => {
  const post = await singlePost(c.req.param('domain'), c.req.param('url_extension'), c.get('username'));
  return c.json(post);
});

export default subdomainRoutes;
