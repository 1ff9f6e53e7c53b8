/**
 * Post Routes
 *
 * Routes:
 * - POST /v1/posts/:domain_name/post
 * - GET  /v1/posts/:domain_name
 */

import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import type { HonoEnv } from '@/types/hono';
import { requireLogin, sessionUser } from '@/middleware/auth';
import { createPostSchema } from '@/validators/posts';
import { throwOnInvalid } from '@/validators/common';
import { createPost, getPosts } from '@/services/post.service';

const postRoutes = new Hono<HonoEnv>();

postRoutes.post(
  '/:domain_name/post',
  requireLogin,
  zValidator('json', createPostSchema, throwOnInvalid),
  async (c) => {
    const { userId, username } = sessionUser(c);
    const domainName = c.req.param('domain_name');
    const body = c.req.valid('json');

    const urlExtension = await createPost(domainName, username, userId, {
      type: body.type,
      title: body.title,
      content: body.content,
      innerHtml: body.inner_html,
      uploadedImages: body.uploaded_images,
    });

    return c.json({ url_extension: urlExtension }, 201);
  }
);

// Domains are looked up as given; a malformed one is simply unknown
postRoutes.get('/:domain_name', async (c) => {
  return c.json(await getPosts(c.req.param('domain_name')));
});

export default postRoutes;
