/**
 * Subdomain Page API Tests
 *
 * Page data a theme renders for a Corna, with read access enforced
 */

import { describe, test, expect, beforeEach, vi } from 'vitest';
import { createCorna, request, signUp } from '../../helpers/app';
import { insertMedia, insertTheme, markPostDeleted, resetDatabase, userUuid } from '../../helpers/db';
import { resetAllRateLimits } from '@/services/rateLimit.service';

vi.mock('@/db/client', async () => (await import('../../helpers/pglite')).createTestDatabase());

describe('Subdomain API', () => {
  let alice: string;
  let themeId: string;

  beforeEach(async () => {
    await resetDatabase();
    resetAllRateLimits();
    alice = await signUp('alice');
    themeId = await insertTheme(await userUuid('alice'));
  });

  async function post(body: Record<string, unknown>): Promise<string> {
    const res = await request('/v1/posts/alice-blog/post', { method: 'POST', body, cookie: alice });
    return (await res.json()).url_extension;
  }

  test('should return the page title, theme and posts', async () => {
    await createCorna(alice, 'alice-blog', { title: 'Notes', theme_uuid: themeId });
    const ext = await post({
      type: 'text',
      title: 'Hello',
      content: 'Hi',
      inner_html: '<p>Hi<script>alert(1)</script></p>',
    });

    const res = await request('/subdomain/alice-blog');

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      title: 'Notes',
      theme: 'paper/index.html',
      posts: [
        {
          uuid: expect.any(String),
          href: ext,
          created: expect.any(String),
          type: 'text',
          domain_name: 'alice-blog',
          title: 'Hello',
          content: '<p>Hi</p>',
        },
      ],
    });
  });

  test('should give picture posts download URLs and a caption', async () => {
    await createCorna(alice, 'alice-blog', { title: 'Notes', theme_uuid: themeId });
    await insertMedia('img00001');
    const ext = await post({ type: 'picture', uploaded_images: ['img00001'] });

    const res = await request(`/subdomain/alice-blog/fragment/${ext}`);

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      uuid: expect.any(String),
      href: ext,
      created: expect.any(String),
      type: 'picture',
      domain_name: 'alice-blog',
      title: null,
      caption: null,
      images: ['https://api.mycorna.com/v1/media/download/img00001'],
    });
  });

  test('should 404 an unknown post', async () => {
    await createCorna(alice, 'alice-blog', { title: 'Notes', theme_uuid: themeId });

    const res = await request('/subdomain/alice-blog/fragment/nothing1');

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: { code: 'NOT_FOUND', message: 'Post does not exist.' } });
  });

  test('should leave deleted posts off the page', async () => {
    await createCorna(alice, 'alice-blog', { title: 'Notes', theme_uuid: themeId });
    const gone = await post({ type: 'text', content: 'First' });
    const kept = await post({ type: 'text', content: 'Second' });
    await markPostDeleted(gone);

    const res = await request('/subdomain/alice-blog');

    expect(res.status).toBe(200);
    const body = await res.json();
    expect(body.posts.map((p: { href: string }) => p.href)).toEqual([kept]);
  });

  test('should 404 the fragment of a deleted post', async () => {
    await createCorna(alice, 'alice-blog', { title: 'Notes', theme_uuid: themeId });
    const ext = await post({ type: 'text', content: 'Gone soon' });
    await markPostDeleted(ext);

    const res = await request(`/subdomain/alice-blog/fragment/${ext}`);

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: { code: 'NOT_FOUND', message: 'Post does not exist.' } });
  });

  test('should 404 a post that belongs to another Corna', async () => {
    await createCorna(alice, 'alice-blog', { title: 'Notes', theme_uuid: themeId });
    const bob = await signUp('bob');
    await createCorna(bob, 'bob-blog', { title: 'Bob' });
    const res1 = await request('/v1/posts/bob-blog/post', {
      method: 'POST',
      body: { type: 'text', content: 'Mine' },
      cookie: bob,
    });
    const bobExt = (await res1.json()).url_extension;

    const res = await request(`/subdomain/alice-blog/fragment/${bobExt}`);

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: { code: 'NOT_FOUND', message: 'Post does not exist.' } });
    expect((await request(`/subdomain/bob-blog/fragment/${bobExt}`)).status).toBe(200);
  });

  test('should 404 an unknown Corna', async () => {
    const res = await request('/subdomain/nowhere');

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({
      error: { code: 'NOT_FOUND', message: 'No Corna with the domain nowhere found.' },
    });
  });

  test('should 404 a Corna without a theme', async () => {
    await createCorna(alice, 'alice-blog', { title: 'Bare' });

    const res = await request('/subdomain/alice-blog');

    expect(res.status).toBe(404);
    expect((await res.json()).error.message).toBe('No theme found for Corna');
  });

  describe('private Cornas', () => {
    beforeEach(async () => {
      await createCorna(alice, 'alice-blog', { title: 'Secret', theme_uuid: themeId, permissions: [] });
    });

    test('should hide the page from anonymous visitors', async () => {
      const res = await request('/subdomain/alice-blog');

      expect(res.status).toBe(401);
      expect(await res.json()).toEqual({
        error: { code: 'UNAUTHORIZED', message: 'User unauthorized to view this Corna' },
      });
    });

    test('should show the page to its owner', async () => {
      const res = await request('/subdomain/alice-blog', { cookie: alice });

      expect(res.status).toBe(200);
      expect((await res.json()).title).toBe('Secret');
    });

    test('should show the page to holders of a read role', async () => {
      const bob = await signUp('bob');
      expect((await request('/subdomain/alice-blog', { cookie: bob })).status).toBe(401);

      await request('/v1/roles', {
        method: 'POST',
        body: { domain_name: 'alice-blog', name: 'friends', permissions: ['read'] },
        cookie: alice,
      });
      await request('/v1/roles/give', {
        method: 'POST',
        body: { domain_name: 'alice-blog', name: 'friends', username: 'bob' },
        cookie: alice,
      });

      expect((await request('/subdomain/alice-blog', { cookie: bob })).status).toBe(200);
    });
  });
});
