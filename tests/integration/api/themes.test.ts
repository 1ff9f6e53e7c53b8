/**
 * Themes API Tests
 */

import { describe, test, expect, beforeAll, afterAll, beforeEach, vi } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { request, signUp } from '../../helpers/app';
import { insertMedia, resetDatabase } from '../../helpers/db';
import { resetAllRateLimits } from '@/services/rateLimit.service';

vi.mock('@/db/client', async () => (await import('../../helpers/pglite')).createTestDatabase());

describe('Themes API', () => {
  let themesDir: string;
  let alice: string;

  beforeAll(async () => {
    themesDir = await fs.mkdtemp(path.join(os.tmpdir(), 'corna-themes-'));
    await fs.mkdir(path.join(themesDir, 'paper'));
    await fs.writeFile(path.join(themesDir, 'paper', 'index.html'), '<html></html>');
    await fs.writeFile(path.join(themesDir, 'paper', 'notes.txt'), 'draft');
    process.env.THEMES_DIR = themesDir;
  });

  afterAll(async () => {
    await fs.rm(themesDir, { recursive: true, force: true });
  });

  beforeEach(async () => {
    await resetDatabase();
    resetAllRateLimits();
    alice = await signUp('alice');
  });

  function addTheme(body: Record<string, unknown>) {
    return request('/v1/themes', { method: 'POST', body, cookie: alice });
  }

  function setStatus(body: Record<string, unknown>) {
    return request('/v1/themes/status', { method: 'PUT', body, cookie: alice });
  }

  async function listed() {
    return (await (await request('/v1/themes')).json()).themes;
  }

  describe('POST /v1/themes', () => {
    test('should list a theme added with a template', async () => {
      const res = await addTheme({ creator: 'alice', name: 'Paper', description: 'Plain', path: 'paper/index.html' });

      expect(res.status).toBe(201);
      const { id } = await res.json();
      expect(await listed()).toEqual([{ id, name: 'Paper', description: 'Plain', thumbnail: null, creator: 'alice' }]);
    });

    test('should not list a theme without a template', async () => {
      const res = await addTheme({ creator: 'alice', name: 'Draft' });

      expect(res.status).toBe(201);
      expect(await listed()).toEqual([]);
    });

    test('should link a thumbnail', async () => {
      await insertMedia('thumb001', 'thumbnail');

      await addTheme({ creator: 'alice', name: 'Paper', path: 'paper/index.html', thumbnail: 'thumb001' });

      const [theme] = await listed();
      expect(theme.thumbnail).toBe('https://api.mycorna.com/v1/media/download/thumb001');
    });

    test('should refuse an unknown thumbnail', async () => {
      const res = await addTheme({ creator: 'alice', name: 'Paper', thumbnail: 'missing1' });

      expect(res.status).toBe(400);
      expect((await res.json()).error.message).toBe('Thumbnail not found');
    });

    test('should refuse duplicates', async () => {
      await addTheme({ creator: 'alice', name: 'Paper' });

      const res = await addTheme({ creator: 'alice', name: 'Paper' });

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: { code: 'BAD_REQUEST', message: 'Theme already exists' } });
    });

    test('should refuse an unknown creator', async () => {
      const res = await addTheme({ creator: 'ghost', name: 'Paper' });

      expect(res.status).toBe(401);
      expect(await res.json()).toEqual({ error: { code: 'UNAUTHORIZED', message: 'Theme creator does not exist' } });
    });

    test('should refuse templates outside the themes directory', async () => {
      const outside = await addTheme({ creator: 'alice', name: 'Escape', path: '../secret.html' });
      const missing = await addTheme({ creator: 'alice', name: 'Missing', path: 'paper/missing.html' });

      expect(outside.status).toBe(400);
      expect((await outside.json()).error.message).toBe('Theme not in directory');
      expect((await missing.json()).error.message).toBe('Theme not in directory');
    });

    test('should refuse templates of the wrong type', async () => {
      const res = await addTheme({ creator: 'alice', name: 'Notes', path: 'paper/notes.txt' });

      expect(res.status).toBe(400);
      expect((await res.json()).error.message).toBe('Incorrect file type');
    });

    test('should require a session', async () => {
      const res = await request('/v1/themes', { method: 'POST', body: { creator: 'alice', name: 'Paper' } });

      expect(res.status).toBe(401);
    });
  });

  describe('PUT /v1/themes/status', () => {
    test('should merge a theme once it has a template', async () => {
      await addTheme({ creator: 'alice', name: 'Draft' });

      const res = await setStatus({ creator: 'alice', name: 'Draft', status: 'merged', path: 'paper/index.html' });

      expect(res.status).toBe(204);
      expect((await listed()).map((theme: { name: string }) => theme.name)).toEqual(['Draft']);
    });

    test('should refuse to merge without a template', async () => {
      await addTheme({ creator: 'alice', name: 'Draft' });

      const res = await setStatus({ creator: 'alice', name: 'Draft', status: 'merged' });

      expect(res.status).toBe(400);
      expect((await res.json()).error.message).toBe('Cannot set status to merged without valid path');
    });

    test('should unlist a merged theme', async () => {
      await addTheme({ creator: 'alice', name: 'Paper', path: 'paper/index.html' });

      await setStatus({ creator: 'alice', name: 'Paper', status: 'unknown' });

      expect(await listed()).toEqual([]);
    });

    test('should 400 an unknown theme', async () => {
      const res = await setStatus({ creator: 'alice', name: 'Nothing', status: 'unknown' });

      expect(res.status).toBe(400);
      expect((await res.json()).error.message).toBe('No theme exists matching given details');
    });

    test('should reject unknown statuses', async () => {
      const res = await setStatus({ creator: 'alice', name: 'Paper', status: 'published' });

      expect(res.status).toBe(400);
      expect((await res.json()).error.code).toBe('VALIDATION_ERROR');
    });
  });
});
