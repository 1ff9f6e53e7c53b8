/**
 * Chunked Upload API Tests
 */

import { describe, test, expect, beforeAll, afterAll, beforeEach, vi } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { request, signUp } from '../../helpers/app';
import { resetDatabase } from '../../helpers/db';
import { resetAllRateLimits } from '@/services/rateLimit.service';

vi.mock('@/db/client', async () => (await import('../../helpers/pglite')).createTestDatabase());

function chunkForm(contents: string, chunkIndex: number, totalChunks: number, uploadId: string): FormData {
  const form = new FormData();
  form.append('chunk', new File([contents], 'blob'));
  form.append('chunkIndex', String(chunkIndex));
  form.append('totalChunks', String(totalChunks));
  form.append('uploadId', uploadId);
  return form;
}

describe('Chunked Upload API', () => {
  let pictureDir: string;
  let alice: string;

  beforeAll(async () => {
    pictureDir = await fs.mkdtemp(path.join(os.tmpdir(), 'corna-upload-'));
    process.env.PICTURE_DIR = pictureDir;
  });

  afterAll(async () => {
    await fs.rm(pictureDir, { recursive: true, force: true });
  });

  beforeEach(async () => {
    await resetDatabase();
    resetAllRateLimits();
    alice = await signUp('alice');
  });

  function sendChunk(contents: string, chunkIndex: number, totalChunks: number, uploadId: string) {
    return request('/v1/media/chunk/upload', {
      method: 'POST',
      body: chunkForm(contents, chunkIndex, totalChunks, uploadId),
      cookie: alice,
    });
  }

  function merge(uploadId: string, filename = 'movie.mp4', contentType = 'video') {
    return request('/v1/media/chunk/merge', {
      method: 'POST',
      body: { filename, uploadId, contentType },
      cookie: alice,
    });
  }

  test('should stage chunks and report progress', async () => {
    const res = await sendChunk('ab', 0, 2, 'movie-1');

    expect(res.status).toBe(201);
    expect(await res.json()).toEqual({ message: 'chunk 0 stored', received: 1, total: 2, uploadId: 'movie-1' });

    const status = await request('/v1/media/chunk/status/movie-1');
    expect(await status.json()).toEqual({ complete: false, message: '1 chunks missing' });
  });

  test('should merge a complete upload into a media file', async () => {
    await sendChunk('cd', 1, 2, 'movie-2');
    const last = await sendChunk('ab', 0, 2, 'movie-2');
    expect((await last.json()).message).toBe('upload complete');

    const res = await merge('movie-2');

    expect(res.status).toBe(201);
    const body = await res.json();
    expect(body).toEqual({
      id: expect.any(String),
      filename: 'movie.mp4',
      mime_type: 'video/mp4',
      size: 4,
      url_extension: expect.stringMatching(/^[a-z0-9]{8}$/),
    });

    const download = await request(`/v1/media/download/${body.url_extension}`);
    expect(await download.text()).toBe('abcd');

    await expect(fs.stat(path.join(pictureDir, 'chunks', 'movie-2'))).rejects.toThrow();
    const status = await request('/v1/media/chunk/status/movie-2');
    expect(status.status).toBe(404);
  });

  test('should refuse to merge an incomplete upload', async () => {
    await sendChunk('ab', 0, 3, 'movie-3');

    const res = await merge('movie-3');

    expect(res.status).toBe(409);
    expect(await res.json()).toEqual({ error: { code: 'CONFLICT', message: 'Incomplete file, 2 chunks missing' } });
  });

  test('should refuse to merge an unknown upload', async () => {
    const res = await merge('never-started');

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({
      error: { code: 'NOT_FOUND', message: "No upload associated with Id 'never-started'" },
    });
  });

  test('should refuse to merge while another merge runs', async () => {
    await sendChunk('ab', 0, 1, 'movie-4');
    await fs.writeFile(path.join(pictureDir, 'chunks', 'movie-4', '.merge.lock'), '');

    const res = await merge('movie-4');

    expect(res.status).toBe(409);
    expect(await res.json()).toEqual({ error: { code: 'CONFLICT', message: 'Merge in progress' } });
  });

  test('should reject a merged file of an illegal type', async () => {
    await sendChunk('ab', 0, 1, 'movie-5');

    const res = await merge('movie-5', 'movie.exe');

    expect(res.status).toBe(422);
  });

  test('should 404 the status of an unknown upload', async () => {
    const res = await request('/v1/media/chunk/status/unknown');

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: { code: 'NOT_FOUND', message: 'No upload being processed' } });
  });

  test('should validate chunk indexes', async () => {
    const res = await sendChunk('ab', 2, 2, 'movie-6');

    expect(res.status).toBe(400);
    expect((await res.json()).error.code).toBe('VALIDATION_ERROR');
  });

  test('should validate upload ids', async () => {
    const res = await sendChunk('ab', 0, 1, '../escape');

    expect(res.status).toBe(400);
    expect((await res.json()).error.code).toBe('VALIDATION_ERROR');
  });

  test('should require a session to upload', async () => {
    const res = await request('/v1/media/chunk/upload', { method: 'POST', body: chunkForm('ab', 0, 1, 'anon') });

    expect(res.status).toBe(401);
  });
});
