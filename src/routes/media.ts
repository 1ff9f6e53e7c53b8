/**
 * Media Routes
 *
 * Routes:
 * - POST /v1/media/upload
 * - GET  /v1/media/download/:url_extension
 * - GET  /v1/media/avatar
 * - POST /v1/media/chunk/upload
 * - GET  /v1/media/chunk/status/:uploadId
 * - POST /v1/media/chunk/merge
 */

import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import type { HonoEnv } from '@/types/hono';
import { requireLogin } from '@/middleware/auth';
import { throwOnInvalid } from '@/validators/common';
import {
  chunkFormSchema,
  mergeSchema,
  slugParamSchema,
  uploadFormSchema,
  uploadIdParamSchema,
} from '@/validators/media';
import { getDownload, parseRange, randomAvatar, uploadMedia } from '@/services/media.service';
import { mergeUpload, processChunk, uploadStatus } from '@/services/chunk.service';
import { fileRangeStream } from '@/services/storage.service';
import { BadRequestError } from '@/errors/appError';

const mediaRoutes = new Hono<HonoEnv>();

/**
 * POST /v1/media/upload
 *
 * Multipart form: image, type, width?, height?
 */
mediaRoutes.post('/upload', requireLogin, zValidator('form', uploadFormSchema, throwOnInvalid), async (c) => {
  const form = c.req.valid('form');
  if (!form.image) {
    throw new BadRequestError('Media file required');
  }

  const response = await uploadMedia({
    data: new Uint8Array(await form.image.arrayBuffer()),
    filename: form.image.name,
    type: form.type,
    width: form.width,
    height: form.height,
  });

  return c.json(response, 201);
});

/**
 * GET /v1/media/download/:url_extension
 *
 * Videos honour `Range: bytes=start-end` and answer 206.
 */
mediaRoutes.get('/download/:url_extension', zValidator('param', slugParamSchema, throwOnInvalid), async (c) => {
  const { url_extension } = c.req.valid('param');
  const target = await getDownload(url_extension);

  const range = target.isVideo ? parseRange(c.req.header('Range'), target.size) : null;
  if (range) {
    if (range.start >= target.size || range.start > range.end) {
      c.header('Content-Range', `bytes */${target.size}`);
      return c.json(
        {
          error: {
            code: 'RANGE_NOT_SATISFIABLE',
            message: 'Requested range not satisfiable',
          },
        },
        416
      );
    }

    return c.body(fileRangeStream(target.path, range.start, range.end), 206, {
      'Content-Type': target.mimeType,
      'Content-Range': `bytes ${range.start}-${range.end}/${target.size}`,
      'Accept-Ranges': 'bytes',
      'Content-Length': String(range.end - range.start + 1),
    });
  }

  return c.body(fileRangeStream(target.path, 0, target.size - 1), 200, {
    'Content-Type': target.mimeType,
    'Content-Length': String(target.size),
    ...(target.isVideo ? { 'Accept-Ranges': 'bytes' } : {}),
  });
});

/**
 * GET /v1/media/avatar
 */
mediaRoutes.get('/avatar', async (c) => {
  return c.json(await randomAvatar());
});

/**
 * POST /v1/media/chunk/upload
 *
 * Multipart form: chunk, chunkIndex, totalChunks, uploadId
 */
mediaRoutes.post('/chunk/upload', requireLogin, zValidator('form', chunkFormSchema, throwOnInvalid), async (c) => {
  const form = c.req.valid('form');
  const result = await processChunk(
    new Uint8Array(await form.chunk.arrayBuffer()),
    form.chunkIndex,
    form.totalChunks,
    form.uploadId
  );
  return c.json(result, 201);
});

/**
 * GET /v1/media/chunk/status/:uploadId
 */
mediaRoutes.get('/chunk/status/:uploadId', zValidator('param', uploadIdParamSchema, throwOnInvalid), async (c) => {
  const { uploadId } = c.req.valid('param');
  return c.json(await uploadStatus(uploadId));
});

/**
 * POST /v1/media/chunk/merge
 */
mediaRoutes.post('/chunk/merge', requireLogin, zValidator('json', mergeSchema, throwOnInvalid), async (c) => {
  const { filename, uploadId, contentType } = c.req.valid('json');
  return c.json(await mergeUpload(uploadId, filename, contentType), 201);
});

export default mediaRoutes;
