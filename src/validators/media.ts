/**
 * Media Validation Schemas
 */

import { z } from 'zod';
import { MEDIA_TYPES } from '@/utils/media';
import { fileSchema } from './common';

export const mediaTypeSchema = z.enum(MEDIA_TYPES);

export const uploadIdSchema = z.string().regex(/^[A-Za-z0-9_-]{1,128}$/, 'Invalid upload id');

/**
 * POST /v1/media/upload (multipart)
 *
 * The file is optional here so its absence gets a specific message.
 */
export const uploadFormSchema = z.object({
  image: fileSchema.optional(),
  type: mediaTypeSchema,
  width: z.coerce.number().int().positive().optional(),
  height: z.coerce.number().int().positive().optional(),
});

/**
 * POST /v1/media/chunk/upload (multipart)
 */
export const chunkFormSchema = z
  .object({
    chunk: fileSchema,
    chunkIndex: z.coerce.number().int().nonnegative(),
    totalChunks: z.coerce.number().int().positive(),
    uploadId: uploadIdSchema,
  })
  .refine((form) => form.chunkIndex < form.totalChunks, {
    message: 'chunkIndex must be less than totalChunks',
    path: ['chunkIndex'],
  });

/**
 * POST /v1/media/chunk/merge
 */
export const mergeSchema = z.object({
  filename: z.string().min(1).max(255),
  uploadId: uploadIdSchema,
  contentType: mediaTypeSchema,
});

export const uploadIdParamSchema = z.object({
  uploadId: uploadIdSchema,
});

export const slugParamSchema = z.object({
  url_extension: z.string().min(1).max(64),
});
