/**
 * Media Service
 *
 * Single-file uploads, downloads (with byte ranges for video) and the
 * avatar picker.
 */

import crypto from 'crypto';
import { eq } from 'drizzle-orm';
import { db } from '@/db/client';
import { images, media, type Media } from '@/db/schema';
import { removeMediaFile, resolveStoredFile, saveMediaFile } from '@/services/storage.service';
import { getApiBaseUrl } from '@/utils/config';
import { generateUniqueToken, md5Hex, randomHash, randomShortString } from '@/utils/crypto';
import { aspectRatio, isAllowedFile, isImage, mimeTypeFor, type MediaType } from '@/utils/media';
import { IllegalFileTypeError, NotFoundError } from '@/errors/appError';
import { logger } from '@/utils/logger';

export interface UploadResponse {
  id: string;
  filename: string;
  mime_type: string | null;
  size: number;
  url_extension: string;
  aspect_ratio?: string;
}

export interface UploadInput {
  data: Uint8Array;
  filename: string;
  type: MediaType;
  width?: number;
  height?: number;
}

async function mediaSlugTaken(candidate: string): Promise<boolean> {
  const [row] = await db
    .select({ uuid: media.uuid })
    .from(media)
    .where(eq(media.urlExtension, candidate))
    .limit(1);
  return row !== undefined;
}

/**
 * Identical images share a path, so only drop a file no media row points at
 */
async function discardUntrackedFile(relativePath: string): Promise<void> {
  const [tracked] = await db
    .select({ uuid: media.uuid })
    .from(media)
    .where(eq(media.path, relativePath))
    .limit(1);
  if (!tracked) {
    await removeMediaFile(relativePath);
  }
}

/**
 * Store an uploaded file and record it as orphaned media
 *
 * @throws IllegalFileTypeError for extensions outside the allowed lists
 * @throws StorageError when the file cannot be written
 */
export async function uploadMedia(input: UploadInput): Promise<UploadResponse> {
  if (!isAllowedFile(input.filename)) {
    logger.warn('Rejected upload with illegal file type', { filename: input.filename });
    throw new IllegalFileTypeError();
  }

  const fingerprinted = isImage(input.filename);
  const hash = fingerprinted ? md5Hex(input.data) : randomHash();

  const urlExtension = await generateUniqueToken(mediaSlugTaken, () => randomShortString(8));
  const relativePath = await saveMediaFile(input.data, input.type, hash, input.filename);
  const uuid = crypto.randomUUID();

  try {
    await db.transaction(async (tx) => {
      let imageUuid: string | null = null;
      if (fingerprinted) {
        imageUuid = crypto.randomUUID();
        await tx.insert(images).values({ uuid: imageUuid, hash });
      }

      await tx.insert(media).values({
        uuid,
        urlExtension,
        path: relativePath,
        size: input.data.byteLength,
        type: input.type,
        orphaned: true,
        imageUuid,
      });
    });
  } catch (error) {
    logger.error('Unable to record upload', { urlExtension, error: String(error) });
    await discardUntrackedFile(relativePath);
    throw error;
  }

  logger.info('Media uploaded', { urlExtension, type: input.type, size: input.data.byteLength });

  const response: UploadResponse = {
    id: uuid,
    filename: input.filename,
    mime_type: mimeTypeFor(input.filename),
    size: input.data.byteLength,
    url_extension: urlExtension,
  };

  if (input.width !== undefined && input.height !== undefined && input.height > 0) {
    response.aspect_ratio = aspectRatio(input.height, input.width);
  }

  return response;
}

export async function getMediaBySlug(slug: string): Promise<Media | null> {
  const [row] = await db.select().from(media).where(eq(media.urlExtension, slug)).limit(1);
  return row ?? null;
}

export interface DownloadTarget {
  path: string;
  size: number;
  mimeType: string;
  isVideo: boolean;
}

/**
 * Locate the file behind a media slug
 *
 * @throws NotFoundError when the slug is unknown or the file is gone
 */
export async function getDownload(slug: string): Promise<DownloadTarget> {
  const row = await getMediaBySlug(slug);
  if (!row) {
    throw new NotFoundError('File not found');
  }

  const stored = await resolveStoredFile(row.path);
  if (!stored) {
    throw new NotFoundError('File not found');
  }

  return {
    path: stored.path,
    size: stored.size,
    mimeType: mimeTypeFor(row.path) ?? 'application/octet-stream',
    isVideo: row.type === 'video',
  };
}

/**
 * Parse `Range: bytes=start-end?`
 *
 * @returns Inclusive byte range with end clamped to the file, or null when
 *   the header is absent or not a byte range
 */
export function parseRange(header: string | undefined, size: number): { start: number; end: number } | null {
  if (!header) return null;

  const match = /^bytes=(\d+)-(\d*)$/.exec(header.trim());
  if (!match) {
    logger.warn('Ignoring malformed Range header', { header });
    return null;
  }

  const start = parseInt(match[1], 10);
  const end = match[2] ? Math.min(parseInt(match[2], 10), size - 1) : size - 1;
  return { start, end };
}

export function downloadUrl(slug: string): string {
  return `${getApiBaseUrl()}/v1/media/download/${slug}`;
}

export async function randomAvatar(): Promise<{ url: string; slug: string }> {
  const avatars = await db
    .select({ urlExtension: media.urlExtension })
    .from(media)
    .where(eq(media.type, 'avatar'));

  if (avatars.length === 0) {
    throw new NotFoundError('No avatars available');
  }

  const pick = avatars[crypto.randomInt(avatars.length)];
  return { url: downloadUrl(pick.urlExtension), slug: pick.urlExtension };
}
