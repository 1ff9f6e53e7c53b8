/**
 * Media Storage Service
 *
 * Writes uploaded bytes below PICTURE_DIR. Database rows keep only the
 * path relative to PICTURE_DIR so the directory can move between hosts.
 */

import fs from 'fs/promises';
import path from 'path';
import { getPictureDir } from '@/utils/config';
import { hashToDir, secureFilename } from '@/utils/media';
import { StorageError } from '@/errors/appError';
import { logger } from '@/utils/logger';

const log = logger.child({ scope: 'storage' });

/**
 * Write a file atomically: temp file first, then rename over the target
 */
export async function atomicWrite(
  target: string,
  data: Uint8Array | string,
  tmpSuffix = '.tmp'
): Promise<void> {
  const tmpPath = `${target}${tmpSuffix}`;
  await fs.writeFile(tmpPath, data);
  await fs.rename(tmpPath, target);
}

/**
 * Save media bytes under {bucket}/{hash dirs}/{safe filename}
 *
 * @returns Path relative to PICTURE_DIR
 * @throws StorageError when the name is unusable or the write fails
 */
export async function saveMediaFile(
  data: Uint8Array,
  bucket: string,
  hash: string,
  filename: string
): Promise<string> {
  const safeName = secureFilename(filename);
  if (!safeName) {
    log.error('File needs a usable name to be saved', { filename });
    throw new StorageError();
  }

  const relativeDir = `${bucket}/${hashToDir(hash)}`;
  const directory = path.join(getPictureDir(), relativeDir);

  try {
    await fs.mkdir(directory, { recursive: true });
    await atomicWrite(path.join(directory, safeName), data);
  } catch (error) {
    log.error('Unable to write media file', { directory, filename: safeName, error: String(error) });
    throw new StorageError('Unable to save file', { cause: error });
  }

  return `${relativeDir}/${safeName}`;
}

/**
 * Delete a stored file; a file already gone is not an error
 */
export async function removeMediaFile(relativePath: string): Promise<void> {
  await fs.rm(path.join(getPictureDir(), relativePath), { force: true });
  log.info('Removed media file', { relativePath });
}

/**
 * Absolute path of a stored file, or null when it is no longer on disk
 */
export async function resolveStoredFile(
  relativePath: string
): Promise<{ path: string; size: number } | null> {
  const root = getPictureDir();
  const fullPath = path.resolve(root, relativePath);
  if (!fullPath.startsWith(root + path.sep)) {
    log.warn('Stored media path escapes the picture directory', { relativePath });
    return null;
  }

  try {
    const stats = await fs.stat(fullPath);
    return stats.isFile() ? { path: fullPath, size: stats.size } : null;
  } catch (error) {
    log.warn('Stored media file missing', { relativePath, error: String(error) });
    return null;
  }
}

export const READ_BLOCK_BYTES = 8192;

/**
 * Stream bytes [start, end] (inclusive) of a file in fixed-size blocks
 */
export function fileRangeStream(
  filePath: string,
  start: number,
  end: number,
  blockSize = READ_BLOCK_BYTES
): ReadableStream<Uint8Array> {
  let handle: fs.FileHandle | null = null;
  let position = start;

  return new ReadableStream<Uint8Array>({
    async start() {
      handle = await fs.open(filePath, 'r');
    },
    async pull(controller) {
      if (!handle) {
        controller.close();
        return;
      }

      const remaining = end - position + 1;
      if (remaining <= 0) {
        await handle.close();
        handle = null;
        controller.close();
        return;
      }

      const buffer = Buffer.alloc(Math.min(blockSize, remaining));
      const { bytesRead } = await handle.read(buffer, 0, buffer.length, position);
      if (bytesRead === 0) {
        await handle.close();
        handle = null;
        controller.close();
        return;
      }

      position += bytesRead;
      controller.enqueue(buffer.subarray(0, bytesRead));
    },
    async cancel() {
      if (handle) {
        await handle.close();
        handle = null;
      }
    },
  });
}
