/**
 * Chunked Upload Service
 *
 * Large files arrive as numbered pieces staged on disk:
 *
 *   CHUNK_DIR/<uploadId>/parts/000000.part
 *   CHUNK_DIR/<uploadId>/parts/000001.part
 *   CHUNK_DIR/<uploadId>/meta.json      { received: number[], totalChunks }
 *   CHUNK_DIR/<uploadId>/.merge.lock    present while a merge runs
 *
 * Parts and metadata are written atomically, so a retried chunk simply
 * replaces the earlier copy.
 */

import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { getChunkDir, getMaxBlobSize } from '@/utils/config';
import { atomicWrite } from '@/services/storage.service';
import { uploadMedia, type UploadResponse } from '@/services/media.service';
import type { MediaType } from '@/utils/media';
import {
  ConflictError,
  MergeError,
  NotFoundError,
  PayloadTooLargeError,
  UploadMetadataError,
} from '@/errors/appError';
import { logger } from '@/utils/logger';

const log = logger.child({ scope: 'chunks' });

const META_FILE = 'meta.json';
const LOCK_FILE = '.merge.lock';
const PARTS_DIR = 'parts';

export const UPLOAD_ID_PATTERN = /^[A-Za-z0-9_-]{1,128}$/;

const uploadMetaSchema = z.object({
  received: z.array(z.number().int().nonnegative()),
  totalChunks: z.number().int().positive(),
});

export type UploadMeta = z.infer<typeof uploadMetaSchema>;

export interface ChunkResult {
  message: string;
  received: number;
  total: number;
  uploadId: string;
}

export interface UploadStatus {
  complete: boolean;
  message: string;
}

function uploadDir(uploadId: string): string {
  return path.join(getChunkDir(), uploadId);
}

export function partFilename(index: number): string {
  return `${String(index).padStart(6, '0')}.part`;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function isExistingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'EEXIST';
}

/**
 * Read an upload's metadata
 *
 * @returns null when the upload has no metadata yet
 * @throws UploadMetadataError when the file is unreadable or malformed
 */
export async function readMeta(uploadId: string): Promise<UploadMeta | null> {
  let raw: string;
  try {
    raw = await fs.readFile(path.join(uploadDir(uploadId), META_FILE), 'utf8');
  } catch (error) {
    if (isMissingFile(error)) return null;
    log.error('Unable to read upload metadata', { uploadId, error: String(error) });
    throw new UploadMetadataError();
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    log.error('Upload metadata is not JSON', { uploadId, error: String(error) });
    throw new UploadMetadataError();
  }

  const result = uploadMetaSchema.safeParse(parsed);
  if (!result.success) {
    log.error('Upload metadata has the wrong shape', { uploadId, issues: result.error.issues });
    throw new UploadMetadataError();
  }
  return result.data;
}

/**
 * Count the parts still needed, ignoring indexes outside the current total
 */
export function missingChunks(meta: UploadMeta): number {
  const present = meta.received.filter((index) => index < meta.totalChunks).length;
  return meta.totalChunks - present;
}

/**
 * Record a received chunk index
 */
async function updateMeta(uploadId: string, chunkIndex: number, totalChunks: number): Promise<UploadMeta> {
  const existing = await readMeta(uploadId);
  const received = new Set(existing?.received ?? []);
  received.add(chunkIndex);

  const meta: UploadMeta = {
    received: [...received].sort((a, b) => a - b),
    totalChunks,
  };
  await atomicWrite(path.join(uploadDir(uploadId), META_FILE), JSON.stringify(meta), '.json.tmp');
  return meta;
}

/**
 * Stage one chunk of an upload
 */
export async function processChunk(
  chunk: Uint8Array,
  chunkIndex: number,
  totalChunks: number,
  uploadId: string
): Promise<ChunkResult> {
  const partsDir = path.join(uploadDir(uploadId), PARTS_DIR);
  await fs.mkdir(partsDir, { recursive: true });
  await atomicWrite(path.join(partsDir, partFilename(chunkIndex)), chunk, '.part.tmp');

  const meta = await updateMeta(uploadId, chunkIndex, totalChunks);
  const missing = missingChunks(meta);
  const received = totalChunks - missing;
  const complete = missing === 0;

  log.debug('Chunk stored', { uploadId, chunkIndex, received, totalChunks });

  return {
    message: complete ? 'upload complete' : `chunk ${chunkIndex} stored`,
    received,
    total: totalChunks,
    uploadId,
  };
}

export async function uploadStatus(uploadId: string): Promise<UploadStatus> {
  const meta = await readMeta(uploadId);
  if (!meta) {
    throw new NotFoundError('No upload being processed');
  }

  const missing = missingChunks(meta);
  return missing > 0
    ? { complete: false, message: `${missing} chunks missing` }
    : { complete: true, message: 'upload complete' };
}

async function stagedSize(uploadId: string, partsDir: string, totalChunks: number): Promise<number> {
  let total = 0;
  for (let i = 0; i < totalChunks; i++) {
    try {
      const stats = await fs.stat(path.join(partsDir, partFilename(i)));
      total += stats.size;
    } catch (error) {
      log.error('Staged part is unreadable', { uploadId, index: i, error: String(error) });
      throw new MergeError(uploadId, { cause: error });
    }
  }
  return total;
}

async function concatParts(uploadId: string, partsDir: string, totalChunks: number): Promise<Uint8Array> {
  const parts: Buffer[] = [];
  for (let i = 0; i < totalChunks; i++) {
    try {
      parts.push(await fs.readFile(path.join(partsDir, partFilename(i))));
    } catch (error) {
      log.error('Staged part is unreadable', { uploadId, index: i, error: String(error) });
      throw new MergeError(uploadId, { cause: error });
    }
  }
  return Buffer.concat(parts);
}

/**
 * Assemble the staged parts while holding the merge lock
 *
 * @throws ConflictError when another merge holds the lock
 * @throws MergeError when a staged part cannot be read
 */
async function assemble(uploadId: string, totalChunks: number): Promise<Uint8Array> {
  const baseDir = uploadDir(uploadId);
  const partsDir = path.join(baseDir, PARTS_DIR);
  const size = await stagedSize(uploadId, partsDir, totalChunks);
  if (size > getMaxBlobSize()) {
    log.error('Merged upload exceeds size limit', { uploadId, size });
    throw new PayloadTooLargeError('File too large for processing');
  }

  const lockPath = path.join(baseDir, LOCK_FILE);
  let lock: fs.FileHandle;
  try {
    lock = await fs.open(lockPath, 'wx');
  } catch (error) {
    if (isExistingFile(error)) {
      throw new ConflictError('Merge in progress');
    }
    throw new MergeError(uploadId, { cause: error });
  }

  try {
    await lock.close();
    return await concatParts(uploadId, partsDir, totalChunks);
  } finally {
    await fs.rm(lockPath, { force: true });
  }
}

/**
 * Remove every staged artefact of an upload
 */
export async function cleanChunks(uploadId: string): Promise<void> {
  await fs.rm(uploadDir(uploadId), { recursive: true, force: true });
  log.info('Removed upload staging directory', { uploadId });
}

/**
 * Merge a completed upload and store it like a single-file upload
 */
export async function mergeUpload(
  uploadId: string,
  filename: string,
  contentType: MediaType
): Promise<UploadResponse> {
  const meta = await readMeta(uploadId);
  if (!meta) {
    throw new NotFoundError(`No upload associated with Id '${uploadId}'`);
  }

  const missing = missingChunks(meta);
  if (missing > 0) {
    throw new ConflictError(`Incomplete file, ${missing} chunks missing`);
  }

  log.info('Merging chunks', { uploadId, totalChunks: meta.totalChunks });
  const data = await assemble(uploadId, meta.totalChunks);

  const response = await uploadMedia({ data, filename, type: contentType });
  await cleanChunks(uploadId);
  return response;
}
