import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import {
  cleanChunks,
  mergeUpload,
  missingChunks,
  partFilename,
  processChunk,
  readMeta,
  uploadStatus,
} from '@/services/chunk.service';
import { AppError, ConflictError, MergeError, NotFoundError, PayloadTooLargeError, UploadMetadataError } from '@/errors/appError';

describe('chunk.service staging', () => {
  let pictureDir: string;

  beforeEach(async () => {
    pictureDir = await fs.mkdtemp(path.join(os.tmpdir(), 'corna-chunks-'));
    process.env.PICTURE_DIR = pictureDir;
  });

  afterEach(async () => {
    delete process.env.MAX_BLOB_SIZE;
    await fs.rm(pictureDir, { recursive: true, force: true });
  });

  function stagingDir(uploadId: string): string {
    return path.join(pictureDir, 'chunks', uploadId);
  }

  it('should name parts by zero-padded index', () => {
    expect(partFilename(0)).toBe('000000.part');
    expect(partFilename(42)).toBe('000042.part');
  });

  it('should store parts and track received indexes', async () => {
    const first = await processChunk(Buffer.from('bb'), 1, 3, 'upload-1');
    expect(first).toEqual({ message: 'chunk 1 stored', received: 1, total: 3, uploadId: 'upload-1' });

    await processChunk(Buffer.from('aa'), 0, 3, 'upload-1');

    const stored = await fs.readFile(path.join(stagingDir('upload-1'), 'parts', '000001.part'), 'utf8');
    expect(stored).toBe('bb');
    await expect(readMeta('upload-1')).resolves.toEqual({ received: [0, 1], totalChunks: 3 });
    await expect(uploadStatus('upload-1')).resolves.toEqual({ complete: false, message: '1 chunks missing' });
  });

  it('should report completion on the last chunk', async () => {
    await processChunk(Buffer.from('a'), 0, 2, 'upload-2');
    const last = await processChunk(Buffer.from('b'), 1, 2, 'upload-2');

    expect(last.message).toBe('upload complete');
    await expect(uploadStatus('upload-2')).resolves.toEqual({ complete: true, message: 'upload complete' });
  });

  it('should count a retried chunk once', async () => {
    await processChunk(Buffer.from('old'), 0, 2, 'upload-3');
    const retried = await processChunk(Buffer.from('new'), 0, 2, 'upload-3');

    expect(retried.received).toBe(1);
    const stored = await fs.readFile(path.join(stagingDir('upload-3'), 'parts', '000000.part'), 'utf8');
    expect(stored).toBe('new');
  });

  it('should not leave temp files behind', async () => {
    await processChunk(Buffer.from('a'), 0, 2, 'upload-4');

    const entries = await fs.readdir(path.join(stagingDir('upload-4'), 'parts'));
    expect(entries).toEqual(['000000.part']);
    const top = await fs.readdir(stagingDir('upload-4'));
    expect(top.sort()).toEqual(['meta.json', 'parts']);
  });

  it('should 404 the status of an unknown upload', async () => {
    await expect(uploadStatus('nobody')).rejects.toThrow(NotFoundError);
    await expect(uploadStatus('nobody')).rejects.toThrow('No upload being processed');
  });

  it('should reject malformed metadata', async () => {
    await fs.mkdir(stagingDir('broken'), { recursive: true });
    await fs.writeFile(path.join(stagingDir('broken'), 'meta.json'), '{"received": "nope"}');

    await expect(readMeta('broken')).rejects.toThrow(UploadMetadataError);

    await fs.writeFile(path.join(stagingDir('broken'), 'meta.json'), 'not json');
    await expect(uploadStatus('broken')).rejects.toThrow(UploadMetadataError);
  });

  it('should refuse to merge unknown uploads', async () => {
    await expect(mergeUpload('ghost', 'a.png', 'image')).rejects.toThrow("No upload associated with Id 'ghost'");
  });

  it('should refuse to merge incomplete uploads', async () => {
    await processChunk(Buffer.from('a'), 0, 3, 'partial');

    const merge = mergeUpload('partial', 'a.png', 'image');
    await expect(merge).rejects.toThrow(ConflictError);
    await expect(mergeUpload('partial', 'a.png', 'image')).rejects.toThrow('Incomplete file, 2 chunks missing');
  });

  it('should refuse to merge while another merge holds the lock', async () => {
    await processChunk(Buffer.from('a'), 0, 1, 'locked');
    await fs.writeFile(path.join(stagingDir('locked'), '.merge.lock'), '');

    await expect(mergeUpload('locked', 'a.png', 'image')).rejects.toThrow('Merge in progress');
  });

  it('should refuse to merge uploads over the size limit', async () => {
    process.env.MAX_BLOB_SIZE = '4';
    await processChunk(Buffer.from('abc'), 0, 2, 'huge');
    await processChunk(Buffer.from('def'), 1, 2, 'huge');

    await expect(mergeUpload('huge', 'a.png', 'image')).rejects.toThrow(PayloadTooLargeError);
    const leftovers = await fs.readdir(stagingDir('huge'));
    expect(leftovers).not.toContain('.merge.lock');
  });

  it('should only count indexes inside the current total', () => {
    expect(missingChunks({ received: [0, 2], totalChunks: 2 })).toBe(1);
    expect(missingChunks({ received: [0, 1, 5], totalChunks: 3 })).toBe(1);
    expect(missingChunks({ received: [0, 1], totalChunks: 2 })).toBe(0);
  });

  it('should not report completion when the total shrinks past a gap', async () => {
    await processChunk(Buffer.from('c'), 2, 3, 'shrunk');
    const second = await processChunk(Buffer.from('a'), 0, 2, 'shrunk');

    expect(second).toEqual({ message: 'chunk 0 stored', received: 1, total: 2, uploadId: 'shrunk' });
    await expect(uploadStatus('shrunk')).resolves.toEqual({ complete: false, message: '1 chunks missing' });
    await expect(mergeUpload('shrunk', 'a.png', 'image')).rejects.toThrow('Incomplete file, 1 chunks missing');
  });

  it('should raise a merge error when a staged part disappears', async () => {
    await processChunk(Buffer.from('a'), 0, 2, 'vanished');
    await processChunk(Buffer.from('b'), 1, 2, 'vanished');
    await fs.rm(path.join(stagingDir('vanished'), 'parts', '000001.part'));

    const merge = mergeUpload('vanished', 'a.png', 'image');
    await expect(merge).rejects.toThrow(MergeError);
    await expect(mergeUpload('vanished', 'a.png', 'image')).rejects.toThrow(AppError);
    await expect(mergeUpload('vanished', 'a.png', 'image')).rejects.toThrow(
      "Unable to merge chunks of upload 'vanished'"
    );
  });

  it('should remove the staging directory on cleanup', async () => {
    await processChunk(Buffer.from('a'), 0, 2, 'done');
    await cleanChunks('done');

    await expect(fs.stat(stagingDir('done'))).rejects.toThrow();
    await expect(readMeta('done')).resolves.toBeNull();
  });
});
