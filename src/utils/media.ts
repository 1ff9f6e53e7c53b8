/**
 * Media Helpers
 *
 * File-type rules, on-disk naming and aspect ratios for uploaded media.
 */

import { getMimeType, mimes } from 'hono/utils/mime';

export const IMAGE_EXTENSIONS = ['gif', 'jpg', 'jpeg', 'png', 'webp'] as const;
export const VIDEO_EXTENSIONS = ['avi', 'flv', 'mkv', 'mp4', 'mov', 'wmv'] as const;

/** Buckets media is filed under; the first path segment on disk. */
export const MEDIA_TYPES = ['image', 'video', 'avatar', 'thumbnail'] as const;
export type MediaType = (typeof MEDIA_TYPES)[number];

/** Lower-cased text after the last dot, or null when there is none. */
export function fileExtension(filename: string): string | null {
  const dot = filename.lastIndexOf('.');
  if (dot === -1 || dot === filename.length - 1) return null;
  return filename.slice(dot + 1).toLowerCase();
}

export function isImage(filename: string): boolean {
  const ext = fileExtension(filename);
  return ext !== null && IMAGE_EXTENSIONS.some((allowed) => allowed === ext);
}

export function isVideo(filename: string): boolean {
  const ext = fileExtension(filename);
  return ext !== null && VIDEO_EXTENSIONS.some((allowed) => allowed === ext);
}

export function isAllowedFile(filename: string): boolean {
  return isImage(filename) || isVideo(filename);
}

const MEDIA_MIMES: Record<string, string> = {
  ...mimes,
  flv: 'video/x-flv',
  mkv: 'video/x-matroska',
  mov: 'video/quicktime',
  wmv: 'video/x-ms-wmv',
};

export function mimeTypeFor(filename: string): string | null {
  return getMimeType(filename.toLowerCase(), MEDIA_MIMES) ?? null;
}

/**
 * Spread files over a balanced directory tree keyed by their hash
 *
 *   b064a10c720babc723728f9ffd58f472 -> b06/4a1/0c7/20babc723728f9ffd58f472
 */
export function hashToDir(hash: string): string {
  return `${hash.slice(0, 3)}/${hash.slice(3, 6)}/${hash.slice(6, 9)}/${hash.slice(9)}`;
}

/**
 * Reduce a client-supplied filename to something safe to put on disk.
 * Returns an empty string when nothing usable is left.
 */
export function secureFilename(filename: string): string {
  const ascii = filename.normalize('NFKD').replace(/[^\x00-\x7f]/g, '');
  const joined = ascii.replace(/[/\\]/g, ' ').trim().split(/\s+/).join('_');
  return joined.replace(/[^A-Za-z0-9_.-]/g, '').replace(/^[._]+|[._]+$/g, '');
}

const COMMON_ASPECT_RATIOS: ReadonlyArray<readonly [number, number]> = [
  [16, 9],
  [4, 3],
  [3, 2],
  [1, 1],
  [21, 9],
  [18, 9],
  [2, 1],
  [5, 4],
  [9, 16],
  [10, 16],
  [9, 18],
  [3, 4],
  [2, 3],
  [1, 2],
  [1, 1.91],
];

function gcd(a: number, b: number): number {
  let x = Math.abs(a);
  let y = Math.abs(b);
  while (y !== 0) {
    [x, y] = [y, x % y];
  }
  return x;
}

/**
 * Aspect ratio as "w/h"
 *
 * Snaps to the nearest common ratio when within `tolerance` (relative error),
 * otherwise returns the reduced width/height fraction.
 */
export function aspectRatio(height: number, width: number, tolerance = 0.02): string {
  if (height === 0) {
    throw new Error('Height cannot be zero');
  }

  const actual = width / height;
  let closest = COMMON_ASPECT_RATIOS[0];
  for (const candidate of COMMON_ASPECT_RATIOS) {
    if (Math.abs(candidate[0] / candidate[1] - actual) < Math.abs(closest[0] / closest[1] - actual)) {
      closest = candidate;
    }
  }

  const error = Math.abs(closest[0] / closest[1] - actual) / actual;
  if (error <= tolerance) {
    return `${closest[0]}/${closest[1]}`;
  }

  const divisor = gcd(width, height);
  return `${width / divisor}/${height / divisor}`;
}
