/**
 * Cryptographic Utilities
 *
 * Token generation, password hashing, content fingerprints and
 * constant-time comparison
 */

import crypto from 'crypto';
import * as argon2 from 'argon2';
import { logger } from '@/utils/logger';

const SHORT_STRING_ALPHABET = 'abcdefghijklmnopqrstuvwxyz0123456789';

/**
 * Generate a URL-safe session token
 *
 * @returns 43 base64url chars (32 random bytes)
 */
export function generateSessionToken(): string {
  return crypto.randomBytes(32).toString('base64url');
}

/**
 * Short lowercase alphanumeric string used for post and media URL extensions.
 * Not unique on its own; pair with generateUniqueToken.
 */
export function randomShortString(length = 8): string {
  let out = '';
  for (let i = 0; i < length; i++) {
    out += SHORT_STRING_ALPHABET[crypto.randomInt(SHORT_STRING_ALPHABET.length)];
  }
  return out;
}

export class UniqueTokenError extends Error {
  constructor() {
    super('Unable to generate unique token');
    this.name = 'UniqueTokenError';
  }
}

/**
 * Draw tokens from `generate` until `isTaken` reports a free one
 *
 * @param isTaken - Lookup against the column the token will be stored in
 * @param generate - Token source (session token by default)
 * @param tries - Attempts before giving up
 */
export async function generateUniqueToken(
  isTaken: (token: string) => Promise<boolean>,
  generate: () => string = generateSessionToken,
  tries = 10
): Promise<string> {
  for (let attempt = 0; attempt < tries; attempt++) {
    const token = generate();
    if (!(await isTaken(token))) {
      return token;
    }
    logger.warn('Generated duplicate token, trying again', { attempt });
  }
  throw new UniqueTokenError();
}

/**
 * Hash a password with argon2id
 */
export async function hashPassword(password: string): Promise<string> {
  return argon2.hash(password, { type: argon2.argon2id });
}

/**
 * Check a password against its stored argon2 hash.
 * A malformed stored hash counts as a mismatch.
 */
export async function verifyPassword(hash: string, password: string): Promise<boolean> {
  try {
    return await argon2.verify(hash, password);
  } catch (error) {
    logger.error('Password verification failed', { error: String(error) });
    return false;
  }
}

/**
 * md5 fingerprint of file contents (hex, 32 chars)
 */
export function md5Hex(data: Uint8Array): string {
  return crypto.createHash('md5').update(data).digest('hex');
}

/**
 * Random 128-bit hex string for files we do not fingerprint (video etc.)
 */
export function randomHash(): string {
  return crypto.randomBytes(16).toString('hex');
}

/**
 * Constant-time comparison
 *
 * Prevents timing attacks by ensuring comparison
 * takes the same time regardless of where inputs differ.
 */
export function constantTimeCompare(a: Uint8Array | string, b: Uint8Array | string): boolean {
  const bufA = typeof a === 'string' ? Buffer.from(a, 'utf8') : Buffer.from(a);
  const bufB = typeof b === 'string' ? Buffer.from(b, 'utf8') : Buffer.from(b);

  // Length check is not timing-safe, but needed for timingSafeEqual
  if (bufA.length !== bufB.length) {
    crypto.timingSafeEqual(bufA, bufA);
    return false;
  }

  return crypto.timingSafeEqual(bufA, bufB);
}
