/**
 * Signed Session Cookies
 *
 * Token layout (before base64url encoding):
 *
 *   <expiry ISO-8601> || <message> || <base64url HMAC-SHA256(key, message)>
 *
 * The signing key is HMAC-SHA256(secret) updated with the salt, so rotating
 * either value invalidates every outstanding cookie.
 */

import crypto from 'crypto';
import { getSessionSecrets, getSessionTtlDays } from '@/utils/config';
import { constantTimeCompare } from '@/utils/crypto';
import { logger } from '@/utils/logger';

const SEPARATOR = '||';
const DAY_MS = 24 * 60 * 60 * 1000;

export class BadSignatureError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BadSignatureError';
  }
}

export interface UnsignedToken {
  expiry: string;
  message: string;
  mac: string;
}

function signingKey(): Buffer {
  const { secret, salt } = getSessionSecrets();
  return crypto.createHmac('sha256', secret).update(salt).digest();
}

function mac(message: string): string {
  return crypto.createHmac('sha256', signingKey()).update(message).digest('base64url');
}

/** Expiry instant for a cookie issued now. */
export function cookieExpiry(now: Date = new Date()): Date {
  return new Date(now.getTime() + getSessionTtlDays() * DAY_MS);
}

export function sign(message: string, expiresAt: Date = cookieExpiry()): string {
  const payload = [expiresAt.toISOString(), message, mac(message)].join(SEPARATOR);
  return Buffer.from(payload, 'utf8').toString('base64url');
}

/**
 * Split a token into its parts without checking the MAC
 *
 * @throws BadSignatureError when the layout is wrong
 */
export function unsign(token: string): UnsignedToken {
  const decoded = Buffer.from(token, 'base64url').toString('utf8');
  if (!decoded.includes(SEPARATOR)) {
    throw new BadSignatureError(`no ${SEPARATOR} found in signature`);
  }

  const parts = decoded.split(SEPARATOR);
  if (parts.length !== 3) {
    throw new BadSignatureError('signature has the wrong number of parts');
  }

  const [expiry, message, signature] = parts;
  return { expiry, message, mac: signature };
}

export function verify(message: string, signature: string): boolean {
  return constantTimeCompare(mac(message), signature);
}

export function isExpired(expiry: string, now: Date = new Date()): boolean {
  const expiresAt = Date.parse(expiry);
  return Number.isNaN(expiresAt) || now.getTime() > expiresAt;
}

/**
 * Message carried by a token, or null when the token is malformed,
 * tampered with or expired
 */
export function readSigned(token: string): string | null {
  try {
    const { expiry, message, mac: signature } = unsign(token);
    if (!verify(message, signature) || isExpired(expiry)) {
      return null;
    }
    return message;
  } catch (error) {
    if (error instanceof BadSignatureError) {
      logger.warn('Rejected malformed session cookie', { reason: error.message });
      return null;
    }
    throw error;
  }
}

export function isValid(token: string): boolean {
  return readSigned(token) !== null;
}
