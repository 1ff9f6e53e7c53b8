/**
 * Runtime Configuration
 *
 * Environment-backed settings. Getters read process.env on every call so
 * tests (and long-running workers) pick up directory overrides.
 */

import path from 'path';

export const SESSION_COOKIE_NAME = 'corna-sesh';

const DEFAULT_API_BASE_URL = 'https://api.mycorna.com';
const DEFAULT_SESSION_TTL_DAYS = 14;
const DEFAULT_MAX_BLOB_SIZE = 100 * 1024 * 1024;

function requireEnv(name: string): string {
  const value = process.env[name];
  if (!value) {
    throw new Error(`${name} environment variable is required`);
  }
  return value;
}

function positiveInt(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw) return fallback;
  const parsed = parseInt(raw, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

export function getApiBaseUrl(): string {
  return (process.env.API_BASE_URL || DEFAULT_API_BASE_URL).replace(/\/+$/, '');
}

export function getSessionTtlDays(): number {
  return positiveInt('SESSION_TTL_DAYS', DEFAULT_SESSION_TTL_DAYS);
}

export function getSessionSecrets(): { secret: string; salt: string } {
  return {
    secret: requireEnv('SESSION_SECRET'),
    salt: requireEnv('SESSION_SALT'),
  };
}

/** Root of all stored media; database rows hold paths relative to it. */
export function getPictureDir(): string {
  return path.resolve(requireEnv('PICTURE_DIR'));
}

/** Staging area for chunked uploads, always inside the picture dir. */
export function getChunkDir(): string {
  return path.join(getPictureDir(), 'chunks');
}

export function getThemesDir(): string {
  return path.resolve(requireEnv('THEMES_DIR'));
}

export function getMaxBlobSize(): number {
  return positiveInt('MAX_BLOB_SIZE', DEFAULT_MAX_BLOB_SIZE);
}

export function isProduction(): boolean {
  return process.env.NODE_ENV === 'production';
}
