/**
 * Vitest Global Setup
 *
 * Loads environment variables and sets up test configuration
 */

import { config } from 'dotenv';
import { fileURLToPath } from 'url';

// Set NODE_ENV to 'test' BEFORE loading dotenv so the server doesn't start
process.env.NODE_ENV = 'test';

// Load .env.test if it exists
config({ path: fileURLToPath(new URL('../.env.test', import.meta.url)) });

// The pool is created lazily and replaced by PGlite in every suite that queries
if (!process.env.DATABASE_URL) {
  process.env.DATABASE_URL = 'postgresql://localhost:5432/corna_test';
}

process.env.SESSION_SECRET = process.env.SESSION_SECRET || 'test-secret';
process.env.SESSION_SALT = process.env.SESSION_SALT || 'test-salt';
process.env.SESSION_TTL_DAYS = process.env.SESSION_TTL_DAYS || '7';
process.env.API_BASE_URL = process.env.API_BASE_URL || 'https://api.mycorna.com';
process.env.LOG_LEVEL = process.env.LOG_LEVEL || 'error';
