/**
 * Apply src/db/init.sql to DATABASE_URL
 *
 * Usage: npm run db:init
 */

import 'dotenv/config';
import fs from 'fs/promises';
import { fileURLToPath } from 'url';
import postgres from 'postgres';
import { logger } from '@/utils/logger';

const INIT_SQL = fileURLToPath(new URL('../db/init.sql', import.meta.url));

async function main(): Promise<void> {
  const url = process.env.DATABASE_URL;
  if (!url) {
    throw new Error('DATABASE_URL environment variable is required');
  }

  const sql = postgres(url, { max: 1 });
  try {
    const ddl = await fs.readFile(INIT_SQL, 'utf8');
    await sql.unsafe(ddl);
    logger.info('Database schema applied', { file: INIT_SQL });
  } finally {
    await sql.end();
  }
}

main().catch((error) => {
  logger.error('Database initialisation failed', { error: String(error) });
  process.exit(1);
});
