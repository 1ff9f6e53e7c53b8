/**
 * Database Connection Pool
 *
 * Manages PostgreSQL connections using the `postgres` driver
 * with Drizzle ORM for type-safe queries.
 */

import postgres from 'postgres';
import { drizzle } from 'drizzle-orm/postgres-js';
import * as schema from './schema';

// Get database URL from environment
const DATABASE_URL = process.env.DATABASE_URL;

if (!DATABASE_URL) {
  throw new Error('DATABASE_URL environment variable is required');
}

// Single pool shared by every request
export const sql = postgres(DATABASE_URL, {
  max: process.env.DB_POOL_SIZE ? parseInt(process.env.DB_POOL_SIZE) : 20, // Maximum number of connections in pool
  idle_timeout: 20, // Close idle connections after 20 seconds
  connect_timeout: 10, // Timeout for establishing connection
  ssl: process.env.NODE_ENV === 'production' ? 'require' : false,
});

// Create Drizzle instance with schema
export const db = drizzle(sql, { schema });

export type Database = typeof db;

/**
 * Either the pool or an open transaction; services accept both so
 * multi-step writes can share one transaction.
 */
export type Executor = Database | Parameters<Parameters<Database['transaction']>[0]>[0];

/**
 * Close the database connection pool
 * Used during graceful shutdown
 */
export async function closeDatabase(): Promise<void> {
  await sql.end();
}
