/**
 * Test Database Helpers
 *
 * Utilities for managing test database lifecycle:
 * - Truncate every table between tests
 * - Test data factories
 */

import crypto from 'crypto';
import { eq, sql } from 'drizzle-orm';
import { db } from '@/db/client';
import { media, posts, themes, users } from '@/db/schema';

export async function resetDatabase(): Promise<void> {
  await db.execute(sql`
    TRUNCATE role_user_map, roles, sessions, corna, text_content, posts,
             media, images, themes, users, emails CASCADE
  `);
}

export async function userUuid(username: string): Promise<string> {
  const [row] = await db.select({ uuid: users.uuid }).from(users).where(eq(users.username, username));
  if (!row) {
    throw new Error(`No user named ${username}`);
  }
  return row.uuid;
}

export async function markPostDeleted(urlExtension: string): Promise<void> {
  await db.update(posts).set({ deleted: true }).where(eq(posts.urlExtension, urlExtension));
}

/**
 * Insert a media row without touching the disk
 */
export async function insertMedia(
  slug: string,
  type = 'image',
  relativePath = `image/${slug}.png`
): Promise<string> {
  const uuid = crypto.randomUUID();
  await db.insert(media).values({
    uuid,
    urlExtension: slug,
    path: relativePath,
    size: 4,
    type,
    orphaned: true,
  });
  return uuid;
}

/**
 * Insert a merged theme owned by the given user
 */
export async function insertTheme(
  creatorUuid: string,
  name = 'paper',
  themePath: string | null = 'paper/index.html'
): Promise<string> {
  const uuid = crypto.randomUUID();
  await db.insert(themes).values({
    uuid,
    name,
    path: themePath,
    status: themePath ? 'merged' : 'unknown',
    creatorUserId: creatorUuid,
  });
  return uuid;
}
