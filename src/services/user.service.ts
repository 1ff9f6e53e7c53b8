/**
 * User Service
 *
 * Profile card data, avatars, and the roles a user has handed out.
 */

import crypto from 'crypto';
import { and, asc, eq } from 'drizzle-orm';
import { db } from '@/db/client';
import { corna, media, roles, users, type User } from '@/db/schema';
import { downloadUrl } from '@/services/media.service';
import { BadRequestError, NotLoggedInError } from '@/errors/appError';
import { logger } from '@/utils/logger';

export interface UserDetails {
  username: string;
  cred: number;
  role: string;
  avatar: string | null;
}

export async function getUserByUsername(username: string): Promise<User | null> {
  const [row] = await db.select().from(users).where(eq(users.username, username)).limit(1);
  return row ?? null;
}

/**
 * Card details for the logged-in user. `cred` is a placeholder score.
 */
export async function getUserDetails(userUuid: string): Promise<UserDetails> {
  const [row] = await db
    .select({ username: users.username, avatarSlug: media.urlExtension })
    .from(users)
    .leftJoin(media, eq(media.uuid, users.avatar))
    .where(eq(users.uuid, userUuid))
    .limit(1);

  if (!row) {
    throw new NotLoggedInError();
  }

  return {
    username: row.username,
    cred: crypto.randomInt(1, 701),
    role: 'adventurer',
    avatar: row.avatarSlug ? downloadUrl(row.avatarSlug) : null,
  };
}

/**
 * Point the user's avatar at an uploaded avatar-type media file
 */
export async function setAvatar(userUuid: string, slug: string): Promise<void> {
  const [file] = await db
    .select({ uuid: media.uuid })
    .from(media)
    .where(and(eq(media.urlExtension, slug), eq(media.type, 'avatar')))
    .limit(1);

  if (!file) {
    throw new BadRequestError('Avatar not found');
  }

  await db.update(users).set({ avatar: file.uuid }).where(eq(users.uuid, userUuid));
  logger.info('Avatar updated', { userUuid, slug });
}

/**
 * Roles the user created, with the Corna each belongs to
 */
export async function rolesCreatedBy(
  userUuid: string
): Promise<{ roles: Array<{ domain_name: string; name: string }> }> {
  const rows = await db
    .select({ domain_name: corna.domainName, name: roles.name })
    .from(roles)
    .innerJoin(corna, eq(corna.uuid, roles.cornaUuid))
    .where(eq(roles.creatorUuid, userUuid))
    .orderBy(asc(roles.created), asc(roles.name));

  return { roles: rows };
}
