/**
 * Theme Service
 *
 * Themes are template files under THEMES_DIR. A theme is listed once it has
 * been merged, which needs a valid template path.
 */

import crypto from 'crypto';
import fs from 'fs/promises';
import path from 'path';
import { and, asc, eq } from 'drizzle-orm';
import { db } from '@/db/client';
import { media, themes, users, type Theme } from '@/db/schema';
import { getUserByUsername } from '@/services/user.service';
import { downloadUrl } from '@/services/media.service';
import { getThemesDir } from '@/utils/config';
import { fileExtension } from '@/utils/media';
import { BadRequestError, UnauthorizedActionError } from '@/errors/appError';
import { logger } from '@/utils/logger';

export const THEME_STATUSES = ['unknown', 'merged'] as const;
export type ThemeStatus = (typeof THEME_STATUSES)[number];

const THEME_FILE_EXTENSIONS = ['html', 'css', 'js'];

export interface CreateThemeInput {
  creator: string;
  name: string;
  description?: string;
  path?: string;
  thumbnail?: string;
}

export interface UpdateThemeStatusInput {
  creator: string;
  name: string;
  path?: string;
  status: ThemeStatus;
}

export interface ThemeListing {
  id: string;
  name: string;
  description: string | null;
  thumbnail: string | null;
  creator: string;
}

async function isFileInside(root: string, candidate: string): Promise<boolean> {
  const resolved = path.resolve(root, candidate);
  if (!resolved.startsWith(root + path.sep)) {
    return false;
  }
  try {
    return (await fs.stat(resolved)).isFile();
  } catch {
    return false;
  }
}

/**
 * Check a template path against THEMES_DIR
 *
 * @returns The path unchanged, or null when none was given
 * @throws BadRequestError when the file is missing or of the wrong type
 */
export async function sanitizeThemePath(themePath?: string): Promise<string | null> {
  if (!themePath) return null;

  if (!(await isFileInside(getThemesDir(), themePath))) {
    throw new BadRequestError('Theme not in directory');
  }

  const ext = fileExtension(themePath);
  if (ext === null || !THEME_FILE_EXTENSIONS.includes(ext)) {
    logger.error('Incorrect theme file type', { path: themePath });
    throw new BadRequestError('Incorrect file type');
  }

  return themePath;
}

async function requireCreator(username: string): Promise<string> {
  const user = await getUserByUsername(username);
  if (!user) {
    throw new UnauthorizedActionError('Theme creator does not exist');
  }
  return user.uuid;
}

async function findTheme(creatorUuid: string, name: string): Promise<Theme | null> {
  const [row] = await db
    .select()
    .from(themes)
    .where(and(eq(themes.creatorUserId, creatorUuid), eq(themes.name, name)))
    .limit(1);
  return row ?? null;
}

/**
 * Register a theme
 *
 * @returns The new theme id
 */
export async function addTheme(input: CreateThemeInput): Promise<string> {
  const creatorUuid = await requireCreator(input.creator);

  if (await findTheme(creatorUuid, input.name)) {
    throw new BadRequestError('Theme already exists');
  }

  const themePath = await sanitizeThemePath(input.path);

  let thumbnailUuid: string | null = null;
  if (input.thumbnail) {
    const [file] = await db
      .select({ uuid: media.uuid })
      .from(media)
      .where(eq(media.urlExtension, input.thumbnail))
      .limit(1);
    if (!file) {
      throw new BadRequestError('Thumbnail not found');
    }
    thumbnailUuid = file.uuid;
  }

  const uuid = crypto.randomUUID();
  await db.insert(themes).values({
    uuid,
    name: input.name,
    description: input.description ?? null,
    path: themePath,
    status: themePath ? 'merged' : 'unknown',
    creatorUserId: creatorUuid,
    thumbnail: thumbnailUuid,
  });

  logger.info('Theme added', { name: input.name, creator: input.creator });
  return uuid;
}

export async function updateThemeStatus(input: UpdateThemeStatusInput): Promise<void> {
  const creatorUuid = await requireCreator(input.creator);

  const theme = await findTheme(creatorUuid, input.name);
  if (!theme) {
    throw new BadRequestError('No theme exists matching given details');
  }

  const themePath = await sanitizeThemePath(input.path);
  if (!themePath && input.status === 'merged') {
    throw new BadRequestError('Cannot set status to merged without valid path');
  }

  await db
    .update(themes)
    .set(themePath ? { status: input.status, path: themePath } : { status: input.status })
    .where(eq(themes.uuid, theme.uuid));

  logger.info('Theme status updated', { name: theme.name, from: theme.status, to: input.status });
}

export async function getTheme(uuid: string): Promise<Theme | null> {
  const [row] = await db.select().from(themes).where(eq(themes.uuid, uuid)).limit(1);
  return row ?? null;
}

/**
 * Merged themes available for a Corna to pick
 */
export async function listThemes(): Promise<{ themes: ThemeListing[] }> {
  const rows = await db
    .select({
      id: themes.uuid,
      name: themes.name,
      description: themes.description,
      thumbnailSlug: media.urlExtension,
      creator: users.username,
    })
    .from(themes)
    .innerJoin(users, eq(users.uuid, themes.creatorUserId))
    .leftJoin(media, eq(media.uuid, themes.thumbnail))
    .where(eq(themes.status, 'merged'))
    .orderBy(asc(themes.created), asc(themes.name));

  return {
    themes: rows.map(({ thumbnailSlug, ...rest }) => ({
      ...rest,
      thumbnail: thumbnailSlug ? downloadUrl(thumbnailSlug) : null,
    })),
  };
}
