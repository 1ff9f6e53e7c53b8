/**
 * Post Service
 *
 * Creating posts on a Corna and listing them back out. A post is a row in
 * `posts`, an optional `text_content` row, and any pre-uploaded media that
 * gets linked to it.
 */

import crypto from 'crypto';
import { and, asc, eq, inArray } from 'drizzle-orm';
import { db, type Executor } from '@/db/client';
import { media, posts, textContent, type Post, type TextContent } from '@/db/schema';
import { requireCorna } from '@/services/corna.service';
import { canWrite } from '@/services/access.service';
import { cleanHtml } from '@/utils/html';
import { getApiBaseUrl } from '@/utils/config';
import { generateUniqueToken, randomShortString } from '@/utils/crypto';
import { BadRequestError, UnauthorizedActionError } from '@/errors/appError';
import { logger } from '@/utils/logger';

export const POST_TYPES = ['text', 'picture'] as const;
export type PostType = (typeof POST_TYPES)[number];

export function isPostType(value: string): value is PostType {
  return POST_TYPES.some((known) => known === value);
}

export interface CreatePostInput {
  type: string;
  title?: string;
  content?: string;
  innerHtml?: string;
  uploadedImages: string[];
}

export interface TextPostView {
  type: 'text';
  created: string;
  post_url: string;
  content: string | null;
  title?: string;
  image_urls?: string[];
}

export interface PicturePostView {
  type: 'picture';
  created: string;
  post_url: string;
  image_urls: string[];
  title?: string;
  caption?: string;
}

export type PostView = TextPostView | PicturePostView;

/**
 * Public URL of a post or one of its images
 */
export function buildPostUrl(extension: string, domainName: string, kind: string): string {
  return `${getApiBaseUrl()}/v1/posts/${domainName}/${kind}/${extension}`;
}

async function urlExtensionTaken(candidate: string): Promise<boolean> {
  const [row] = await db
    .select({ uuid: posts.uuid })
    .from(posts)
    .where(eq(posts.urlExtension, candidate))
    .limit(1);
  return row !== undefined;
}

/**
 * Attach orphaned uploads to a post
 *
 * @throws BadRequestError when a slug is unknown or already linked
 */
async function linkMedia(tx: Executor, postUuid: string, slugs: string[]): Promise<void> {
  for (const slug of slugs) {
    const [file] = await tx
      .select({ uuid: media.uuid, orphaned: media.orphaned })
      .from(media)
      .where(eq(media.urlExtension, slug))
      .limit(1);

    if (!file || !file.orphaned) {
      throw new BadRequestError('Unable to find file');
    }

    await tx
      .update(media)
      .set({ postUuid, orphaned: false })
      .where(eq(media.uuid, file.uuid));
  }
}

/**
 * Create a post on a Corna
 *
 * @returns The new post's url extension
 */
export async function createPost(
  domainName: string,
  username: string,
  userUuid: string,
  input: CreatePostInput
): Promise<string> {
  const cornaRow = await requireCorna(domainName);

  if (!(await canWrite(domainName, username))) {
    logger.warn('Post creation refused', { domainName, username });
    throw new UnauthorizedActionError('User unauthorized to create posts');
  }

  const { type } = input;
  if (!isPostType(type)) {
    throw new BadRequestError(`${type} is not a valid type of content`);
  }
  if (type === 'text' && !input.content) {
    throw new BadRequestError('Text post needs text');
  }
  if (type === 'picture' && input.uploadedImages.length === 0) {
    throw new BadRequestError('Photo post needs images');
  }

  const innerHtml = input.innerHtml ? cleanHtml(input.innerHtml) : null;
  const urlExtension = await generateUniqueToken(urlExtensionTaken, () => randomShortString(8));
  const postUuid = crypto.randomUUID();

  await db.transaction(async (tx) => {
    await tx.insert(posts).values({
      uuid: postUuid,
      urlExtension,
      type,
      cornaUuid: cornaRow.uuid,
      userUuid,
    });

    if (input.title || input.content) {
      await tx.insert(textContent).values({
        uuid: crypto.randomUUID(),
        title: input.title ?? null,
        content: input.content ?? null,
        innerHtml,
        postUuid,
      });
    }

    await linkMedia(tx, postUuid, input.uploadedImages);
  });

  logger.info('Post created', { domainName, urlExtension, type });
  return urlExtension;
}

/**
 * A post together with its text and linked media
 */
export interface PostBundle {
  post: Post;
  text: TextContent | null;
  mediaSlugs: string[];
}

/**
 * Load text and media for a set of posts, preserving their order
 */
export async function bundlePosts(rows: Post[]): Promise<PostBundle[]> {
  if (rows.length === 0) return [];

  const ids = rows.map((row) => row.uuid);
  const texts = await db.select().from(textContent).where(inArray(textContent.postUuid, ids));
  const files = await db
    .select({ postUuid: media.postUuid, urlExtension: media.urlExtension })
    .from(media)
    .where(inArray(media.postUuid, ids))
    .orderBy(asc(media.created), asc(media.urlExtension));

  const textByPost = new Map<string, TextContent>();
  for (const text of texts) {
    if (text.postUuid) textByPost.set(text.postUuid, text);
  }

  const slugsByPost = new Map<string, string[]>();
  for (const file of files) {
    if (!file.postUuid) continue;
    const slugs = slugsByPost.get(file.postUuid) ?? [];
    slugs.push(file.urlExtension);
    slugsByPost.set(file.postUuid, slugs);
  }

  return rows.map((post) => ({
    post,
    text: textByPost.get(post.uuid) ?? null,
    mediaSlugs: slugsByPost.get(post.uuid) ?? [],
  }));
}

/**
 * Live posts of a Corna, oldest first
 */
export async function listLivePosts(cornaUuid: string): Promise<PostBundle[]> {
  const rows = await db
    .select()
    .from(posts)
    .where(and(eq(posts.cornaUuid, cornaUuid), eq(posts.deleted, false)))
    .orderBy(asc(posts.created), asc(posts.urlExtension));
  return bundlePosts(rows);
}

function toView(domainName: string, bundle: PostBundle): PostView {
  const { post, text, mediaSlugs } = bundle;
  const imageUrls = mediaSlugs.map((slug) => buildPostUrl(slug, domainName, 'image'));
  const base = {
    created: post.created.toISOString(),
    post_url: buildPostUrl(post.urlExtension, domainName, post.type),
  };

  if (post.type === 'picture') {
    const view: PicturePostView = { type: 'picture', ...base, image_urls: imageUrls };
    if (text?.title) view.title = text.title;
    if (text?.content) view.caption = text.content;
    return view;
  }

  const view: TextPostView = { type: 'text', ...base, content: text?.content ?? null };
  if (text?.title) view.title = text.title;
  if (imageUrls.length > 0) view.image_urls = imageUrls;
  return view;
}

export async function getPosts(domainName: string): Promise<{ posts: PostView[] }> {
  const cornaRow = await requireCorna(domainName);
  const bundles = await listLivePosts(cornaRow.uuid);
  return { posts: bundles.map((bundle) => toView(domainName, bundle)) };
}
