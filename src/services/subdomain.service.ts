/**
 * Subdomain View
 *
 * Everything a theme needs to render a Corna's page: its title, the
 * theme template path and the live posts.
 */

import { and, eq } from 'drizzle-orm';
import { db } from '@/db/client';
import { posts, type Corna } from '@/db/schema';
import { getCornaByDomain } from '@/services/corna.service';
import { canRead } from '@/services/access.service';
import { bundlePosts, listLivePosts, type PostBundle } from '@/services/post.service';
import { downloadUrl } from '@/services/media.service';
import { getTheme } from '@/services/theme.service';
import { NotFoundError, UnauthorizedActionError } from '@/errors/appError';
import { logger } from '@/utils/logger';

export interface SubdomainPost {
  uuid: string;
  href: string;
  created: string;
  type: string;
  domain_name: string;
  title: string | null;
  content?: string | null;
  caption?: string | null;
  images?: string[];
}

export interface SubdomainPage {
  title: string | null;
  theme: string | null;
  posts: SubdomainPost[];
}

/**
 * Load the Corna a viewer is allowed to see
 *
 * @throws NotFoundError when no Corna uses the domain
 * @throws UnauthorizedActionError when the viewer lacks read access
 */
async function viewableCorna(domainName: string, viewer?: string): Promise<Corna> {
  const cornaRow = await getCornaByDomain(domainName);
  if (!cornaRow) {
    logger.warn('No corna for subdomain', { domainName });
    throw new NotFoundError(`No Corna with the domain ${domainName} found.`);
  }

  if (!(await canRead(domainName, viewer))) {
    throw new UnauthorizedActionError('User unauthorized to view this Corna');
  }

  return cornaRow;
}

export function toSubdomainPost(domainName: string, bundle: PostBundle): SubdomainPost {
  const { post, text, mediaSlugs } = bundle;
  const fragment = text?.innerHtml ? text.innerHtml : null;

  const parsed: SubdomainPost = {
    uuid: post.uuid,
    href: post.urlExtension,
    created: post.created.toISOString(),
    type: post.type,
    domain_name: domainName,
    title: text?.title ? text.title : null,
  };

  if (post.type === 'text') {
    parsed.content = fragment;
  } else {
    parsed.caption = fragment;
  }

  if (post.type === 'picture' || mediaSlugs.length > 0) {
    parsed.images = mediaSlugs.map(downloadUrl);
  }

  return parsed;
}

export async function buildPage(domainName: string, viewer?: string): Promise<SubdomainPage> {
  const cornaRow = await viewableCorna(domainName, viewer);

  const theme = cornaRow.theme ? await getTheme(cornaRow.theme) : null;
  if (!theme) {
    throw new NotFoundError('No theme found for Corna');
  }

  const bundles = await listLivePosts(cornaRow.uuid);
  return {
    title: cornaRow.title || null,
    theme: theme.path,
    posts: bundles.map((bundle) => toSubdomainPost(domainName, bundle)),
  };
}

export async function singlePost(
  domainName: string,
  urlExtension: string,
  viewer?: string
): Promise<SubdomainPost> {
  const cornaRow = await viewableCorna(domainName, viewer);

  const rows = await db
    .select()
    .from(posts)
    .where(
      and(
        eq(posts.urlExtension, urlExtension),
        eq(posts.cornaUuid, cornaRow.uuid),
        eq(posts.deleted, false)
      )
    )
    .limit(1);

  if (rows.length === 0) {
    logger.warn('Post missing on corna', { domainName, urlExtension });
    throw new NotFoundError('Post does not exist.');
  }

  const [bundle] = await bundlePosts(rows);
  return toSubdomainPost(domainName, bundle);
}
