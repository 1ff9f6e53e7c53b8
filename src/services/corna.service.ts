/**
 * Corna Service
 *
 * A user's blog: one per user, addressed by its subdomain.
 */

import crypto from 'crypto';
import { eq } from 'drizzle-orm';
import { db, type Executor } from '@/db/client';
import { corna, textContent, themes, type Corna } from '@/db/schema';
import { createRole, DEFAULT_CORNA_PERMISSIONS } from '@/services/permissions';
import { BadRequestError, NotFoundError } from '@/errors/appError';
import { logger } from '@/utils/logger';

export interface CreateCornaInput {
  title: string;
  aboutMe?: string;
  themeUuid?: string;
  permissions?: string[];
}

export async function getCornaByDomain(
  domainName: string,
  executor: Executor = db
): Promise<Corna | null> {
  const [row] = await executor
    .select()
    .from(corna)
    .where(eq(corna.domainName, domainName))
    .limit(1);
  return row ?? null;
}

/**
 * Like getCornaByDomain, but a missing Corna is an error
 */
export async function requireCorna(
  domainName: string,
  message = 'Corna does not exist'
): Promise<Corna> {
  const row = await getCornaByDomain(domainName);
  if (!row) {
    throw new NotFoundError(message);
  }
  return row;
}

export async function getCornaForUser(userUuid: string): Promise<Corna | null> {
  const [row] = await db
    .select()
    .from(corna)
    .where(eq(corna.userUuid, userUuid))
    .limit(1);
  return row ?? null;
}

export async function isDomainAvailable(domainName: string): Promise<boolean> {
  return (await getCornaByDomain(domainName)) === null;
}

/**
 * Domain of the Corna the user owns
 *
 * @throws NotFoundError when the user has none
 */
export async function getUserCornaDomain(userUuid: string): Promise<string> {
  const row = await getCornaForUser(userUuid);
  if (!row) {
    throw new NotFoundError('User has no corna');
  }
  return row.domainName;
}

/**
 * Create a Corna for a user
 *
 * An omitted permission list gives the public default; an empty list
 * makes the Corna private.
 */
export async function createCorna(
  userUuid: string,
  domainName: string,
  input: CreateCornaInput
): Promise<Corna> {
  if (await getCornaForUser(userUuid)) {
    throw new BadRequestError('User has pre-existing Corna');
  }

  if (!(await isDomainAvailable(domainName))) {
    throw new BadRequestError('Domain name in use');
  }

  if (input.themeUuid) {
    const [theme] = await db
      .select({ uuid: themes.uuid })
      .from(themes)
      .where(eq(themes.uuid, input.themeUuid))
      .limit(1);
    if (!theme) {
      throw new BadRequestError('Theme does not exist');
    }
  }

  const permissions =
    input.permissions === undefined ? DEFAULT_CORNA_PERMISSIONS : createRole(input.permissions);

  const created = await db.transaction(async (tx) => {
    let aboutUuid: string | null = null;
    if (input.aboutMe) {
      aboutUuid = crypto.randomUUID();
      await tx.insert(textContent).values({
        uuid: aboutUuid,
        content: input.aboutMe,
      });
    }

    const [row] = await tx
      .insert(corna)
      .values({
        uuid: crypto.randomUUID(),
        domainName,
        title: input.title,
        userUuid,
        permissions,
        about: aboutUuid,
        theme: input.themeUuid ?? null,
      })
      .returning();
    return row;
  });

  logger.info('Corna created', { domainName, userUuid, permissions });
  return created;
}
