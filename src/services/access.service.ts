/**
 * Access Checks
 *
 * A user may perform an action on a Corna when they own it, when the
 * Corna's public mask grants it, or when one of their roles there does.
 * Anonymous callers only get the public mask.
 */

import { and, eq, sql } from 'drizzle-orm';
import { db } from '@/db/client';
import { roles, roleUserMap, users, type Corna } from '@/db/schema';
import { getCornaByDomain } from '@/services/corna.service';
import { CORNA_PERMISSIONS, type PermissionName } from '@/services/permissions';

async function ownerUsername(cornaRow: Corna): Promise<string | null> {
  const [owner] = await db
    .select({ username: users.username })
    .from(users)
    .where(eq(users.uuid, cornaRow.userUuid))
    .limit(1);
  return owner?.username ?? null;
}

async function hasRoleWith(cornaRow: Corna, username: string, bit: number): Promise<boolean> {
  const [match] = await db
    .select({ uuid: roles.uuid })
    .from(roles)
    .innerJoin(roleUserMap, eq(roleUserMap.roleId, roles.uuid))
    .innerJoin(users, eq(users.uuid, roleUserMap.userId))
    .where(
      and(
        eq(roles.cornaUuid, cornaRow.uuid),
        eq(users.username, username),
        sql`(${roles.permissions} & ${bit}::bigint) <> 0`
      )
    )
    .limit(1);
  return match !== undefined;
}

async function allows(
  domainName: string,
  username: string | undefined,
  permission: PermissionName
): Promise<boolean> {
  const cornaRow = await getCornaByDomain(domainName);
  if (!cornaRow) return false;

  const bit = CORNA_PERMISSIONS[permission];
  if ((cornaRow.permissions & bit) !== 0) return true;
  if (!username) return false;

  if ((await ownerUsername(cornaRow)) === username) return true;
  return hasRoleWith(cornaRow, username, bit);
}

export async function isOwner(domainName: string, username?: string): Promise<boolean> {
  if (!username) return false;
  const cornaRow = await getCornaByDomain(domainName);
  if (!cornaRow) return false;
  return (await ownerUsername(cornaRow)) === username;
}

export function canRead(domainName: string, username?: string): Promise<boolean> {
  return allows(domainName, username, 'read');
}

export function canWrite(domainName: string, username?: string): Promise<boolean> {
  return allows(domainName, username, 'write');
}

export function canChangePermissions(domainName: string, username?: string): Promise<boolean> {
  return allows(domainName, username, 'change_permissions');
}
