/**
 * Role Service
 *
 * Named permission masks scoped to a Corna and handed to users. Every
 * mutation needs the change_permissions permission on that Corna. Role
 * names are stored and looked up lower-cased.
 */

import crypto from 'crypto';
import { and, asc, eq, sql } from 'drizzle-orm';
import { db } from '@/db/client';
import { roles, roleUserMap, users, type Role } from '@/db/schema';
import { getCornaByDomain, requireCorna } from '@/services/corna.service';
import { canChangePermissions } from '@/services/access.service';
import { getUserByUsername } from '@/services/user.service';
import {
  addPerm,
  createRole as buildMask,
  permissionBit,
  permissionList,
  removePerm,
  type PermissionName,
} from '@/services/permissions';
import { BadRequestError, NotFoundError, UnauthorizedActionError } from '@/errors/appError';
import { logger } from '@/utils/logger';

const log = logger.child({ scope: 'roles' });

export function normalizeRoleName(name: string): string {
  return name.toLowerCase();
}

async function findRole(cornaUuid: string, name: string): Promise<Role | null> {
  const [row] = await db
    .select()
    .from(roles)
    .where(and(eq(roles.cornaUuid, cornaUuid), eq(roles.name, normalizeRoleName(name))))
    .limit(1);
  return row ?? null;
}

/**
 * Throw unless the actor may change permissions on the Corna
 */
async function authorize(domainName: string, actor: string, verb: string): Promise<void> {
  if (!(await canChangePermissions(domainName, actor))) {
    log.warn('Unauthorized role change attempt', { actor, domainName, verb });
    throw new UnauthorizedActionError(`User can not ${verb}`);
  }
}

async function requireRole(domainName: string, name: string, message: string): Promise<Role> {
  const cornaRow = await getCornaByDomain(domainName);
  const role = cornaRow ? await findRole(cornaRow.uuid, name) : null;
  if (!role) {
    throw new BadRequestError(message);
  }
  return role;
}

export async function newRole(
  actor: string,
  actorUuid: string,
  domainName: string,
  name: string,
  permissions: string[]
): Promise<void> {
  const cornaRow = await getCornaByDomain(domainName);
  if (!cornaRow) {
    throw new BadRequestError('Corna does not exist');
  }

  await authorize(domainName, actor, 'create a role');

  if (await findRole(cornaRow.uuid, name)) {
    throw new BadRequestError('Duplicate roles are not permitted');
  }

  await db.insert(roles).values({
    uuid: crypto.randomUUID(),
    name: normalizeRoleName(name),
    permissions: buildMask(permissions),
    creatorUuid: actorUuid,
    cornaUuid: cornaRow.uuid,
  });

  log.info('Role created', { domainName, name: normalizeRoleName(name) });
}

/**
 * Replace a role's whole permission mask
 */
export async function updateRole(
  actor: string,
  domainName: string,
  name: string,
  permissions: string[]
): Promise<void> {
  await authorize(domainName, actor, 'update a role');
  const role = await requireRole(domainName, name, 'Role not found');

  await db
    .update(roles)
    .set({ permissions: buildMask(permissions) })
    .where(eq(roles.uuid, role.uuid));

  log.info('Role permissions replaced', { domainName, name: role.name });
}

export async function deleteRole(actor: string, domainName: string, name: string): Promise<void> {
  await authorize(domainName, actor, 'delete a role');

  const cornaRow = await getCornaByDomain(domainName);
  if (!cornaRow) return;

  // role_user_map rows go with the role (ON DELETE CASCADE)
  await db
    .delete(roles)
    .where(and(eq(roles.cornaUuid, cornaRow.uuid), eq(roles.name, normalizeRoleName(name))));

  log.info('Role deleted', { domainName, name: normalizeRoleName(name) });
}

export async function addPermission(
  actor: string,
  domainName: string,
  name: string,
  permission: string
): Promise<void> {
  await authorize(domainName, actor, 'add permission to role');
  const role = await requireRole(domainName, name, 'Role not found');

  await db
    .update(roles)
    .set({ permissions: addPerm(role.permissions, permission) })
    .where(eq(roles.uuid, role.uuid));

  log.info('Permission added to role', { domainName, name: role.name, permission });
}

export async function removePermission(
  actor: string,
  domainName: string,
  name: string,
  permission: string
): Promise<void> {
  await authorize(domainName, actor, 'remove permission from role');
  const role = await requireRole(domainName, name, 'Role not found');

  await db
    .update(roles)
    .set({ permissions: removePerm(role.permissions, permission) })
    .where(eq(roles.uuid, role.uuid));

  log.info('Permission removed from role', { domainName, name: role.name, permission });
}

export async function giveRole(
  actor: string,
  domainName: string,
  name: string,
  username: string
): Promise<void> {
  await authorize(domainName, actor, 'give a role');

  const user = await getUserByUsername(username);
  if (!user) {
    throw new BadRequestError(`User with username ${username} does not exist`);
  }

  const role = await requireRole(domainName, name, `Role named ${name} not found`);

  await db
    .insert(roleUserMap)
    .values({ roleId: role.uuid, userId: user.uuid })
    .onConflictDoNothing();

  log.info('Role given', { domainName, name: role.name, username });
}

export async function takeRole(
  actor: string,
  domainName: string,
  name: string,
  username: string
): Promise<void> {
  await authorize(domainName, actor, 'take a role');

  const cornaRow = await getCornaByDomain(domainName);
  const user = await getUserByUsername(username);
  const role = cornaRow ? await findRole(cornaRow.uuid, name) : null;

  if (user && role) {
    await db
      .delete(roleUserMap)
      .where(and(eq(roleUserMap.roleId, role.uuid), eq(roleUserMap.userId, user.uuid)));
  }

  log.info('Attempted to take role', { domainName, name: normalizeRoleName(name), username });
}

export async function cornaRoles(domainName: string): Promise<{ corna: string; roles: string[] }> {
  const cornaRow = await requireCorna(domainName);
  const rows = await db
    .select({ name: roles.name })
    .from(roles)
    .where(eq(roles.cornaUuid, cornaRow.uuid))
    .orderBy(asc(roles.name));

  return { corna: domainName, roles: rows.map((row) => row.name) };
}

export async function rolePermissions(
  domainName: string,
  name: string
): Promise<{ corna: string; name: string; permissions: PermissionName[] }> {
  const cornaRow = await getCornaByDomain(domainName);
  const role = cornaRow ? await findRole(cornaRow.uuid, name) : null;
  if (!role) {
    throw new NotFoundError(`No role named ${name} on Corna ${domainName}`);
  }

  return { corna: domainName, name: role.name, permissions: permissionList(role.permissions) };
}

export async function roleUsers(
  domainName: string,
  name: string
): Promise<{ corna: string; name: string; users: string[] }> {
  const cornaRow = await requireCorna(domainName);
  const rows = await db
    .select({ username: users.username })
    .from(roleUserMap)
    .innerJoin(roles, eq(roles.uuid, roleUserMap.roleId))
    .innerJoin(users, eq(users.uuid, roleUserMap.userId))
    .where(and(eq(roles.cornaUuid, cornaRow.uuid), eq(roles.name, normalizeRoleName(name))))
    .orderBy(asc(users.username));

  return { corna: domainName, name: normalizeRoleName(name), users: rows.map((row) => row.username) };
}

export async function userRoles(
  domainName: string,
  username: string
): Promise<{ username: string; corna: string; roles: string[] }> {
  const cornaRow = await requireCorna(domainName);
  const rows = await db
    .select({ name: roles.name })
    .from(roleUserMap)
    .innerJoin(roles, eq(roles.uuid, roleUserMap.roleId))
    .innerJoin(users, eq(users.uuid, roleUserMap.userId))
    .where(and(eq(roles.cornaUuid, cornaRow.uuid), eq(users.username, username)))
    .orderBy(asc(roles.name));

  return { username, corna: domainName, roles: rows.map((row) => row.name) };
}

/**
 * Users holding a role on the Corna that grants the permission
 */
export async function usersWithPermission(
  domainName: string,
  permission: string
): Promise<{ corna: string; permission: string; users: string[] }> {
  const bit = permissionBit(permission);
  if (bit === null) {
    throw new BadRequestError(`Unknown permission ${permission}`);
  }

  const cornaRow = await requireCorna(domainName);
  const rows = await db
    .selectDistinct({ username: users.username })
    .from(roleUserMap)
    .innerJoin(roles, eq(roles.uuid, roleUserMap.roleId))
    .innerJoin(users, eq(users.uuid, roleUserMap.userId))
    .where(
      and(
        eq(roles.cornaUuid, cornaRow.uuid),
        sql`(${roles.permissions} & ${bit}::bigint) = ${bit}::bigint`
      )
    )
    .orderBy(asc(users.username));

  return { corna: domainName, permission: permission.toLowerCase(), users: rows.map((row) => row.username) };
}
