/**
 * Corna Permissions
 *
 * Permissions are single bits OR-ed into a mask. A Corna carries a public
 * mask (what anyone may do) and each role carries its own mask.
 */

import { logger } from '@/utils/logger';

export const PERMISSION_NAMES = [
  'read',
  'write',
  'edit',
  'delete',
  'change_theme',
  'change_permissions',
  'comment',
  'like',
  'follow',
] as const;

export type PermissionName = (typeof PERMISSION_NAMES)[number];

export const CORNA_PERMISSIONS: Readonly<Record<PermissionName, number>> = {
  read: 0x1,
  write: 0x2,
  edit: 0x4,
  delete: 0x8,
  change_theme: 0x10,
  change_permissions: 0x20,
  comment: 0x40,
  like: 0x80,
  follow: 0x100,
};

/** Mask applied to a Corna created without an explicit permission list. */
export const DEFAULT_CORNA_PERMISSIONS =
  CORNA_PERMISSIONS.read |
  CORNA_PERMISSIONS.comment |
  CORNA_PERMISSIONS.like |
  CORNA_PERMISSIONS.follow;

export function isPermissionName(name: string): name is PermissionName {
  return PERMISSION_NAMES.some((known) => known === name);
}

/**
 * Bit for a permission name (case-insensitive), or null when unknown
 */
export function permissionBit(name: string): number | null {
  const key = name.toLowerCase();
  return isPermissionName(key) ? CORNA_PERMISSIONS[key] : null;
}

/**
 * Build a mask from permission names; unknown names are skipped
 */
export function createRole(names: readonly string[]): number {
  let mask = 0;
  for (const name of names) {
    const bit = permissionBit(name);
    if (bit === null) {
      logger.warn('Unknown permission ignored', { permission: name });
      continue;
    }
    mask |= bit;
  }
  return mask;
}

/** Every permission name mapped to whether the mask grants it. */
export function perms(mask: number): Record<string, boolean> {
  return Object.fromEntries(
    PERMISSION_NAMES.map((name) => [name, (mask & CORNA_PERMISSIONS[name]) !== 0])
  );
}

/** Granted permission names, in bit order. */
export function permissionList(mask: number): PermissionName[] {
  return PERMISSION_NAMES.filter((name) => (mask & CORNA_PERMISSIONS[name]) !== 0);
}

export function hasPerm(mask: number, name: string): boolean {
  const bit = permissionBit(name);
  return bit !== null && (mask & bit) !== 0;
}

export function addPerm(mask: number, name: string): number {
  const bit = permissionBit(name);
  if (bit === null) {
    logger.warn('No permission with that name', { permission: name });
    return mask;
  }
  return mask | bit;
}

export function removePerm(mask: number, name: string): number {
  const bit = permissionBit(name);
  if (bit === null) {
    logger.warn('No permission with that name', { permission: name });
    return mask;
  }
  return mask & ~bit;
}
