/**
 * Role Validation Schemas
 */

import { z } from 'zod';
import { domainNameSchema } from './common';

/** Path segments of the role query routes; a role so named could not be looked up. */
export const RESERVED_ROLE_NAMES = ['user', 'permission'] as const;

const roleName = z
  .string()
  .trim()
  .min(1)
  .max(64)
  .refine((name) => !RESERVED_ROLE_NAMES.some((reserved) => reserved === name.toLowerCase()), {
    message: 'Role name is reserved',
  });

/**
 * DELETE /v1/roles
 */
export const roleNameSchema = z.object({
  domain_name: domainNameSchema,
  name: roleName,
});

/**
 * POST /v1/roles, PUT /v1/roles
 */
export const roleSchema = roleNameSchema.extend({
  permissions: z.array(z.string()),
});

/**
 * PUT /v1/roles/permissions/add, PUT /v1/roles/permissions/remove
 */
export const rolePermissionSchema = roleNameSchema.extend({
  permission: z.string().min(1),
});

/**
 * POST /v1/roles/give, POST /v1/roles/take
 */
export const roleUserSchema = roleNameSchema.extend({
  username: z.string().min(1),
});

export const roleParamSchema = z.object({
  domain_name: domainNameSchema,
  role: roleName,
});

export const userRolesParamSchema = z.object({
  domain_name: domainNameSchema,
  username: z.string().min(1),
});

export const permissionParamSchema = z.object({
  domain_name: domainNameSchema,
  permission: z.string().min(1),
});
