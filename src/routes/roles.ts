/**
 * Role Routes
 *
 * Mutations need login and change_permissions on the Corna; queries are
 * open.
 *
 * Routes:
 * - POST   /v1/roles
 * - PUT    /v1/roles
 * - DELETE /v1/roles
 * - PUT    /v1/roles/permissions/add
 * - PUT    /v1/roles/permissions/remove
 * - POST   /v1/roles/give
 * - POST   /v1/roles/take
 * - GET    /v1/roles/:domain_name
 * - GET    /v1/roles/:domain_name/user/:username
 * - GET    /v1/roles/:domain_name/permission/:permission/users
 * - GET    /v1/roles/:domain_name/:role/permissions
 * - GET    /v1/roles/:domain_name/:role/users
 */

import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import type { HonoEnv } from '@/types/hono';
import { requireLogin, sessionUser } from '@/middleware/auth';
import { domainParamSchema, throwOnInvalid } from '@/validators/common';
import {
  permissionParamSchema,
  roleNameSchema,
  roleParamSchema,
  rolePermissionSchema,
  roleSchema,
  roleUserSchema,
  userRolesParamSchema,
} from '@/validators/roles';
import {
  addPermission,
  cornaRoles,
  deleteRole,
  giveRole,
  newRole,
  removePermission,
  rolePermissions,
  roleUsers,
  takeRole,
  updateRole,
  userRoles,
  usersWithPermission,
} from '@/services/role.service';

const roleRoutes = new Hono<HonoEnv>();

roleRoutes.post('/', requireLogin, zValidator('json', roleSchema, throwOnInvalid), async (c) => {
  const { username, userId } = sessionUser(c);
  const { domain_name, name, permissions } = c.req.valid('json');
  await newRole(username, userId, domain_name, name, permissions);
  return c.body(null, 201);
});

roleRoutes.put('/', requireLogin, zValidator('json', roleSchema, throwOnInvalid), async (c) => {
  const { username } = sessionUser(c);
  const { domain_name, name, permissions } = c.req.valid('json');
  await updateRole(username, domain_name, name, permissions);
  return c.body(null, 204);
});

roleRoutes.delete('/', requireLogin, zValidator('json', roleNameSchema, throwOnInvalid), async (c) => {
  const { username } = sessionUser(c);
  const { domain_name, name } = c.req.valid('json');
  await deleteRole(username, domain_name, name);
  return c.body(null, 204);
});

roleRoutes.put(
  '/permissions/add',
  requireLogin,
  zValidator('json', rolePermissionSchema, throwOnInvalid),
  async (c) => {
    const { username } = sessionUser(c);
    const { domain_name, name, permission } = c.req.valid('json');
    await addPermission(username, domain_name, name, permission);
    return c.body(null, 204);
  }
);

roleRoutes.put(
  '/permissions/remove',
  requireLogin,
  zValidator('json', rolePermissionSchema, throwOnInvalid),
  async (c) => {
    const { username } = sessionUser(c);
    const { domain_name, name, permission } = c.req.valid('json');
    await removePermission(username, domain_name, name, permission);
    return c.body(null, 204);
  }
);

roleRoutes.post('/give', requireLogin, zValidator('json', roleUserSchema, throwOnInvalid), async (c) => {
  const actor = sessionUser(c);
  const { domain_name, name, username } = c.req.valid('json');
  await giveRole(actor.username, domain_name, name, username);
  return c.body(null, 201);
});

roleRoutes.post('/take', requireLogin, zValidator('json', roleUserSchema, throwOnInvalid), async (c) => {
  const actor = sessionUser(c);
  const { domain_name, name, username } = c.req.valid('json');
  await takeRole(actor.username, domain_name, name, username);
  return c.body(null, 201);
});

roleRoutes.get('/:domain_name', zValidator('param', domainParamSchema, throwOnInvalid), async (c) => {
  const { domain_name } = c.req.valid('param');
  return c.json(await cornaRoles(domain_name));
});

roleRoutes.get(
  '/:domain_name/user/:username',
  zValidator('param', userRolesParamSchema, throwOnInvalid),
  async (c) => {
    const { domain_name, username } = c.req.valid('param');
    return c.json(await userRoles(domain_name, username));
  }
);

roleRoutes.get(
  '/:domain_name/permission/:permission/users',
  zValidator('param', permissionParamSchema, throwOnInvalid),
  async (c) => {
    const { domain_name, permission } = c.req.valid('param');
    return c.json(await usersWithPermission(domain_name, permission));
  }
);

roleRoutes.get(
  '/:domain_name/:role/permissions',
  zValidator('param', roleParamSchema, throwOnInvalid),
  async (c) => {
    const { domain_name, role } = c.req.valid('param');
    return c.json(await rolePermissions(domain_name, role));
  }
);

roleRoutes.get(
  '/:domain_name/:role/users',
  zValidator('param', roleParamSchema, throwOnInvalid),
  async (c) => {
    const { domain_name, role } = c.req.valid('param');
    return c.json(await roleUsers(domain_name, role));
  }
);

export default roleRoutes;
