/**
 * Authentication Routes
 *
 * Email/password accounts and cookie sessions
 *
 * Routes:
 * - POST /v1/auth/register
 * - POST /v1/auth/login
 * - DELETE /v1/auth/logout
 * - GET  /v1/auth/check-login-status
 */

import { Hono } from 'hono';
import { deleteCookie, getCookie, setCookie } from 'hono/cookie';
import { zValidator } from '@hono/zod-validator';
import type { HonoEnv } from '@/types/hono';
import { loginSchema, registerSchema } from '@/validators/auth';
import { throwOnInvalid } from '@/validators/common';
import { login, logout, registerUser } from '@/services/auth.service';
import { requireLogin, sessionUser } from '@/middleware/auth';
import { authAttemptRateLimit } from '@/middleware/rateLimit';
import { SESSION_COOKIE_NAME } from '@/utils/config';

const auth = new Hono<HonoEnv>();

/**
 * POST /v1/auth/register
 */
auth.post('/register', authAttemptRateLimit, zValidator('json', registerSchema, throwOnInvalid), async (c) => {
  const body = c.req.valid('json');

  await registerUser({
    emailAddress: body.email_address,
    password: body.password,
    username: body.user_name,
  });

  return c.json({ message: 'User created' }, 201);
});

/**
 * POST /v1/auth/login
 *
 * Replaces any session the caller (or the account) already had
 */
auth.post('/login', authAttemptRateLimit, zValidator('json', loginSchema, throwOnInvalid), async (c) => {
  const { email, password } = c.req.valid('json');

  const result = await login(email, password, getCookie(c, SESSION_COOKIE_NAME));

  setCookie(c, SESSION_COOKIE_NAME, result.cookie, {
    httpOnly: true,
    secure: true,
    sameSite: 'Lax',
    expires: result.expiresAt,
    path: '/',
  });

  return c.json({ message: 'Logged in', username: result.username });
});

/**
 * DELETE /v1/auth/logout
 */
auth.delete('/logout', requireLogin, async (c) => {
  const { sessionId } = sessionUser(c);
  await logout(sessionId);

  deleteCookie(c, SESSION_COOKIE_NAME, { path: '/', secure: true });

  return c.json({ message: 'Logged out' });
});

/**
 * GET /v1/auth/check-login-status
 */
auth.get('/check-login-status', (c) => {
  return c.json({ status: c.get('userId') !== undefined });
});

export default auth;
