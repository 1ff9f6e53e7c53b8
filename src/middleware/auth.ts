/**
 * Authentication Middleware
 *
 * Resolves the signed `corna-sesh` cookie to a live session.
 *
 * Sets context variables:
 * - c.get('userId') - Authenticated user UUID
 * - c.get('username') - Authenticated username
 * - c.get('sessionId') - Session row id
 */

import type { Context, MiddlewareHandler } from 'hono';
import { getCookie } from 'hono/cookie';
import type { HonoEnv } from '@/types/hono';
import { resolveSession, type SessionUser } from '@/services/auth.service';
import { NotLoggedInError } from '@/errors/appError';
import { SESSION_COOKIE_NAME } from '@/utils/config';
import { logger } from '@/utils/logger';

/**
 * Session resolver middleware
 *
 * Anonymous requests pass through untouched; routes that need a user add
 * the requireLogin guard.
 */
export const authResolver: MiddlewareHandler<HonoEnv> = async (c, next) => {
  const cookie = getCookie(c, SESSION_COOKIE_NAME);
  if (cookie) {
    const session = await resolveSession(cookie);
    if (session) {
      c.set('userId', session.userId);
      c.set('username', session.username);
      c.set('sessionId', session.sessionId);
    } else {
      logger.debug('Session cookie did not resolve to a session', { path: c.req.path });
    }
  }

  return next();
};

/**
 * Require login guard
 *
 * Use after authResolver in middleware chain
 */
export const requireLogin: MiddlewareHandler<HonoEnv> = async (c, next) => {
  if (!c.get('userId')) {
    return c.json(
      {
        error: {
          code: 'UNAUTHENTICATED',
          message: 'Login required for this action',
        },
      },
      401
    );
  }

  return next();
};

/**
 * Session of a request that passed requireLogin
 *
 * @throws NotLoggedInError when called on an anonymous request
 */
export function sessionUser(c: Context<HonoEnv>): SessionUser {
  const userId = c.get('userId');
  const username = c.get('username');
  const sessionId = c.get('sessionId');
  if (!userId || !username || !sessionId) {
    throw new NotLoggedInError();
  }
  return { userId, username, sessionId };
}
