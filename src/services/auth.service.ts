/**
 * Authentication Service
 *
 * Business logic for authentication operations:
 * - Registration (email + password)
 * - Login / logout
 * - Session lookup from the signed cookie
 *
 * A user holds at most one session. Logging in again replaces it.
 */

import crypto from 'crypto';
import { eq } from 'drizzle-orm';
import { db } from '@/db/client';
import { emails, sessions, users } from '@/db/schema';
import { generateUniqueToken, hashPassword, verifyPassword } from '@/utils/crypto';
import { cookieExpiry, readSigned, sign } from '@/utils/signing';
import { BadRequestError, NotFoundError } from '@/errors/appError';
import { logger } from '@/utils/logger';

export interface RegisterInput {
  emailAddress: string;
  password: string;
  username: string;
}

/**
 * Session resolved from a request cookie
 */
export interface SessionUser {
  userId: string;
  username: string;
  sessionId: string;
}

export interface LoginResult {
  username: string;
  cookie: string;
  expiresAt: Date;
}

export async function registerUser(input: RegisterInput): Promise<void> {
  const [existingEmail] = await db
    .select({ emailAddress: emails.emailAddress })
    .from(emails)
    .where(eq(emails.emailAddress, input.emailAddress))
    .limit(1);
  if (existingEmail) {
    throw new BadRequestError('Email address already has an account');
  }

  const [existingUser] = await db
    .select({ uuid: users.uuid })
    .from(users)
    .where(eq(users.username, input.username))
    .limit(1);
  if (existingUser) {
    throw new BadRequestError('Username already taken');
  }

  const passwordHash = await hashPassword(input.password);

  await db.transaction(async (tx) => {
    await tx.insert(emails).values({ emailAddress: input.emailAddress, passwordHash });
    await tx.insert(users).values({
      uuid: crypto.randomUUID(),
      username: input.username,
      emailAddress: input.emailAddress,
    });
  });

  logger.info('User registered', { username: input.username });
}

async function sessionIdTaken(token: string): Promise<boolean> {
  const [row] = await db
    .select({ sessionId: sessions.sessionId })
    .from(sessions)
    .where(eq(sessions.sessionId, token))
    .limit(1);
  return row !== undefined;
}

async function cookieIdTaken(token: string): Promise<boolean> {
  const [row] = await db
    .select({ sessionId: sessions.sessionId })
    .from(sessions)
    .where(eq(sessions.cookieId, token))
    .limit(1);
  return row !== undefined;
}

/**
 * Check credentials and open a new session
 *
 * @param currentCookie - Cookie already on the request; its session is dropped
 * @returns Signed cookie value for the new session
 */
export async function login(
  emailAddress: string,
  password: string,
  currentCookie?: string
): Promise<LoginResult> {
  if (currentCookie) {
    const cookieId = readSigned(currentCookie);
    if (cookieId) {
      await db.delete(sessions).where(eq(sessions.cookieId, cookieId));
    }
  }

  const [credentials] = await db
    .select()
    .from(emails)
    .where(eq(emails.emailAddress, emailAddress))
    .limit(1);
  if (!credentials) {
    throw new NotFoundError('User does not exist');
  }

  if (!(await verifyPassword(credentials.passwordHash, password))) {
    logger.warn('Login with wrong password', { emailAddress });
    throw new BadRequestError('Wrong password');
  }

  const [user] = await db
    .select({ uuid: users.uuid, username: users.username })
    .from(users)
    .where(eq(users.emailAddress, emailAddress))
    .limit(1);
  if (!user) {
    throw new NotFoundError('User does not exist');
  }

  const sessionId = await generateUniqueToken(sessionIdTaken);
  const cookieId = await generateUniqueToken(cookieIdTaken);

  await db.transaction(async (tx) => {
    await tx.delete(sessions).where(eq(sessions.userUuid, user.uuid));
    await tx.insert(sessions).values({ sessionId, cookieId, userUuid: user.uuid });
  });

  const expiresAt = cookieExpiry();
  logger.info('User logged in', { username: user.username });

  return {
    username: user.username,
    cookie: sign(cookieId, expiresAt),
    expiresAt,
  };
}

export async function logout(sessionId: string): Promise<void> {
  await db.delete(sessions).where(eq(sessions.sessionId, sessionId));
  logger.info('Session closed', { sessionId });
}

/**
 * Resolve a cookie to its live session, or null when it is invalid,
 * expired or no longer backed by a session row
 */
export async function resolveSession(cookie: string): Promise<SessionUser | null> {
  const cookieId = readSigned(cookie);
  if (!cookieId) {
    return null;
  }

  const [row] = await db
    .select({
      sessionId: sessions.sessionId,
      userId: users.uuid,
      username: users.username,
    })
    .from(sessions)
    .innerJoin(users, eq(sessions.userUuid, users.uuid))
    .where(eq(sessions.cookieId, cookieId))
    .limit(1);

  return row ?? null;
}
