/**
 * Rate Limiting Middleware
 *
 * Returns 429 Too Many Requests when limit exceeded
 */

import type { Context, Next } from 'hono';
import type { HonoEnv } from '@/types/hono';
import {
  consumeRateLimit,
  determineRateLimitTier,
  getRateLimitKey,
  RateLimitTier,
  type RateLimitResult,
} from '@/services/rateLimit.service';

function clientIp(c: Context<HonoEnv>): string {
  return c.req.header('x-forwarded-for')?.split(',')[0].trim() ||
         c.req.header('x-real-ip') ||
         'unknown';
}

function limitExceeded(c: Context<HonoEnv>, result: RateLimitResult, message: string) {
  c.header('Retry-After', String(result.retryAfter || 60));

  return c.json(
    {
      error: {
        code: 'RATE_LIMIT_EXCEEDED',
        message,
        retryAfter: result.retryAfter,
      },
    },
    429
  );
}

/**
 * Rate limiting middleware
 *
 * Keyed by session user when logged in, otherwise by client IP
 */
export async function rateLimitMiddleware(c: Context<HonoEnv>, next: Next) {
  const userId = c.get('userId');
  const tier = determineRateLimitTier({ isAuthenticated: !!userId });
  const key = getRateLimitKey({ userId, ip: clientIp(c) });

  const result = await consumeRateLimit(key, tier);

  c.header('X-RateLimit-Limit', String(result.limit));
  c.header('X-RateLimit-Remaining', String(result.remainingPoints));
  c.header('X-RateLimit-Reset', String(result.resetTime));

  if (!result.allowed) {
    return limitExceeded(c, result, 'Too many requests. Please try again later.');
  }

  return next();
}

/**
 * Extra per-IP limit for register and login
 */
export async function authAttemptRateLimit(c: Context<HonoEnv>, next: Next) {
  const result = await consumeRateLimit(`auth:${clientIp(c)}`, RateLimitTier.AUTH_ATTEMPT);

  if (!result.allowed) {
    return limitExceeded(c, result, 'Too many login attempts. Please try again later.');
  }

  return next();
}
