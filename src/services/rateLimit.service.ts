/**
 * Rate Limiting Service
 *
 * In-memory limits keyed by session user or client IP.
 *
 * Rate Limits:
 * - Anonymous (IP): 60 req/min
 * - Logged-in session: 300 req/min
 * - Register/login attempts (IP): 10 req/min, on top of the above
 */

import { RateLimiterMemory, RateLimiterRes } from 'rate-limiter-flexible';
import { logger } from '@/utils/logger';

export enum RateLimitTier {
  ANONYMOUS = 'anonymous',
  SESSION = 'session',
  AUTH_ATTEMPT = 'auth_attempt',
}

const RATE_LIMIT_CONFIG: Record<RateLimitTier, { points: number; duration: number; blockDuration: number }> = {
  [RateLimitTier.ANONYMOUS]: {
    points: 60,
    duration: 60,
    blockDuration: 60,
  },
  [RateLimitTier.SESSION]: {
    points: 300,
    duration: 60,
    blockDuration: 60,
  },
  [RateLimitTier.AUTH_ATTEMPT]: {
    points: 10,
    duration: 60,
    blockDuration: 300, // slow down password guessing
  },
};

function createLimiters(): Record<RateLimitTier, RateLimiterMemory> {
  return {
    [RateLimitTier.ANONYMOUS]: new RateLimiterMemory(RATE_LIMIT_CONFIG[RateLimitTier.ANONYMOUS]),
    [RateLimitTier.SESSION]: new RateLimiterMemory(RATE_LIMIT_CONFIG[RateLimitTier.SESSION]),
    [RateLimitTier.AUTH_ATTEMPT]: new RateLimiterMemory(RATE_LIMIT_CONFIG[RateLimitTier.AUTH_ATTEMPT]),
  };
}

let rateLimiters = createLimiters();

export interface RateLimitResult {
  allowed: boolean;
  tier: RateLimitTier;
  limit: number;
  remainingPoints: number;
  resetTime: number; // Unix timestamp when limit resets
  retryAfter?: number; // Seconds to wait before retry
}

/**
 * Consume a rate limit point for a given key and tier
 */
export async function consumeRateLimit(
  key: string,
  tier: RateLimitTier
): Promise<RateLimitResult> {
  const limiter = rateLimiters[tier];
  const config = RATE_LIMIT_CONFIG[tier];

  try {
    const result: RateLimiterRes = await limiter.consume(key);

    return {
      allowed: true,
      tier,
      limit: config.points,
      remainingPoints: result.remainingPoints,
      resetTime: Math.floor((Date.now() + result.msBeforeNext) / 1000),
    };
  } catch (error) {
    if (error instanceof RateLimiterRes) {
      logger.warn('Rate limit exceeded', { key, tier });
      return {
        allowed: false,
        tier,
        limit: config.points,
        remainingPoints: 0,
        resetTime: Math.floor((Date.now() + error.msBeforeNext) / 1000),
        retryAfter: Math.ceil(error.msBeforeNext / 1000),
      };
    }

    // Unknown error - fail open (allow request but log)
    logger.error('Rate limiter error', { error: String(error) });
    return {
      allowed: true,
      tier,
      limit: config.points,
      remainingPoints: config.points,
      resetTime: Math.floor(Date.now() / 1000) + config.duration,
    };
  }
}

export function determineRateLimitTier(authContext: { isAuthenticated: boolean }): RateLimitTier {
  return authContext.isAuthenticated ? RateLimitTier.SESSION : RateLimitTier.ANONYMOUS;
}

/**
 * Get rate limit key for tracking
 */
export function getRateLimitKey(authContext: { userId?: string; ip?: string }): string {
  if (authContext.userId) {
    return `user:${authContext.userId}`;
  }

  return `ip:${authContext.ip || 'unknown'}`;
}

/**
 * Reset all rate limiters (for testing only)
 */
export function resetAllRateLimits(): void {
  rateLimiters = createLimiters();
}
