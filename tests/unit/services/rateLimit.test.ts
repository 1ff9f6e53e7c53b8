import { describe, it, expect, beforeEach } from 'vitest';
import {
  consumeRateLimit,
  determineRateLimitTier,
  getRateLimitKey,
  RateLimitTier,
  resetAllRateLimits,
} from '@/services/rateLimit.service';

describe('rateLimit.service', () => {
  beforeEach(() => {
    resetAllRateLimits();
  });

  it('should pick the tier from the session', () => {
    expect(determineRateLimitTier({ isAuthenticated: true })).toBe(RateLimitTier.SESSION);
    expect(determineRateLimitTier({ isAuthenticated: false })).toBe(RateLimitTier.ANONYMOUS);
  });

  it('should key by user before IP', () => {
    expect(getRateLimitKey({ userId: 'u-1', ip: '10.0.0.1' })).toBe('user:u-1');
    expect(getRateLimitKey({ ip: '10.0.0.1' })).toBe('ip:10.0.0.1');
    expect(getRateLimitKey({})).toBe('ip:unknown');
  });

  it('should count down remaining points', async () => {
    const first = await consumeRateLimit('ip:10.0.0.2', RateLimitTier.ANONYMOUS);
    const second = await consumeRateLimit('ip:10.0.0.2', RateLimitTier.ANONYMOUS);

    expect(first).toMatchObject({ allowed: true, limit: 60, remainingPoints: 59 });
    expect(second.remainingPoints).toBe(58);
  });

  it('should refuse once the auth attempt budget is spent', async () => {
    for (let i = 0; i < 10; i++) {
      const result = await consumeRateLimit('auth:10.0.0.3', RateLimitTier.AUTH_ATTEMPT);
      expect(result.allowed).toBe(true);
    }

    const blocked = await consumeRateLimit('auth:10.0.0.3', RateLimitTier.AUTH_ATTEMPT);
    expect(blocked.allowed).toBe(false);
    expect(blocked.remainingPoints).toBe(0);
    expect(blocked.retryAfter).toBeGreaterThan(0);
  });

  it('should keep separate budgets per key', async () => {
    for (let i = 0; i < 11; i++) {
      await consumeRateLimit('auth:10.0.0.4', RateLimitTier.AUTH_ATTEMPT);
    }

    const other = await consumeRateLimit('auth:10.0.0.5', RateLimitTier.AUTH_ATTEMPT);
    expect(other.allowed).toBe(true);
  });

  it('should start over after a reset', async () => {
    for (let i = 0; i < 11; i++) {
      await consumeRateLimit('auth:10.0.0.6', RateLimitTier.AUTH_ATTEMPT);
    }
    resetAllRateLimits();

    const result = await consumeRateLimit('auth:10.0.0.6', RateLimitTier.AUTH_ATTEMPT);
    expect(result).toMatchObject({ allowed: true, remainingPoints: 9 });
  });
});
