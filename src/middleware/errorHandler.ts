/**
 * Error Handler Middleware
 *
 * Global error handling for the API
 * Catches all errors and formats them as JSON responses
 */

import type { Context, Next, MiddlewareHandler } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { ZodError } from 'zod';
import { AppError } from '@/errors/appError';
import { logger } from '@/utils/logger';

/**
 * Error response format
 */
export interface ErrorResponse {
  error: {
    code: string;
    message: string;
    details?: unknown;
  };
}

// Only show verbose errors in development and test,
// never in staging or production
function isVerboseErrors(): boolean {
  const env = process.env.NODE_ENV;
  return env === 'development' || env === 'test';
}

/**
 * Render any thrown value as an ErrorResponse
 *
 * Shared by the middleware below and app.onError, which receives errors
 * thrown from route handlers.
 */
export function handleError(error: unknown, c: Context): Response {
  if (error instanceof AppError) {
    if (error.status >= 500) {
      logger.error('Request failed', {
        code: error.code,
        error: error.message,
        cause: error.cause ? String(error.cause) : undefined,
        path: c.req.path,
        method: c.req.method,
      });
    } else {
      logger.debug('Request rejected', { code: error.code, error: error.message, path: c.req.path });
    }

    return c.json<ErrorResponse>(
      { error: { code: error.code, message: error.message } },
      error.status
    );
  }

  // Handle Zod validation errors
  if (error instanceof ZodError) {
    return c.json<ErrorResponse>(
      {
        error: {
          code: 'VALIDATION_ERROR',
          message: 'Invalid request data',
          details: error.issues,
        },
      },
      400
    );
  }

  // Body parsing failures and the like raised by Hono itself
  if (error instanceof HTTPException && error.status < 500) {
    return c.json<ErrorResponse>(
      { error: { code: 'BAD_REQUEST', message: error.message || 'Malformed request' } },
      400
    );
  }

  logger.error('Unhandled error', {
    error: String(error),
    stack: error instanceof Error ? error.stack : undefined,
    cause: error instanceof Error && error.cause ? String(error.cause) : undefined,
    path: c.req.path,
    method: c.req.method,
  });

  if (error instanceof Error) {
    return c.json<ErrorResponse>(
      {
        error: {
          code: 'INTERNAL_ERROR',
          message: isVerboseErrors() ? error.message : 'An internal error occurred',
        },
      },
      500
    );
  }

  // Unknown error type
  return c.json<ErrorResponse>(
    {
      error: {
        code: 'INTERNAL_ERROR',
        message: 'An unexpected error occurred',
      },
    },
    500
  );
}

/**
 * Global error handler middleware
 *
 * Catches errors raised by middleware further down the chain
 */
export const errorHandler: MiddlewareHandler = async (c: Context, next: Next) => {
  try {
    return await next();
  } catch (error) {
    return handleError(error, c);
  }
};
