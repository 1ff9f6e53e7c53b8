/**
 * Corna API Server
 *
 * Hono server for:
 * - REST API (/v1/*)
 * - Authentication (/v1/auth/*)
 * - Corna page data (/subdomain/*)
 */

import { Hono } from 'hono';
import { serve } from '@hono/node-server';
import { securityHeaders } from '@/middleware/securityHeaders';
import { corsMiddleware } from '@/middleware/cors';
import { errorHandler, handleError } from '@/middleware/errorHandler';
import { authResolver } from '@/middleware/auth';
import { rateLimitMiddleware } from '@/middleware/rateLimit';
import authRoutes from '@/routes/auth';
import cornaRoutes from '@/routes/corna';
import postRoutes from '@/routes/posts';
import mediaRoutes from '@/routes/media';
import roleRoutes from '@/routes/roles';
import themeRoutes from '@/routes/themes';
import userRoutes from '@/routes/user';
import subdomainRoutes from '@/routes/subdomain';
import { closeDatabase } from '@/db/client';
import { logger } from '@/utils/logger';
import type { HonoEnv } from '@/types/hono';

// Initialize Hono app
const app = new Hono<HonoEnv>();

// Global middleware chain
app.use('*', securityHeaders);
app.use('*', corsMiddleware);
app.use('*', errorHandler);
app.use('*', authResolver);
app.use('*', rateLimitMiddleware); // after auth so logged-in users get their own bucket

// Health check endpoint
app.get('/health', (c) => {
  return c.json({
    status: 'ok',
    timestamp: new Date().toISOString(),
    version: '1.0.0',
  });
});

app.route('/v1/auth', authRoutes);
app.route('/v1/corna', cornaRoutes);
app.route('/v1/posts', postRoutes);
app.route('/v1/media', mediaRoutes);
app.route('/v1/roles', roleRoutes);
app.route('/v1/themes', themeRoutes);
app.route('/v1/user', userRoutes);
app.route('/subdomain', subdomainRoutes);

// Global error handler (catches errors thrown by route handlers)
app.onError((error, c) => handleError(error, c));

// 404 handler
app.notFound((c) => {
  return c.json(
    {
      error: {
        code: 'NOT_FOUND',
        message: 'Endpoint not found',
      },
    },
    404
  );
});

// Start server (skip in test mode)
if (process.env.NODE_ENV !== 'test') {
  const PORT = parseInt(process.env.PORT || '3000');

  const server = serve({
    fetch: app.fetch,
    port: PORT,
  });

  logger.info('Corna API Server running', { url: `http://localhost:${PORT}` });

  // Graceful shutdown with request drain
  function gracefulShutdown(signal: string) {
    logger.info(`${signal} received: shutting down gracefully...`);
    server.close(() => {
      logger.info('HTTP server closed, draining connections');
      closeDatabase().then(() => {
        logger.info('Database connections closed');
        process.exit(0);
      }).catch((err) => {
        logger.error('Error closing database', { error: String(err) });
        process.exit(1);
      });
    });
    // Force exit after 10 seconds if drain takes too long
    setTimeout(() => {
      logger.error('Forced shutdown after 10s timeout');
      process.exit(1);
    }, 10_000).unref();
  }

  process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => gracefulShutdown('SIGINT'));
}

export default app;
