/**
 * CORS Middleware
 *
 * The web client lives on mycorna.com and each Corna on its own subdomain;
 * those origins get credentialed CORS so the session cookie travels.
 * Requests without an Origin (curl, server-to-server) get a wildcard.
 */

import type { Context, Next } from 'hono';

/**
 * Allowed origins for CORS
 * Includes env-configured origin for staging/custom deployments
 */
function allowedOrigins(): string[] {
  return [
    'http://localhost:5173', // Vite dev server
    'http://localhost:3000', // API dev server
    'https://mycorna.com',
    ...(process.env.CORS_ORIGIN ? [process.env.CORS_ORIGIN] : []),
  ];
}

const CORNA_SUBDOMAIN = /^https:\/\/[a-z0-9-]+\.mycorna\.com$/;

export function isAllowedOrigin(origin: string): boolean {
  return allowedOrigins().includes(origin) || CORNA_SUBDOMAIN.test(origin);
}

export const corsMiddleware = async (c: Context, next: Next) => {
  const origin = c.req.header('Origin');
  const headers: Record<string, string> = {
    'Access-Control-Allow-Methods': 'GET, POST, PUT, PATCH, DELETE, OPTIONS',
    'Access-Control-Allow-Headers': 'Content-Type, Range',
    'Access-Control-Expose-Headers': 'Content-Length, Content-Range, Accept-Ranges',
    'Access-Control-Max-Age': '86400',
  };

  if (!origin) {
    headers['Access-Control-Allow-Origin'] = '*';
  } else if (isAllowedOrigin(origin)) {
    // Known origin: echo, allow credentials for session cookies
    headers['Access-Control-Allow-Origin'] = origin;
    headers['Access-Control-Allow-Credentials'] = 'true';
    headers['Vary'] = 'Origin';
  }

  // Preflight: return 204 with CORS headers directly
  if (c.req.method === 'OPTIONS') {
    return new Response(null, { status: 204, headers });
  }

  for (const [key, value] of Object.entries(headers)) {
    c.header(key, value);
  }

  return next();
};
