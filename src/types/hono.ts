/**
 * Hono Type Extensions
 *
 * Custom types for Hono context variables
 */

/**
 * Variables set by the session resolver; absent for anonymous requests
 */
export type HonoEnv = {
  Variables: {
    userId?: string;
    username?: string;
    sessionId?: string;
  };
};
