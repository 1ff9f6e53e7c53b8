/**
 * Authentication Validation Schemas
 *
 * Zod schemas for request validation on auth endpoints
 */

import { z } from 'zod';

/**
 * POST /v1/auth/register
 */
export const registerSchema = z.object({
  email_address: z.string().email(),
  password: z.string().min(1).max(1024),
  user_name: z.string().trim().min(1).max(64),
}).strict();

/**
 * POST /v1/auth/login
 */
export const loginSchema = z.object({
  email: z.string().email(),
  password: z.string().min(1).max(1024),
}).strict();

export type RegisterBody = z.infer<typeof registerSchema>;
export type LoginBody = z.infer<typeof loginSchema>;
