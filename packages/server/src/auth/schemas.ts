/**
 * Auth Request Schemas
 *
 * Zod validation schemas for social login, refresh and logout.
 */

import { z } from 'zod';

const deviceField = z.string().min(1).max(255).optional();

/**
 * Social login request schema
 */
export const socialLoginSchema = z.object({
  provider: z.string().min(1, 'Provider is required').max(64),
  access_token: z.string().min(1, 'Provider access token is required').max(8192),
  email: z.string().email().max(320).optional(),
  name: z.string().min(1).max(255).optional(),
  avatar_url: z.string().url().max(2048).optional(),
  device_type: deviceField,
  device_id: deviceField,
  os: deviceField,
  app_version: deviceField,
  user_agent: z.string().min(1).max(1024).optional(),
  ip: z.string().min(1).max(64).optional(),
  metadata: z.record(z.unknown()).optional(),
});

export type SocialLoginBody = z.infer<typeof socialLoginSchema>;

/**
 * Refresh request schema
 */
export const refreshSchema = z.object({
  refresh_token: z.string().min(1, 'Refresh token is required').max(512),
  metadata: z.record(z.unknown()).optional(),
});

export type RefreshBody = z.infer<typeof refreshSchema>;

/**
 * Logout request schema. Without a refresh token the access token in the
 * credential header identifies the session.
 */
export const logoutSchema = z
  .object({
    refresh_token: z.string().min(1).max(512).optional(),
  })
  .default({});

export type LogoutBody = z.infer<typeof logoutSchema>;
