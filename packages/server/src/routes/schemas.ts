/**
 * User Route Schemas
 *
 * Zod validation schemas for the profile and usage routes.
 */

import { z } from 'zod';

// ==========================================================================
// PROFILE SCHEMAS
// ==========================================================================

export const profileQuerySchema = z.object({
  user: z.string().min(1).optional(),
  recent_limit: z.coerce.number().int().min(0).max(100).default(10),
});

// ==========================================================================
// USAGE SCHEMAS
// ==========================================================================

const tokenCount = z.number().int().nonnegative().nullable().optional();

export const recordUsageSchema = z
  .object({
    user: z.string().min(1).optional(),
    model: z.string().min(1).max(255),
    provider: z.string().min(1).max(64).nullable().optional(),
    endpoint: z.string().min(1).max(255),
    prompt_tokens: tokenCount,
    completion_tokens: tokenCount,
    total_tokens: tokenCount,
    cost: z.number().nonnegative().nullable().optional(),
    status: z.enum(['success', 'error']).default('success'),
    error_message: z.string().max(2048).nullable().optional(),
  })
  .strict();

export type RecordUsageBody = z.infer<typeof recordUsageSchema>;
