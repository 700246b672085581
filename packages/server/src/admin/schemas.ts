/**
 * Admin API Validation Schemas
 *
 * All body schemas use .strict() to reject unexpected fields.
 */

import { z } from 'zod';

// ==========================================================================
// USER SCHEMAS
// ==========================================================================

export const userParamsSchema = z.object({
  userId: z.string().min(1),
});

export const updateUserSchema = z
  .object({
    blocked: z.boolean().optional(),
    alias: z.string().min(1).max(255).nullable().optional(),
    metadata: z.record(z.unknown()).optional(),
  })
  .strict()
  .refine(body => Object.keys(body).length > 0, 'At least one field is required');

// ==========================================================================
// BUDGET SCHEMAS
// ==========================================================================

export const budgetParamsSchema = z.object({
  budgetId: z.string().min(1),
});

export const updateBudgetSchema = z
  .object({
    max_budget: z.number().nonnegative().nullable().optional(),
    budget_duration_sec: z.number().int().min(60).nullable().optional(),
  })
  .strict()
  .refine(body => Object.keys(body).length > 0, 'At least one field is required');

// ==========================================================================
// API KEY SCHEMAS
// ==========================================================================

export const keyParamsSchema = z.object({
  keyId: z.string().min(1),
});

export const updateKeySchema = z
  .object({
    is_active: z.boolean(),
  })
  .strict();
