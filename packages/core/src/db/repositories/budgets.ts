/**
 * Budget Repository
 *
 * @see schema/index.ts budgets table
 */

import { eq } from 'drizzle-orm';
import { v4 as uuidv4 } from 'uuid';
import type { DatabaseExecutor } from '../client.js';
import { budgets, type Budget } from '../../schema/index.js';

export interface CreateBudgetInput {
  max_budget: number | null;
  budget_duration_sec: number | null;
}

export interface UpdateBudgetInput {
  max_budget?: number | null;
  budget_duration_sec?: number | null;
}

export function insertBudget(ex: DatabaseExecutor, input: CreateBudgetInput, now: string): Budget {
  const budget: Budget = {
    budget_id: uuidv4(),
    max_budget: input.max_budget,
    budget_duration_sec: input.budget_duration_sec,
    created_at: now,
    updated_at: now,
  };

  ex.insert(budgets).values(budget).run();
  return budget;
}

export function getBudgetById(ex: DatabaseExecutor, budgetId: string): Budget | null {
  return ex.select().from(budgets).where(eq(budgets.budget_id, budgetId)).get() ?? null;
}

/**
 * Administrative edit of a budget's limits
 *
 * @returns Updated budget or null if it does not exist
 */
export function updateBudget(
  ex: DatabaseExecutor,
  budgetId: string,
  patch: UpdateBudgetInput,
  now: string
): Budget | null {
  return (
    ex
      .update(budgets)
      .set({ ...patch, updated_at: now })
      .where(eq(budgets.budget_id, budgetId))
      .returning()
      .get() ?? null
  );
}
