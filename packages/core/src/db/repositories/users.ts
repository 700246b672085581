/**
 * User Repository
 *
 * @see schema/index.ts users table
 */

import { eq, sql } from 'drizzle-orm';
import { v4 as uuidv4 } from 'uuid';
import type { DatabaseExecutor } from '../client.js';
import { users, type JsonObject, type User } from '../../schema/index.js';
import { addSeconds } from '../../utils/clock.js';

export interface CreateUserInput {
  budget_id: string;
  alias?: string | null;
  budget_started_at: string;
  next_budget_reset_at: string | null;
  metadata?: JsonObject;
}

export interface UpdateUserInput {
  alias?: string | null;
  blocked?: boolean;
  metadata?: JsonObject;
}

export function insertUser(ex: DatabaseExecutor, input: CreateUserInput, now: string): User {
  const user: User = {
    user_id: uuidv4(),
    budget_id: input.budget_id,
    alias: input.alias ?? null,
    spend: 0,
    budget_started_at: input.budget_started_at,
    next_budget_reset_at: input.next_budget_reset_at,
    blocked: false,
    created_at: now,
    updated_at: now,
    metadata: input.metadata ?? {},
  };

  ex.insert(users).values(user).run();
  return user;
}

export function getUserById(ex: DatabaseExecutor, userId: string): User | null {
  return ex.select().from(users).where(eq(users.user_id, userId)).get() ?? null;
}

export function updateUser(
  ex: DatabaseExecutor,
  userId: string,
  patch: UpdateUserInput,
  now: string
): User | null {
  return (
    ex
      .update(users)
      .set({ ...patch, updated_at: now })
      .where(eq(users.user_id, userId))
      .returning()
      .get() ?? null
  );
}

/**
 * Add amount to the user's spend in a single statement (no read-modify-write)
 */
export function accrueSpend(ex: DatabaseExecutor, userId: string, amount: number, now: string): void {
  ex.update(users)
    .set({ spend: sql`${users.spend} + ${amount}`, updated_at: now })
    .where(eq(users.user_id, userId))
    .run();
}

/**
 * Move the next reset of every user on a budget to budget_started_at +
 * duration (now + duration where no window has started). A null duration
 * clears it. Spend is left alone; a reset time already in the past is
 * picked up by the next window check.
 *
 * @returns Number of users updated
 */
export function rescheduleBudgetWindows(
  ex: DatabaseExecutor,
  budgetId: string,
  durationSec: number | null,
  now: string
): number {
  const members = ex.select().from(users).where(eq(users.budget_id, budgetId)).all();
  for (const member of members) {
    const nextResetAt =
      durationSec === null
        ? null
        : addSeconds(new Date(member.budget_started_at ?? now), durationSec).toISOString();
    ex.update(users)
      .set({ next_budget_reset_at: nextResetAt, updated_at: now })
      .where(eq(users.user_id, member.user_id))
      .run();
  }
  return members.length;
}

/**
 * Start a new budget window with zero spend
 */
export function resetSpendWindow(
  ex: DatabaseExecutor,
  userId: string,
  startedAt: string,
  nextResetAt: string | null
): void {
  ex.update(users)
    .set({
      spend: 0,
      budget_started_at: startedAt,
      next_budget_reset_at: nextResetAt,
      updated_at: startedAt,
    })
    .where(eq(users.user_id, userId))
    .run();
}
