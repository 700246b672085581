/**
 * Usage Log Repository
 *
 * Usage rows and budget reset rows written by the ledger hooks, plus the
 * aggregates the profile endpoint reads.
 */

import { and, desc, eq, gte, sql } from 'drizzle-orm';
import { v4 as uuidv4 } from 'uuid';
import type { DatabaseExecutor } from '../client.js';
import {
  budget_reset_logs,
  usage_logs,
  type BudgetResetLog,
  type NewUsageLog,
  type UsageLog,
} from '../../schema/index.js';

export type UsageLogInput = Omit<NewUsageLog, 'id'>;

export interface UsageWindow {
  requests: number;
  prompt_tokens: number;
  completion_tokens: number;
  total_tokens: number;
  cost: number;
}

export function insertUsageLog(ex: DatabaseExecutor, input: UsageLogInput): UsageLog {
  return ex
    .insert(usage_logs)
    .values({ id: uuidv4(), ...input })
    .returning()
    .get();
}

/**
 * Sum usage for a user since the given ISO timestamp (inclusive)
 */
export function aggregateUsage(ex: DatabaseExecutor, userId: string, since: string): UsageWindow {
  const row = ex
    .select({
      requests: sql<number>`count(${usage_logs.id})`,
      prompt_tokens: sql<number>`coalesce(sum(${usage_logs.prompt_tokens}), 0)`,
      completion_tokens: sql<number>`coalesce(sum(${usage_logs.completion_tokens}), 0)`,
      total_tokens: sql<number>`coalesce(sum(${usage_logs.total_tokens}), 0)`,
      cost: sql<number>`coalesce(sum(${usage_logs.cost}), 0.0)`,
    })
    .from(usage_logs)
    .where(and(eq(usage_logs.user_id, userId), gte(usage_logs.timestamp, since)))
    .get();

  return {
    requests: Number(row?.requests ?? 0),
    prompt_tokens: Number(row?.prompt_tokens ?? 0),
    completion_tokens: Number(row?.completion_tokens ?? 0),
    total_tokens: Number(row?.total_tokens ?? 0),
    cost: Number(row?.cost ?? 0),
  };
}

export function listRecentUsage(ex: DatabaseExecutor, userId: string, limit: number): UsageLog[] {
  if (limit <= 0) {
    return [];
  }
  return ex
    .select()
    .from(usage_logs)
    .where(eq(usage_logs.user_id, userId))
    .orderBy(desc(usage_logs.timestamp))
    .limit(limit)
    .all();
}

export function insertBudgetResetLog(
  ex: DatabaseExecutor,
  input: Omit<BudgetResetLog, 'id'>
): BudgetResetLog {
  const row: BudgetResetLog = { id: uuidv4(), ...input };
  ex.insert(budget_reset_logs).values(row).run();
  return row;
}

export function listBudgetResetLogs(ex: DatabaseExecutor, userId: string): BudgetResetLog[] {
  return ex
    .select()
    .from(budget_reset_logs)
    .where(eq(budget_reset_logs.user_id, userId))
    .orderBy(desc(budget_reset_logs.reset_at))
    .all();
}
