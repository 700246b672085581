/**
 * Usage/Budget Ledger Hooks
 *
 * Accrual points consumed by request logging. This module does not price
 * requests: callers pass the cost they computed. What it guarantees is that
 * spend lands in the current budget window and that an elapsed window is
 * reset exactly once.
 */

import type { DatabaseClient, DatabaseExecutor } from '../db/client.js';
import { runInTransaction } from '../db/client.js';
import { getBudgetById } from '../db/repositories/budgets.js';
import { accrueSpend, getUserById, resetSpendWindow } from '../db/repositories/users.js';
import {
  aggregateUsage,
  insertBudgetResetLog,
  insertUsageLog,
  listRecentUsage,
  type UsageWindow,
} from '../db/repositories/usage-logs.js';
import type { Budget, UsageLog, User } from '../schema/index.js';
import { addSeconds, systemClock, type Clock } from '../utils/clock.js';
import { BudgetExceededError, NotFoundError, UserBlockedError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export interface UsageEvent {
  user_id: string;
  api_key_id?: string | null;
  model: string;
  provider?: string | null;
  endpoint: string;
  prompt_tokens?: number | null;
  completion_tokens?: number | null;
  total_tokens?: number | null;
  cost?: number | null;
  status: 'success' | 'error';
  error_message?: string | null;
}

export interface AccountState {
  user: User;
  budget: Budget;
  /** True when this call closed an elapsed window */
  window_reset: boolean;
}

export class UsageLedger {
  constructor(
    private db: DatabaseClient,
    private clock: Clock = systemClock
  ) {}

  /**
   * Reset the user's spend if their budget window has elapsed
   *
   * @throws NotFoundError if the user or their budget does not exist
   */
  async ensureBudgetWindow(userId: string): Promise<AccountState> {
    return runInTransaction(this.db, tx => this.rollWindow(tx, userId));
  }

  /**
   * Gate for user-facing calls: the user must exist, not be blocked, and
   * have spend below max_budget in the current window.
   */
  async assertCanSpend(userId: string): Promise<AccountState> {
    const state = await this.ensureBudgetWindow(userId);

    if (state.user.blocked) {
      throw new UserBlockedError(userId);
    }

    const { max_budget } = state.budget;
    if (max_budget !== null && state.user.spend >= max_budget) {
      throw new BudgetExceededError(userId, {
        spend: state.user.spend,
        max_budget,
        next_budget_reset_at: state.user.next_budget_reset_at,
      });
    }

    return state;
  }

  /**
   * Record one usage event and accrue its cost onto the user's spend
   */
  async recordUsage(event: UsageEvent): Promise<UsageLog> {
    const timestamp = this.clock.now().toISOString();

    const log = runInTransaction(this.db, tx => {
      this.rollWindow(tx, event.user_id);

      const row = insertUsageLog(tx, {
        user_id: event.user_id,
        api_key_id: event.api_key_id ?? null,
        timestamp,
        model: event.model,
        provider: event.provider ?? null,
        endpoint: event.endpoint,
        prompt_tokens: event.prompt_tokens ?? null,
        completion_tokens: event.completion_tokens ?? null,
        total_tokens: event.total_tokens ?? null,
        cost: event.cost ?? null,
        status: event.status,
        error_message: event.error_message ?? null,
      });

      if (event.cost && event.cost > 0) {
        accrueSpend(tx, event.user_id, event.cost, timestamp);
      }
      return row;
    });

    logger.debug(
      { user_id: event.user_id, model: event.model, cost: event.cost ?? 0 },
      '[ledger] Usage recorded'
    );
    return log;
  }

  async summarizeUsage(userId: string, since: Date): Promise<UsageWindow> {
    return aggregateUsage(this.db, userId, since.toISOString());
  }

  async recentUsage(userId: string, limit: number): Promise<UsageLog[]> {
    return listRecentUsage(this.db, userId, limit);
  }

  private rollWindow(tx: DatabaseExecutor, userId: string): AccountState {
    const user = getUserById(tx, userId);
    if (!user) {
      throw new NotFoundError(`User '${userId}' not found`);
    }
    const budget = getBudgetById(tx, user.budget_id);
    if (!budget) {
      throw new NotFoundError(`Budget '${user.budget_id}' not found`);
    }

    const now = this.clock.now();
    const nextReset = user.next_budget_reset_at;
    if (nextReset === null || new Date(nextReset).getTime() > now.getTime()) {
      return { user, budget, window_reset: false };
    }

    const startedAt = now.toISOString();
    const nextResetAt =
      budget.budget_duration_sec === null
        ? null
        : addSeconds(now, budget.budget_duration_sec).toISOString();

    resetSpendWindow(tx, userId, startedAt, nextResetAt);
    insertBudgetResetLog(tx, {
      user_id: userId,
      budget_id: budget.budget_id,
      previous_spend: user.spend,
      reset_at: startedAt,
      next_reset_at: nextResetAt,
    });

    logger.info({ user_id: userId, previous_spend: user.spend }, '[ledger] Budget window reset');

    return {
      user: {
        ...user,
        spend: 0,
        budget_started_at: startedAt,
        next_budget_reset_at: nextResetAt,
        updated_at: startedAt,
      },
      budget,
      window_reset: true,
    };
  }
}
