/**
 * Shared fixtures for core tests
 */

import {
  initializeDatabase,
  runMigrations,
  insertBudget,
  insertUser,
  type DatabaseClient,
} from '../src/db/index.js';
import type { Budget, User } from '../src/schema/index.js';
import { addSeconds } from '../src/utils/clock.js';

export function createTestDatabase(): DatabaseClient {
  const db = initializeDatabase({ sqliteFilePath: ':memory:' });
  runMigrations(db);
  return db;
}

export function seedUser(
  db: DatabaseClient,
  now: Date,
  limits: { max_budget: number | null; budget_duration_sec: number | null } = {
    max_budget: 10,
    budget_duration_sec: 3600,
  }
): { budget: Budget; user: User } {
  const iso = now.toISOString();
  const budget = insertBudget(db, limits, iso);
  const user = insertUser(
    db,
    {
      budget_id: budget.budget_id,
      budget_started_at: iso,
      next_budget_reset_at:
        limits.budget_duration_sec === null
          ? null
          : addSeconds(now, limits.budget_duration_sec).toISOString(),
    },
    iso
  );
  return { budget, user };
}
