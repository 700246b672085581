/**
 * Shared fixtures for session tests
 */

import {
  initializeDatabase,
  insertApiKey,
  insertBudget,
  insertUser,
  runMigrations,
  type ApiKey,
  type DatabaseClient,
  type User,
} from '@tollgate/core';

export const TEST_SECRET = 'test-secret-test-secret-test-secret';

export function createTestDatabase(): DatabaseClient {
  const db = initializeDatabase({ sqliteFilePath: ':memory:' });
  runMigrations(db);
  return db;
}

export function seedUserWithKey(db: DatabaseClient, now: string, keyHash: string): { user: User; apiKey: ApiKey } {
  const budget = insertBudget(db, { max_budget: 10, budget_duration_sec: null }, now);
  const user = insertUser(
    db,
    { budget_id: budget.budget_id, budget_started_at: now, next_budget_reset_at: null },
    now
  );
  const apiKey = insertApiKey(db, { user_id: user.user_id, key_hash: keyHash, key_name: 'default' }, now);
  return { user, apiKey };
}

export function flushBackground(): Promise<void> {
  return new Promise(resolve => setImmediate(resolve));
}
