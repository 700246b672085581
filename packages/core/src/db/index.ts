/**
 * Database Access Layer - Barrel Export
 *
 * Usage:
 * ```typescript
 * import { initializeDatabase, runMigrations, runInTransaction, insertBudget } from '@tollgate/core';
 *
 * const db = initializeDatabase({ sqliteFilePath: './data/tollgate.db' });
 * runMigrations(db);
 * const budget = runInTransaction(db, tx => insertBudget(tx, { max_budget: 10, budget_duration_sec: 86400 }, now));
 * ```
 */

// Database client setup
export {
  initializeDatabase,
  runMigrations,
  runInTransaction,
  closeDatabase,
  checkDatabaseHealth,
  isUniqueViolation,
  type DatabaseClient,
  type DatabaseExecutor,
  type DatabaseConfig,
  type Schema,
} from './client.js';

// Budget repository
export {
  insertBudget,
  getBudgetById,
  updateBudget,
  type CreateBudgetInput,
  type UpdateBudgetInput,
} from './repositories/budgets.js';

// User repository
export {
  insertUser,
  getUserById,
  updateUser,
  accrueSpend,
  resetSpendWindow,
  rescheduleBudgetWindows,
  type CreateUserInput,
  type UpdateUserInput,
} from './repositories/users.js';

// API key repository
export {
  insertApiKey,
  getApiKeyByHash,
  getApiKeyById,
  listApiKeysForUser,
  findPrimaryApiKey,
  isApiKeyUsable,
  touchApiKey,
  setApiKeyActive,
  type CreateApiKeyInput,
} from './repositories/api-keys.js';

// Provider identity repository
export {
  findProviderIdentity,
  getProviderIdentityByUserId,
  insertProviderIdentity,
  recordProviderLogin,
  type CreateProviderIdentityInput,
  type ProviderProfileFields,
} from './repositories/provider-identities.js';

// Session token repository
export {
  insertSessionToken,
  getSessionTokenById,
  getSessionTokenByRefreshHash,
  revokeSessionToken,
  revokeSessionFamily,
  revokeSessionsForUser,
  listSessionFamily,
  touchSessionToken,
} from './repositories/session-tokens.js';

// Usage log repository
export {
  insertUsageLog,
  aggregateUsage,
  listRecentUsage,
  insertBudgetResetLog,
  listBudgetResetLogs,
  type UsageLogInput,
  type UsageWindow,
} from './repositories/usage-logs.js';
