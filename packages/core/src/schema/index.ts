/**
 * Tollgate - Database Schema
 *
 * Drizzle ORM schema definitions for SQLite.
 *
 * Design constraints:
 * - JSON columns stored as TEXT with JSON serialization
 * - UUIDs stored as TEXT (36 chars with hyphens)
 * - Timestamps as ISO 8601 strings (UTC), so lexical order is time order
 * - Enum types as constrained TEXT columns
 *
 * Mirrors drizzle/0000_initial.sql; keep the two in sync.
 */

import { sqliteTable, text, integer, real, index, uniqueIndex } from 'drizzle-orm/sqlite-core';

export type JsonObject = Record<string, unknown>;

/**
 * budgets table
 *
 * Spending limit shared by one or more users. A null max_budget means
 * unlimited; a null budget_duration_sec means the window never resets.
 */
export const budgets = sqliteTable('budgets', {
  budget_id: text('budget_id').primaryKey().notNull(), // UUIDv4
  max_budget: real('max_budget'),
  budget_duration_sec: integer('budget_duration_sec'),
  created_at: text('created_at').notNull(),
  updated_at: text('updated_at').notNull(),
});

/**
 * users table
 *
 * Accounting identity. Every user references exactly one budget.
 */
export const users = sqliteTable(
  'users',
  {
    user_id: text('user_id').primaryKey().notNull(), // UUIDv4
    budget_id: text('budget_id')
      .notNull()
      .references(() => budgets.budget_id, { onDelete: 'restrict' }),
    alias: text('alias'),

    // Accounting window
    spend: real('spend').notNull().default(0),
    budget_started_at: text('budget_started_at'),
    next_budget_reset_at: text('next_budget_reset_at'),

    blocked: integer('blocked', { mode: 'boolean' }).notNull().default(false),

    created_at: text('created_at').notNull(),
    updated_at: text('updated_at').notNull(),
    metadata: text('metadata', { mode: 'json' }).$type<JsonObject>().notNull().default({}),
  },
  table => ({
    budgetIdx: index('idx_users_budget_id').on(table.budget_id),
  })
);

/**
 * api_keys table
 *
 * Long-lived user credentials. Only the SHA-256 of the key is stored; the
 * plaintext exists solely in the response that created it.
 */
export const api_keys = sqliteTable(
  'api_keys',
  {
    id: text('id').primaryKey().notNull(), // UUIDv4
    key_hash: text('key_hash').notNull(), // SHA-256 hex
    key_name: text('key_name').notNull(),
    user_id: text('user_id')
      .notNull()
      .references(() => users.user_id, { onDelete: 'cascade' }),
    expires_at: text('expires_at'),
    is_active: integer('is_active', { mode: 'boolean' }).notNull().default(true),
    created_at: text('created_at').notNull(),
    last_used_at: text('last_used_at'),
    metadata: text('metadata', { mode: 'json' }).$type<JsonObject>().notNull().default({}),
  },
  table => ({
    keyHashIdx: uniqueIndex('unique_api_keys_key_hash').on(table.key_hash),
    userIdIdx: index('idx_api_keys_user_id').on(table.user_id),
  })
);

/**
 * caret_users table
 *
 * External (social) identities. One provider identity maps to exactly one
 * user; the (provider, provider_user_id) index is what serializes
 * concurrent first logins.
 */
export const caret_users = sqliteTable(
  'caret_users',
  {
    id: text('id').primaryKey().notNull(), // UUIDv4
    user_id: text('user_id')
      .notNull()
      .references(() => users.user_id, { onDelete: 'cascade' }),
    provider: text('provider').notNull(),
    provider_user_id: text('provider_user_id').notNull(),
    role: text('role').notNull().default('user'),
    email: text('email'),
    name: text('name'),
    avatar_url: text('avatar_url'),
    access_token_expires_at: text('access_token_expires_at'),
    last_login_at: text('last_login_at'),
    created_at: text('created_at').notNull(),
    updated_at: text('updated_at').notNull(),
    metadata: text('metadata', { mode: 'json' }).$type<JsonObject>().notNull().default({}),
  },
  table => ({
    providerSubjectIdx: uniqueIndex('unique_caret_users_provider_subject').on(
      table.provider,
      table.provider_user_id
    ),
    userIdIdx: uniqueIndex('unique_caret_users_user_id').on(table.user_id),
  })
);

/**
 * session_tokens table
 *
 * One row per issued refresh token. The row id doubles as the access
 * token's jti. Rows sharing a family_id form one login chain; parent_id
 * points at the row this one was rotated from.
 */
export const session_tokens = sqliteTable(
  'session_tokens',
  {
    id: text('id').primaryKey().notNull(), // UUIDv4, access token jti
    user_id: text('user_id')
      .notNull()
      .references(() => users.user_id, { onDelete: 'cascade' }),
    api_key_id: text('api_key_id')
      .notNull()
      .references(() => api_keys.id, { onDelete: 'cascade' }),
    family_id: text('family_id').notNull(),
    parent_id: text('parent_id'),
    refresh_token_hash: text('refresh_token_hash').notNull(), // SHA-256 hex
    refresh_expires_at: text('refresh_expires_at').notNull(),
    access_expires_at: text('access_expires_at').notNull(),
    revoked_at: text('revoked_at'),
    revoked_reason: text('revoked_reason', {
      enum: ['rotated', 'logout', 'reuse_detected', 'admin'],
    }),
    created_at: text('created_at').notNull(),
    last_used_at: text('last_used_at'),
    metadata: text('metadata', { mode: 'json' }).$type<JsonObject>().notNull().default({}),
  },
  table => ({
    refreshHashIdx: uniqueIndex('unique_session_tokens_refresh_hash').on(table.refresh_token_hash),
    familyIdx: index('idx_session_tokens_family_id').on(table.family_id),
    userIdx: index('idx_session_tokens_user_id').on(table.user_id),
  })
);

/**
 * usage_logs table
 *
 * One row per accounted request, written by the ledger hooks.
 */
export const usage_logs = sqliteTable(
  'usage_logs',
  {
    id: text('id').primaryKey().notNull(),
    user_id: text('user_id')
      .notNull()
      .references(() => users.user_id, { onDelete: 'cascade' }),
    api_key_id: text('api_key_id').references(() => api_keys.id, { onDelete: 'set null' }),
    timestamp: text('timestamp').notNull(),
    model: text('model').notNull(),
    provider: text('provider'),
    endpoint: text('endpoint').notNull(),
    prompt_tokens: integer('prompt_tokens'),
    completion_tokens: integer('completion_tokens'),
    total_tokens: integer('total_tokens'),
    cost: real('cost'),
    status: text('status', { enum: ['success', 'error'] }).notNull(),
    error_message: text('error_message'),
  },
  table => ({
    userTimeIdx: index('idx_usage_logs_user_timestamp').on(table.user_id, table.timestamp),
  })
);

/**
 * budget_reset_logs table
 *
 * Audit trail of spend resets performed when a budget window elapses.
 */
export const budget_reset_logs = sqliteTable(
  'budget_reset_logs',
  {
    id: text('id').primaryKey().notNull(),
    user_id: text('user_id')
      .notNull()
      .references(() => users.user_id, { onDelete: 'cascade' }),
    budget_id: text('budget_id').notNull(),
    previous_spend: real('previous_spend').notNull(),
    reset_at: text('reset_at').notNull(),
    next_reset_at: text('next_reset_at'),
  },
  table => ({
    userIdx: index('idx_budget_reset_logs_user_id').on(table.user_id),
  })
);

// ===== Inferred row types =====

export type Budget = typeof budgets.$inferSelect;
export type NewBudget = typeof budgets.$inferInsert;
export type User = typeof users.$inferSelect;
export type NewUser = typeof users.$inferInsert;
export type ApiKey = typeof api_keys.$inferSelect;
export type NewApiKey = typeof api_keys.$inferInsert;
export type ProviderIdentity = typeof caret_users.$inferSelect;
export type NewProviderIdentity = typeof caret_users.$inferInsert;
export type SessionToken = typeof session_tokens.$inferSelect;
export type NewSessionToken = typeof session_tokens.$inferInsert;
export type SessionRevocationReason = NonNullable<SessionToken['revoked_reason']>;
export type UsageLog = typeof usage_logs.$inferSelect;
export type NewUsageLog = typeof usage_logs.$inferInsert;
export type BudgetResetLog = typeof budget_reset_logs.$inferSelect;
