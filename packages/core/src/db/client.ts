/**
 * Database Client Setup
 *
 * Initializes Drizzle ORM over better-sqlite3. Handles file permissions,
 * pragmas, migrations and the transaction helper every multi-row write
 * goes through.
 */

import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import type { BaseSQLiteDatabase } from 'drizzle-orm/sqlite-core';
import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import * as schema from '../schema/index.js';
import { logger } from '../utils/logger.js';

export type Schema = typeof schema;

export type DatabaseClient = BetterSQLite3Database<Schema> & { $client: Database.Database };

/**
 * Anything repositories can run statements against: the client itself or
 * an open transaction.
 */
export type DatabaseExecutor = BaseSQLiteDatabase<'sync', Database.RunResult, Schema>;

export interface DatabaseConfig {
  /** File path, or ':memory:' for an ephemeral database */
  sqliteFilePath: string;
  /** SQLite Write-Ahead Logging (better concurrency for readers) */
  enableWAL?: boolean;
}

/**
 * Initialize database connection
 *
 * @param config Database configuration
 * @returns Drizzle database client
 */
export function initializeDatabase(config: DatabaseConfig): DatabaseClient {
  const filePath = config.sqliteFilePath;
  const inMemory = filePath === ':memory:';

  if (!inMemory) {
    const dir = path.dirname(filePath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true, mode: 0o700 });
    }
  }

  const sqlite = new Database(filePath);

  if (!inMemory) {
    try {
      fs.chmodSync(filePath, 0o600);
    } catch (err) {
      logger.warn({ err }, `[db] Could not set file permissions on ${filePath}`);
    }
  }

  if (config.enableWAL !== false && !inMemory) {
    sqlite.pragma('journal_mode = WAL');
  }

  // SQLite default is OFF
  sqlite.pragma('foreign_keys = ON');
  sqlite.pragma('busy_timeout = 5000');
  sqlite.pragma('synchronous = NORMAL');

  const db = drizzle(sqlite, { schema });

  logger.info(`[db] SQLite initialized: ${filePath}`);

  return db;
}

/**
 * Run database migrations
 *
 * Applies every .sql file in packages/core/drizzle/ in lexicographic order.
 * Migration files are written to be idempotent.
 */
export function runMigrations(db: DatabaseClient): void {
  const currentDir = path.dirname(fileURLToPath(import.meta.url));
  const migrationsDir = path.join(currentDir, '../../drizzle');

  if (!fs.existsSync(migrationsDir)) {
    logger.warn(`[db] Migrations directory not found: ${migrationsDir}`);
    return;
  }

  const files = fs
    .readdirSync(migrationsDir)
    .filter(f => f.endsWith('.sql'))
    .sort();

  for (const file of files) {
    const sqlContent = fs.readFileSync(path.join(migrationsDir, file), 'utf-8');
    try {
      db.$client.exec(sqlContent);
      logger.debug(`[db] Migration applied: ${file}`);
    } catch (err) {
      logger.error({ err }, `[db] Migration failed: ${file}`);
      throw err;
    }
  }

  logger.info(`[db] Migrations complete (${files.length} files)`);
}

/**
 * Execute a callback inside a BEGIN IMMEDIATE transaction.
 *
 * better-sqlite3 transactions are synchronous: the callback must not await,
 * and no other request's statements can interleave with it.
 */
export function runInTransaction<T>(db: DatabaseClient, fn: (tx: DatabaseExecutor) => T): T {
  return db.transaction(tx => fn(tx), { behavior: 'immediate' });
}

/**
 * Close database connection
 */
export function closeDatabase(db: DatabaseClient): void {
  try {
    db.$client.close();
  } catch (err) {
    logger.warn({ err }, '[db] Error closing database connection');
  }
}

/**
 * Health check - verify database connectivity
 */
export function checkDatabaseHealth(db: DatabaseClient): boolean {
  try {
    db.$client.prepare('SELECT 1').get();
    return true;
  } catch (err) {
    logger.error({ err }, '[db] Health check failed');
    return false;
  }
}

/**
 * True when err is a SQLite UNIQUE constraint violation
 */
export function isUniqueViolation(err: unknown): boolean {
  if (!(err instanceof Error)) {
    return false;
  }
  if ('code' in err && err.code === 'SQLITE_CONSTRAINT_UNIQUE') {
    return true;
  }
  return err.cause !== undefined && isUniqueViolation(err.cause);
}
