/**
 * @tollgate/core
 *
 * Core package exports: schema, database layer, config loader, SPI
 * interfaces, ledger hooks and shared utilities.
 */

// Database layer
export * from './db/index.js';

// Schema tables and row types
export * from './schema/index.js';

// SPI interfaces
export * from './spi/index.js';

// Configuration loader with secrets resolution
export * from './config/index.js';

// Usage/budget ledger hooks
export * from './ledger/index.js';

// Utilities
export * from './utils/errors.js';
export * from './utils/logger.js';
export * from './utils/clock.js';
