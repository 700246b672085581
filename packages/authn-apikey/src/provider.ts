/**
 * API Key Authentication Provider
 *
 * Implements AuthenticationProvider SPI for long-lived API keys.
 *
 * - Tokens without the tg_sk_ shape are not ours: not_applicable, no lookup
 * - Lookup is by SHA-256 hash on a unique index
 * - Inactive or expired keys are rejected with InvalidCredential
 * - last_used_at is written in the background; a failed write is only logged
 */

import type {
  AuthenticationProvider,
  AuthResult,
  Clock,
  DatabaseClient,
  ProviderHealth,
} from '@tollgate/core';
import {
  InvalidCredentialError,
  checkDatabaseHealth,
  getApiKeyByHash,
  logger,
  systemClock,
  touchApiKey,
} from '@tollgate/core';
import { hashApiKey, isValidApiKeyFormat } from './keys.js';

export class ApiKeyAuthProvider implements AuthenticationProvider {
  readonly id = 'api_key';

  constructor(
    private db: DatabaseClient,
    private clock: Clock = systemClock
  ) {}

  async authenticate(token: string): Promise<AuthResult> {
    if (!isValidApiKeyFormat(token)) {
      return { outcome: 'not_applicable' };
    }

    const record = getApiKeyByHash(this.db, hashApiKey(token));
    if (!record) {
      return { outcome: 'rejected', error: new InvalidCredentialError() };
    }

    if (!record.is_active) {
      logger.debug({ api_key_id: record.id }, '[authn-apikey] Inactive key presented');
      return { outcome: 'rejected', error: new InvalidCredentialError() };
    }

    const now = this.clock.now();
    if (record.expires_at !== null && new Date(record.expires_at).getTime() <= now.getTime()) {
      logger.debug({ api_key_id: record.id }, '[authn-apikey] Expired key presented');
      return { outcome: 'rejected', error: new InvalidCredentialError() };
    }

    // Update last_used_at (background - don't block auth)
    Promise.resolve()
      .then(() => touchApiKey(this.db, record.id, now.toISOString()))
      .catch((err: unknown) => {
        logger.warn({ err, api_key_id: record.id }, '[authn-apikey] Failed to update last_used_at');
      });

    return {
      outcome: 'authenticated',
      principal: {
        kind: 'api_key',
        user_id: record.user_id,
        api_key_id: record.id,
        is_admin: false,
      },
    };
  }

  async healthCheck(): Promise<ProviderHealth> {
    const healthy = checkDatabaseHealth(this.db);
    return {
      status: healthy ? 'healthy' : 'unhealthy',
      message: healthy ? 'Database accessible' : 'Database unreachable',
      last_checked: this.clock.now().toISOString(),
    };
  }
}
