/**
 * API Key Repository
 *
 * Stores and looks up API keys by their SHA-256 hash. Nothing here ever
 * sees a plaintext key.
 *
 * @see schema/index.ts api_keys table
 */

import { and, asc, eq, gt, isNull, or } from 'drizzle-orm';
import { v4 as uuidv4 } from 'uuid';
import type { DatabaseExecutor } from '../client.js';
import { api_keys, type ApiKey, type JsonObject } from '../../schema/index.js';

export interface CreateApiKeyInput {
  user_id: string;
  key_hash: string;
  key_name: string;
  expires_at?: string | null;
  metadata?: JsonObject;
}

export function insertApiKey(ex: DatabaseExecutor, input: CreateApiKeyInput, now: string): ApiKey {
  const record: ApiKey = {
    id: uuidv4(),
    key_hash: input.key_hash,
    key_name: input.key_name,
    user_id: input.user_id,
    expires_at: input.expires_at ?? null,
    is_active: true,
    created_at: now,
    last_used_at: null,
    metadata: input.metadata ?? {},
  };

  ex.insert(api_keys).values(record).run();
  return record;
}

export function getApiKeyByHash(ex: DatabaseExecutor, keyHash: string): ApiKey | null {
  return ex.select().from(api_keys).where(eq(api_keys.key_hash, keyHash)).get() ?? null;
}

export function getApiKeyById(ex: DatabaseExecutor, id: string): ApiKey | null {
  return ex.select().from(api_keys).where(eq(api_keys.id, id)).get() ?? null;
}

export function listApiKeysForUser(ex: DatabaseExecutor, userId: string): ApiKey[] {
  return ex
    .select()
    .from(api_keys)
    .where(eq(api_keys.user_id, userId))
    .orderBy(asc(api_keys.created_at))
    .all();
}

/**
 * The user's primary key: the oldest key that is active and not expired
 */
export function findPrimaryApiKey(ex: DatabaseExecutor, userId: string, now: string): ApiKey | null {
  return (
    ex
      .select()
      .from(api_keys)
      .where(
        and(
          eq(api_keys.user_id, userId),
          eq(api_keys.is_active, true),
          or(isNull(api_keys.expires_at), gt(api_keys.expires_at, now))
        )
      )
      .orderBy(asc(api_keys.created_at))
      .limit(1)
      .get() ?? null
  );
}

/**
 * Active and not past its expiry
 */
export function isApiKeyUsable(key: ApiKey, now: Date): boolean {
  return key.is_active && (key.expires_at === null || new Date(key.expires_at).getTime() > now.getTime());
}

export function touchApiKey(ex: DatabaseExecutor, id: string, now: string): void {
  ex.update(api_keys).set({ last_used_at: now }).where(eq(api_keys.id, id)).run();
}

export function setApiKeyActive(ex: DatabaseExecutor, id: string, isActive: boolean): boolean {
  const result = ex.update(api_keys).set({ is_active: isActive }).where(eq(api_keys.id, id)).run();
  return result.changes > 0;
}
