/**
 * API key issuance
 *
 * Mints a key, stores its hash and hands the plaintext back exactly once.
 * Runs on whatever executor it is given so callers can make it part of a
 * larger transaction (identity provisioning does).
 */

import { insertApiKey, type ApiKey, type DatabaseExecutor, type JsonObject } from '@tollgate/core';
import { generateApiKey, hashApiKey } from './keys.js';

export interface IssueApiKeyRequest {
  user_id: string;
  key_name: string;
  expires_at?: string | null;
  metadata?: JsonObject;
}

export interface IssuedApiKey {
  record: ApiKey;
  /** Plaintext key, shown only once */
  api_key: string;
}

export function issueApiKey(
  ex: DatabaseExecutor,
  request: IssueApiKeyRequest,
  now: string
): IssuedApiKey {
  const apiKey = generateApiKey();
  const record = insertApiKey(
    ex,
    {
      user_id: request.user_id,
      key_hash: hashApiKey(apiKey),
      key_name: request.key_name,
      expires_at: request.expires_at ?? null,
      metadata: request.metadata,
    },
    now
  );

  return { record, api_key: apiKey };
}
