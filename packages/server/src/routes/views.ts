/**
 * Response views
 *
 * What the HTTP surface shows of stored rows. API keys never leave the
 * server with their hash.
 */

import type { ApiKey, ProviderIdentity } from '@tollgate/core';

export interface ApiKeySummary {
  id: string;
  key_name: string;
  is_active: boolean;
  expires_at: string | null;
  created_at: string;
  last_used_at: string | null;
}

export interface IdentitySummary {
  provider: string;
  provider_user_id: string;
  role: string;
  email: string | null;
  name: string | null;
  avatar_url: string | null;
  last_login_at: string | null;
}

export function toApiKeySummary(key: ApiKey): ApiKeySummary {
  return {
    id: key.id,
    key_name: key.key_name,
    is_active: key.is_active,
    expires_at: key.expires_at,
    created_at: key.created_at,
    last_used_at: key.last_used_at,
  };
}

export function toIdentitySummary(identity: ProviderIdentity | null): IdentitySummary | null {
  if (!identity) {
    return null;
  }
  return {
    provider: identity.provider,
    provider_user_id: identity.provider_user_id,
    role: identity.role,
    email: identity.email,
    name: identity.name,
    avatar_url: identity.avatar_url,
    last_login_at: identity.last_login_at,
  };
}
