/**
 * Provider Identity Repository
 *
 * External (social login) identities in the caret_users table.
 */

import { and, eq } from 'drizzle-orm';
import { v4 as uuidv4 } from 'uuid';
import type { DatabaseExecutor } from '../client.js';
import { caret_users, type JsonObject, type ProviderIdentity } from '../../schema/index.js';

export interface ProviderProfileFields {
  role: string;
  email?: string | null;
  name?: string | null;
  avatar_url?: string | null;
  access_token_expires_at?: string | null;
}

export interface CreateProviderIdentityInput extends ProviderProfileFields {
  user_id: string;
  provider: string;
  provider_user_id: string;
  metadata?: JsonObject;
}

export function findProviderIdentity(
  ex: DatabaseExecutor,
  provider: string,
  providerUserId: string
): ProviderIdentity | null {
  return (
    ex
      .select()
      .from(caret_users)
      .where(and(eq(caret_users.provider, provider), eq(caret_users.provider_user_id, providerUserId)))
      .get() ?? null
  );
}

export function getProviderIdentityByUserId(
  ex: DatabaseExecutor,
  userId: string
): ProviderIdentity | null {
  return ex.select().from(caret_users).where(eq(caret_users.user_id, userId)).get() ?? null;
}

/**
 * Insert a provider identity.
 *
 * Throws a UNIQUE constraint error when (provider, provider_user_id) already
 * exists; callers inside the provisioning transaction rely on that.
 */
export function insertProviderIdentity(
  ex: DatabaseExecutor,
  input: CreateProviderIdentityInput,
  now: string
): ProviderIdentity {
  const identity: ProviderIdentity = {
    id: uuidv4(),
    user_id: input.user_id,
    provider: input.provider,
    provider_user_id: input.provider_user_id,
    role: input.role,
    email: input.email ?? null,
    name: input.name ?? null,
    avatar_url: input.avatar_url ?? null,
    access_token_expires_at: input.access_token_expires_at ?? null,
    last_login_at: now,
    created_at: now,
    updated_at: now,
    metadata: input.metadata ?? {},
  };

  ex.insert(caret_users).values(identity).run();
  return identity;
}

/**
 * Refresh profile fields and last_login_at on a repeat login.
 * Fields the provider did not send keep their stored value.
 */
export function recordProviderLogin(
  ex: DatabaseExecutor,
  id: string,
  fields: ProviderProfileFields,
  now: string
): ProviderIdentity | null {
  return (
    ex
      .update(caret_users)
      .set({
        role: fields.role,
        ...(fields.email != null && { email: fields.email }),
        ...(fields.name != null && { name: fields.name }),
        ...(fields.avatar_url != null && { avatar_url: fields.avatar_url }),
        ...(fields.access_token_expires_at != null && {
          access_token_expires_at: fields.access_token_expires_at,
        }),
        last_login_at: now,
        updated_at: now,
      })
      .where(eq(caret_users.id, id))
      .returning()
      .get() ?? null
  );
}
