/**
 * Session Token Repository
 *
 * Refresh-token rows. Revocation is a compare-and-swap on revoked_at: a
 * row is only ever revoked once, and the caller learns whether it won.
 *
 * @see schema/index.ts session_tokens table
 */

import { and, eq, isNull } from 'drizzle-orm';
import type { DatabaseExecutor } from '../client.js';
import {
  session_tokens,
  type NewSessionToken,
  type SessionRevocationReason,
  type SessionToken,
} from '../../schema/index.js';

export function insertSessionToken(ex: DatabaseExecutor, row: NewSessionToken): SessionToken {
  return ex.insert(session_tokens).values(row).returning().get();
}

export function getSessionTokenById(ex: DatabaseExecutor, id: string): SessionToken | null {
  return ex.select().from(session_tokens).where(eq(session_tokens.id, id)).get() ?? null;
}

export function getSessionTokenByRefreshHash(
  ex: DatabaseExecutor,
  refreshTokenHash: string
): SessionToken | null {
  return (
    ex
      .select()
      .from(session_tokens)
      .where(eq(session_tokens.refresh_token_hash, refreshTokenHash))
      .get() ?? null
  );
}

/**
 * Revoke one row if it is still active.
 *
 * @returns true if this call performed the revocation
 */
export function revokeSessionToken(
  ex: DatabaseExecutor,
  id: string,
  reason: SessionRevocationReason,
  now: string
): boolean {
  const result = ex
    .update(session_tokens)
    .set({ revoked_at: now, revoked_reason: reason })
    .where(and(eq(session_tokens.id, id), isNull(session_tokens.revoked_at)))
    .run();
  return result.changes === 1;
}

/**
 * Revoke every still-active row of a login chain
 *
 * @returns Number of rows revoked
 */
export function revokeSessionFamily(
  ex: DatabaseExecutor,
  familyId: string,
  reason: SessionRevocationReason,
  now: string
): number {
  const result = ex
    .update(session_tokens)
    .set({ revoked_at: now, revoked_reason: reason })
    .where(and(eq(session_tokens.family_id, familyId), isNull(session_tokens.revoked_at)))
    .run();
  return result.changes;
}

export function revokeSessionsForUser(
  ex: DatabaseExecutor,
  userId: string,
  reason: SessionRevocationReason,
  now: string
): number {
  const result = ex
    .update(session_tokens)
    .set({ revoked_at: now, revoked_reason: reason })
    .where(and(eq(session_tokens.user_id, userId), isNull(session_tokens.revoked_at)))
    .run();
  return result.changes;
}

export function listSessionFamily(ex: DatabaseExecutor, familyId: string): SessionToken[] {
  return ex.select().from(session_tokens).where(eq(session_tokens.family_id, familyId)).all();
}

export function touchSessionToken(ex: DatabaseExecutor, id: string, now: string): void {
  ex.update(session_tokens).set({ last_used_at: now }).where(eq(session_tokens.id, id)).run();
}
