/**
 * Session Token Manager
 *
 * Issues, verifies, rotates and revokes access/refresh token pairs.
 *
 * One session_tokens row per refresh token; the row id is the access token's
 * jti. Rotation retires the presented row and inserts its successor in the
 * same family. Presenting a retired refresh token is treated as theft: the
 * whole family is revoked.
 */

import { v4 as uuidv4 } from 'uuid';
import {
  ForbiddenError,
  InvalidRefreshTokenError,
  RefreshExpiredError,
  RefreshReuseDetectedError,
  addSeconds,
  checkDatabaseHealth,
  getApiKeyById,
  getSessionTokenById,
  getSessionTokenByRefreshHash,
  insertSessionToken,
  isApiKeyUsable,
  logger,
  revokeSessionFamily,
  revokeSessionToken,
  revokeSessionsForUser,
  runInTransaction,
  systemClock,
  touchSessionToken,
  type Clock,
  type DatabaseClient,
  type DatabaseExecutor,
  type JsonObject,
  type ProviderHealth,
  type SessionToken,
} from '@tollgate/core';
import {
  generateRefreshToken,
  hashToken,
  isRefreshTokenFormat,
  signAccessToken,
  verifyAccessToken,
} from './token.js';
import type {
  AccessTokenVerification,
  IssueSessionRequest,
  IssuedSession,
  SessionTokenManagerOptions,
  SessionVerification,
} from './types.js';

const SECONDS_PER_DAY = 86400;

type RotationOutcome =
  | { kind: 'rotated'; issued: IssuedSession }
  | { kind: 'unknown' }
  | { kind: 'expired'; session_id: string }
  | { kind: 'key_inactive'; session_id: string; api_key_id: string }
  | { kind: 'reuse'; session: SessionToken; revoked: number };

interface MintRequest extends IssueSessionRequest {
  family_id: string;
  parent_id: string | null;
}

export class SessionTokenManager {
  private readonly accessTtlSeconds: number;
  private readonly refreshTtlSeconds: number;

  constructor(
    private db: DatabaseClient,
    private options: SessionTokenManagerOptions,
    private clock: Clock = systemClock
  ) {
    this.accessTtlSeconds = options.access_token_ttl_minutes * 60;
    this.refreshTtlSeconds = options.refresh_token_ttl_days * SECONDS_PER_DAY;
  }

  /**
   * Start a new login chain for a user and one of their API keys
   *
   * @throws ForbiddenError if the API key does not belong to the user
   */
  async issue(request: IssueSessionRequest): Promise<IssuedSession> {
    const issued = runInTransaction(this.db, tx => {
      const key = getApiKeyById(tx, request.api_key_id);
      if (!key || key.user_id !== request.user_id) {
        throw new ForbiddenError('API key does not belong to user', {
          api_key_id: request.api_key_id,
        });
      }
      return this.mint(tx, { ...request, family_id: uuidv4(), parent_id: null });
    });

    logger.info(
      { user_id: request.user_id, session_id: issued.session_id, family_id: issued.family_id },
      '[authn-session] Session issued'
    );
    return issued;
  }

  /**
   * Check signature, expiry and claims of an access token (no store access)
   */
  decodeAccessToken(token: string): AccessTokenVerification {
    return verifyAccessToken(this.options.secret, token, this.clock.now());
  }

  /**
   * Liveness of the session behind an access token's jti. A session is only
   * as live as the API key it is scoped to.
   */
  async verify(jti: string): Promise<SessionVerification> {
    const session = getSessionTokenById(this.db, jti);
    if (!session) {
      return { status: 'not_found' };
    }
    if (session.revoked_at !== null) {
      return { status: 'revoked', session };
    }
    if (!this.isKeyUsable(this.db, session.api_key_id, this.clock.now())) {
      return { status: 'key_inactive', session };
    }
    return { status: 'active', session };
  }

  /**
   * Exchange a refresh token for a new pair
   *
   * @param metadata Merged over the metadata carried from the previous row
   * @throws InvalidRefreshTokenError (also when the session's API key is inactive),
   *   RefreshExpiredError, RefreshReuseDetectedError
   */
  async refresh(refreshToken: string, metadata: JsonObject = {}): Promise<IssuedSession> {
    if (!isRefreshTokenFormat(refreshToken)) {
      throw new InvalidRefreshTokenError();
    }
    const tokenHash = hashToken(refreshToken);

    // Outcomes are returned, not thrown, so a family revocation commits
    const outcome = runInTransaction(this.db, (tx): RotationOutcome => {
      const current = getSessionTokenByRefreshHash(tx, tokenHash);
      if (!current) {
        return { kind: 'unknown' };
      }

      const now = this.clock.now();
      const nowIso = now.toISOString();

      if (current.revoked_at !== null) {
        const revoked = revokeSessionFamily(tx, current.family_id, 'reuse_detected', nowIso);
        return { kind: 'reuse', session: current, revoked };
      }

      if (new Date(current.refresh_expires_at).getTime() <= now.getTime()) {
        return { kind: 'expired', session_id: current.id };
      }

      // Left unrevoked: reactivating the key brings the session back
      if (!this.isKeyUsable(tx, current.api_key_id, now)) {
        return { kind: 'key_inactive', session_id: current.id, api_key_id: current.api_key_id };
      }

      if (!revokeSessionToken(tx, current.id, 'rotated', nowIso)) {
        const revoked = revokeSessionFamily(tx, current.family_id, 'reuse_detected', nowIso);
        return { kind: 'reuse', session: current, revoked };
      }

      const issued = this.mint(tx, {
        user_id: current.user_id,
        api_key_id: current.api_key_id,
        metadata: { ...current.metadata, ...metadata },
        family_id: current.family_id,
        parent_id: current.id,
      });
      return { kind: 'rotated', issued };
    });

    switch (outcome.kind) {
      case 'rotated':
        logger.debug(
          { session_id: outcome.issued.session_id, family_id: outcome.issued.family_id },
          '[authn-session] Refresh token rotated'
        );
        return outcome.issued;
      case 'unknown':
        throw new InvalidRefreshTokenError();
      case 'expired':
        logger.debug({ session_id: outcome.session_id }, '[authn-session] Expired refresh token presented');
        throw new RefreshExpiredError();
      case 'key_inactive':
        logger.debug(
          { session_id: outcome.session_id, api_key_id: outcome.api_key_id },
          '[authn-session] Refresh refused, API key inactive or expired'
        );
        throw new InvalidRefreshTokenError();
      case 'reuse':
        logger.warn(
          {
            security_event: 'refresh_reuse_detected',
            user_id: outcome.session.user_id,
            session_id: outcome.session.id,
            family_id: outcome.session.family_id,
            revoked_sessions: outcome.revoked,
          },
          '[authn-session] Refresh token reuse detected, session family revoked'
        );
        throw new RefreshReuseDetectedError();
    }
  }

  /**
   * Log out the session behind an access token
   *
   * @returns true if this call revoked it; false if already revoked or unknown
   */
  async revokeByJti(jti: string): Promise<boolean> {
    const revoked = revokeSessionToken(this.db, jti, 'logout', this.clock.now().toISOString());
    if (revoked) {
      logger.info({ session_id: jti }, '[authn-session] Session revoked');
    }
    return revoked;
  }

  /**
   * Log out the session a refresh token belongs to
   *
   * @returns true if this call revoked it; false if already revoked or unknown
   */
  async revokeByRefreshToken(refreshToken: string): Promise<boolean> {
    if (!isRefreshTokenFormat(refreshToken)) {
      return false;
    }
    const session = getSessionTokenByRefreshHash(this.db, hashToken(refreshToken));
    if (!session) {
      return false;
    }
    return this.revokeByJti(session.id);
  }

  /**
   * Revoke every active session of a user (administrative)
   *
   * @returns Number of sessions revoked
   */
  async revokeAllForUser(userId: string): Promise<number> {
    const count = revokeSessionsForUser(this.db, userId, 'admin', this.clock.now().toISOString());
    logger.info({ user_id: userId, revoked_sessions: count }, '[authn-session] User sessions revoked');
    return count;
  }

  /**
   * Record access-token use on the session row
   */
  async touch(jti: string): Promise<void> {
    touchSessionToken(this.db, jti, this.clock.now().toISOString());
  }

  async healthCheck(): Promise<ProviderHealth> {
    const healthy = checkDatabaseHealth(this.db);
    return {
      status: healthy ? 'healthy' : 'unhealthy',
      message: healthy ? 'Session store accessible' : 'Session store unreachable',
      last_checked: this.clock.now().toISOString(),
    };
  }

  private isKeyUsable(ex: DatabaseExecutor, apiKeyId: string, now: Date): boolean {
    const key = getApiKeyById(ex, apiKeyId);
    return key !== null && isApiKeyUsable(key, now);
  }

  private mint(tx: DatabaseExecutor, request: MintRequest): IssuedSession {
    const now = this.clock.now();
    const sessionId = uuidv4();

    const access = signAccessToken(
      this.options.secret,
      { user_id: request.user_id, api_key_id: request.api_key_id, jti: sessionId },
      now,
      this.accessTtlSeconds
    );
    const refreshToken = generateRefreshToken();
    const refreshExpiresAt = addSeconds(now, this.refreshTtlSeconds).toISOString();
    const accessExpiresAt = access.expires_at.toISOString();

    insertSessionToken(tx, {
      id: sessionId,
      user_id: request.user_id,
      api_key_id: request.api_key_id,
      family_id: request.family_id,
      parent_id: request.parent_id,
      refresh_token_hash: hashToken(refreshToken),
      refresh_expires_at: refreshExpiresAt,
      access_expires_at: accessExpiresAt,
      created_at: now.toISOString(),
      metadata: request.metadata ?? {},
    });

    return {
      session_id: sessionId,
      family_id: request.family_id,
      access_token: access.token,
      refresh_token: refreshToken,
      access_token_expires_at: accessExpiresAt,
      refresh_token_expires_at: refreshExpiresAt,
    };
  }
}
