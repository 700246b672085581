/**
 * Local types for the session token provider
 */

import type { JsonObject, SessionToken } from '@tollgate/core';

/**
 * Claims carried by an access token
 */
export interface AccessTokenClaims {
  /** user_id */
  sub: string;
  api_key_id: string;
  /** session_tokens.id */
  jti: string;
  iat: number;
  exp: number;
}

export type AccessTokenVerification =
  | { status: 'valid'; claims: AccessTokenClaims }
  | { status: 'expired' }
  | { status: 'invalid' };

/**
 * Signed access token with its expiry
 */
export interface SignedAccessToken {
  token: string;
  expires_at: Date;
}

export interface IssueSessionRequest {
  user_id: string;
  api_key_id: string;
  /** Device/client info stored on the session row */
  metadata?: JsonObject;
}

/**
 * Token pair handed to the client. Plaintexts exist only here.
 */
export interface IssuedSession {
  session_id: string;
  family_id: string;
  access_token: string;
  refresh_token: string;
  access_token_expires_at: string;
  refresh_token_expires_at: string;
}

export type SessionVerification =
  | { status: 'active'; session: SessionToken }
  | { status: 'revoked'; session: SessionToken }
  /** Session row is live but its API key is inactive or expired */
  | { status: 'key_inactive'; session: SessionToken }
  | { status: 'not_found' };

export interface SessionTokenManagerOptions {
  /** HS256 signing secret */
  secret: string;
  access_token_ttl_minutes: number;
  refresh_token_ttl_days: number;
}
