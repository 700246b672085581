/**
 * Access and Refresh Token Primitives
 *
 * Access token: HS256 JWT with sub, api_key_id, jti, iat, exp. Stateless to
 * verify; liveness is checked separately against the session row (jti).
 *
 * Refresh token: tg_rt_{64 base64url} (48 random bytes). Only its SHA-256
 * hex digest is stored, in session_tokens.refresh_token_hash.
 *
 * Signing and verification are synchronous and take "now" from the caller so
 * every expiry decision follows the injected clock.
 */

import { createHash, randomBytes } from 'crypto';
import jwt, { type JwtPayload } from 'jsonwebtoken';
import { z } from 'zod';
import { toUnixSeconds } from '@tollgate/core';
import type { AccessTokenClaims, AccessTokenVerification, SignedAccessToken } from './types.js';

export const REFRESH_TOKEN_PREFIX = 'tg_rt_';

const REFRESH_TOKEN_BYTES = 48;
const REFRESH_TOKEN_PATTERN = /^tg_rt_[A-Za-z0-9_-]{64}$/;
const JWT_SHAPE_PATTERN = /^[A-Za-z0-9_-]+\.[A-Za-z0-9_-]+\.[A-Za-z0-9_-]+$/;

const claimsSchema = z.object({
  sub: z.string().min(1),
  api_key_id: z.string().min(1),
  jti: z.string().min(1),
  iat: z.number().int(),
  exp: z.number().int(),
});

/**
 * Sign an access token
 *
 * @param issuedAt Clock reading used for iat
 * @param ttlSeconds Lifetime; exp = iat + ttlSeconds
 */
export function signAccessToken(
  secret: string,
  subject: { user_id: string; api_key_id: string; jti: string },
  issuedAt: Date,
  ttlSeconds: number
): SignedAccessToken {
  const iat = toUnixSeconds(issuedAt);
  const claims: AccessTokenClaims = {
    sub: subject.user_id,
    api_key_id: subject.api_key_id,
    jti: subject.jti,
    iat,
    exp: iat + ttlSeconds,
  };

  const token = jwt.sign(claims, secret, { algorithm: 'HS256' });
  return { token, expires_at: new Date(claims.exp * 1000) };
}

/**
 * Verify signature, expiry and claim structure.
 *
 * expired is only reported for tokens whose signature checked out.
 */
export function verifyAccessToken(secret: string, token: string, now: Date): AccessTokenVerification {
  let decoded: string | JwtPayload;
  try {
    decoded = jwt.verify(token, secret, {
      algorithms: ['HS256'],
      clockTimestamp: toUnixSeconds(now),
    });
  } catch (err) {
    if (err instanceof jwt.TokenExpiredError) {
      return { status: 'expired' };
    }
    return { status: 'invalid' };
  }

  const parsed = claimsSchema.safeParse(decoded);
  if (!parsed.success) {
    return { status: 'invalid' };
  }
  return { status: 'valid', claims: parsed.data };
}

/**
 * Three dot-separated base64url segments
 */
export function isJwtShaped(token: string): boolean {
  return JWT_SHAPE_PATTERN.test(token);
}

export function generateRefreshToken(): string {
  return `${REFRESH_TOKEN_PREFIX}${randomBytes(REFRESH_TOKEN_BYTES).toString('base64url')}`;
}

export function isRefreshTokenFormat(token: string): boolean {
  return REFRESH_TOKEN_PATTERN.test(token);
}

/**
 * SHA-256 hex digest used to store and look up refresh tokens
 */
export function hashToken(token: string): string {
  return createHash('sha256').update(token, 'utf8').digest('hex');
}
