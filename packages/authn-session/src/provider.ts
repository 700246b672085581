/**
 * Access Token Authentication Provider
 *
 * Implements AuthenticationProvider SPI for short-lived JWT access tokens.
 *
 * - Not JWT-shaped, bad signature or malformed claims: not_applicable, so the
 *   resolver can still try the token as an API key
 * - Valid signature but past exp: not_applicable with expired = true
 * - Valid token whose session row is revoked or missing, or whose API key
 *   is inactive or expired: rejected
 */

import type { AuthenticationProvider, AuthResult, ProviderHealth } from '@tollgate/core';
import { RevokedOrUnknownSessionError, logger } from '@tollgate/core';
import type { SessionTokenManager } from './session-manager.js';
import { isJwtShaped } from './token.js';

export class AccessTokenAuthProvider implements AuthenticationProvider {
  readonly id = 'access_token';

  constructor(private sessions: SessionTokenManager) {}

  async authenticate(token: string): Promise<AuthResult> {
    if (!isJwtShaped(token)) {
      return { outcome: 'not_applicable' };
    }

    const decoded = this.sessions.decodeAccessToken(token);
    if (decoded.status === 'expired') {
      return { outcome: 'not_applicable', expired: true };
    }
    if (decoded.status === 'invalid') {
      return { outcome: 'not_applicable' };
    }

    const { claims } = decoded;
    const verification = await this.sessions.verify(claims.jti);
    if (verification.status !== 'active') {
      logger.debug(
        { session_id: claims.jti, status: verification.status },
        '[authn-session] Access token for inactive session'
      );
      return { outcome: 'rejected', error: new RevokedOrUnknownSessionError() };
    }

    const { session } = verification;
    if (session.user_id !== claims.sub || session.api_key_id !== claims.api_key_id) {
      logger.warn({ session_id: claims.jti }, '[authn-session] Access token claims do not match session');
      return { outcome: 'rejected', error: new RevokedOrUnknownSessionError() };
    }

    // Update last_used_at (background - don't block auth)
    Promise.resolve()
      .then(() => this.sessions.touch(session.id))
      .catch((err: unknown) => {
        logger.warn({ err, session_id: session.id }, '[authn-session] Failed to update last_used_at');
      });

    return {
      outcome: 'authenticated',
      principal: {
        kind: 'access_token',
        user_id: session.user_id,
        api_key_id: session.api_key_id,
        session_id: session.id,
        is_admin: false,
      },
    };
  }

  async healthCheck(): Promise<ProviderHealth> {
    return this.sessions.healthCheck();
  }
}
