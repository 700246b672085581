/**
 * Access token signing secret
 *
 * auth.jwt_secret when configured, otherwise the master key. The fallback
 * means rotating the master key also invalidates every access token.
 */

import { logger, type AuthConfig } from '@tollgate/core';

export function resolveJwtSecret(auth: Pick<AuthConfig, 'jwt_secret' | 'master_key'>): string {
  if (auth.jwt_secret) {
    return auth.jwt_secret;
  }
  logger.warn('[authn-session] auth.jwt_secret not set, signing access tokens with the master key');
  return auth.master_key;
}
