/**
 * @tollgate/authn-session
 *
 * Session token lifecycle: short-lived HS256 access tokens paired with
 * rotating refresh tokens, plus the provider that authenticates access
 * tokens.
 */

export { SessionTokenManager } from './session-manager.js';
export { AccessTokenAuthProvider } from './provider.js';
export { resolveJwtSecret } from './jwt-secret.js';
export {
  REFRESH_TOKEN_PREFIX,
  generateRefreshToken,
  hashToken,
  isJwtShaped,
  isRefreshTokenFormat,
  signAccessToken,
  verifyAccessToken,
} from './token.js';
export type {
  AccessTokenClaims,
  AccessTokenVerification,
  IssueSessionRequest,
  IssuedSession,
  SessionTokenManagerOptions,
  SessionVerification,
  SignedAccessToken,
} from './types.js';
