/**
 * Service Provider Interface (SPI) definitions
 *
 * Contracts shared between the credential providers, the resolver that
 * composes them, the policy engine and the social-login pipeline.
 */

import type { GatewayError } from '../utils/errors.js';

// ===== Principal =====

export type CredentialKind = 'master' | 'api_key' | 'access_token';

export interface MasterPrincipal {
  kind: 'master';
  is_admin: true;
}

export interface ApiKeyPrincipal {
  kind: 'api_key';
  user_id: string;
  api_key_id: string;
  is_admin: false;
}

export interface AccessTokenPrincipal {
  kind: 'access_token';
  user_id: string;
  api_key_id: string;
  /** SessionToken row id (the token's jti) */
  session_id: string;
  is_admin: false;
}

/**
 * Resolved caller identity. Produced once per request by the credential
 * resolver; nothing downstream looks at the raw header.
 */
export type Principal = MasterPrincipal | ApiKeyPrincipal | AccessTokenPrincipal;

export type UserPrincipal = ApiKeyPrincipal | AccessTokenPrincipal;

// ===== Authentication SPI =====

/**
 * Authentication outcome for one provider.
 *
 * - authenticated: the token belongs to this provider and is valid
 * - rejected: the token belongs to this provider but must not be accepted
 * - not_applicable: the token is not this provider's; try the next one
 *   (expired = true when it looked like ours but had expired)
 */
export type AuthResult =
  | { outcome: 'authenticated'; principal: UserPrincipal }
  | { outcome: 'rejected'; error: GatewayError }
  | { outcome: 'not_applicable'; expired?: boolean };

/**
 * Authentication Provider Interface
 *
 * Implementations: AccessTokenAuthProvider (@tollgate/authn-session),
 *                  ApiKeyAuthProvider (@tollgate/authn-apikey)
 */
export interface AuthenticationProvider extends ProviderLifecycle {
  /** Which credential kind this provider produces */
  readonly id: Exclude<CredentialKind, 'master'>;

  /** Validate a bearer token (header prefix already stripped) */
  authenticate(token: string): Promise<AuthResult>;
}

// ===== Profile verification SPI =====

export interface ProfileVerificationRequest {
  provider: string;
  access_token: string;
}

/**
 * Normalized social profile returned by a verifier
 */
export interface VerifiedProfile {
  subject: string;
  email?: string | null;
  name?: string | null;
  avatar_url?: string | null;
  role: string;
  /** When the provider's own access token stops being valid, if known */
  access_token_expires_at?: string | null;
}

/**
 * Verifies a social provider access token and returns the caller's profile.
 * Must honor the abort signal; the pipeline aborts on timeout.
 */
export interface ProfileVerifier {
  verify(request: ProfileVerificationRequest, signal: AbortSignal): Promise<VerifiedProfile>;
}

// ===== Common Provider Types =====

export interface ProviderHealth {
  status: 'healthy' | 'degraded' | 'unhealthy';
  message?: string;
  latency_ms?: number;
  last_checked: string;
}

export interface ProviderLifecycle {
  /** Health check */
  healthCheck(): Promise<ProviderHealth>;
}
