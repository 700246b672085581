/**
 * @tollgate/server
 *
 * Fastify HTTP surface: credential resolution, social login, session
 * rotation, account, usage and admin routes.
 */

export { GatewayServer, type GatewayServerOptions } from './server.js';
export {
  CREDENTIAL_HEADER,
  CredentialResolver,
  parseBearerCredential,
} from './auth/credential-resolver.js';
export {
  getEffectiveUserId,
  getPrincipal,
  requireRouteClass,
  type TargetUserSource,
} from './auth/middleware.js';
export {
  IdentityProvisioningService,
  buildSessionMetadata,
  type IdentityOutcome,
  type IdentityProvisioningOptions,
  type ProvisioningResult,
  type SessionContext,
  type SocialLoginRequest,
  type SocialProfile,
} from './services/identity-provisioning.js';
export { HttpProfileVerifier, type FetchFn } from './services/profile-verifier.js';
export { wrapError, wrapSuccess } from './admin/reply-envelope.js';
