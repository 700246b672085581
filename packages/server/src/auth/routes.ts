/**
 * Auth Routes
 *
 * Social login, refresh token rotation and logout. Login and refresh are
 * unauthenticated: the provider token or refresh token is the credential.
 */

import type { FastifyInstance } from 'fastify';
import { ValidationError } from '@tollgate/core';
import type { SessionTokenManager } from '@tollgate/authn-session';
import type { IdentityProvisioningService } from '../services/identity-provisioning.js';
import { wrapSuccess } from '../admin/reply-envelope.js';
import { toIdentitySummary } from '../routes/views.js';
import { CREDENTIAL_HEADER, type CredentialResolver } from './credential-resolver.js';
import { logoutSchema, refreshSchema, socialLoginSchema } from './schemas.js';

export interface AuthRoutesConfig {
  provisioning: IdentityProvisioningService;
  sessions: SessionTokenManager;
  resolver: CredentialResolver;
}

export async function registerAuthRoutes(
  fastify: FastifyInstance,
  opts: AuthRoutesConfig
): Promise<void> {
  const { provisioning, sessions, resolver } = opts;

  // ==========================================================================
  // POST /v1/auth/social-login
  // ==========================================================================
  fastify.post('/v1/auth/social-login', async (request, reply) => {
    const body = socialLoginSchema.parse(request.body);

    const result = await provisioning.socialLogin({
      ...body,
      user_agent: body.user_agent ?? request.headers['user-agent'],
      ip: body.ip ?? request.ip,
    });

    return reply.status(result.is_new_user ? 201 : 200).send(
      wrapSuccess({
        is_new_user: result.is_new_user,
        user: result.user,
        budget: result.budget,
        identity: toIdentitySummary(result.identity),
        api_key_id: result.api_key_id,
        api_key: result.api_key,
        access_token: result.access_token,
        refresh_token: result.refresh_token,
        access_token_expires_at: result.access_token_expires_at,
        refresh_token_expires_at: result.refresh_token_expires_at,
      })
    );
  });

  // ==========================================================================
  // POST /v1/auth/refresh
  // ==========================================================================
  fastify.post('/v1/auth/refresh', async (request, reply) => {
    const body = refreshSchema.parse(request.body);
    const issued = await sessions.refresh(body.refresh_token, body.metadata ?? {});

    return reply.send(
      wrapSuccess({
        access_token: issued.access_token,
        refresh_token: issued.refresh_token,
        access_token_expires_at: issued.access_token_expires_at,
        refresh_token_expires_at: issued.refresh_token_expires_at,
      })
    );
  });

  // ==========================================================================
  // POST /v1/auth/logout
  // ==========================================================================
  fastify.post('/v1/auth/logout', async (request, reply) => {
    const body = logoutSchema.parse(request.body ?? undefined);

    if (body.refresh_token) {
      const revoked = await sessions.revokeByRefreshToken(body.refresh_token);
      return reply.send(wrapSuccess({ revoked }));
    }

    const header = request.headers[CREDENTIAL_HEADER];
    if (header === undefined) {
      throw new ValidationError('Logout requires a refresh_token or an access token credential');
    }

    const principal = await resolver.resolve(header);
    if (principal.kind !== 'access_token') {
      throw new ValidationError('Logout requires a refresh_token or an access token credential', {
        credential_kind: principal.kind,
      });
    }

    const revoked = await sessions.revokeByJti(principal.session_id);
    return reply.send(wrapSuccess({ revoked }));
  });
}
