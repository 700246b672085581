/**
 * Authentication & authorization pre-handler hooks
 *
 * Resolves the X-AnyLLM-Key credential once per request, applies the route
 * class policy and leaves the outcome on request.principal and
 * request.effectiveUserId. Handlers never look at the raw header.
 */

import type { FastifyRequest, preHandlerHookHandler } from 'fastify';
import { authorizeRoute, type RouteClass } from '@tollgate/authz-local';
import { GatewayError, type Principal } from '@tollgate/core';
import { ErrorCodes } from '../admin/reply-envelope.js';
import { CREDENTIAL_HEADER, type CredentialResolver } from './credential-resolver.js';

declare module 'fastify' {
  interface FastifyRequest {
    principal: Principal | null;
    effectiveUserId: string | null;
  }
}

/**
 * Where a route reads the master key's target user from
 */
export type TargetUserSource = 'query' | 'body';

function readUserField(source: unknown): string | undefined {
  if (typeof source === 'object' && source !== null && 'user' in source) {
    const value = source.user;
    if (typeof value === 'string' && value.length > 0) {
      return value;
    }
  }
  return undefined;
}

/**
 * Build a preHandler that authenticates the caller and authorizes the route class
 *
 * @param target Where the optional `user` parameter lives for this route
 */
export function requireRouteClass(
  resolver: CredentialResolver,
  routeClass: RouteClass,
  target?: TargetUserSource
): preHandlerHookHandler {
  // eslint-disable-next-line @typescript-eslint/no-misused-promises
  return async (request: FastifyRequest): Promise<void> => {
    const principal = await resolver.resolve(request.headers[CREDENTIAL_HEADER]);

    const targetUserId =
      target === 'query'
        ? readUserField(request.query)
        : target === 'body'
          ? readUserField(request.body)
          : undefined;

    const decision = authorizeRoute(routeClass, principal, targetUserId);
    request.principal = decision.principal;
    request.effectiveUserId = decision.user_id;
  };
}

/**
 * The user a handler acts for. Only call behind a hook whose route class
 * always yields one.
 */
export function getEffectiveUserId(request: FastifyRequest): string {
  if (request.effectiveUserId === null) {
    throw new GatewayError('Request has no effective user', ErrorCodes.INTERNAL_ERROR, 500);
  }
  return request.effectiveUserId;
}

export function getPrincipal(request: FastifyRequest): Principal {
  if (request.principal === null) {
    throw new GatewayError('Request was not authenticated', ErrorCodes.INTERNAL_ERROR, 500);
  }
  return request.principal;
}
