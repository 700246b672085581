/**
 * @tollgate/authz-local
 *
 * Route-class authorization policy
 *
 * Every protected route belongs to one fixed class. The class decides which
 * credential kinds may call it and whether the master key must name the user
 * it is acting for.
 *
 * Decision logic:
 * 1. Credential kind not accepted by the class → Forbidden
 * 2. Master on a target-required class → the supplied target, or TargetUserRequired
 * 3. User principals act as themselves; naming another user → Forbidden
 */

import {
  ForbiddenError,
  TargetUserRequiredError,
  type CredentialKind,
  type Principal,
} from '@tollgate/core';

export type RouteClass = 'call' | 'self' | 'admin' | 'profile';

export interface RoutePolicy {
  allowed: readonly CredentialKind[];
  /** Whether the master key must supply the user it acts for */
  master_target: 'required' | 'none';
}

export const ROUTE_POLICIES: Readonly<Record<RouteClass, RoutePolicy>> = {
  call: { allowed: ['api_key', 'access_token', 'master'], master_target: 'required' },
  self: { allowed: ['api_key', 'access_token'], master_target: 'none' },
  admin: { allowed: ['master'], master_target: 'none' },
  profile: { allowed: ['api_key', 'access_token', 'master'], master_target: 'required' },
};

export interface AuthorizationDecision {
  principal: Principal;
  /** Effective user; null for administrative routes */
  user_id: string | null;
}

/**
 * Authorize a resolved principal for a route class
 *
 * @param targetUserId The `user` parameter of the request, if any
 * @throws ForbiddenError, TargetUserRequiredError
 */
export function authorizeRoute(
  routeClass: RouteClass,
  principal: Principal,
  targetUserId?: string | null
): AuthorizationDecision {
  const policy = ROUTE_POLICIES[routeClass];

  if (!policy.allowed.includes(principal.kind)) {
    throw new ForbiddenError(`This route does not accept ${principal.kind} credentials`, {
      route_class: routeClass,
      credential_kind: principal.kind,
    });
  }

  const target = targetUserId ? targetUserId : null;

  if (principal.kind === 'master') {
    if (policy.master_target === 'none') {
      return { principal, user_id: null };
    }
    if (target === null) {
      throw new TargetUserRequiredError();
    }
    return { principal, user_id: target };
  }

  if (target !== null && target !== principal.user_id) {
    throw new ForbiddenError('Cannot act on behalf of another user', { route_class: routeClass });
  }
  return { principal, user_id: principal.user_id };
}
