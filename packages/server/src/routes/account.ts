/**
 * Account Routes
 *
 * The caller's own view of their account (`self` class) and the profile
 * endpoint (`profile` class), which the master key can read for any user.
 *
 * Every read starts by rolling the budget window so spend is current.
 */

import type { FastifyInstance } from 'fastify';
import {
  getProviderIdentityByUserId,
  listApiKeysForUser,
  type Clock,
  type DatabaseClient,
  type UsageLedger,
} from '@tollgate/core';
import { wrapSuccess } from '../admin/reply-envelope.js';
import type { CredentialResolver } from '../auth/credential-resolver.js';
import { getEffectiveUserId, getPrincipal, requireRouteClass } from '../auth/middleware.js';
import { profileQuerySchema } from './schemas.js';
import { toApiKeySummary, toIdentitySummary } from './views.js';

const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

export interface AccountRoutesConfig {
  db: DatabaseClient;
  resolver: CredentialResolver;
  ledger: UsageLedger;
  clock: Clock;
}

export async function registerAccountRoutes(
  fastify: FastifyInstance,
  opts: AccountRoutesConfig
): Promise<void> {
  const { db, resolver, ledger, clock } = opts;

  // ==========================================================================
  // GET /v1/me
  // ==========================================================================
  fastify.get(
    '/v1/me',
    { preHandler: requireRouteClass(resolver, 'self') },
    async (request, reply) => {
      const userId = getEffectiveUserId(request);
      const { user, budget } = await ledger.ensureBudgetWindow(userId);

      return reply.send(
        wrapSuccess({
          credential: getPrincipal(request).kind,
          user,
          budget,
          identity: toIdentitySummary(getProviderIdentityByUserId(db, userId)),
        })
      );
    }
  );

  // ==========================================================================
  // GET /v1/keys
  // ==========================================================================
  fastify.get(
    '/v1/keys',
    { preHandler: requireRouteClass(resolver, 'self') },
    async (request, reply) => {
      const keys = listApiKeysForUser(db, getEffectiveUserId(request));
      return reply.send(wrapSuccess(keys.map(toApiKeySummary)));
    }
  );

  // ==========================================================================
  // GET /v1/profile?user=&recent_limit=
  // ==========================================================================
  fastify.get(
    '/v1/profile',
    { preHandler: requireRouteClass(resolver, 'profile', 'query') },
    async (request, reply) => {
      const query = profileQuerySchema.parse(request.query);
      const userId = getEffectiveUserId(request);

      const { user, budget } = await ledger.ensureBudgetWindow(userId);
      const now = clock.now().getTime();

      const [last24h, last7d, last30d] = await Promise.all([
        ledger.summarizeUsage(userId, new Date(now - DAY_MS)),
        ledger.summarizeUsage(userId, new Date(now - 7 * DAY_MS)),
        ledger.summarizeUsage(userId, new Date(now - 30 * DAY_MS)),
      ]);
      const recent = await ledger.recentUsage(userId, query.recent_limit);

      return reply.send(
        wrapSuccess({
          user,
          budget,
          identity: toIdentitySummary(getProviderIdentityByUserId(db, userId)),
          usage: {
            last_24h: last24h,
            last_7d: last7d,
            last_30d: last30d,
          },
          recent_usage: recent,
        })
      );
    }
  );
}
