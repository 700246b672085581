/**
 * Usage Routes
 *
 * Accrual point for completed model calls (`call` class). The credit check
 * runs first; a blocked or exhausted user gets nothing recorded.
 */

import type { FastifyInstance } from 'fastify';
import { getUserById, type DatabaseClient, type UsageLedger } from '@tollgate/core';
import { wrapSuccess } from '../admin/reply-envelope.js';
import type { CredentialResolver } from '../auth/credential-resolver.js';
import { getEffectiveUserId, getPrincipal, requireRouteClass } from '../auth/middleware.js';
import { recordUsageSchema } from './schemas.js';

export interface UsageRoutesConfig {
  db: DatabaseClient;
  resolver: CredentialResolver;
  ledger: UsageLedger;
}

export async function registerUsageRoutes(
  fastify: FastifyInstance,
  opts: UsageRoutesConfig
): Promise<void> {
  const { db, resolver, ledger } = opts;

  // ==========================================================================
  // POST /v1/usage
  // ==========================================================================
  fastify.post(
    '/v1/usage',
    { preHandler: requireRouteClass(resolver, 'call', 'body') },
    async (request, reply) => {
      const body = recordUsageSchema.parse(request.body);
      const userId = getEffectiveUserId(request);
      const principal = getPrincipal(request);

      await ledger.assertCanSpend(userId);

      const usage = await ledger.recordUsage({
        user_id: userId,
        api_key_id: principal.kind === 'master' ? null : principal.api_key_id,
        model: body.model,
        provider: body.provider,
        endpoint: body.endpoint,
        prompt_tokens: body.prompt_tokens,
        completion_tokens: body.completion_tokens,
        total_tokens: body.total_tokens,
        cost: body.cost,
        status: body.status,
        error_message: body.error_message,
      });

      return reply.status(201).send(
        wrapSuccess({
          usage,
          spend: getUserById(db, userId)?.spend ?? null,
        })
      );
    }
  );
}
