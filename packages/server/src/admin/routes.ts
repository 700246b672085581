/**
 * Admin API Routes
 *
 * Fastify plugin mounted under /v1/admin. Every route is in the `admin`
 * class: master key only.
 */

import type { FastifyPluginCallback } from 'fastify';
import {
  NotFoundError,
  getApiKeyById,
  getBudgetById,
  getProviderIdentityByUserId,
  getUserById,
  listApiKeysForUser,
  logger,
  rescheduleBudgetWindows,
  runInTransaction,
  setApiKeyActive,
  updateBudget,
  updateUser,
  type Clock,
  type DatabaseClient,
} from '@tollgate/core';
import type { SessionTokenManager } from '@tollgate/authn-session';
import type { CredentialResolver } from '../auth/credential-resolver.js';
import { requireRouteClass } from '../auth/middleware.js';
import { toApiKeySummary, toIdentitySummary } from '../routes/views.js';
import { wrapSuccess } from './reply-envelope.js';
import {
  budgetParamsSchema,
  keyParamsSchema,
  updateBudgetSchema,
  updateKeySchema,
  updateUserSchema,
  userParamsSchema,
} from './schemas.js';

export interface AdminRoutesConfig {
  db: DatabaseClient;
  resolver: CredentialResolver;
  sessions: SessionTokenManager;
  clock: Clock;
}

export const registerAdminRoutes: FastifyPluginCallback<AdminRoutesConfig> = (fastify, opts, done) => {
  const { db, resolver, sessions, clock } = opts;

  fastify.addHook('preHandler', requireRouteClass(resolver, 'admin'));

  // ==========================================================================
  // GET /v1/admin/users/:userId
  // ==========================================================================
  fastify.get('/users/:userId', async (request, reply) => {
    const { userId } = userParamsSchema.parse(request.params);

    const user = getUserById(db, userId);
    if (!user) {
      throw new NotFoundError(`User '${userId}' not found`);
    }

    return reply.send(
      wrapSuccess({
        user,
        budget: getBudgetById(db, user.budget_id),
        identity: toIdentitySummary(getProviderIdentityByUserId(db, userId)),
        api_keys: listApiKeysForUser(db, userId).map(toApiKeySummary),
      })
    );
  });

  // ==========================================================================
  // PATCH /v1/admin/users/:userId
  // ==========================================================================
  fastify.patch('/users/:userId', async (request, reply) => {
    const { userId } = userParamsSchema.parse(request.params);
    const patch = updateUserSchema.parse(request.body);

    const user = updateUser(db, userId, patch, clock.now().toISOString());
    if (!user) {
      throw new NotFoundError(`User '${userId}' not found`);
    }

    if (patch.blocked !== undefined) {
      logger.info({ user_id: userId, blocked: patch.blocked }, '[admin] User block state changed');
    }
    return reply.send(wrapSuccess(user));
  });

  // ==========================================================================
  // PATCH /v1/admin/budgets/:budgetId
  // ==========================================================================
  fastify.patch('/budgets/:budgetId', async (request, reply) => {
    const { budgetId } = budgetParamsSchema.parse(request.params);
    const patch = updateBudgetSchema.parse(request.body);

    const now = clock.now().toISOString();

    const budget = runInTransaction(db, tx => {
      const updated = updateBudget(tx, budgetId, patch, now);
      if (updated && patch.budget_duration_sec !== undefined) {
        const rescheduled = rescheduleBudgetWindows(tx, budgetId, updated.budget_duration_sec, now);
        logger.info(
          { budget_id: budgetId, budget_duration_sec: updated.budget_duration_sec, users: rescheduled },
          '[admin] Budget windows rescheduled'
        );
      }
      return updated;
    });
    if (!budget) {
      throw new NotFoundError(`Budget '${budgetId}' not found`);
    }
    return reply.send(wrapSuccess(budget));
  });

  // ==========================================================================
  // PATCH /v1/admin/keys/:keyId
  // ==========================================================================
  fastify.patch('/keys/:keyId', async (request, reply) => {
    const { keyId } = keyParamsSchema.parse(request.params);
    const { is_active } = updateKeySchema.parse(request.body);

    if (!setApiKeyActive(db, keyId, is_active)) {
      throw new NotFoundError(`API key '${keyId}' not found`);
    }
    const key = getApiKeyById(db, keyId);
    if (!key) {
      throw new NotFoundError(`API key '${keyId}' not found`);
    }

    logger.info({ api_key_id: keyId, is_active }, '[admin] API key state changed');
    return reply.send(wrapSuccess(toApiKeySummary(key)));
  });

  // ==========================================================================
  // POST /v1/admin/users/:userId/sessions/revoke
  // ==========================================================================
  fastify.post('/users/:userId/sessions/revoke', async (request, reply) => {
    const { userId } = userParamsSchema.parse(request.params);

    if (!getUserById(db, userId)) {
      throw new NotFoundError(`User '${userId}' not found`);
    }

    const revoked = await sessions.revokeAllForUser(userId);
    return reply.send(wrapSuccess({ revoked }));
  });

  done();
};
