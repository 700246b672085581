/**
 * Account Routes Integration Tests
 *
 * /v1/me, /v1/keys and /v1/profile across credential kinds.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { ErrorEnvelope, SuccessEnvelope } from '@tollgate/contracts';
import type { UsageLog, UsageWindow } from '@tollgate/core';
import {
  TEST_MASTER_KEY,
  credential,
  socialLogin,
  startTestServer,
  stopTestServer,
  type LoginData,
  type TestServerHandle,
} from '../helpers.js';

interface ProfileData {
  user: { user_id: string; spend: number };
  budget: { budget_id: string };
  identity: { provider: string; email: string | null } | null;
  usage: { last_24h: UsageWindow; last_7d: UsageWindow; last_30d: UsageWindow };
  recent_usage: UsageLog[];
}

const HOUR_MS = 60 * 60 * 1000;

describe('Account Routes', () => {
  let handle: TestServerHandle;
  let login: LoginData;
  let apiKey: string;

  beforeEach(async () => {
    handle = await startTestServer();
    login = (await socialLogin(handle, 'u1')).data;
    apiKey = login.api_key ?? '';
  });

  afterEach(async () => {
    await stopTestServer(handle);
  });

  async function recordUsage(cost: number, model = 'model-a') {
    return handle.fastify.inject({
      method: 'POST',
      url: '/v1/usage',
      headers: credential(apiKey),
      payload: { model, endpoint: '/v1/chat/completions', total_tokens: 10, cost },
    });
  }

  describe('credential checks', () => {
    it('should reject a missing or malformed header', async () => {
      const missing = await handle.fastify.inject({ method: 'GET', url: '/v1/me' });
      expect(missing.statusCode).toBe(401);
      expect(missing.json<ErrorEnvelope>().error).toEqual({
        code: 'MALFORMED_CREDENTIAL',
        message: 'Missing or malformed credential header',
      });

      const basic = await handle.fastify.inject({
        method: 'GET',
        url: '/v1/me',
        headers: { 'x-anyllm-key': 'Basic abc' },
      });
      expect(basic.json<ErrorEnvelope>().error.code).toBe('MALFORMED_CREDENTIAL');
    });

    it('should reject unknown tokens', async () => {
      const garbage = await handle.fastify.inject({
        method: 'GET',
        url: '/v1/me',
        headers: credential('garbage'),
      });
      expect(garbage.statusCode).toBe(401);
      expect(garbage.json<ErrorEnvelope>().error.code).toBe('INVALID_CREDENTIAL');

      const unknownKey = await handle.fastify.inject({
        method: 'GET',
        url: '/v1/me',
        headers: credential('tg_sk_' + 'A'.repeat(48)),
      });
      expect(unknownKey.json<ErrorEnvelope>().error.code).toBe('INVALID_CREDENTIAL');
    });
  });

  describe('GET /v1/me', () => {
    it('should return the caller for an API key and an access token', async () => {
      const byKey = await handle.fastify.inject({ method: 'GET', url: '/v1/me', headers: credential(apiKey) });
      expect(byKey.statusCode).toBe(200);
      expect(byKey.json<SuccessEnvelope<{ credential: string; user: { user_id: string } }>>().data).toMatchObject({
        credential: 'api_key',
        user: { user_id: login.user.user_id },
      });

      const byToken = await handle.fastify.inject({
        method: 'GET',
        url: '/v1/me',
        headers: credential(login.access_token),
      });
      expect(byToken.json<SuccessEnvelope<{ credential: string }>>().data.credential).toBe('access_token');
    });

    it('should refuse the master key', async () => {
      const response = await handle.fastify.inject({
        method: 'GET',
        url: '/v1/me',
        headers: credential(TEST_MASTER_KEY),
      });

      expect(response.statusCode).toBe(403);
      expect(response.json<ErrorEnvelope>().error.code).toBe('FORBIDDEN');
    });
  });

  describe('GET /v1/keys', () => {
    it('should list keys without plaintext or hash', async () => {
      const response = await handle.fastify.inject({
        method: 'GET',
        url: '/v1/keys',
        headers: credential(login.access_token),
      });

      const keys = response.json<SuccessEnvelope<Array<Record<string, unknown>>>>().data;
      expect(keys).toHaveLength(1);
      expect(Object.keys(keys[0] ?? {}).sort()).toEqual([
        'created_at',
        'expires_at',
        'id',
        'is_active',
        'key_name',
        'last_used_at',
      ]);
      expect(keys[0]).toMatchObject({ id: login.api_key_id, key_name: 'google login', is_active: true });
    });
  });

  describe('GET /v1/profile', () => {
    it('should require a target user for the master key', async () => {
      const response = await handle.fastify.inject({
        method: 'GET',
        url: '/v1/profile',
        headers: credential(TEST_MASTER_KEY),
      });

      expect(response.statusCode).toBe(400);
      expect(response.json<ErrorEnvelope>().error.code).toBe('TARGET_USER_REQUIRED');
    });

    it('should let the master key read any user', async () => {
      const response = await handle.fastify.inject({
        method: 'GET',
        url: `/v1/profile?user=${login.user.user_id}`,
        headers: credential(TEST_MASTER_KEY),
      });

      expect(response.statusCode).toBe(200);
      const data = response.json<SuccessEnvelope<ProfileData>>().data;
      expect(data.user.user_id).toBe(login.user.user_id);
      expect(data.identity).toMatchObject({ provider: 'google', email: 'u1@example.com' });
    });

    it('should 404 for an unknown target user', async () => {
      const response = await handle.fastify.inject({
        method: 'GET',
        url: '/v1/profile?user=no-such-user',
        headers: credential(TEST_MASTER_KEY),
      });

      expect(response.statusCode).toBe(404);
      expect(response.json<ErrorEnvelope>().error.code).toBe('NOT_FOUND');
    });

    it('should refuse a user reading another user', async () => {
      const other = (await socialLogin(handle, 'u2')).data;

      const response = await handle.fastify.inject({
        method: 'GET',
        url: `/v1/profile?user=${other.user.user_id}`,
        headers: credential(apiKey),
      });

      expect(response.statusCode).toBe(403);
      expect(response.json<ErrorEnvelope>().error.code).toBe('FORBIDDEN');
    });

    it('should summarize usage by window and list recent events', async () => {
      await recordUsage(1, 'model-old');
      handle.clock.advance(2 * 24 * HOUR_MS);
      await recordUsage(2, 'model-a');
      handle.clock.advance(60 * 1000);
      await recordUsage(3, 'model-b');

      const response = await handle.fastify.inject({
        method: 'GET',
        url: '/v1/profile?recent_limit=1',
        headers: credential(apiKey),
      });

      const data = response.json<SuccessEnvelope<ProfileData>>().data;
      expect(data.usage.last_24h).toEqual({
        requests: 2,
        prompt_tokens: 0,
        completion_tokens: 0,
        total_tokens: 20,
        cost: 5,
      });
      expect(data.usage.last_7d.requests).toBe(3);
      expect(data.usage.last_30d.cost).toBe(6);
      expect(data.recent_usage).toHaveLength(1);
      expect(data.recent_usage[0]?.model).toBe('model-b');
      // Window of one day elapsed before the second batch
      expect(data.user.spend).toBe(5);
    });

    it('should accept recent_limit=0 and reject values over 100', async () => {
      const none = await handle.fastify.inject({
        method: 'GET',
        url: '/v1/profile?recent_limit=0',
        headers: credential(apiKey),
      });
      expect(none.json<SuccessEnvelope<ProfileData>>().data.recent_usage).toEqual([]);

      const tooMany = await handle.fastify.inject({
        method: 'GET',
        url: '/v1/profile?recent_limit=101',
        headers: credential(apiKey),
      });
      expect(tooMany.statusCode).toBe(400);
      expect(tooMany.json<ErrorEnvelope>().error.code).toBe('VALIDATION_ERROR');
    });
  });
});
