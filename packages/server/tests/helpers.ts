/**
 * Shared test helpers for server tests
 *
 * Boots a GatewayServer on an in-memory database with a fixed clock and a
 * fake social profile verifier. Requests go through fastify.inject.
 */

import type { FastifyInstance } from 'fastify';
import type { SuccessEnvelope, TokenPair } from '@tollgate/contracts';
import {
  FixedClock,
  GatewayConfigSchema,
  ProfileVerificationFailedError,
  type Budget,
  type DatabaseClient,
  type GatewayConfigInput,
  type ProfileVerificationRequest,
  type ProfileVerifier,
  type User,
  type VerifiedProfile,
} from '@tollgate/core';
import { GatewayServer } from '../src/server.js';

export const TEST_MASTER_KEY = 'test-master-key-0001';
export const TEST_JWT_SECRET = 'test-secret-test-secret-test-secret';
export const START_TIME = '2025-01-01T00:00:00.000Z';

/**
 * In-process stand-in for the social provider's userinfo endpoint
 */
export class FakeProfileVerifier implements ProfileVerifier {
  readonly calls: ProfileVerificationRequest[] = [];
  private profiles = new Map<string, VerifiedProfile>();

  register(provider: string, accessToken: string, profile: Omit<VerifiedProfile, 'role'> & { role?: string }): void {
    this.profiles.set(`${provider}:${accessToken}`, { role: 'user', ...profile });
  }

  async verify(request: ProfileVerificationRequest, _signal: AbortSignal): Promise<VerifiedProfile> {
    this.calls.push(request);
    const profile = this.profiles.get(`${request.provider}:${request.access_token}`);
    if (!profile) {
      throw new ProfileVerificationFailedError('Provider rejected the access token', {
        provider: request.provider,
      });
    }
    return profile;
  }
}

export interface TestServerHandle {
  server: GatewayServer;
  fastify: FastifyInstance;
  db: DatabaseClient;
  clock: FixedClock;
  verifier: FakeProfileVerifier;
}

export interface TestServerOverrides {
  budget?: GatewayConfigInput['budget'];
}

export async function startTestServer(overrides: TestServerOverrides = {}): Promise<TestServerHandle> {
  const config = GatewayConfigSchema.parse({
    server: { log_level: 'silent' },
    database: { path: ':memory:' },
    auth: { master_key: TEST_MASTER_KEY, jwt_secret: TEST_JWT_SECRET },
    budget: overrides.budget ?? { default_max_budget: 10, default_budget_duration_sec: 86400 },
  });

  const clock = new FixedClock(START_TIME);
  const verifier = new FakeProfileVerifier();
  const server = new GatewayServer({ config, profileVerifier: verifier, clock });
  await server.initialize();

  return {
    server,
    fastify: server.getServer(),
    db: server.getDatabase(),
    clock,
    verifier,
  };
}

export async function stopTestServer(handle: TestServerHandle): Promise<void> {
  await handle.server.stop();
}

/**
 * X-AnyLLM-Key header for a token
 */
export function credential(token: string): Record<string, string> {
  return { 'x-anyllm-key': `Bearer ${token}` };
}

export interface LoginData extends TokenPair {
  is_new_user: boolean;
  user: User;
  budget: Budget;
  identity: {
    provider: string;
    provider_user_id: string;
    role: string;
    email: string | null;
    name: string | null;
    avatar_url: string | null;
    last_login_at: string | null;
  };
  api_key_id: string;
  api_key: string | null;
}

/**
 * Register a provider profile and log in with it
 */
export async function socialLogin(
  handle: TestServerHandle,
  subject: string,
  extra: Record<string, unknown> = {}
): Promise<{ statusCode: number; data: LoginData }> {
  const accessToken = `google-token-${subject}`;
  handle.verifier.register('google', accessToken, {
    subject,
    email: `${subject}@example.com`,
    name: `User ${subject}`,
  });

  const response = await handle.fastify.inject({
    method: 'POST',
    url: '/v1/auth/social-login',
    payload: { provider: 'google', access_token: accessToken, ...extra },
  });

  return {
    statusCode: response.statusCode,
    data: response.json<SuccessEnvelope<LoginData>>().data,
  };
}
