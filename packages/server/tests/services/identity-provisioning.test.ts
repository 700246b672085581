/**
 * Identity Provisioning Service Tests
 *
 * Create vs existing outcomes, the conflict retry, verification failures
 * and timeouts.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  FixedClock,
  ProfileVerificationFailedError,
  ProvisioningFailedError,
  api_keys,
  budgets,
  caret_users,
  closeDatabase,
  initializeDatabase,
  runMigrations,
  session_tokens,
  setApiKeyActive,
  users,
  type DatabaseClient,
  type DatabaseExecutor,
  type ProfileVerificationRequest,
  type ProfileVerifier,
  type ProviderIdentity,
  type VerifiedProfile,
} from '@tollgate/core';
import { SessionTokenManager } from '@tollgate/authn-session';
import {
  IdentityProvisioningService,
  buildSessionMetadata,
  type IdentityProvisioningOptions,
  type SocialProfile,
} from '../../src/services/identity-provisioning.js';
import { FakeProfileVerifier, TEST_JWT_SECRET } from '../helpers.js';

/**
 * Misses the identity lookup a fixed number of times, as a request that
 * read before a concurrent creation committed would
 */
class StaleLookupService extends IdentityProvisioningService {
  misses = 0;

  protected override lookupIdentity(
    ex: DatabaseExecutor,
    provider: string,
    subject: string
  ): ProviderIdentity | null {
    if (this.misses > 0) {
      this.misses--;
      return null;
    }
    return super.lookupIdentity(ex, provider, subject);
  }
}

class HangingVerifier implements ProfileVerifier {
  signal: AbortSignal | null = null;

  verify(_request: ProfileVerificationRequest, signal: AbortSignal): Promise<VerifiedProfile> {
    this.signal = signal;
    return new Promise<VerifiedProfile>(() => {});
  }
}

class BrokenVerifier implements ProfileVerifier {
  async verify(): Promise<VerifiedProfile> {
    throw new Error('socket hang up');
  }
}

const PROFILE: SocialProfile = {
  provider: 'google',
  subject: 'u1',
  email: 'u1@example.com',
  name: 'User One',
  role: 'user',
};

describe('IdentityProvisioningService', () => {
  let db: DatabaseClient;
  let clock: FixedClock;
  let sessions: SessionTokenManager;
  let verifier: FakeProfileVerifier;
  let options: IdentityProvisioningOptions;
  let service: IdentityProvisioningService;

  beforeEach(() => {
    db = initializeDatabase({ sqliteFilePath: ':memory:' });
    runMigrations(db);
    clock = new FixedClock('2025-01-01T00:00:00.000Z');
    sessions = new SessionTokenManager(
      db,
      { secret: TEST_JWT_SECRET, access_token_ttl_minutes: 30, refresh_token_ttl_days: 14 },
      clock
    );
    verifier = new FakeProfileVerifier();
    options = {
      budget: { default_max_budget: 10, default_budget_duration_sec: 3600 },
      verification_timeout_ms: 50,
    };
    service = new IdentityProvisioningService(db, verifier, sessions, options, clock);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    closeDatabase(db);
  });

  function countRows() {
    return {
      budgets: db.select().from(budgets).all().length,
      users: db.select().from(users).all().length,
      api_keys: db.select().from(api_keys).all().length,
      identities: db.select().from(caret_users).all().length,
    };
  }

  describe('provision', () => {
    it('should create the whole cascade for a new identity', async () => {
      const result = await service.provision(PROFILE, { device_type: 'android' });

      expect(result.is_new_user).toBe(true);
      expect(result.api_key).toMatch(/^tg_sk_[A-Za-z0-9_-]{48}$/);
      expect(result.budget).toMatchObject({ max_budget: 10, budget_duration_sec: 3600 });
      expect(result.user).toMatchObject({
        budget_id: result.budget.budget_id,
        alias: 'User One',
        spend: 0,
        budget_started_at: '2025-01-01T00:00:00.000Z',
        next_budget_reset_at: '2025-01-01T01:00:00.000Z',
      });
      expect(result.identity).toMatchObject({
        user_id: result.user.user_id,
        provider: 'google',
        provider_user_id: 'u1',
        email: 'u1@example.com',
      });
      expect(countRows()).toEqual({ budgets: 1, users: 1, api_keys: 1, identities: 1 });

      const [session] = db.select().from(session_tokens).all();
      expect(session).toMatchObject({
        user_id: result.user.user_id,
        api_key_id: result.api_key_id,
        metadata: { device_type: 'android' },
      });
    });

    it('should leave the reset time empty for a budget that never resets', async () => {
      options.budget = { default_max_budget: null, default_budget_duration_sec: null };

      const result = await service.provision(PROFILE);

      expect(result.budget.max_budget).toBeNull();
      expect(result.user.next_budget_reset_at).toBeNull();
    });

    it('should reuse the account and refresh the profile on repeat login', async () => {
      const first = await service.provision(PROFILE);
      clock.advance(60_000);

      const second = await service.provision({ ...PROFILE, name: 'Renamed', email: null });

      expect(second.is_new_user).toBe(false);
      expect(second.api_key).toBeNull();
      expect(second.user.user_id).toBe(first.user.user_id);
      expect(second.api_key_id).toBe(first.api_key_id);
      expect(second.identity).toMatchObject({
        name: 'Renamed',
        email: 'u1@example.com',
        last_login_at: '2025-01-01T00:01:00.000Z',
      });
      expect(countRows()).toEqual({ budgets: 1, users: 1, api_keys: 1, identities: 1 });
    });

    it('should mint a key when the user has none left', async () => {
      const first = await service.provision(PROFILE);
      setApiKeyActive(db, first.api_key_id, false);

      const second = await service.provision(PROFILE);

      expect(second.is_new_user).toBe(false);
      expect(second.api_key).toMatch(/^tg_sk_/);
      expect(second.api_key_id).not.toBe(first.api_key_id);
      expect(db.select().from(session_tokens).all().map(session => session.api_key_id)).toEqual([
        first.api_key_id,
        second.api_key_id,
      ]);
    });
  });

  describe('session failure', () => {
    it('should retire a freshly minted key so the next login hands out a new one', async () => {
      vi.spyOn(sessions, 'issue').mockRejectedValueOnce(new Error('disk I/O error'));

      await expect(service.provision(PROFILE)).rejects.toThrow('disk I/O error');
      const [orphan] = db.select().from(api_keys).all();
      expect(orphan?.is_active).toBe(false);

      const retry = await service.provision(PROFILE);
      expect(retry.is_new_user).toBe(false);
      expect(retry.api_key).toMatch(/^tg_sk_/);
      expect(retry.api_key_id).not.toBe(orphan?.id);
    });

    it('should leave an existing key alone', async () => {
      const first = await service.provision(PROFILE);
      vi.spyOn(sessions, 'issue').mockRejectedValueOnce(new Error('disk I/O error'));

      await expect(service.provision(PROFILE)).rejects.toThrow('disk I/O error');

      const again = await service.provision(PROFILE);
      expect(again.api_key).toBeNull();
      expect(again.api_key_id).toBe(first.api_key_id);
    });
  });

  describe('concurrent creation', () => {
    it('should retry a conflicting creation as an existing identity', async () => {
      const winner = await service.provision(PROFILE);
      const stale = new StaleLookupService(db, verifier, sessions, options, clock);
      stale.misses = 1;

      const loser = await stale.provision(PROFILE);

      expect(loser.is_new_user).toBe(false);
      expect(loser.user.user_id).toBe(winner.user.user_id);
      expect(loser.api_key_id).toBe(winner.api_key_id);
      expect(countRows()).toEqual({ budgets: 1, users: 1, api_keys: 1, identities: 1 });
    });

    it('should give up after the retry conflicts as well', async () => {
      await service.provision(PROFILE);
      const stale = new StaleLookupService(db, verifier, sessions, options, clock);
      stale.misses = 2;

      await expect(stale.provision(PROFILE)).rejects.toBeInstanceOf(ProvisioningFailedError);
      expect(countRows()).toEqual({ budgets: 1, users: 1, api_keys: 1, identities: 1 });
      expect(db.select().from(session_tokens).all()).toHaveLength(1);
    });
  });

  describe('socialLogin', () => {
    it('should fill profile gaps from the request', async () => {
      verifier.register('github', 'gh-token', { subject: '42' });

      const result = await service.socialLogin({
        provider: 'github',
        access_token: 'gh-token',
        email: 'dev@example.com',
        name: 'Dev',
      });

      expect(result.identity).toMatchObject({
        provider: 'github',
        provider_user_id: '42',
        email: 'dev@example.com',
        name: 'Dev',
      });
      expect(verifier.calls).toEqual([{ provider: 'github', access_token: 'gh-token' }]);
    });

    it('should propagate a verification failure without writing', async () => {
      await expect(
        service.socialLogin({ provider: 'google', access_token: 'unknown' })
      ).rejects.toBeInstanceOf(ProfileVerificationFailedError);

      expect(verifier.calls).toHaveLength(1);
      expect(countRows()).toEqual({ budgets: 0, users: 0, api_keys: 0, identities: 0 });
    });

    it('should abort a verification that takes too long', async () => {
      const hanging = new HangingVerifier();
      const slow = new IdentityProvisioningService(db, hanging, sessions, options, clock);

      await expect(slow.socialLogin({ provider: 'google', access_token: 't' })).rejects.toMatchObject({
        code: 'PROFILE_VERIFICATION_FAILED',
        message: 'Profile verification timed out',
      });
      expect(hanging.signal?.aborted).toBe(true);
      expect(countRows().users).toBe(0);
    });

    it('should wrap unexpected verifier errors', async () => {
      const broken = new IdentityProvisioningService(db, new BrokenVerifier(), sessions, options, clock);

      await expect(broken.socialLogin({ provider: 'google', access_token: 't' })).rejects.toMatchObject({
        code: 'PROFILE_VERIFICATION_FAILED',
        message: 'Profile verification failed',
      });
    });
  });

  describe('buildSessionMetadata', () => {
    it('should merge device fields over free-form metadata', () => {
      expect(
        buildSessionMetadata({
          device_type: 'ios',
          ip: '10.0.0.1',
          metadata: { campaign: 'spring', ip: 'spoofed' },
        })
      ).toEqual({ campaign: 'spring', device_type: 'ios', ip: '10.0.0.1' });
    });
  });
});
