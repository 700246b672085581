/**
 * Identity Provisioning Service
 *
 * Social login pipeline: verify the provider token, map the provider
 * identity to a gateway user (creating Budget → User → ApiKey →
 * ProviderIdentity on first sight), then open a session.
 *
 * The create cascade is one transaction. Two first logins racing on the
 * same (provider, subject) meet at the identity's unique index; the loser
 * rolls back and is retried once through the existing-identity path.
 *
 * Sessions are issued after the cascade commits. If that fails, a key
 * minted by the same login is deactivated.
 */

import {
  NotFoundError,
  ProfileVerificationFailedError,
  ProvisioningConflictError,
  ProvisioningFailedError,
  addSeconds,
  findPrimaryApiKey,
  findProviderIdentity,
  getBudgetById,
  getUserById,
  insertBudget,
  insertProviderIdentity,
  insertUser,
  isUniqueViolation,
  logger,
  recordProviderLogin,
  runInTransaction,
  setApiKeyActive,
  systemClock,
  type Budget,
  type BudgetDefaults,
  type Clock,
  type DatabaseClient,
  type DatabaseExecutor,
  type JsonObject,
  type ProfileVerifier,
  type ProviderIdentity,
  type User,
  type VerifiedProfile,
} from '@tollgate/core';
import { issueApiKey } from '@tollgate/authn-apikey';
import type { IssuedSession, SessionTokenManager } from '@tollgate/authn-session';

/**
 * Device and client details stored on the session row
 */
export interface SessionContext {
  device_type?: string;
  device_id?: string;
  os?: string;
  app_version?: string;
  user_agent?: string;
  ip?: string;
  metadata?: JsonObject;
}

export interface SocialLoginRequest extends SessionContext {
  provider: string;
  access_token: string;
  /** Used only where the provider's profile leaves the field empty */
  email?: string;
  name?: string;
  avatar_url?: string;
}

export interface SocialProfile extends VerifiedProfile {
  provider: string;
}

/**
 * Result of the identity step, before a session exists
 */
export type IdentityOutcome =
  | {
      kind: 'created';
      user: User;
      budget: Budget;
      identity: ProviderIdentity;
      api_key_id: string;
      api_key: string;
    }
  | {
      kind: 'existing';
      user: User;
      budget: Budget;
      identity: ProviderIdentity;
      api_key_id: string;
      /** Set only when the user had no usable key and one was minted */
      api_key: string | null;
    };

export interface ProvisioningResult {
  is_new_user: boolean;
  user: User;
  budget: Budget;
  identity: ProviderIdentity;
  api_key_id: string;
  /** Plaintext key; null unless it was minted by this login */
  api_key: string | null;
  access_token: string;
  refresh_token: string;
  access_token_expires_at: string;
  refresh_token_expires_at: string;
}

export interface IdentityProvisioningOptions {
  budget: BudgetDefaults;
  verification_timeout_ms: number;
}

const SESSION_CONTEXT_FIELDS = [
  'device_type',
  'device_id',
  'os',
  'app_version',
  'user_agent',
  'ip',
] as const;

/**
 * Flatten device details and free-form metadata into the session row's metadata
 */
export function buildSessionMetadata(context: SessionContext): JsonObject {
  const metadata: JsonObject = { ...(context.metadata ?? {}) };
  for (const field of SESSION_CONTEXT_FIELDS) {
    const value = context[field];
    if (value !== undefined) {
      metadata[field] = value;
    }
  }
  return metadata;
}

export class IdentityProvisioningService {
  constructor(
    private db: DatabaseClient,
    private verifier: ProfileVerifier,
    private sessions: SessionTokenManager,
    private options: IdentityProvisioningOptions,
    private clock: Clock = systemClock
  ) {}

  /**
   * Full social login: verify, provision, issue a token pair
   *
   * @throws ProfileVerificationFailedError, ProvisioningFailedError
   */
  async socialLogin(request: SocialLoginRequest): Promise<ProvisioningResult> {
    const verified = await this.verifyProfile(request);

    const profile: SocialProfile = {
      ...verified,
      provider: request.provider,
      email: verified.email ?? request.email ?? null,
      name: verified.name ?? request.name ?? null,
      avatar_url: verified.avatar_url ?? request.avatar_url ?? null,
    };

    return this.provision(profile, request);
  }

  /**
   * Map a verified profile to a user and open a session for it
   */
  async provision(profile: SocialProfile, context: SessionContext = {}): Promise<ProvisioningResult> {
    const outcome = this.provisionIdentity(profile);

    let tokens: IssuedSession;
    try {
      tokens = await this.sessions.issue({
        user_id: outcome.user.user_id,
        api_key_id: outcome.api_key_id,
        metadata: buildSessionMetadata(context),
      });
    } catch (err) {
      // A minted key whose plaintext never reached the caller is retired
      if (outcome.api_key !== null) {
        setApiKeyActive(this.db, outcome.api_key_id, false);
        logger.warn(
          { err, user_id: outcome.user.user_id, api_key_id: outcome.api_key_id },
          '[provisioning] Session issue failed, minted API key deactivated'
        );
      }
      throw err;
    }

    logger.info(
      {
        user_id: outcome.user.user_id,
        provider: profile.provider,
        outcome: outcome.kind,
        session_id: tokens.session_id,
      },
      '[provisioning] Social login completed'
    );

    return {
      is_new_user: outcome.kind === 'created',
      user: outcome.user,
      budget: outcome.budget,
      identity: outcome.identity,
      api_key_id: outcome.api_key_id,
      api_key: outcome.api_key,
      access_token: tokens.access_token,
      refresh_token: tokens.refresh_token,
      access_token_expires_at: tokens.access_token_expires_at,
      refresh_token_expires_at: tokens.refresh_token_expires_at,
    };
  }

  /**
   * Find or create the user behind a provider identity, retrying once on a
   * concurrent-creation conflict
   *
   * @throws ProvisioningFailedError if the retry fails as well
   */
  provisionIdentity(profile: SocialProfile): IdentityOutcome {
    try {
      return this.provisionOnce(profile);
    } catch (err) {
      if (!(err instanceof ProvisioningConflictError)) {
        throw err;
      }
      logger.info(
        { provider: profile.provider },
        '[provisioning] Identity created concurrently, retrying as existing'
      );
    }

    try {
      return this.provisionOnce(profile);
    } catch (err) {
      logger.error({ err, provider: profile.provider }, '[provisioning] Provisioning retry failed');
      throw new ProvisioningFailedError();
    }
  }

  /**
   * Identity lookup inside the provisioning transaction
   */
  protected lookupIdentity(
    ex: DatabaseExecutor,
    provider: string,
    subject: string
  ): ProviderIdentity | null {
    return findProviderIdentity(ex, provider, subject);
  }

  private provisionOnce(profile: SocialProfile): IdentityOutcome {
    try {
      return runInTransaction(this.db, tx => {
        const identity = this.lookupIdentity(tx, profile.provider, profile.subject);
        return identity ? this.loadExisting(tx, identity, profile) : this.createIdentity(tx, profile);
      });
    } catch (err) {
      if (isUniqueViolation(err)) {
        throw new ProvisioningConflictError();
      }
      throw err;
    }
  }

  private createIdentity(tx: DatabaseExecutor, profile: SocialProfile): IdentityOutcome {
    const now = this.clock.now();
    const nowIso = now.toISOString();
    const { default_max_budget, default_budget_duration_sec } = this.options.budget;

    const budget = insertBudget(
      tx,
      { max_budget: default_max_budget, budget_duration_sec: default_budget_duration_sec },
      nowIso
    );

    const user = insertUser(
      tx,
      {
        budget_id: budget.budget_id,
        alias: profile.name ?? profile.email ?? null,
        budget_started_at: nowIso,
        next_budget_reset_at:
          default_budget_duration_sec === null
            ? null
            : addSeconds(now, default_budget_duration_sec).toISOString(),
      },
      nowIso
    );

    const key = issueApiKey(tx, { user_id: user.user_id, key_name: `${profile.provider} login` }, nowIso);

    // Last, so a concurrent creation fails here and rolls back everything above
    const identity = insertProviderIdentity(
      tx,
      {
        user_id: user.user_id,
        provider: profile.provider,
        provider_user_id: profile.subject,
        role: profile.role,
        email: profile.email,
        name: profile.name,
        avatar_url: profile.avatar_url,
        access_token_expires_at: profile.access_token_expires_at,
      },
      nowIso
    );

    logger.info(
      { user_id: user.user_id, budget_id: budget.budget_id, provider: profile.provider },
      '[provisioning] New user provisioned'
    );

    return {
      kind: 'created',
      user,
      budget,
      identity,
      api_key_id: key.record.id,
      api_key: key.api_key,
    };
  }

  private loadExisting(
    tx: DatabaseExecutor,
    existing: ProviderIdentity,
    profile: SocialProfile
  ): IdentityOutcome {
    const nowIso = this.clock.now().toISOString();

    const user = getUserById(tx, existing.user_id);
    if (!user) {
      throw new NotFoundError(`User '${existing.user_id}' not found`);
    }
    const budget = getBudgetById(tx, user.budget_id);
    if (!budget) {
      throw new NotFoundError(`Budget '${user.budget_id}' not found`);
    }

    const identity =
      recordProviderLogin(
        tx,
        existing.id,
        {
          role: profile.role,
          email: profile.email,
          name: profile.name,
          avatar_url: profile.avatar_url,
          access_token_expires_at: profile.access_token_expires_at,
        },
        nowIso
      ) ?? existing;

    const primary = findPrimaryApiKey(tx, user.user_id, nowIso);
    if (primary) {
      return { kind: 'existing', user, budget, identity, api_key_id: primary.id, api_key: null };
    }

    const minted = issueApiKey(
      tx,
      { user_id: user.user_id, key_name: `${profile.provider} login` },
      nowIso
    );
    logger.info({ user_id: user.user_id }, '[provisioning] No usable API key left, minted a new one');

    return {
      kind: 'existing',
      user,
      budget,
      identity,
      api_key_id: minted.record.id,
      api_key: minted.api_key,
    };
  }

  private async verifyProfile(request: SocialLoginRequest): Promise<VerifiedProfile> {
    const controller = new AbortController();
    const timeoutMs = this.options.verification_timeout_ms;

    const timedOut = new Promise<never>((_resolve, reject) => {
      controller.signal.addEventListener(
        'abort',
        () => {
          reject(
            new ProfileVerificationFailedError('Profile verification timed out', {
              provider: request.provider,
              timeout_ms: timeoutMs,
            })
          );
        },
        { once: true }
      );
    });
    const timer = setTimeout(() => controller.abort(), timeoutMs);

    try {
      return await Promise.race([
        this.verifier.verify(
          { provider: request.provider, access_token: request.access_token },
          controller.signal
        ),
        timedOut,
      ]);
    } catch (err) {
      if (err instanceof ProfileVerificationFailedError) {
        throw err;
      }
      logger.warn({ err, provider: request.provider }, '[provisioning] Profile verification error');
      throw new ProfileVerificationFailedError('Profile verification failed', {
        provider: request.provider,
      });
    } finally {
      clearTimeout(timer);
    }
  }
}
