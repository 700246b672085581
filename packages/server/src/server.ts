/**
 * Gateway Server
 *
 * HTTP server with:
 * - credential resolution (master key, access token, API key)
 * - social login, refresh rotation and logout
 * - self/profile/usage routes for users, admin routes for the master key
 *
 * CORS default deny. Every response carries the envelope and no-store
 * caching headers.
 */

import Fastify, { type FastifyInstance } from 'fastify';
import fastifyCors from '@fastify/cors';
import {
  UsageLedger,
  checkDatabaseHealth,
  closeDatabase,
  initializeDatabase,
  logger,
  runMigrations,
  systemClock,
  type Clock,
  type DatabaseClient,
  type GatewayConfig,
  type ProfileVerifier,
} from '@tollgate/core';
import { ApiKeyAuthProvider } from '@tollgate/authn-apikey';
import {
  AccessTokenAuthProvider,
  SessionTokenManager,
  resolveJwtSecret,
} from '@tollgate/authn-session';
import { ErrorCodes, wrapError, wrapSuccess } from './admin/reply-envelope.js';
import { registerAdminRoutes } from './admin/routes.js';
import { CredentialResolver } from './auth/credential-resolver.js';
import { registerAuthRoutes } from './auth/routes.js';
import { registerErrorHandlers } from './error-handler.js';
import { registerAccountRoutes } from './routes/account.js';
import { registerUsageRoutes } from './routes/usage.js';
import { IdentityProvisioningService } from './services/identity-provisioning.js';
import { HttpProfileVerifier } from './services/profile-verifier.js';

export interface GatewayServerOptions {
  config: GatewayConfig;
  /** Social profile verifier; defaults to the userinfo-endpoint verifier */
  profileVerifier?: ProfileVerifier;
  clock?: Clock;
}

export class GatewayServer {
  private fastify: FastifyInstance | null = null;
  private db: DatabaseClient | null = null;
  private readonly config: GatewayConfig;
  private readonly clock: Clock;

  constructor(private options: GatewayServerOptions) {
    this.config = options.config;
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Initialize the server: database, providers, routes
   */
  async initialize(): Promise<void> {
    const { server, database, auth, budget, profile_verification } = this.config;

    this.fastify = Fastify({
      logger: {
        level: server.log_level,
      },
      bodyLimit: 1048576, // 1MB max request body
      trustProxy: server.trust_proxy,
    });

    // CORS default deny
    await this.fastify.register(fastifyCors, {
      origin: false,
    });

    this.fastify.addHook('onSend', async (_request, reply) => {
      reply.header('X-Content-Type-Options', 'nosniff');
      reply.header('X-Frame-Options', 'DENY');
      reply.header('Cache-Control', 'no-store');
    });

    this.fastify.decorateRequest('principal', null);
    this.fastify.decorateRequest('effectiveUserId', null);
    registerErrorHandlers(this.fastify);

    logger.info(`[server] Initializing database: ${database.path}`);
    this.db = initializeDatabase({
      sqliteFilePath: database.path,
      enableWAL: database.enable_wal,
    });
    runMigrations(this.db);
    const db = this.db;

    const sessions = new SessionTokenManager(
      db,
      {
        secret: resolveJwtSecret(auth),
        access_token_ttl_minutes: auth.access_token_ttl_minutes,
        refresh_token_ttl_days: auth.refresh_token_ttl_days,
      },
      this.clock
    );

    // Access tokens first: a JWT never has the API key shape, and an expired
    // JWT must be reported as expired rather than invalid
    const resolver = new CredentialResolver(auth.master_key, [
      new AccessTokenAuthProvider(sessions),
      new ApiKeyAuthProvider(db, this.clock),
    ]);

    const provisioning = new IdentityProvisioningService(
      db,
      this.options.profileVerifier ?? new HttpProfileVerifier(profile_verification),
      sessions,
      { budget, verification_timeout_ms: profile_verification.timeout_ms },
      this.clock
    );

    const ledger = new UsageLedger(db, this.clock);

    // Health check endpoint (no auth required)
    this.fastify.get('/health', async (_request, reply) => {
      if (!checkDatabaseHealth(db)) {
        return reply
          .status(503)
          .send(wrapError(ErrorCodes.INTERNAL_ERROR, 'Database unavailable'));
      }
      return reply.send(wrapSuccess({ status: 'ok' }));
    });

    await registerAuthRoutes(this.fastify, { provisioning, sessions, resolver });
    await registerAccountRoutes(this.fastify, { db, resolver, ledger, clock: this.clock });
    await registerUsageRoutes(this.fastify, { db, resolver, ledger });
    await this.fastify.register(registerAdminRoutes, {
      prefix: '/v1/admin',
      db,
      resolver,
      sessions,
      clock: this.clock,
    });

    await this.fastify.ready();
    logger.info('[server] Initialization complete');
  }

  /**
   * Start listening
   */
  async start(): Promise<void> {
    const fastify = this.getServer();
    const { host, port } = this.config.server;

    try {
      await fastify.listen({ host, port });
      logger.info(`[server] Listening on http://${host}:${port}`);
    } catch (err) {
      logger.error({ err }, '[server] Failed to start');
      throw err;
    }
  }

  /**
   * Stop the server and close the database
   */
  async stop(): Promise<void> {
    logger.info('[server] Shutting down...');

    if (this.fastify) {
      await this.fastify.close();
      this.fastify = null;
    }

    if (this.db) {
      closeDatabase(this.db);
      this.db = null;
    }

    logger.info('[server] Shutdown complete');
  }

  /**
   * Get the Fastify instance (for testing)
   */
  getServer(): FastifyInstance {
    if (!this.fastify) {
      throw new Error('Server not initialized - call initialize() first');
    }
    return this.fastify;
  }

  /**
   * Get the database client (for testing)
   */
  getDatabase(): DatabaseClient {
    if (!this.db) {
      throw new Error('Server not initialized - call initialize() first');
    }
    return this.db;
  }
}
