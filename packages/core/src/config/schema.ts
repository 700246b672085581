/**
 * Configuration schema (Zod)
 *
 * Validates tollgate.yaml structure with a type-safe config object.
 */

import { z } from 'zod';

// ===== Server =====

const ServerConfigSchema = z
  .object({
    host: z.string().default('0.0.0.0'),
    port: z.number().int().min(0).max(65535).default(8080),
    log_level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
    /** Trust X-Forwarded-For for request.ip (only behind a trusted proxy) */
    trust_proxy: z.boolean().default(false),
  })
  .default({});

// ===== Database =====

const DatabaseConfigSchema = z
  .object({
    path: z.string().default('./data/tollgate.db'),
    enable_wal: z.boolean().default(true),
  })
  .default({});

// ===== Authentication & session tokens =====

const AuthConfigSchema = z.object({
  /** Administrator credential; compared in constant time */
  master_key: z.string().min(16, 'master_key must be at least 16 characters'),
  /** HS256 signing secret for access tokens; falls back to master_key */
  jwt_secret: z.string().min(32, 'jwt_secret must be at least 32 characters').optional(),
  /** Access token lifetime (minutes) */
  access_token_ttl_minutes: z.number().int().min(5).max(1440).default(30),
  /** Refresh token lifetime (days) */
  refresh_token_ttl_days: z.number().int().min(1).max(365).default(14),
});

// ===== Budget defaults for newly provisioned users =====

const BudgetDefaultsSchema = z
  .object({
    /** null = unlimited */
    default_max_budget: z.number().nonnegative().nullable().default(10),
    /** null = window never resets; default 30 days */
    default_budget_duration_sec: z.number().int().min(60).nullable().default(2592000),
  })
  .default({});

// ===== Social profile verification =====

const ProviderEndpointSchema = z.object({
  userinfo_url: z.string().url(),
});

const ProfileVerificationConfigSchema = z
  .object({
    timeout_ms: z.number().int().min(100).max(60000).default(5000),
    providers: z.record(ProviderEndpointSchema).default({
      google: { userinfo_url: 'https://openidconnect.googleapis.com/v1/userinfo' },
      github: { userinfo_url: 'https://api.github.com/user' },
    }),
  })
  .default({});

// ===== Root Configuration Schema =====

export const GatewayConfigSchema = z.object({
  server: ServerConfigSchema,
  database: DatabaseConfigSchema,
  auth: AuthConfigSchema,
  budget: BudgetDefaultsSchema,
  profile_verification: ProfileVerificationConfigSchema,
});

export type GatewayConfig = z.infer<typeof GatewayConfigSchema>;
export type GatewayConfigInput = z.input<typeof GatewayConfigSchema>;
export type AuthConfig = GatewayConfig['auth'];
export type BudgetDefaults = GatewayConfig['budget'];
export type ProfileVerificationConfig = GatewayConfig['profile_verification'];

// ===== Credential field patterns =====

export const CREDENTIAL_FIELD_PATTERNS = [
  'password',
  'secret',
  'master_key',
  'credential',
  'passphrase',
  'bearer',
] as const;

/**
 * Check if a config key is likely a credential field
 */
export function isCredentialField(key: string, patterns: readonly string[] = CREDENTIAL_FIELD_PATTERNS): boolean {
  const lowerKey = key.toLowerCase();
  return patterns.some(pattern => lowerKey.includes(pattern));
}

export function buildCredentialPatterns(additional: string[] = []): string[] {
  return [...CREDENTIAL_FIELD_PATTERNS, ...additional];
}
