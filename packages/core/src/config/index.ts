/**
 * Configuration loader with secrets resolution
 *
 * Implements ${ENV:VAR} and ${file:/path} resolution with startup validation.
 * Credential-looking fields (master_key, jwt_secret, ...) must use one of the
 * resolvers; a literal value is rejected in 'block' mode.
 */

import fs from 'fs/promises';
import path from 'path';
import yaml from 'yaml';
import { ZodError } from 'zod';
import {
  GatewayConfigSchema,
  buildCredentialPatterns,
  isCredentialField,
  type GatewayConfig,
} from './schema.js';
import { logger } from '../utils/logger.js';
import { GatewayError, ValidationError } from '../utils/errors.js';

/**
 * Configuration loading options
 */
export interface ConfigLoadOptions {
  /** Additional credential field patterns (beyond defaults) */
  additional_credential_patterns?: string[];
  /** Enforcement mode: warn or block on literal secrets */
  enforcement?: 'warn' | 'block';
  /** Base directory for ${file:} resolution (default: config file directory) */
  secrets_base_dir?: string;
}

const MAX_CONFIG_BYTES = 1024 * 1024;

/**
 * Load configuration from a YAML file with secrets resolution
 *
 * @param configPath Path to tollgate.yaml
 * @returns Validated and resolved configuration
 * @throws ValidationError if the config is invalid or contains literal secrets (block mode)
 */
export async function loadConfig(
  configPath: string,
  options: ConfigLoadOptions = {}
): Promise<GatewayConfig> {
  logger.info(`[config] Loading configuration from ${configPath}`);

  try {
    const stats = await fs.stat(configPath);
    if (stats.size > MAX_CONFIG_BYTES) {
      throw new ValidationError(`Config file ${configPath} exceeds 1MB size limit`);
    }

    const fileContent = await fs.readFile(configPath, 'utf-8');
    const rawConfig: unknown = yaml.parse(fileContent, {
      maxAliasCount: 50,
      schema: 'core',
      uniqueKeys: true,
    });

    const config = await resolveConfig(rawConfig, {
      ...options,
      secrets_base_dir: options.secrets_base_dir || path.dirname(path.resolve(configPath)),
    });

    logger.info('[config] Configuration loaded successfully');
    return config;
  } catch (error) {
    if (error instanceof GatewayError) {
      throw error;
    }
    if (error instanceof Error) {
      throw new ValidationError(`Failed to load config: ${error.message}`);
    }
    throw error;
  }
}

/**
 * Resolve secrets in an already-parsed config object and validate it
 */
export async function resolveConfig(
  rawConfig: unknown,
  options: ConfigLoadOptions = {}
): Promise<GatewayConfig> {
  const {
    additional_credential_patterns = [],
    enforcement = 'block',
    secrets_base_dir = process.cwd(),
  } = options;

  const credentialPatterns = buildCredentialPatterns(additional_credential_patterns);
  const resolved = await resolveSecrets(rawConfig, credentialPatterns, enforcement, secrets_base_dir);

  try {
    return GatewayConfigSchema.parse(resolved);
  } catch (error) {
    if (error instanceof ZodError) {
      const first = error.issues[0];
      const where = first ? `${first.path.join('.')}: ${first.message}` : error.message;
      throw new ValidationError(`Invalid configuration (${where})`, { issues: error.issues });
    }
    throw error;
  }
}

/**
 * Resolve ${ENV:VAR} and ${file:/path} references in config
 */
async function resolveSecrets(
  obj: unknown,
  credentialPatterns: string[],
  enforcement: 'warn' | 'block',
  secretsBaseDir: string
): Promise<unknown> {
  if (typeof obj === 'string') {
    // Case-sensitive resolver syntax
    const envMatch = obj.match(/^\$\{ENV:([A-Z_][A-Z0-9_]*)\}$/);
    if (envMatch) {
      const envVar = envMatch[1] ?? '';
      const value = process.env[envVar];
      if (value === undefined) {
        throw new ValidationError(`Environment variable ${envVar} not found`);
      }
      return value;
    }

    const fileMatch = obj.match(/^\$\{file:(.+)\}$/);
    if (fileMatch?.[1]) {
      return await resolveFileReference(fileMatch[1], secretsBaseDir);
    }

    return obj;
  }

  if (Array.isArray(obj)) {
    return Promise.all(
      obj.map(item => resolveSecrets(item, credentialPatterns, enforcement, secretsBaseDir))
    );
  }

  if (obj !== null && typeof obj === 'object') {
    const resolved: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      if (typeof value === 'string' && isCredentialField(key, credentialPatterns)) {
        checkCredentialLiteral(key, value, enforcement);
      }
      resolved[key] = await resolveSecrets(value, credentialPatterns, enforcement, secretsBaseDir);
    }
    return resolved;
  }

  return obj;
}

function checkCredentialLiteral(key: string, value: string, enforcement: 'warn' | 'block'): void {
  let message: string | null = null;

  if (value.startsWith('${')) {
    // Must be a real resolver, not just ${anything}
    if (!/^\$\{(ENV:[A-Z_][A-Z0-9_]*|file:.+)\}$/.test(value)) {
      message = `Credential field '${key}' has unresolved reference: ${value}`;
    }
  } else {
    message = `Credential field '${key}' contains literal value - use \${ENV:VAR} or \${file:/path}`;
  }

  if (!message) {
    return;
  }
  if (enforcement === 'block') {
    throw new ValidationError(message, { field: key });
  }
  logger.warn(`[config] ${message}`);
}

/**
 * Resolve ${file:/path} reference with path containment
 *
 * @returns Secret value (trimmed)
 */
async function resolveFileReference(filePath: string, secretsBaseDir: string): Promise<string> {
  try {
    const absolutePath = path.isAbsolute(filePath)
      ? filePath
      : path.resolve(secretsBaseDir, filePath);

    // Canonical paths (follows symlinks) for the containment check
    const realPath = await fs.realpath(absolutePath);
    const realBase = await fs.realpath(secretsBaseDir);

    if (!realPath.startsWith(realBase + path.sep) && realPath !== realBase) {
      throw new ValidationError(`Secret file path escapes allowed directory: ${filePath}`);
    }

    const stats = await fs.lstat(realPath);
    if (stats.size > MAX_CONFIG_BYTES) {
      throw new ValidationError(`Secret file ${realPath} exceeds 1MB`);
    }

    const mode = stats.mode & 0o777;
    if (mode > 0o600) {
      logger.warn(
        `[config] Secret file ${realPath} has permissive permissions (${mode.toString(8)}) - should be 0600 or 0400`
      );
    }

    const content = await fs.readFile(realPath, 'utf-8');
    return content.trim();
  } catch (error) {
    if (error instanceof GatewayError) {
      throw error;
    }
    if (error instanceof Error) {
      throw new ValidationError(`Cannot read secret file ${filePath}: ${error.message}`);
    }
    throw error;
  }
}

// Re-export schema types
export {
  GatewayConfigSchema,
  type GatewayConfig,
  type GatewayConfigInput,
  type AuthConfig,
  type BudgetDefaults,
  type ProfileVerificationConfig,
} from './schema.js';
