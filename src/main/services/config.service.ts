/**
 * Config Service
 *
 * Resolves the card service settings from, in increasing precedence:
 * built-in defaults, an optional JSON file named by LUNCHCARD_CONFIG_FILE,
 * and environment variables (a .env file is loaded through dotenv).
 * The merged result is validated with Zod.
 *
 * @module main/services/config.service
 */

import fs from 'fs';
import dotenv from 'dotenv';
import { z } from 'zod';
import { createLogger } from '../utils/logger';
import {
  type CardServiceConfig,
  CONFIG_ENV_VARS,
  CONFIG_FILE_ENV_VAR,
  DEFAULT_CONFIG,
  safeValidateConfig,
} from '../../shared/types/config.types';

// ============================================================================
// Types
// ============================================================================

export interface ConfigSources {
  /** Environment to read; defaults to process.env after loading .env */
  env?: NodeJS.ProcessEnv;
  /** JSON settings file; overrides LUNCHCARD_CONFIG_FILE */
  configFile?: string;
  /** .env file to load when reading process.env (default: ".env") */
  dotenvPath?: string;
}

// ============================================================================
// Errors
// ============================================================================

export class ConfigValidationError extends Error {
  public readonly code = 'INVALID_CONFIG';

  constructor(public readonly issues: string[]) {
    super(`Invalid configuration:\n  - ${issues.join('\n  - ')}`);
    this.name = 'ConfigValidationError';
  }
}

// ============================================================================
// Logger Setup
// ============================================================================

const log = createLogger('config-service');

const JsonObjectSchema = z.record(z.string(), z.unknown());

// ============================================================================
// Loading
// ============================================================================

function readConfigFile(filePath: string): Record<string, unknown> {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigValidationError([
      `${CONFIG_FILE_ENV_VAR}: cannot read ${filePath} (${error instanceof Error ? error.message : 'Unknown error'})`,
    ]);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigValidationError([
      `${CONFIG_FILE_ENV_VAR}: ${filePath} is not valid JSON (${error instanceof Error ? error.message : 'Unknown error'})`,
    ]);
  }

  const result = JsonObjectSchema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigValidationError([`${CONFIG_FILE_ENV_VAR}: ${filePath} must hold a JSON object`]);
  }
  return result.data;
}

/**
 * Settings given in the environment, keyed by setting name
 */
function readEnv(env: NodeJS.ProcessEnv): Record<string, string> {
  const values: Record<string, string> = {};
  for (const [key, variable] of Object.entries(CONFIG_ENV_VARS)) {
    const value = env[variable];
    if (value !== undefined && value.trim() !== '') {
      values[key] = value.trim();
    }
  }
  return values;
}

/**
 * Resolve and validate the configuration
 *
 * @throws ConfigValidationError listing every invalid setting
 */
export function loadConfig(sources: ConfigSources = {}): CardServiceConfig {
  let env = sources.env;
  if (!env) {
    dotenv.config({ path: sources.dotenvPath ?? '.env' });
    env = process.env;
  }

  const configFile = sources.configFile ?? env[CONFIG_FILE_ENV_VAR];
  const fileValues = configFile ? readConfigFile(configFile) : {};

  const merged = { ...DEFAULT_CONFIG, ...fileValues, ...readEnv(env) };
  const result = safeValidateConfig(merged);

  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const path = issue.path.join('.') || '(root)';
      return `${path}: ${issue.message}`;
    });
    log.error('Configuration rejected', { issues });
    throw new ConfigValidationError(issues);
  }

  log.info('Configuration loaded', {
    configFile: configFile ?? null,
    primaryDbPath: result.data.primaryDbPath,
    offlineDbPath: result.data.offlineDbPath,
  });

  return result.data;
}

// ============================================================================
// Config Service Class
// ============================================================================

export class ConfigService {
  private readonly config: CardServiceConfig;

  constructor(sources: ConfigSources = {}) {
    this.config = loadConfig(sources);
  }

  getConfig(): CardServiceConfig {
    return { ...this.config };
  }

  get<K extends keyof CardServiceConfig>(key: K): CardServiceConfig[K] {
    return this.config[key];
  }
}
