/**
 * @description: Loads and validates bot host environment configuration and defaults.
 * @scope: utility
 * @module: EnvConfig
 * @risk: high - Misconfiguration can break auth, command sync, or which extensions load.
 */

import dotenv from 'dotenv';
import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { logger, sanitizeLogData } from './logger.js';

// Get the current directory
const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

// Calculate .env file path (repository root)
const envPath = path.resolve(__dirname, '../../../../.env');

// Load environment variables from .env file in the root directory (when present).
if (fs.existsSync(envPath)) {
  const { error, parsed } = dotenv.config({ path: envPath });

  if (error) {
    logger.warn(`Failed to load .env file: ${error.message}`);
  } else if (parsed) {
    logger.debug(`Loaded environment variables: ${Object.keys(parsed).join(', ')}`);
  }
} else {
  logger.debug('No .env file found; relying on injected environment variables.');
}

/**
 * List of required environment variables that must be set for the application to run.
 */
const REQUIRED_ENV_VARS = [
  'DISCORD_TOKEN', // Discord bot token for authentication
  'CLIENT_ID'      // Discord application client ID
] as const;

const DEFAULTS = {
  COMMAND_PREFIX: '!',
  EXTENSIONS: ['./extensions/basic', './extensions/greetings'],
  DEPLOY_COMMANDS: false,
  HANDLER_TIMEOUT_MS: 0
} as const;

export interface BotConfig {
  token: string;
  clientId: string;
  /** Guild that receives command syncs during development; global when absent. */
  guildId?: string;
  env: string;
  isProduction: boolean;
  commandPrefix: string;
  extensions: string[];
  deployCommands: boolean;
  handlerTimeoutMs: number;
}

type Env = Record<string, string | undefined>;

/**
 * Reads a numeric configuration value while gracefully handling invalid input
 */
export function getNumberEnv(env: Env, key: string, defaultValue: number): number {
  const value = env[key];
  if (value === undefined || value.trim() === '') {
    return defaultValue;
  }

  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0) {
    logger.warn(
      `Ignoring invalid numeric value for ${key}: "${value}". Expected a non-negative number; using default (${defaultValue}).`
    );
    return defaultValue;
  }

  return parsed;
}

/**
 * Gets a boolean from environment variables with a default value
 */
export function getBooleanEnv(env: Env, key: string, defaultValue: boolean): boolean {
  const value = env[key];
  if (value === undefined || value.trim() === '') return defaultValue;
  return value.trim().toLowerCase() === 'true';
}

/**
 * Parses a comma-delimited list from the environment into an array of strings.
 * Empty or whitespace-only entries are discarded.
 */
export function getStringArrayEnv(env: Env, key: string, defaultValue: readonly string[]): string[] {
  const value = env[key];
  if (!value) {
    return [...defaultValue];
  }

  const entries = value
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);

  if (entries.length === 0) {
    logger.warn(
      `Ignoring ${key} because it did not contain any entries. Falling back to default (${defaultValue.join(', ') || 'none'}).`
    );
    return [...defaultValue];
  }

  return entries;
}

/**
 * Builds the host configuration from environment variables.
 * @throws {Error} If any required environment variable is missing
 */
export function loadConfig(env: Env = process.env): BotConfig {
  const missing = REQUIRED_ENV_VARS.filter((name) => !env[name]?.trim());
  if (missing.length > 0) {
    throw new Error(`Missing required environment variable: ${missing.join(', ')}`);
  }

  const nodeEnv = env.NODE_ENV || 'development';
  const guildId = env.GUILD_ID?.trim();
  const prefix = env.COMMAND_PREFIX?.trim();

  const config: BotConfig = {
    token: env.DISCORD_TOKEN?.trim() ?? '',
    clientId: env.CLIENT_ID?.trim() ?? '',
    guildId: guildId ? guildId : undefined,
    env: nodeEnv,
    isProduction: nodeEnv === 'production',
    commandPrefix: prefix ? prefix : DEFAULTS.COMMAND_PREFIX,
    extensions: getStringArrayEnv(env, 'EXTENSIONS', DEFAULTS.EXTENSIONS),
    deployCommands: getBooleanEnv(env, 'DEPLOY_COMMANDS', DEFAULTS.DEPLOY_COMMANDS),
    handlerTimeoutMs: getNumberEnv(env, 'HANDLER_TIMEOUT_MS', DEFAULTS.HANDLER_TIMEOUT_MS)
  };

  logger.debug(`Configuration: ${JSON.stringify(sanitizeLogData(config))}`);
  return config;
}
