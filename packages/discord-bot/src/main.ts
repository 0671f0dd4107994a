/**
 * @module: Main
 * @risk: critical
 * @scope: core
 *
 * @description
 * Process entry point: reads configuration, builds the bot host, loads the configured extensions and connects.
 *
 * @impact
 * Risk: Failure here halts the application or leaks the token into logs.
 */

import path from 'path';
import { fileURLToPath } from 'url';
import { BotHost } from './bot/index.js';
import { loadConfig } from './utils/env.js';
import { describeError, logger } from './utils/logger.js';

// ====================
// Environment Setup
// ====================
const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

const config = loadConfig();

// ====================
// Host Configuration
// ====================
const host = new BotHost({
  token: config.token,
  clientId: config.clientId,
  guildId: config.guildId,
  commandPrefix: config.commandPrefix,
  extensions: config.extensions,
  // Relative extension references resolve beside this file (src/ under tsx, dist/ in production).
  extensionBaseDir: __dirname,
  deployCommands: config.deployCommands,
  handlerTimeoutMs: config.handlerTimeoutMs
});

const shutdown = (signal: string) => {
  logger.info(`Received ${signal}, shutting down...`);
  host.stop()
    .then(() => process.exit(0))
    .catch((error: unknown) => {
      logger.error(`Failed to shut down cleanly: ${describeError(error)}`);
      process.exit(1);
    });
};

process.once('SIGINT', () => shutdown('SIGINT'));
process.once('SIGTERM', () => shutdown('SIGTERM'));

logger.info(`Starting bot in ${config.env} mode...`);
host.start().catch((error: unknown) => {
  logger.error(`Failed to start bot: ${describeError(error)}`);
  process.exit(1);
});
