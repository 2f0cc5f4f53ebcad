/**
 * Startup Utilities
 *
 * Initialization and validation functions run during bot-client startup.
 */

import { createLogger, getConfig } from '@pagewise/common-types';

const logger = createLogger('bot-client');

/**
 * Validate Discord token is configured
 * @throws Error if DISCORD_TOKEN is missing
 * @returns the token
 */
export function validateDiscordToken(config = getConfig()): string {
  if (config.DISCORD_TOKEN === undefined || config.DISCORD_TOKEN.length === 0) {
    logger.error({}, 'DISCORD_TOKEN is required for bot-client');
    throw new Error('DISCORD_TOKEN environment variable is required');
  }
  return config.DISCORD_TOKEN;
}

/**
 * Whether slash commands should be deployed on startup
 */
export function shouldAutoDeployCommands(config = getConfig()): boolean {
  return config.AUTO_DEPLOY_COMMANDS === 'true';
}
