/**
 * Deploy Slash Commands
 *
 * Registers slash commands with Discord's API
 * Usage:
 *   GUILD_ID=123456789 npm run deploy-commands  # Guild-specific (dev)
 *   npm run deploy-commands                     # Global (production)
 *
 * Environment variables are loaded from the .env file at the repository root
 */

import { config as loadDotenv } from 'dotenv';
import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';
import { createLogger, getConfig } from '@pagewise/common-types';
import { deployCommands } from '../src/utils/deployCommands.js';

const logger = createLogger('deploy-commands');

// Load .env from the repository root (two levels up from this script)
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
loadDotenv({ path: join(__dirname, '../../../.env') });

const config = getConfig();

void deployCommands(config.GUILD_ID === undefined, undefined, config).catch((error: unknown) => {
  logger.error({ err: error }, '❌ Error deploying commands');
  process.exit(1);
});
