/**
 * Deploy Slash Commands Utility
 *
 * Shared logic for deploying slash commands to Discord
 * Can be called from scripts or on bot startup
 */

import { REST, Routes } from 'discord.js';
import { createLogger, getConfig, type EnvConfig } from '@pagewise/common-types';
import { commands as registeredCommands } from '../commands/index.js';
import type { Command } from '../types.js';

const logger = createLogger('deploy-commands');

/**
 * Deploy commands to Discord
 *
 * @param global - Deploy globally (production) or to GUILD_ID (dev)
 */
export async function deployCommands(
  global = true,
  commands: readonly Command[] = registeredCommands,
  config: EnvConfig = getConfig()
): Promise<void> {
  try {
    const clientId = config.DISCORD_CLIENT_ID;
    const token = config.DISCORD_TOKEN;
    const guildId = config.GUILD_ID;

    if (
      clientId === undefined ||
      clientId.length === 0 ||
      token === undefined ||
      token.length === 0
    ) {
      throw new Error('Missing DISCORD_CLIENT_ID or DISCORD_TOKEN environment variables');
    }

    const body = commands.map(command => {
      logger.info(`Loaded: /${command.data.name}`);
      return command.data.toJSON();
    });

    logger.info(`Deploying ${body.length} commands to Discord...`);

    const rest = new REST().setToken(token);

    if (!global && guildId !== undefined && guildId.length > 0) {
      // Guild-specific deployment (dev/testing)
      logger.info(`Deploying to guild: ${guildId}`);
      await rest.put(Routes.applicationGuildCommands(clientId, guildId), { body });
      logger.info(`Successfully deployed ${body.length} commands to guild ${guildId}`);
    } else {
      // Global deployment (production)
      logger.info('Deploying globally (this may take up to an hour to propagate)');
      await rest.put(Routes.applicationCommands(clientId), { body });
      logger.info(`Successfully deployed ${body.length} commands globally`);
    }
  } catch (error) {
    logger.error({ err: error }, 'Error deploying commands');
    throw error;
  }
}
