/**
 * Command Handler
 *
 * Routes slash commands to their Command definitions and answers pagination
 * buttons that no live session is listening to.
 */

import { Collection, MessageFlags } from 'discord.js';
import type { ButtonInteraction, ChatInputCommandInteraction } from 'discord.js';
import { createLogger, PAGINATION_BUTTON_PREFIX } from '@pagewise/common-types';
import { getActiveSession } from '../pagination/activeSessionRegistry.js';
import { replyEphemeral } from '../utils/commandHelpers.js';
import type { Command } from '../types.js';

const logger = createLogger('CommandHandler');

export const EXPIRED_PAGINATION_MESSAGE =
  '⏰ These pages have expired. Run the command again to browse them.';
export const NOT_OWNER_MESSAGE = 'Only the person who opened these pages can turn them.';

/**
 * Command Handler - manages slash command registration and execution
 */
export class CommandHandler {
  private readonly commands = new Collection<string, Command>();

  constructor(commands: readonly Command[]) {
    for (const command of commands) {
      this.commands.set(command.data.name, command);
    }
    logger.info(`[CommandHandler] Loaded ${this.commands.size} commands`);
  }

  /**
   * Handle a slash command interaction
   */
  async handleInteraction(interaction: ChatInputCommandInteraction): Promise<void> {
    const commandName = interaction.commandName;
    const command = this.commands.get(commandName);

    if (!command) {
      logger.warn({}, `[CommandHandler] Unknown command: ${commandName}`);
      await interaction.reply({ content: 'Unknown command!', flags: MessageFlags.Ephemeral });
      return;
    }

    try {
      logger.info(`[CommandHandler] Executing command: ${commandName}`);
      await command.execute(interaction);
    } catch (error) {
      logger.error({ err: error }, `[CommandHandler] Error executing command: ${commandName}`);

      const errorMessage = 'There was an error executing this command!';
      if (interaction.replied || interaction.deferred) {
        await interaction.followUp({ content: errorMessage, flags: MessageFlags.Ephemeral });
      } else {
        await interaction.reply({ content: errorMessage, flags: MessageFlags.Ephemeral });
      }
    }
  }

  /**
   * Handle a button interaction.
   *
   * Presses by the owner of a live session belong to that session's collector and
   * are left alone here. Everything else on a pagination button gets an
   * ephemeral explanation, so Discord never shows "This interaction failed".
   *
   * @returns true if the button was a pagination control
   */
  async handleButton(interaction: ButtonInteraction): Promise<boolean> {
    if (!interaction.customId.startsWith(PAGINATION_BUTTON_PREFIX)) {
      return false;
    }

    const session = getActiveSession(interaction.message.id);
    if (session?.isActive === true) {
      if (session.ownerId !== interaction.user.id) {
        await replyEphemeral(interaction, NOT_OWNER_MESSAGE);
      }
      return true;
    }

    logger.debug(
      { customId: interaction.customId, messageId: interaction.message.id },
      '[CommandHandler] Pagination button without a live session'
    );
    await replyEphemeral(interaction, EXPIRED_PAGINATION_MESSAGE);
    return true;
  }

  /**
   * Get all loaded commands (for deployment)
   */
  getCommands(): Collection<string, Command> {
    return this.commands;
  }
}
