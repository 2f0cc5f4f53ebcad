/**
 * Bot Client Types
 *
 * Type definitions for Discord bot client.
 */

import type { ChatInputCommandInteraction, SlashCommandBuilder } from 'discord.js';

/**
 * Slash command definition
 */
export interface Command {
  /** Builder output; option-only builders are accepted too */
  data: Pick<SlashCommandBuilder, 'name' | 'toJSON'>;
  execute: (interaction: ChatInputCommandInteraction) => Promise<void>;
}
