/**
 * Command Helpers
 * Shared utilities for Discord slash command handlers
 */

import { MessageFlags } from 'discord.js';
import type { ButtonInteraction, ChatInputCommandInteraction } from 'discord.js';

/**
 * Reply with a simple error message (interaction must be deferred)
 */
export async function replyWithError(
  interaction: ChatInputCommandInteraction,
  message: string
): Promise<void> {
  await interaction.editReply({ content: `❌ ${message}`, embeds: [], components: [] });
}

/**
 * Answer a button press with a message only the presser can see
 */
export async function replyEphemeral(interaction: ButtonInteraction, content: string): Promise<void> {
  await interaction.reply({ content, flags: MessageFlags.Ephemeral });
}
