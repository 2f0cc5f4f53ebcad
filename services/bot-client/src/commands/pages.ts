/**
 * /pages Command
 * Splits the given text into pages and lets the caller browse them with buttons
 * or reactions.
 */

import { SlashCommandBuilder } from 'discord.js';
import type { ChatInputCommandInteraction } from 'discord.js';
import { createLogger, DISCORD_COLORS } from '@pagewise/common-types';
import { generatePagesInEmbed, type SplitType } from '@pagewise/pagination';
import { paginateWithButtons, paginateWithReactions } from '../pagination/paginate.js';
import { replyWithError } from '../utils/commandHelpers.js';
import type { Command } from '../types.js';

const logger = createLogger('pages-command');

type PagesMode = 'buttons' | 'reactions';

export const data = new SlashCommandBuilder()
  .setName('pages')
  .setDescription('Browse long text one page at a time')
  .addStringOption(option =>
    option.setName('text').setDescription('Text to paginate').setRequired(true)
  )
  .addStringOption(option =>
    option
      .setName('mode')
      .setDescription('How to turn pages (default: buttons)')
      .addChoices({ name: 'Buttons', value: 'buttons' }, { name: 'Reactions', value: 'reactions' })
  )
  .addStringOption(option =>
    option
      .setName('split')
      .setDescription('Where to break pages (default: every 500 characters)')
      .addChoices({ name: 'Characters', value: 'character' }, { name: 'Lines', value: 'line' })
  );

function parseMode(value: string | null): PagesMode {
  return value === 'reactions' ? 'reactions' : 'buttons';
}

function parseSplit(value: string | null): SplitType {
  return value === 'line' ? 'line' : 'character';
}

export async function execute(interaction: ChatInputCommandInteraction): Promise<void> {
  await interaction.deferReply();

  const text = interaction.options.getString('text', true);
  const mode = parseMode(interaction.options.getString('mode'));
  const splitType = parseSplit(interaction.options.getString('split'));
  const userId = interaction.user.id;

  if (text.trim().length === 0) {
    await replyWithError(interaction, 'There is nothing to paginate.');
    return;
  }

  try {
    const pages = generatePagesInEmbed(text, {
      splitType,
      template: { title: '📄 Pages', color: DISCORD_COLORS.BLURPLE },
    });

    const result =
      mode === 'reactions'
        ? await paginateWithReactions(
            await interaction.editReply({ content: 'Loading pages…' }),
            userId,
            pages
          )
        : await paginateWithButtons(interaction, pages);

    logger.info(
      { userId, mode, pageCount: pages.length, reason: result.reason },
      '[Pages] Pagination finished'
    );
  } catch (error) {
    logger.error({ err: error, userId, mode }, '[Pages] Pagination failed');
    await replyWithError(interaction, 'Could not show those pages. Please try again later.');
  }
}

export const pagesCommand: Command = { data, execute };
