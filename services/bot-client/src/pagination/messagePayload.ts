/**
 * Page Rendering
 *
 * Turns a Page into message options accepted by Message.edit() and
 * ButtonInteraction.update().
 */

import type { ActionRowBuilder, ButtonBuilder } from 'discord.js';
import type { APIEmbed } from 'discord-api-types/v10';
import type { Page } from '@pagewise/pagination';

export interface PagePayload {
  content: string;
  embeds: APIEmbed[];
  components: ActionRowBuilder<ButtonBuilder>[];
}

/**
 * Build edit options for a page. Embeds are always sent (possibly empty) so a
 * content-only page replaces the previous page's embed.
 */
export function toMessagePayload(
  page: Page,
  components: ActionRowBuilder<ButtonBuilder>[] = []
): PagePayload {
  return {
    content: page.content,
    embeds: page.embed !== undefined ? [{ ...page.embed }] : [],
    components,
  };
}
