/**
 * Page
 *
 * One unit of displayable content. Pages are frozen when built; sessions only
 * ever read them.
 */

import type { APIEmbed } from 'discord-api-types/v10';

export interface Page {
  /** Message text (may be empty when the page is embed-only) */
  readonly content: string;
  /** Optional embed rendered below the text */
  readonly embed?: Readonly<APIEmbed>;
}

/**
 * Build a frozen page
 *
 * @example
 * ```typescript
 * createPage('Rules, part 1');
 * createPage('', { title: 'Rules', description: 'Be kind.' });
 * ```
 */
export function createPage(content = '', embed?: APIEmbed): Page {
  if (embed === undefined) {
    return Object.freeze({ content });
  }
  return Object.freeze({ content, embed: Object.freeze({ ...embed }) });
}
