/**
 * Page Generator
 *
 * Splits long text into pages for a pagination session, either as plain message
 * content or as embed descriptions.
 */

import type { APIEmbed } from 'discord-api-types/v10';
import { DISCORD_LIMITS, PAGINATION_DEFAULTS } from '@pagewise/common-types';
import { PaginationProgrammingError } from './errors.js';
import { createPage, type Page } from './Page.js';

export type SplitType = 'character' | 'line';

export interface PageGenerationOptions {
  /** Split every `maxLength` characters, or every `linesPerPage` lines (default: 'character') */
  splitType?: SplitType;
  /** Characters per page for 'character' splits; also the cap for 'line' pages */
  maxLength?: number;
  /** Lines per page for 'line' splits */
  linesPerPage?: number;
}

export interface EmbedPageOptions extends PageGenerationOptions {
  /** Title, color etc. copied onto every page */
  template?: Omit<APIEmbed, 'description' | 'footer'>;
  /** Add a "Page X/Y" footer (default: true) */
  showPageNumbers?: boolean;
}

function assertPositiveInteger(value: number, name: string): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new PaginationProgrammingError(`${name} must be a positive integer, got ${value}`);
  }
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

/**
 * Cut every `maxLength` UTF-16 units, never between the two halves of a
 * surrogate pair (emoji and other astral characters stay whole). A chunk of one
 * unit that would split a pair takes the whole pair instead.
 */
function splitByCharacters(text: string, maxLength: number): string[] {
  const chunks: string[] = [];
  let start = 0;
  while (start < text.length) {
    let end = Math.min(start + maxLength, text.length);
    if (end < text.length && isHighSurrogate(text.charCodeAt(end - 1))) {
      end += end - start > 1 ? -1 : 1;
    }
    chunks.push(text.slice(start, end));
    start = end;
  }
  return chunks;
}

function splitByLines(text: string, linesPerPage: number, maxLength: number): string[] {
  const lines = text.split(/\r?\n/);
  const chunks: string[] = [];
  for (let i = 0; i < lines.length; i += linesPerPage) {
    const chunk = lines.slice(i, i + linesPerPage).join('\n');
    // A handful of very long lines can still overflow the limit
    chunks.push(...splitByCharacters(chunk, maxLength));
  }
  return chunks.filter(chunk => chunk.trim().length > 0);
}

/**
 * Split text into page-sized chunks
 *
 * @param text - Text to split (must contain something besides whitespace)
 * @param options - Split settings
 * @param limit - Hard per-chunk limit of the destination field
 * @throws PaginationProgrammingError on empty text or invalid sizes
 */
export function splitIntoChunks(
  text: string,
  options: PageGenerationOptions,
  limit: number
): string[] {
  if (text.trim().length === 0) {
    throw new PaginationProgrammingError('Cannot generate pages from empty text');
  }

  const maxLength = Math.min(options.maxLength ?? PAGINATION_DEFAULTS.CHARACTERS_PER_PAGE, limit);
  assertPositiveInteger(maxLength, 'maxLength');

  if (options.splitType === 'line') {
    const linesPerPage = options.linesPerPage ?? PAGINATION_DEFAULTS.LINES_PER_PAGE;
    assertPositiveInteger(linesPerPage, 'linesPerPage');
    return splitByLines(text, linesPerPage, maxLength);
  }

  return splitByCharacters(text, maxLength);
}

/**
 * Generate content-only pages
 *
 * @example
 * ```typescript
 * generatePagesInContent(changelog, { splitType: 'line', linesPerPage: 10 });
 * ```
 */
export function generatePagesInContent(text: string, options: PageGenerationOptions = {}): Page[] {
  return splitIntoChunks(text, options, DISCORD_LIMITS.MESSAGE_LENGTH).map(chunk =>
    createPage(chunk)
  );
}

/**
 * Generate embed pages, one chunk per embed description
 */
export function generatePagesInEmbed(text: string, options: EmbedPageOptions = {}): Page[] {
  const chunks = splitIntoChunks(text, options, DISCORD_LIMITS.EMBED_DESCRIPTION);
  const showPageNumbers = options.showPageNumbers ?? true;

  return chunks.map((chunk, index) => {
    const embed: APIEmbed = { ...options.template, description: chunk };
    if (showPageNumbers) {
      embed.footer = { text: `Page ${index + 1}/${chunks.length}` };
    }
    return createPage('', embed);
  });
}
