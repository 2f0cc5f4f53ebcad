/**
 * Constants Barrel Export
 *
 * Re-exports all domain-separated constants from a single entry point.
 */

// Discord constants
export { DISCORD_LIMITS, DISCORD_COLORS } from './discord.js';

// Pagination constants
export {
  PaginationBehavior,
  PaginationDeletion,
  PAGINATION_DEFAULTS,
  PAGINATION_EMOJIS,
  PAGINATION_BUTTON_PREFIX,
  PAGINATION_BUTTON_IDS,
} from './pagination.js';
