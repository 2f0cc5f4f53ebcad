/**
 * Pagination Constants
 *
 * Boundary and cleanup policies for interactive pagination sessions, plus the
 * defaults the bot falls back to when a command does not choose its own.
 */

/**
 * What navigation does at the first and last page
 */
export enum PaginationBehavior {
  /** Stay on the boundary page */
  Clamp = 'clamp',
  /** Jump to the opposite end */
  WrapAround = 'wrapAround',
}

/**
 * What happens to the paginated message when its session ends
 */
export enum PaginationDeletion {
  /** Remove every reaction (or button row) from the message */
  DeleteControlMarks = 'deleteControlMarks',
  /** Delete the message itself */
  DeleteRenderedArtifact = 'deleteRenderedArtifact',
  /** Leave the message and its controls untouched */
  KeepControlMarks = 'keepControlMarks',
}

/**
 * Session defaults
 */
export const PAGINATION_DEFAULTS = {
  /** Session timeout (5 minutes) */
  TIMEOUT_MS: 5 * 60 * 1000,
  BEHAVIOR: PaginationBehavior.WrapAround,
  DELETION: PaginationDeletion.DeleteControlMarks,
  /** Characters per page when splitting by character */
  CHARACTERS_PER_PAGE: 500,
  /** Lines per page when splitting by line */
  LINES_PER_PAGE: 15,
} as const;

/**
 * Reaction emojis bound to the five navigation actions
 */
export const PAGINATION_EMOJIS = {
  SKIP_TO_FIRST: '⏮',
  PREVIOUS: '◀',
  STOP: '⏹',
  NEXT: '▶',
  SKIP_TO_LAST: '⏭',
} as const;

/** Custom ID prefix shared by the default pagination buttons */
export const PAGINATION_BUTTON_PREFIX = 'pages::';

/**
 * Button custom IDs bound to the five navigation actions
 */
export const PAGINATION_BUTTON_IDS = {
  SKIP_TO_FIRST: `${PAGINATION_BUTTON_PREFIX}first`,
  PREVIOUS: `${PAGINATION_BUTTON_PREFIX}previous`,
  STOP: `${PAGINATION_BUTTON_PREFIX}stop`,
  NEXT: `${PAGINATION_BUTTON_PREFIX}next`,
  SKIP_TO_LAST: `${PAGINATION_BUTTON_PREFIX}last`,
} as const;
