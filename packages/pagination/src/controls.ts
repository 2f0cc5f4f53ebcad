/**
 * Control Binding Sets
 *
 * Map the five navigation actions to the tokens a transport delivers: emoji names
 * for reaction sessions, custom IDs for button sessions. A session only ever sees
 * tokens, so both kinds sit behind the same registerControl() contract.
 */

import { PAGINATION_BUTTON_IDS, PAGINATION_EMOJIS } from '@pagewise/common-types';

export enum PaginationAction {
  SkipToFirst = 'skipToFirst',
  Previous = 'previous',
  Stop = 'stop',
  Next = 'next',
  SkipToLast = 'skipToLast',
}

/** Display order of the controls (left to right) */
export const PAGINATION_ACTION_ORDER: readonly PaginationAction[] = [
  PaginationAction.SkipToFirst,
  PaginationAction.Previous,
  PaginationAction.Stop,
  PaginationAction.Next,
  PaginationAction.SkipToLast,
];

/** Input capability a binding set relies on */
export type ControlCapability = 'reactions' | 'buttons';

export type ControlTokens = Readonly<Record<PaginationAction, string>>;

export interface ControlBindingSet {
  readonly capability: ControlCapability;
  readonly tokens: ControlTokens;
  /** Action bound to `token`, or null when the token is not part of this set */
  resolve(token: string): PaginationAction | null;
}

/**
 * Build a binding set, rejecting duplicate or empty tokens
 *
 * @throws Error if two actions share a token or a token is empty
 */
function createBindingSet(capability: ControlCapability, tokens: ControlTokens): ControlBindingSet {
  const byToken = new Map<string, PaginationAction>();
  for (const action of PAGINATION_ACTION_ORDER) {
    const token = tokens[action];
    if (token.length === 0) {
      throw new Error(`Control token for "${action}" must not be empty`);
    }
    const existing = byToken.get(token);
    if (existing !== undefined) {
      throw new Error(`Control token "${token}" is bound to both "${existing}" and "${action}"`);
    }
    byToken.set(token, action);
  }

  const frozenTokens = Object.freeze({ ...tokens });
  return Object.freeze({
    capability,
    tokens: frozenTokens,
    resolve: (token: string) => byToken.get(token) ?? null,
  });
}

/**
 * Reaction binding set. Defaults to ⏮ ◀ ⏹ ▶ ⏭.
 */
export function createReactionControls(overrides: Partial<ControlTokens> = {}): ControlBindingSet {
  return createBindingSet('reactions', {
    [PaginationAction.SkipToFirst]: PAGINATION_EMOJIS.SKIP_TO_FIRST,
    [PaginationAction.Previous]: PAGINATION_EMOJIS.PREVIOUS,
    [PaginationAction.Stop]: PAGINATION_EMOJIS.STOP,
    [PaginationAction.Next]: PAGINATION_EMOJIS.NEXT,
    [PaginationAction.SkipToLast]: PAGINATION_EMOJIS.SKIP_TO_LAST,
    ...overrides,
  });
}

/**
 * Button binding set. Tokens are component custom IDs.
 */
export function createButtonControls(overrides: Partial<ControlTokens> = {}): ControlBindingSet {
  return createBindingSet('buttons', {
    [PaginationAction.SkipToFirst]: PAGINATION_BUTTON_IDS.SKIP_TO_FIRST,
    [PaginationAction.Previous]: PAGINATION_BUTTON_IDS.PREVIOUS,
    [PaginationAction.Stop]: PAGINATION_BUTTON_IDS.STOP,
    [PaginationAction.Next]: PAGINATION_BUTTON_IDS.NEXT,
    [PaginationAction.SkipToLast]: PAGINATION_BUTTON_IDS.SKIP_TO_LAST,
    ...overrides,
  });
}
