/**
 * Pagination Button Row
 *
 * Standard button layout:
 *   [⏮] [◀] [⏹ Stop] [▶] [⏭]
 *
 * Under clamp, the buttons that cannot move are disabled at either end.
 */

import { ActionRowBuilder, ButtonBuilder, ButtonStyle } from 'discord.js';
import { PAGINATION_EMOJIS } from '@pagewise/common-types';
import {
  PaginationAction,
  PaginationBehavior,
  PAGINATION_ACTION_ORDER,
  UnsupportedCapabilityError,
  type ControlBindingSet,
} from '@pagewise/pagination';

/** Emoji shown on each button */
const BUTTON_EMOJIS: Record<PaginationAction, string> = {
  [PaginationAction.SkipToFirst]: PAGINATION_EMOJIS.SKIP_TO_FIRST,
  [PaginationAction.Previous]: PAGINATION_EMOJIS.PREVIOUS,
  [PaginationAction.Stop]: PAGINATION_EMOJIS.STOP,
  [PaginationAction.Next]: PAGINATION_EMOJIS.NEXT,
  [PaginationAction.SkipToLast]: PAGINATION_EMOJIS.SKIP_TO_LAST,
};

export interface ButtonRowState {
  /** Current page (0-indexed) */
  index: number;
  pageCount: number;
  behavior: PaginationBehavior;
}

function isDisabled(action: PaginationAction, state: ButtonRowState): boolean {
  if (action === PaginationAction.Stop) {
    return false;
  }
  if (state.pageCount <= 1) {
    return true;
  }
  if (state.behavior === PaginationBehavior.WrapAround) {
    return false;
  }
  const atStart = state.index === 0;
  const atEnd = state.index >= state.pageCount - 1;
  switch (action) {
    case PaginationAction.SkipToFirst:
    case PaginationAction.Previous:
      return atStart;
    case PaginationAction.Next:
    case PaginationAction.SkipToLast:
      return atEnd;
  }
}

/**
 * Build the navigation button row for a button session
 *
 * @throws UnsupportedCapabilityError if `controls` is not a button binding set
 */
export function buildControlButtons(
  controls: ControlBindingSet,
  state: ButtonRowState
): ActionRowBuilder<ButtonBuilder> {
  if (controls.capability !== 'buttons') {
    throw new UnsupportedCapabilityError(
      controls.capability,
      'This pagination session uses reactions and does not support buttons'
    );
  }

  const row = new ActionRowBuilder<ButtonBuilder>();
  for (const action of PAGINATION_ACTION_ORDER) {
    const button = new ButtonBuilder()
      .setCustomId(controls.tokens[action])
      .setEmoji(BUTTON_EMOJIS[action])
      .setStyle(action === PaginationAction.Stop ? ButtonStyle.Danger : ButtonStyle.Secondary)
      .setDisabled(isDisabled(action, state));
    if (action === PaginationAction.Stop) {
      button.setLabel('Stop');
    }
    row.addComponents(button);
  }
  return row;
}
