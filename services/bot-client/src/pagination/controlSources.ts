/**
 * Discord Control Sources
 *
 * Wrap discord.js collectors as pagination ControlEventSources. Both collectors
 * are created without a `time` option: the session owns the timeout and stops
 * delivery through the unsubscribe function.
 */

import { ComponentType } from 'discord.js';
import type {
  ButtonInteraction,
  Message,
  MessageReaction,
  PartialMessageReaction,
} from 'discord.js';
import { createLogger } from '@pagewise/common-types';
import type { ControlEvent, ControlEventSource, ControlListener } from '@pagewise/pagination';

const logger = createLogger('pagination-sources');

/** Reason passed to collector.stop() when the session ends */
export const COLLECTOR_STOP_REASON = 'paginationEnded';

/**
 * Strip the emoji presentation selector (U+FE0F) so '▶️' and '▶' match
 */
export function normalizeEmoji(name: string): string {
  return name.replace(/\uFE0F/g, '');
}

function reactionToken(reaction: MessageReaction | PartialMessageReaction): string | null {
  const { emoji } = reaction;
  if (emoji.id !== null) {
    // Custom emoji: match on the identifier used by message.react()
    return emoji.name !== null ? `${emoji.name}:${emoji.id}` : emoji.id;
  }
  return emoji.name !== null ? normalizeEmoji(emoji.name) : null;
}

/**
 * Reaction clicks by the session owner on one message
 */
export class ReactionControlSource implements ControlEventSource {
  constructor(
    private readonly message: Message,
    private readonly ownerId: string
  ) {}

  subscribe(listener: ControlListener<ControlEvent>): () => void {
    const collector = this.message.createReactionCollector({
      filter: (_reaction, user) => user.id === this.ownerId,
    });

    collector.on('collect', (reaction, user) => {
      const token = reactionToken(reaction);
      if (token === null) {
        return;
      }

      listener({ actorId: user.id, token, targetId: this.message.id });

      // Take the click back off so the same control can be pressed again
      void reaction.users.remove(user.id).catch((error: unknown) => {
        logger.debug(
          { err: error, messageId: this.message.id },
          '[Pagination] Could not remove user reaction'
        );
      });
    });

    return () => {
      collector.stop(COLLECTOR_STOP_REASON);
    };
  }
}

/**
 * A button press, carrying the interaction so the renderer can answer it
 */
export interface ButtonControlEvent extends ControlEvent {
  interaction: ButtonInteraction;
}

/**
 * Button presses by the session owner on one message
 */
export class ButtonControlSource implements ControlEventSource<ButtonControlEvent> {
  constructor(
    private readonly message: Message,
    private readonly ownerId: string
  ) {}

  subscribe(listener: ControlListener<ButtonControlEvent>): () => void {
    const collector = this.message.createMessageComponentCollector({
      componentType: ComponentType.Button,
      filter: interaction => interaction.user.id === this.ownerId,
    });

    collector.on('collect', (interaction: ButtonInteraction) => {
      listener({
        actorId: interaction.user.id,
        token: interaction.customId,
        targetId: interaction.message.id,
        interaction,
        acknowledge: async () => {
          await interaction.deferUpdate();
        },
      });
    });

    return () => {
      collector.stop(COLLECTOR_STOP_REASON);
    };
  }
}
