/**
 * Discord Render Target
 *
 * Adapts a bot-owned Discord message to the pagination RenderTarget interface.
 * "Control marks" are the reactions of a reaction session and the button rows of a
 * button session.
 */

import type { Message } from 'discord.js';
import type { ControlCapability, RenderTarget } from '@pagewise/pagination';

export class DiscordRenderTarget implements RenderTarget {
  constructor(
    private readonly message: Message,
    private readonly capability: ControlCapability
  ) {}

  get id(): string {
    return this.message.id;
  }

  async removeAllControlMarks(): Promise<void> {
    if (this.capability === 'reactions') {
      await this.message.reactions.removeAll();
    } else {
      await this.message.edit({ components: [] });
    }
  }

  async deleteArtifact(): Promise<void> {
    await this.message.delete();
  }
}
