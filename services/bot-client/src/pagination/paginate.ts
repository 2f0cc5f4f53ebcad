/**
 * Discord Paginators
 *
 * Entry points that put a pagination session on a Discord message:
 * - paginateWithReactions: ⏮ ◀ ⏹ ▶ ⏭ reactions on an existing bot message
 * - paginateWithButtons: a button row on a slash command reply
 *
 * Both resolve once the session has ended and its cleanup has run.
 */

import type { ChatInputCommandInteraction, Message } from 'discord.js';
import {
  createLogger,
  getConfig,
  type EnvConfig,
  type PaginationBehavior,
  type PaginationDeletion,
} from '@pagewise/common-types';
import {
  createButtonControls,
  createReactionControls,
  createSession,
  PaginationProgrammingError,
  PAGINATION_ACTION_ORDER,
  runPagination,
  UnsupportedCapabilityError,
  type ControlBindingSet,
  type Page,
  type PaginationRunResult,
  type PaginationSession,
} from '@pagewise/pagination';
import { deregisterActiveSession, registerActiveSession } from './activeSessionRegistry.js';
import { buildControlButtons } from './buttonRow.js';
import { ButtonControlSource, ReactionControlSource } from './controlSources.js';
import { DiscordRenderTarget } from './DiscordRenderTarget.js';
import { toMessagePayload } from './messagePayload.js';

const logger = createLogger('paginator');

export interface PaginateOptions {
  /** Boundary policy (default: PAGINATION_BEHAVIOR) */
  behavior?: PaginationBehavior;
  /** Cleanup policy (default: PAGINATION_DELETION) */
  deletionPolicy?: PaginationDeletion;
  /** Session timeout in ms (default: PAGINATION_TIMEOUT_MS) */
  timeoutMs?: number;
  /** Custom control tokens; must match the paginator's input kind */
  controls?: ControlBindingSet;
}

interface SessionSettings {
  behavior: PaginationBehavior;
  deletionPolicy: PaginationDeletion;
  timeoutMs: number;
}

function resolveSettings(options: PaginateOptions, config: EnvConfig): SessionSettings {
  return {
    behavior: options.behavior ?? config.PAGINATION_BEHAVIOR,
    deletionPolicy: options.deletionPolicy ?? config.PAGINATION_DELETION,
    timeoutMs: options.timeoutMs ?? config.PAGINATION_TIMEOUT_MS,
  };
}

/**
 * Run a started session, keeping it in the active registry while it is live.
 * The session is disposed on every exit path.
 */
async function runRegistered(
  session: PaginationSession,
  run: () => Promise<PaginationRunResult>
): Promise<PaginationRunResult> {
  registerActiveSession(session.id, session);
  try {
    return await run();
  } finally {
    deregisterActiveSession(session.id);
    await session.dispose();
  }
}

/**
 * Paginate an existing bot message with reactions.
 *
 * Shows the first page, adds the control reactions in order, then follows the
 * owner's clicks until the session times out or is stopped.
 *
 * @example
 * ```typescript
 * const message = await channel.send('Loading…');
 * await paginateWithReactions(message, user.id, generatePagesInEmbed(longText));
 * ```
 */
export async function paginateWithReactions(
  message: Message,
  ownerId: string,
  pages: readonly Page[],
  options: PaginateOptions = {},
  config: EnvConfig = getConfig()
): Promise<PaginationRunResult> {
  const controls = options.controls ?? createReactionControls();
  if (controls.capability !== 'reactions') {
    throw new UnsupportedCapabilityError(
      controls.capability,
      'paginateWithReactions needs a reaction binding set'
    );
  }

  const session = createSession({
    pages,
    ownerId,
    controls,
    renderTarget: new DiscordRenderTarget(message, 'reactions'),
    ...resolveSettings(options, config),
  });

  return runRegistered(session, async () => {
    await message.edit(toMessagePayload(session.currentPage()));

    logger.info(
      { messageId: message.id, ownerId, pageCount: session.pageCount },
      '[Pagination] Reaction session started'
    );

    // Listen before reacting: the owner may click the first control while the rest are added
    const run = runPagination({
      session,
      source: new ReactionControlSource(message, ownerId),
      render: async page => {
        await message.edit(toMessagePayload(page));
      },
    });
    const reacting = addControlReactions(message, controls, session).catch((error: unknown) => {
      session.stop();
      throw error;
    });

    const [result] = await Promise.all([run, reacting]);
    return result;
  });
}

/**
 * Add the control reactions in display order, stopping early once the session
 * has ended (a fast stop press would otherwise leave reactions behind cleanup).
 */
async function addControlReactions(
  message: Message,
  controls: ControlBindingSet,
  session: PaginationSession
): Promise<void> {
  for (const action of PAGINATION_ACTION_ORDER) {
    if (!session.isActive) {
      return;
    }
    await message.react(controls.tokens[action]);
  }
}

/**
 * Paginate a (deferred) slash command reply with a button row.
 *
 * Each press is answered with interaction.update(), so Discord never shows
 * "This interaction failed" for a live session.
 */
export async function paginateWithButtons(
  interaction: ChatInputCommandInteraction,
  pages: readonly Page[],
  options: PaginateOptions = {},
  config: EnvConfig = getConfig()
): Promise<PaginationRunResult> {
  const controls = options.controls ?? createButtonControls();
  const settings = resolveSettings(options, config);
  const [firstPage] = pages;
  if (firstPage === undefined) {
    throw new PaginationProgrammingError('A pagination session needs at least one page');
  }

  const buildRow = (index: number) =>
    buildControlButtons(controls, {
      index,
      pageCount: pages.length,
      behavior: settings.behavior,
    });

  const message = await interaction.editReply(toMessagePayload(firstPage, [buildRow(0)]));
  const ownerId = interaction.user.id;
  const session = createSession({
    pages,
    ownerId,
    controls,
    renderTarget: new DiscordRenderTarget(message, 'buttons'),
    ...settings,
  });

  logger.info(
    { messageId: message.id, ownerId, pageCount: pages.length },
    '[Pagination] Button session started'
  );

  return runRegistered(session, () =>
    runPagination({
      session,
      source: new ButtonControlSource(message, ownerId),
      render: async (page, event, state) => {
        await event.interaction.update(toMessagePayload(page, [buildRow(state.index)]));
      },
    })
  );
}
