/**
 * Pagination Runner
 *
 * The collector loop: feeds control events from a source into a session, renders
 * the resulting pages, and releases everything once the session completes.
 *
 * Pattern:
 * 1. Subscribe to the event source
 * 2. For each event from the owner on the session's message, registerControl()
 * 3. Render the returned page (renders are chained so they land in order)
 * 4. When the session completes (timeout or stop), unsubscribe, let queued renders
 *    finish, then dispose
 *
 * Step 4 also runs when anything in between throws, so the timer and collector
 * never outlive the call.
 */

import { createLogger } from '@pagewise/common-types';
import type { CompletionReason } from './CompletionSignal.js';
import type { CleanupOutcome } from './cleanup.js';
import type { PaginationSession } from './PaginationSession.js';
import type { ControlEvent, ControlEventSource, PageRenderer } from './types.js';

const logger = createLogger('pagination-runner');

export interface RunPaginationOptions<TEvent extends ControlEvent> {
  session: PaginationSession;
  source: ControlEventSource<TEvent>;
  render: PageRenderer<TEvent>;
}

export interface PaginationRunResult {
  reason: CompletionReason;
  /** Page index when the session completed */
  finalIndex: number;
  /** Controls the session accepted (including stop) */
  controlsApplied: number;
  /** Renders or acknowledgements that failed */
  renderFailures: number;
  cleanup: CleanupOutcome;
}

export async function runPagination<TEvent extends ControlEvent>(
  options: RunPaginationOptions<TEvent>
): Promise<PaginationRunResult> {
  const { session, source, render } = options;
  const targetId = session.renderTarget.id;
  // Tracked here so a session disposed from outside can still be reported
  let finalIndex = session.currentIndex;
  let controlsApplied = 0;
  let renderFailures = 0;
  let pending: Promise<void> = Promise.resolve();

  const enqueue = (work: () => Promise<void>, what: string): void => {
    pending = pending.then(work).catch((error: unknown) => {
      renderFailures++;
      logger.warn({ err: error, targetId }, `[Pagination] ${what} failed`);
    });
  };

  const settle = (event: TEvent): void => {
    const { acknowledge } = event;
    if (acknowledge !== undefined) {
      enqueue(acknowledge, 'Acknowledge');
    }
  };

  const onEvent = (event: TEvent): void => {
    if (event.targetId !== targetId || event.actorId !== session.ownerId) {
      logger.debug({ targetId, actorId: event.actorId }, '[Pagination] Ignored foreign event');
      return;
    }

    const result = session.registerControl(event.token);
    if (!result.ok) {
      logger.debug(
        { targetId, control: event.token, reason: result.error.name },
        '[Pagination] Control rejected'
      );
      settle(event);
      return;
    }

    controlsApplied++;
    finalIndex = result.index;
    if (!result.stillActive) {
      settle(event);
      return;
    }

    const state = { index: result.index, pageCount: session.pageCount };
    enqueue(() => render(result.page, event, state), 'Render');
  };

  let unsubscribe: (() => void) | null = null;
  const stopDelivery = (): void => {
    const stop = unsubscribe;
    unsubscribe = null;
    stop?.();
  };
  const release = (): Promise<CleanupOutcome> => {
    stopDelivery();
    return session.dispose();
  };

  try {
    unsubscribe = source.subscribe(onEvent);
    const reason = await session.waitUntilComplete();
    // Input arriving after completion is left to whoever owns the transport
    stopDelivery();
    await pending;
    const cleanup = await release();

    logger.info(
      { targetId, reason, finalIndex, controlsApplied, renderFailures, cleanupOk: cleanup.ok },
      '[Pagination] Session ended'
    );
    return { reason, finalIndex, controlsApplied, renderFailures, cleanup };
  } finally {
    await release();
  }
}
