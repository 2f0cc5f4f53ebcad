/**
 * Pagination Session
 *
 * Lifecycle controller for one interactive pagination: owns the navigation state,
 * the timeout timer and the completion signal.
 *
 * State machine:
 *   active --(timeout | stop)--> completed --(dispose: cleanup ran)--> disposed
 *
 * Every mutation of the page index and of the completion flag happens inside a
 * synchronous method (registerControl, stop, the timer callback), so each one runs
 * to completion before any other can start. Nothing awaits while holding state.
 */

import {
  createLogger,
  PAGINATION_DEFAULTS,
  PaginationBehavior,
  PaginationDeletion,
} from '@pagewise/common-types';
import { CompletionSignal, type CompletionReason } from './CompletionSignal.js';
import { executeCleanup, type CleanupOutcome } from './cleanup.js';
import { PaginationAction, type ControlBindingSet } from './controls.js';
import {
  PaginationProgrammingError,
  SessionDisposedError,
  SessionInactiveError,
  UnsupportedCapabilityError,
} from './errors.js';
import { NavigationStateMachine } from './NavigationStateMachine.js';
import type { Page } from './Page.js';
import { PageStore } from './PageStore.js';
import type { RenderTarget } from './types.js';

const logger = createLogger('pagination-session');

export type SessionState = 'active' | 'completed' | 'disposed';

export interface SessionOptions {
  /** Pages in display order (at least one) */
  pages: readonly Page[];
  /** The only user allowed to drive navigation */
  ownerId: string;
  /** Message the session renders into */
  renderTarget: RenderTarget;
  /** Token bindings for the five navigation actions */
  controls: ControlBindingSet;
  /** Boundary policy (default: wrap around) */
  behavior?: PaginationBehavior;
  /** What cleanup does to the message (default: remove control marks) */
  deletionPolicy?: PaginationDeletion;
  /** Milliseconds until the session expires, counted from construction (default: 5 minutes) */
  timeoutMs?: number;
}

/**
 * Result of registering a control token
 */
export type ControlResult =
  | {
      ok: true;
      action: PaginationAction;
      /** Page at the index after the action */
      page: Page;
      index: number;
      /** False when this control stopped the session */
      stillActive: boolean;
    }
  | { ok: false; error: SessionInactiveError | UnsupportedCapabilityError };

export class PaginationSession {
  readonly ownerId: string;
  readonly renderTarget: RenderTarget;
  readonly controls: ControlBindingSet;
  readonly deletionPolicy: PaginationDeletion;
  readonly timeoutMs: number;

  private readonly navigation: NavigationStateMachine;
  private readonly completion = new CompletionSignal();
  private timer: ReturnType<typeof setTimeout> | null;
  private sessionState: SessionState = 'active';
  private disposal: Promise<CleanupOutcome> | null = null;

  /**
   * @throws PaginationProgrammingError on an empty page list or a non-positive timeout
   */
  constructor(options: SessionOptions) {
    const timeoutMs = options.timeoutMs ?? PAGINATION_DEFAULTS.TIMEOUT_MS;
    if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
      throw new PaginationProgrammingError(
        `Session timeout must be a positive number of milliseconds, got ${timeoutMs}`
      );
    }

    this.navigation = new NavigationStateMachine(
      new PageStore(options.pages),
      options.behavior ?? PAGINATION_DEFAULTS.BEHAVIOR
    );
    this.ownerId = options.ownerId;
    this.renderTarget = options.renderTarget;
    this.controls = options.controls;
    this.deletionPolicy = options.deletionPolicy ?? PAGINATION_DEFAULTS.DELETION;
    this.timeoutMs = timeoutMs;

    this.timer = setTimeout(() => {
      this.timer = null;
      this.complete('timeout');
    }, timeoutMs);

    logger.debug(
      {
        targetId: this.id,
        ownerId: this.ownerId,
        pageCount: this.navigation.pageCount,
        behavior: this.behavior,
        timeoutMs,
      },
      '[Pagination] Session started'
    );
  }

  /** Sessions are keyed by the message they render into */
  get id(): string {
    return this.renderTarget.id;
  }

  get behavior(): PaginationBehavior {
    return this.navigation.behavior;
  }

  get state(): SessionState {
    return this.sessionState;
  }

  get isActive(): boolean {
    return this.sessionState === 'active';
  }

  get completionReason(): CompletionReason | null {
    return this.completion.completionReason;
  }

  get pageCount(): number {
    this.assertNotDisposed();
    return this.navigation.pageCount;
  }

  get currentIndex(): number {
    this.assertNotDisposed();
    return this.navigation.currentIndex;
  }

  currentPage(): Page {
    this.assertNotDisposed();
    return this.navigation.currentPage();
  }

  /**
   * Apply the action bound to `token`.
   *
   * Rejected without touching the index once the session has completed, and when
   * the token is not part of this session's binding set.
   */
  registerControl(token: string): ControlResult {
    if (this.sessionState !== 'active') {
      logger.debug({ targetId: this.id, control: token }, '[Pagination] Control after completion');
      return { ok: false, error: new SessionInactiveError(this.id) };
    }

    const action = this.controls.resolve(token);
    if (action === null) {
      return {
        ok: false,
        error: new UnsupportedCapabilityError(
          this.controls.capability,
          `Control "${token}" is not bound in this session's ${this.controls.capability} controls`
        ),
      };
    }

    let stillActive = true;
    switch (action) {
      case PaginationAction.SkipToFirst:
        this.navigation.jumpToFirst();
        break;
      case PaginationAction.Previous:
        this.navigation.retreat();
        break;
      case PaginationAction.Next:
        this.navigation.advance();
        break;
      case PaginationAction.SkipToLast:
        this.navigation.jumpToLast();
        break;
      case PaginationAction.Stop:
        this.complete('stopped');
        stillActive = false;
        break;
    }

    return {
      ok: true,
      action,
      page: this.navigation.currentPage(),
      index: this.navigation.currentIndex,
      stillActive,
    };
  }

  /**
   * End the session now. Safe to call any number of times, from any state.
   */
  stop(): void {
    this.complete('stopped');
  }

  /**
   * Resolves once the session completes, with the reason it completed.
   */
  waitUntilComplete(): Promise<CompletionReason> {
    return this.completion.wait();
  }

  /**
   * Complete the session (if still active), run the deletion policy once and
   * release the timer. Repeated calls share the first call's outcome.
   */
  dispose(): Promise<CleanupOutcome> {
    this.disposal ??= this.runDisposal();
    return this.disposal;
  }

  private async runDisposal(): Promise<CleanupOutcome> {
    this.complete('stopped');
    try {
      const outcome = await executeCleanup(this.deletionPolicy, this.renderTarget);
      logger.debug(
        { targetId: this.id, policy: this.deletionPolicy, ok: outcome.ok },
        '[Pagination] Session disposed'
      );
      return outcome;
    } finally {
      this.clearTimer();
      this.sessionState = 'disposed';
    }
  }

  /**
   * @returns true if this call completed the session
   */
  private complete(reason: CompletionReason): boolean {
    if (!this.completion.fire(reason)) {
      return false;
    }
    this.clearTimer();
    this.sessionState = 'completed';
    logger.debug(
      { targetId: this.id, reason, index: this.navigation.currentIndex },
      '[Pagination] Session completed'
    );
    return true;
  }

  private clearTimer(): void {
    if (this.timer !== null) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  private assertNotDisposed(): void {
    if (this.sessionState === 'disposed') {
      throw new SessionDisposedError(this.id);
    }
  }
}

/**
 * Create a session. The timeout clock starts immediately.
 *
 * @example
 * ```typescript
 * const session = createSession({
 *   pages: [createPage('one'), createPage('two')],
 *   ownerId: user.id,
 *   renderTarget: new DiscordRenderTarget(message, 'reactions'),
 *   controls: createReactionControls(),
 *   behavior: PaginationBehavior.Clamp,
 * });
 * ```
 */
export function createSession(options: SessionOptions): PaginationSession {
  return new PaginationSession(options);
}
