/**
 * Collaborator interfaces
 *
 * The session never talks to Discord directly. Transports implement these.
 */

import type { Page } from './Page.js';

/**
 * Handle to the externally owned message a session is attached to
 */
export interface RenderTarget {
  readonly id: string;
  /** Remove every control mark (reactions or button rows) from the message */
  removeAllControlMarks(): Promise<void>;
  /** Delete the message */
  deleteArtifact(): Promise<void>;
}

/**
 * A raw input event already mapped to a control token
 */
export interface ControlEvent {
  /** User who produced the input */
  actorId: string;
  /** Emoji name or button custom ID */
  token: string;
  /** Message the input was produced on */
  targetId: string;
  /**
   * Settle the input without rendering a page. Transports whose input must be
   * answered (button interactions) implement this; reactions do not need it.
   */
  acknowledge?: () => Promise<void>;
}

export type ControlListener<TEvent extends ControlEvent> = (event: TEvent) => void;

/**
 * Source of control events (a reaction or component collector)
 */
export interface ControlEventSource<TEvent extends ControlEvent = ControlEvent> {
  /** @returns a function that stops delivery and releases the underlying collector */
  subscribe(listener: ControlListener<TEvent>): () => void;
}

/**
 * Shows `page` on the render target. Receives the triggering event so transports
 * that must acknowledge input (button interactions) can answer through it.
 */
export type PageRenderer<TEvent extends ControlEvent = ControlEvent> = (
  page: Page,
  event: TEvent,
  state: { index: number; pageCount: number }
) => Promise<void>;
