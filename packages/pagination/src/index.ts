/**
 * Interactive pagination: sessions, navigation, controls and cleanup.
 */

export { PaginationBehavior, PaginationDeletion } from '@pagewise/common-types';

export { createPage, type Page } from './Page.js';
export { PageStore } from './PageStore.js';
export { NavigationStateMachine } from './NavigationStateMachine.js';
export { CompletionSignal, type CompletionReason } from './CompletionSignal.js';
export {
  PaginationAction,
  PAGINATION_ACTION_ORDER,
  createReactionControls,
  createButtonControls,
  type ControlBindingSet,
  type ControlCapability,
  type ControlTokens,
} from './controls.js';
export { executeCleanup, type CleanupOutcome, type CleanupCall } from './cleanup.js';
export {
  PaginationSession,
  createSession,
  type SessionOptions,
  type SessionState,
  type ControlResult,
} from './PaginationSession.js';
export {
  runPagination,
  type RunPaginationOptions,
  type PaginationRunResult,
} from './runPagination.js';
export {
  generatePagesInContent,
  generatePagesInEmbed,
  splitIntoChunks,
  type SplitType,
  type PageGenerationOptions,
  type EmbedPageOptions,
} from './pageGenerator.js';
export type {
  RenderTarget,
  ControlEvent,
  ControlListener,
  ControlEventSource,
  PageRenderer,
} from './types.js';
export {
  PaginationProgrammingError,
  SessionInactiveError,
  SessionDisposedError,
  UnsupportedCapabilityError,
  CleanupTransportError,
} from './errors.js';
