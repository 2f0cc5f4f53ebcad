/**
 * Active Session Registry
 *
 * Tracks which messages currently have a live pagination session, so the global
 * InteractionCreate handler can tell a stale pagination button from a live one.
 *
 * Pattern:
 * 1. When a paginator starts a session, register the message ID
 * 2. The global handler ignores pagination buttons on registered messages (the
 *    session's collector answers them)
 * 3. When the session ends, deregister the message ID
 * 4. After deregistration, the global handler answers clicks with "expired"
 *
 * The map is empty on startup, so buttons left over from before a restart are
 * reported as expired.
 */

import type { PaginationSession } from '@pagewise/pagination';

const activeSessions = new Map<string, PaginationSession>();

/**
 * Register a message as having a live session.
 */
export function registerActiveSession(messageId: string, session: PaginationSession): void {
  activeSessions.set(messageId, session);
}

/**
 * Deregister a message when its session ends.
 */
export function deregisterActiveSession(messageId: string): void {
  activeSessions.delete(messageId);
}

/**
 * @returns true if a session is live on this message (global handler should ignore)
 */
export function hasActiveSession(messageId: string): boolean {
  return activeSessions.has(messageId);
}

/**
 * Live session for a message, if any.
 */
export function getActiveSession(messageId: string): PaginationSession | undefined {
  return activeSessions.get(messageId);
}

/**
 * Get the count of live sessions (for debugging/monitoring).
 */
export function getActiveSessionCount(): number {
  return activeSessions.size;
}

/**
 * Dispose every live session and wait for their cleanup calls (shutdown).
 * Cleanup failures are already reported by each session's outcome.
 */
export async function disposeAllActiveSessions(): Promise<void> {
  await Promise.all([...activeSessions.values()].map(session => session.dispose()));
}
