/**
 * Cleanup Policy Executor
 *
 * Runs the session's deletion policy against its render target. Exactly one
 * branch runs per call and remote failures come back as a value.
 */

import { createLogger, PaginationDeletion } from '@pagewise/common-types';
import { CleanupTransportError } from './errors.js';
import type { RenderTarget } from './types.js';

const logger = createLogger('pagination-cleanup');

/** Remote call a policy issued, null for KeepControlMarks */
export type CleanupCall = 'removeAllControlMarks' | 'deleteArtifact' | null;

export type CleanupOutcome =
  | { ok: true; policy: PaginationDeletion; remoteCall: CleanupCall }
  | { ok: false; policy: PaginationDeletion; error: CleanupTransportError };

export async function executeCleanup(
  policy: PaginationDeletion,
  target: RenderTarget
): Promise<CleanupOutcome> {
  switch (policy) {
    case PaginationDeletion.KeepControlMarks:
      return { ok: true, policy, remoteCall: null };

    case PaginationDeletion.DeleteControlMarks:
      try {
        await target.removeAllControlMarks();
        return { ok: true, policy, remoteCall: 'removeAllControlMarks' };
      } catch (error) {
        return fail(policy, target, new CleanupTransportError('removeAllControlMarks', error));
      }

    case PaginationDeletion.DeleteRenderedArtifact:
      try {
        await target.deleteArtifact();
        return { ok: true, policy, remoteCall: 'deleteArtifact' };
      } catch (error) {
        return fail(policy, target, new CleanupTransportError('deleteArtifact', error));
      }
  }
}

function fail(
  policy: PaginationDeletion,
  target: RenderTarget,
  error: CleanupTransportError
): CleanupOutcome {
  logger.warn({ err: error, targetId: target.id, policy }, '[Pagination] Cleanup call failed');
  return { ok: false, policy, error };
}
