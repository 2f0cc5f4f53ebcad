/**
 * Tests for PaginationSession
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { PaginationBehavior, PaginationDeletion } from '@pagewise/common-types';
import { createSession, type SessionOptions } from './PaginationSession.js';
import { createButtonControls, createReactionControls, PaginationAction } from './controls.js';
import {
  PaginationProgrammingError,
  SessionDisposedError,
  SessionInactiveError,
  UnsupportedCapabilityError,
} from './errors.js';
import { createFakeRenderTarget, createLetterPages } from './test/fakes.js';

vi.mock('@pagewise/common-types', async importOriginal => {
  const actual = await importOriginal<typeof import('@pagewise/common-types')>();
  return {
    ...actual,
    createLogger: () => ({
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    }),
  };
});

const NEXT = '▶';
const PREVIOUS = '◀';
const STOP = '⏹';
const FIRST = '⏮';
const LAST = '⏭';

function buildSession(overrides: Partial<SessionOptions> = {}) {
  const renderTarget = createFakeRenderTarget();
  const session = createSession({
    pages: createLetterPages(3),
    ownerId: 'user-1',
    renderTarget,
    controls: createReactionControls(),
    behavior: PaginationBehavior.Clamp,
    deletionPolicy: PaginationDeletion.DeleteControlMarks,
    timeoutMs: 60_000,
    ...overrides,
  });
  return { session, renderTarget };
}

describe('PaginationSession', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('construction', () => {
    it('should start active on the first page', () => {
      const { session } = buildSession();

      expect(session.state).toBe('active');
      expect(session.isActive).toBe(true);
      expect(session.currentIndex).toBe(0);
      expect(session.pageCount).toBe(3);
      expect(session.currentPage().content).toBe('A');
      expect(session.id).toBe('message-1');
    });

    it('should apply defaults', () => {
      const session = createSession({
        pages: createLetterPages(2),
        ownerId: 'user-1',
        renderTarget: createFakeRenderTarget(),
        controls: createReactionControls(),
      });

      expect(session.behavior).toBe(PaginationBehavior.WrapAround);
      expect(session.deletionPolicy).toBe(PaginationDeletion.DeleteControlMarks);
      expect(session.timeoutMs).toBe(300_000);
    });

    it('should reject an empty page list', () => {
      expect(() => buildSession({ pages: [] })).toThrow(PaginationProgrammingError);
    });

    it.each([0, -5, Number.NaN])('should reject timeout %s', timeoutMs => {
      expect(() => buildSession({ timeoutMs })).toThrow(PaginationProgrammingError);
    });
  });

  describe('registerControl', () => {
    it('should apply navigation controls and return the page to render', () => {
      const { session } = buildSession();

      const result = session.registerControl(NEXT);

      expect(result).toEqual({
        ok: true,
        action: PaginationAction.Next,
        page: { content: 'B' },
        index: 1,
        stillActive: true,
      });
    });

    it('should jump to last then retreat (A, B, C round trip)', () => {
      const { session } = buildSession();

      const last = session.registerControl(LAST);
      const previous = session.registerControl(PREVIOUS);

      expect(last.ok && last.page.content).toBe('C');
      expect(previous.ok && previous.page.content).toBe('B');
      expect(session.registerControl(FIRST)).toMatchObject({ ok: true, index: 0 });
    });

    it('should wrap back to the first page after three nexts', () => {
      const { session } = buildSession({ behavior: PaginationBehavior.WrapAround });

      session.registerControl(NEXT);
      session.registerControl(NEXT);
      const result = session.registerControl(NEXT);

      expect(result).toMatchObject({ ok: true, index: 0, page: { content: 'A' } });
    });

    it('should reaffirm the boundary page under clamp', () => {
      const { session } = buildSession();

      expect(session.registerControl(PREVIOUS)).toMatchObject({ ok: true, index: 0 });
    });

    it('should complete the session on stop', async () => {
      const { session } = buildSession();
      session.registerControl(NEXT);

      const result = session.registerControl(STOP);

      expect(result).toMatchObject({
        ok: true,
        action: PaginationAction.Stop,
        index: 1,
        stillActive: false,
      });
      expect(session.state).toBe('completed');
      await expect(session.waitUntilComplete()).resolves.toBe('stopped');
    });

    it('should report unbound tokens as a capability mismatch', () => {
      const { session } = buildSession();

      const result = session.registerControl('pages::next');

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(UnsupportedCapabilityError);
        expect(result.error.message).toBe(
          'Control "pages::next" is not bound in this session\'s reactions controls'
        );
      }
      expect(session.currentIndex).toBe(0);
      expect(session.isActive).toBe(true);
    });

    it('should accept button tokens on a button session', () => {
      const { session } = buildSession({ controls: createButtonControls() });

      expect(session.registerControl('pages::last')).toMatchObject({ ok: true, index: 2 });
    });

    it('should reject controls after completion without moving', () => {
      const { session } = buildSession();
      session.registerControl(NEXT);
      session.stop();

      const result = session.registerControl(NEXT);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(SessionInactiveError);
      }
      expect(session.currentIndex).toBe(1);
    });

    it('should reject controls after timeout', () => {
      const { session } = buildSession();

      vi.advanceTimersByTime(60_000);

      expect(session.registerControl(NEXT)).toMatchObject({ ok: false });
      expect(session.currentIndex).toBe(0);
    });

    it('should report use after disposal as inactive rather than crashing', async () => {
      const { session } = buildSession();
      await session.dispose();

      const result = session.registerControl(NEXT);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(SessionInactiveError);
      }
    });
  });

  describe('timeout', () => {
    it('should complete when the timeout elapses', async () => {
      const { session } = buildSession();
      const waiting = session.waitUntilComplete();

      vi.advanceTimersByTime(59_999);
      expect(session.isActive).toBe(true);

      vi.advanceTimersByTime(1);
      await expect(waiting).resolves.toBe('timeout');
      expect(session.completionReason).toBe('timeout');
    });

    it('should not reset the timeout on activity', () => {
      const { session } = buildSession();

      vi.advanceTimersByTime(30_000);
      session.registerControl(NEXT);
      vi.advanceTimersByTime(30_000);

      expect(session.state).toBe('completed');
    });

    it('should disarm the timer on stop', () => {
      const { session } = buildSession();

      session.stop();

      expect(vi.getTimerCount()).toBe(0);
      expect(session.completionReason).toBe('stopped');
    });
  });

  describe('stop', () => {
    it('should be idempotent', async () => {
      const { session } = buildSession();

      session.stop();
      session.stop();

      expect(session.state).toBe('completed');
      await expect(session.waitUntilComplete()).resolves.toBe('stopped');
    });
  });

  describe('dispose', () => {
    it('should run cleanup exactly once when stop races the timeout', async () => {
      const { session, renderTarget } = buildSession();

      session.stop();
      vi.advanceTimersByTime(60_000);
      session.stop();
      const [first, second] = await Promise.all([session.dispose(), session.dispose()]);

      expect(first).toBe(second);
      expect(renderTarget.removeAllControlMarks).toHaveBeenCalledTimes(1);
      expect(session.state).toBe('disposed');
      expect(session.completionReason).toBe('stopped');
    });

    it('should delete the message once and leave reactions alone for DeleteRenderedArtifact', async () => {
      const { session, renderTarget } = buildSession({
        deletionPolicy: PaginationDeletion.DeleteRenderedArtifact,
      });

      vi.advanceTimersByTime(60_000);
      await session.waitUntilComplete();
      await session.dispose();

      expect(renderTarget.deleteArtifact).toHaveBeenCalledTimes(1);
      expect(renderTarget.removeAllControlMarks).not.toHaveBeenCalled();
    });

    it('should complete an active session before cleaning up', async () => {
      const { session } = buildSession();

      const outcome = await session.dispose();

      expect(outcome.ok).toBe(true);
      expect(session.completionReason).toBe('stopped');
      expect(vi.getTimerCount()).toBe(0);
    });

    it('should reach disposed even when cleanup fails', async () => {
      const { session, renderTarget } = buildSession();
      renderTarget.removeAllControlMarks.mockRejectedValue(new Error('Missing Access'));

      const outcome = await session.dispose();

      expect(outcome.ok).toBe(false);
      expect(session.state).toBe('disposed');
    });

    it('should fail loudly when page state is read after disposal', async () => {
      const { session } = buildSession();
      await session.dispose();

      expect(() => session.currentPage()).toThrow(SessionDisposedError);
      expect(() => session.pageCount).toThrow(SessionDisposedError);
      expect(() => session.currentIndex).toThrow(SessionDisposedError);
    });
  });

  it('should keep sessions independent', () => {
    const first = buildSession().session;
    const second = createSession({
      pages: createLetterPages(3),
      ownerId: 'user-2',
      renderTarget: createFakeRenderTarget('message-2'),
      controls: createReactionControls(),
      timeoutMs: 60_000,
    });

    first.registerControl(NEXT);
    first.stop();

    expect(second.currentIndex).toBe(0);
    expect(second.isActive).toBe(true);
  });
});
