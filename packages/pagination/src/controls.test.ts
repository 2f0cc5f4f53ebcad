/**
 * Tests for Control Binding Sets
 */

import { describe, it, expect } from 'vitest';
import {
  PaginationAction,
  PAGINATION_ACTION_ORDER,
  createButtonControls,
  createReactionControls,
} from './controls.js';

describe('createReactionControls', () => {
  it('should bind the default emojis', () => {
    const controls = createReactionControls();

    expect(controls.capability).toBe('reactions');
    expect(controls.resolve('⏮')).toBe(PaginationAction.SkipToFirst);
    expect(controls.resolve('◀')).toBe(PaginationAction.Previous);
    expect(controls.resolve('⏹')).toBe(PaginationAction.Stop);
    expect(controls.resolve('▶')).toBe(PaginationAction.Next);
    expect(controls.resolve('⏭')).toBe(PaginationAction.SkipToLast);
  });

  it('should return null for unbound tokens', () => {
    const controls = createReactionControls();

    expect(controls.resolve('👍')).toBeNull();
    expect(controls.resolve('pages::next')).toBeNull();
  });

  it('should accept overrides', () => {
    const controls = createReactionControls({ [PaginationAction.Stop]: '❌' });

    expect(controls.resolve('❌')).toBe(PaginationAction.Stop);
    expect(controls.resolve('⏹')).toBeNull();
    expect(controls.tokens[PaginationAction.Stop]).toBe('❌');
  });

  it('should reject a token bound to two actions', () => {
    expect(() => createReactionControls({ [PaginationAction.Next]: '◀' })).toThrow(
      'Control token "◀" is bound to both "previous" and "next"'
    );
  });

  it('should reject empty tokens', () => {
    expect(() => createReactionControls({ [PaginationAction.Stop]: '' })).toThrow(
      'Control token for "stop" must not be empty'
    );
  });
});

describe('createButtonControls', () => {
  it('should bind custom IDs for every action', () => {
    const controls = createButtonControls();

    expect(controls.capability).toBe('buttons');
    for (const action of PAGINATION_ACTION_ORDER) {
      expect(controls.resolve(controls.tokens[action])).toBe(action);
    }
    expect(controls.resolve('pages::next')).toBe(PaginationAction.Next);
  });

  it('should not recognise reaction tokens', () => {
    expect(createButtonControls().resolve('▶')).toBeNull();
  });

  it('should be read-only', () => {
    const controls = createButtonControls();

    expect(Object.isFrozen(controls)).toBe(true);
    expect(Object.isFrozen(controls.tokens)).toBe(true);
  });
});
