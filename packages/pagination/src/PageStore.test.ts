/**
 * Tests for PageStore
 */

import { describe, it, expect } from 'vitest';
import { PageStore } from './PageStore.js';
import { PaginationProgrammingError } from './errors.js';
import { createLetterPages } from './test/fakes.js';

describe('PageStore', () => {
  it('should expose the page count and last index', () => {
    const store = new PageStore(createLetterPages(3));

    expect(store.pageCount).toBe(3);
    expect(store.lastIndex).toBe(2);
  });

  it('should return pages by index', () => {
    const store = new PageStore(createLetterPages(3));

    expect(store.pageAt(0).content).toBe('A');
    expect(store.pageAt(2).content).toBe('C');
  });

  it('should reject an empty page list', () => {
    expect(() => new PageStore([])).toThrow(PaginationProgrammingError);
  });

  it.each([-1, 3, 1.5])('should throw on out-of-range index %s', index => {
    const store = new PageStore(createLetterPages(3));

    expect(() => store.pageAt(index)).toThrow(PaginationProgrammingError);
  });

  it('should not be affected by later changes to the source array', () => {
    const pages = createLetterPages(2);
    const store = new PageStore(pages);

    pages.pop();

    expect(store.pageCount).toBe(2);
    expect(store.pageAt(1).content).toBe('B');
  });
});
