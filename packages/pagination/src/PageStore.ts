/**
 * Page Store
 *
 * Read-only, ordered sequence of pages for one session.
 */

import { PaginationProgrammingError } from './errors.js';
import type { Page } from './Page.js';

export class PageStore {
  private readonly pages: readonly Page[];

  /**
   * @throws PaginationProgrammingError if `pages` is empty
   */
  constructor(pages: readonly Page[]) {
    if (pages.length === 0) {
      throw new PaginationProgrammingError('A pagination session needs at least one page');
    }
    this.pages = Object.freeze([...pages]);
  }

  get pageCount(): number {
    return this.pages.length;
  }

  get lastIndex(): number {
    return this.pages.length - 1;
  }

  /**
   * @throws PaginationProgrammingError if `index` is not an integer in [0, pageCount)
   */
  pageAt(index: number): Page {
    const page = Number.isInteger(index) ? this.pages[index] : undefined;
    if (page === undefined) {
      throw new PaginationProgrammingError(
        `Page index ${index} is out of range (0-${this.lastIndex})`
      );
    }
    return page;
  }
}
