/**
 * Navigation State Machine
 *
 * Owns the current page index and applies the session's boundary policy.
 * Every transition keeps `0 <= currentIndex <= lastIndex`.
 */

import { PaginationBehavior } from '@pagewise/common-types';
import type { Page } from './Page.js';
import type { PageStore } from './PageStore.js';

export class NavigationStateMachine {
  private index = 0;

  constructor(
    private readonly store: PageStore,
    readonly behavior: PaginationBehavior
  ) {}

  get currentIndex(): number {
    return this.index;
  }

  get pageCount(): number {
    return this.store.pageCount;
  }

  advance(): number {
    if (this.index < this.store.lastIndex) {
      this.index++;
    } else if (this.behavior === PaginationBehavior.WrapAround) {
      this.index = 0;
    }
    return this.index;
  }

  retreat(): number {
    if (this.index > 0) {
      this.index--;
    } else if (this.behavior === PaginationBehavior.WrapAround) {
      this.index = this.store.lastIndex;
    }
    return this.index;
  }

  jumpToFirst(): number {
    this.index = 0;
    return this.index;
  }

  jumpToLast(): number {
    this.index = this.store.lastIndex;
    return this.index;
  }

  currentPage(): Page {
    return this.store.pageAt(this.index);
  }
}
