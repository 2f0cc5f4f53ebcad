/**
 * Completion Signal
 *
 * One-shot `pending -> completed` latch. The first fire() wins and records its
 * reason; later fires are ignored and report that nothing changed. Waiters are
 * woken through a promise, so nobody polls.
 */

export type CompletionReason = 'timeout' | 'stopped';

export class CompletionSignal {
  private reason: CompletionReason | null = null;
  private readonly promise: Promise<CompletionReason>;
  private resolvePromise: (reason: CompletionReason) => void = () => undefined;

  constructor() {
    this.promise = new Promise<CompletionReason>(resolve => {
      this.resolvePromise = resolve;
    });
  }

  get isCompleted(): boolean {
    return this.reason !== null;
  }

  get completionReason(): CompletionReason | null {
    return this.reason;
  }

  /**
   * @returns true if this call completed the signal, false if it was already completed
   */
  fire(reason: CompletionReason): boolean {
    if (this.reason !== null) {
      return false;
    }
    this.reason = reason;
    this.resolvePromise(reason);
    return true;
  }

  wait(): Promise<CompletionReason> {
    return this.promise;
  }
}
