import { LockHeldError } from './errors.js';

/**
 * Mutual exclusion over one Int32 word of a SharedArrayBuffer, shared by
 * session transitions and record appends on every thread. Waiting threads
 * block in Atomics.wait; a re-entrant call from the holding thread is
 * rejected instead of deadlocking.
 */
export class SessionLock {
  private holder: string | null = null;

  constructor(
    private readonly word: Int32Array = new Int32Array(new SharedArrayBuffer(Int32Array.BYTES_PER_ELEMENT)),
    private readonly index: number = 0
  ) {}

  public acquireLock(owner: string): boolean {
    if (this.holder !== null) {
      // Lock already acquired by this thread
      return false;
    }
    while (Atomics.compareExchange(this.word, this.index, 0, 1) !== 0) {
      Atomics.wait(this.word, this.index, 1);
    }
    this.holder = owner;
    return true;
  }

  public releaseLock(): void {
    if (this.holder === null) {
      return;
    }
    this.holder = null;
    Atomics.store(this.word, this.index, 0);
    Atomics.notify(this.word, this.index, 1);
  }

  public isLocked(): boolean {
    return this.holder !== null;
  }

  public currentHolder(): string | null {
    return this.holder;
  }

  public withLock<T>(owner: string, fn: () => T): T {
    if (!this.acquireLock(owner)) {
      throw new LockHeldError(owner, this.holder ?? 'unknown');
    }
    try {
      return fn();
    } finally {
      this.releaseLock();
    }
  }
}
