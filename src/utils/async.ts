/**
 * @fileoverview Async Utilities
 *
 * Shared async helpers used across the codebase.
 *
 * @packageDocumentation
 */

/** Releases a held lock. Calling it more than once has no effect. */
export type Release = () => void;

/**
 * Non-reentrant async mutual-exclusion lock with an optional bounded wait.
 *
 * Waiters are served in FIFO order. A waiter whose wait times out is removed
 * from the queue and never acquires the lock afterwards.
 */
export class AsyncMutex {
  private locked = false;
  private waiters: Array<(release: Release) => void> = [];

  get isLocked(): boolean {
    return this.locked;
  }

  get pendingCount(): number {
    return this.waiters.length;
  }

  /**
   * Acquire the lock.
   *
   * @param timeoutMs - Maximum wait; omitted, non-finite or negative means wait forever
   * @returns A release function, or null when the wait timed out
   */
  acquire(timeoutMs?: number): Promise<Release | null> {
    if (!this.locked) {
      this.locked = true;
      return Promise.resolve(this.createRelease());
    }

    return new Promise<Release | null>((resolve) => {
      let timeoutId: ReturnType<typeof setTimeout> | null = null;

      const waiter = (release: Release): void => {
        if (timeoutId) {
          clearTimeout(timeoutId);
        }
        resolve(release);
      };
      this.waiters.push(waiter);

      if (timeoutMs !== undefined && Number.isFinite(timeoutMs) && timeoutMs >= 0) {
        timeoutId = setTimeout(() => {
          const index = this.waiters.indexOf(waiter);
          if (index >= 0) {
            this.waiters.splice(index, 1);
            resolve(null);
          }
        }, timeoutMs);
      }
    });
  }

  private createRelease(): Release {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      const next = this.waiters.shift();
      if (next) {
        next(this.createRelease());
      } else {
        this.locked = false;
      }
    };
  }
}
