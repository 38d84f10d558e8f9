/**
 * Wake-up latch for polling loops. A `notify` that arrives while nobody waits is kept
 * and consumed by the next `wait`.
 */
export class WakeSignal {
  private pending = false;
  private wake: (() => void) | null = null;

  notify(): void {
    if (this.wake) {
      this.wake();
    } else {
      this.pending = true;
    }
  }

  /** Resolves on the next notification or after `timeoutMs`, whichever is first. */
  wait(timeoutMs: number): Promise<void> {
    if (this.pending) {
      this.pending = false;
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      const finish = () => {
        clearTimeout(timer);
        this.wake = null;
        resolve();
      };
      const timer = setTimeout(finish, timeoutMs);
      this.wake = finish;
    });
  }
}
