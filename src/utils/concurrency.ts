/**
 * ConcurrencyLimiter
 *
 * Limits the concurrency of async operations, with the ability to suspend the
 * start of queued work for a while (used when an upstream signals throttling).
 * Suspending never cancels operations already running.
 */
export class ConcurrencyLimiter {
  private readonly queue: (() => void)[] = [];
  private active = 0;
  private pausedUntil = 0;
  private resumeTimer: NodeJS.Timeout | null = null;

  /**
   * @param concurrency - Max number of concurrent operations
   */
  constructor(private readonly concurrency: number) {
    if (!((Number.isInteger(concurrency) || concurrency === Infinity) && concurrency > 0)) {
      throw new TypeError('Expected `concurrency` to be a number from 1 and up');
    }
  }

  get activeCount(): number {
    return this.active;
  }

  get pendingCount(): number {
    return this.queue.length;
  }

  /**
   * Run `fn` once a slot is free and no pause is in effect
   */
  run<T>(fn: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.queue.push(() => {
        this.active++;
        void fn()
          .then(resolve, reject)
          .finally(() => {
            this.active--;
            this.drain();
          });
      });
      this.drain();
    });
  }

  /**
   * Do not start queued operations for `ms` milliseconds. Extends, never shortens, a running pause.
   */
  pauseFor(ms: number): void {
    this.pausedUntil = Math.max(this.pausedUntil, Date.now() + ms);
  }

  private drain(): void {
    while (this.active < this.concurrency && this.queue.length > 0) {
      const remaining = this.pausedUntil - Date.now();
      if (remaining > 0) {
        if (!this.resumeTimer) {
          this.resumeTimer = setTimeout(() => {
            this.resumeTimer = null;
            this.drain();
          }, remaining);
        }
        return;
      }
      const start = this.queue.shift();
      if (start) {
        start();
      }
    }
  }
}
