export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;
export type Clock = () => number;

// setTimeout-based delay that resolves early when the signal aborts
export const sleep: Sleep = (ms, signal) =>
  new Promise((resolve) => {
    if (ms <= 0 || signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });

/**
 * Enforces a minimum delay between operations against the same source,
 * shared by every worker. Slots are reserved synchronously, so concurrent
 * callers queue up behind each other instead of all firing after one wait.
 */
export class SourceRateLimiter {
  private readonly nextSlot = new Map<string, number>();

  constructor(
    private readonly minDelayMs: number,
    private readonly clock: Clock = Date.now,
    private readonly wait: Sleep = sleep
  ) {}

  async acquire(source: string): Promise<void> {
    const now = this.clock();
    const slot = Math.max(now, this.nextSlot.get(source) ?? 0);
    this.nextSlot.set(source, slot + this.minDelayMs);

    const delay = slot - now;
    if (delay > 0) {
      await this.wait(delay);
    }
  }
}
