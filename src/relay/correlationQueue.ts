/** Interval at which waiting consumers re-check their cancellation predicate. */
export const DEFAULT_POLL_INTERVAL_MS = 1_000;

/** Options accepted by {@link CorrelationQueue.take}. */
export interface TakeOptions {
  /** Maximum wait, in milliseconds, before the consumer gives up. */
  readonly deadlineMs: number;
  /** Granularity of the cancellation checks. Defaults to {@link DEFAULT_POLL_INTERVAL_MS}. */
  readonly pollIntervalMs?: number;
  /** Predicate polled on every increment, e.g. "has the live connection closed". */
  readonly isCancelled?: () => boolean;
}

/** Terminal outcome of a wait, exposed for callers that log the cause. */
export type TakeOutcome<T> =
  | { readonly status: "value"; readonly value: T }
  | { readonly status: "timeout"; readonly waitedMs: number }
  | { readonly status: "cancelled"; readonly waitedMs: number };

interface Waiter<T> {
  settle(outcome: TakeOutcome<T>): void;
}

/**
 * Hand-off primitive between a producer (an operator answer arriving over the
 * live connection) and consumers awaiting it (suspended tool invocations).
 *
 * `offer` never blocks: the value goes to the oldest waiting consumer, or is
 * buffered for the next {@link take} when nobody waits. The producer never
 * drains the buffer, so a buffered value satisfies whichever `take` comes next
 * unless the owner calls {@link drain}. A consumer that gave up never receives
 * a value afterwards.
 */
export class CorrelationQueue<T extends object> {
  private readonly buffered: T[] = [];
  private readonly waiters: Array<Waiter<T>> = [];

  /** Number of buffered values not yet consumed. */
  get size(): number {
    return this.buffered.length;
  }

  /** Number of consumers currently suspended in {@link take}. */
  get waiting(): number {
    return this.waiters.length;
  }

  offer(value: T): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.settle({ status: "value", value });
      return;
    }
    this.buffered.push(value);
  }

  /** Resolves with the first delivered value, or `undefined` on timeout or cancellation. */
  async take(options: TakeOptions): Promise<T | undefined> {
    const outcome = await this.takeOutcome(options);
    return outcome.status === "value" ? outcome.value : undefined;
  }

  /** Same as {@link take} but reports why no value was delivered. */
  takeOutcome(options: TakeOptions): Promise<TakeOutcome<T>> {
    if (this.buffered.length > 0) {
      const value = this.buffered[0];
      this.buffered.shift();
      return Promise.resolve({ status: "value", value });
    }

    const isCancelled = options.isCancelled ?? (() => false);
    if (isCancelled()) {
      return Promise.resolve({ status: "cancelled", waitedMs: 0 });
    }

    const deadlineMs = Math.max(0, options.deadlineMs);
    if (deadlineMs === 0) {
      return Promise.resolve({ status: "timeout", waitedMs: 0 });
    }
    const pollIntervalMs = Math.max(1, options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS);
    const startedAt = Date.now();

    return new Promise<TakeOutcome<T>>((resolve) => {
      let timer: NodeJS.Timeout | null = null;
      let settled = false;

      const waiter: Waiter<T> = {
        settle: (outcome) => {
          if (settled) {
            return;
          }
          settled = true;
          if (timer) {
            clearTimeout(timer);
            timer = null;
          }
          const index = this.waiters.indexOf(waiter);
          if (index >= 0) {
            this.waiters.splice(index, 1);
          }
          resolve(outcome);
        },
      };

      const tick = (): void => {
        const waitedMs = Date.now() - startedAt;
        if (isCancelled()) {
          waiter.settle({ status: "cancelled", waitedMs });
          return;
        }
        const remaining = deadlineMs - waitedMs;
        if (remaining <= 0) {
          waiter.settle({ status: "timeout", waitedMs });
          return;
        }
        timer = setTimeout(tick, Math.min(pollIntervalMs, remaining));
      };

      this.waiters.push(waiter);
      timer = setTimeout(tick, Math.min(pollIntervalMs, deadlineMs));
    });
  }

  /** Wakes every waiting consumer without a value. Returns how many were woken. */
  cancel(): number {
    const pending = this.waiters.splice(0, this.waiters.length);
    for (const waiter of pending) {
      waiter.settle({ status: "cancelled", waitedMs: 0 });
    }
    return pending.length;
  }

  /** Discards buffered values that no consumer picked up. Returns how many were dropped. */
  drain(): number {
    return this.buffered.splice(0, this.buffered.length).length;
  }
}
