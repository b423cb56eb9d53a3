import { BackendError } from "./errors.js";

export type ConcurrencyGateOptions = {
  maxActive: number;
  maxQueued: number;
};

type Waiter = {
  resolve: (release: () => void) => void;
  reject: (error: Error) => void;
  signal?: AbortSignal;
  onAbort?: () => void;
};

/**
 * Counting semaphore with a bounded wait queue. Callers beyond
 * `maxActive + maxQueued` are rejected with an `overloaded` BackendError.
 */
export class ConcurrencyGate {
  private active = 0;
  private queue: Waiter[] = [];
  private closedError: Error | null = null;

  constructor(private readonly options: ConcurrencyGateOptions) {
    if (options.maxActive < 1) {
      throw new Error(`maxActive must be at least 1 (got ${options.maxActive})`);
    }
  }

  get activeCount(): number {
    return this.active;
  }

  get queuedCount(): number {
    return this.queue.length;
  }

  acquire(signal?: AbortSignal): Promise<() => void> {
    if (this.closedError) {
      return Promise.reject(this.closedError);
    }
    if (signal?.aborted) {
      return Promise.reject(new BackendError("cancelled", "Request cancelled before dispatch"));
    }
    if (this.active < this.options.maxActive) {
      this.active += 1;
      return Promise.resolve(this.createRelease());
    }
    if (this.queue.length >= this.options.maxQueued) {
      return Promise.reject(
        new BackendError(
          "overloaded",
          `Backend busy: ${this.active} in flight, ${this.queue.length} queued`
        )
      );
    }

    return new Promise((resolve, reject) => {
      const waiter: Waiter = { resolve, reject, signal };
      if (signal) {
        waiter.onAbort = () => {
          this.removeWaiter(waiter);
          reject(new BackendError("cancelled", "Request cancelled while queued"));
        };
        signal.addEventListener("abort", waiter.onAbort, { once: true });
      }
      this.queue.push(waiter);
    });
  }

  /** Rejects every queued caller. Held slots are released by their owners. */
  close(error: Error): void {
    this.closedError = error;
    const waiters = this.queue;
    this.queue = [];
    for (const waiter of waiters) {
      this.detach(waiter);
      waiter.reject(error);
    }
  }

  private createRelease(): () => void {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.handoff();
    };
  }

  private handoff(): void {
    const next = this.queue.shift();
    if (next) {
      // The slot passes straight to the next waiter; `active` is unchanged.
      this.detach(next);
      next.resolve(this.createRelease());
      return;
    }
    this.active -= 1;
  }

  private removeWaiter(waiter: Waiter): void {
    const index = this.queue.indexOf(waiter);
    if (index >= 0) {
      this.queue.splice(index, 1);
    }
  }

  private detach(waiter: Waiter): void {
    if (waiter.signal && waiter.onAbort) {
      waiter.signal.removeEventListener("abort", waiter.onAbort);
    }
  }
}
