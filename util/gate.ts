import { OperationCancelled } from "./errors";

type Waiter = {
  resolve: () => void;
  detach: () => void;
};

/**
 * Admission gate limiting how many segment fetches run at once. A released
 * slot is handed straight to the oldest waiter.
 */
export class Semaphore {
  readonly capacity: number;
  private available: number;
  private waiters: Waiter[];

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Semaphore capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
    this.available = capacity;
    this.waiters = [];
  }

  get inUse(): number {
    return this.capacity - this.available;
  }

  get pending(): number {
    return this.waiters.length;
  }

  acquire(signal?: AbortSignal): Promise<void> {
    if (signal && signal.aborted) {
      return Promise.reject(new OperationCancelled());
    }
    if (this.available > 0) {
      this.available--;
      return Promise.resolve();
    }
    return new Promise<void>((resolve, reject) => {
      const onAbort = () => {
        this.waiters = this.waiters.filter((w) => w !== waiter);
        reject(new OperationCancelled());
      };
      const waiter: Waiter = {
        resolve: resolve,
        detach: () => {
          if (signal) {
            signal.removeEventListener("abort", onAbort);
          }
        },
      };
      if (signal) {
        signal.addEventListener("abort", onAbort, { once: true });
      }
      this.waiters.push(waiter);
    });
  }

  release(): void {
    const next = this.waiters.shift();
    if (next) {
      next.detach();
      next.resolve();
      return;
    }
    if (this.available < this.capacity) {
      this.available++;
    }
  }
}

/**
 * Collects finished segment files as they complete, in whatever order that
 * happens, and hands them back in playlist order.
 */
export class OrderedAccumulator {
  private entries: { index: number; path: string }[] = [];

  record(index: number, path: string): number {
    this.entries.push({ index: index, path: path });
    return this.entries.length;
  }

  get count(): number {
    return this.entries.length;
  }

  paths(): string[] {
    return [...this.entries].sort((a, b) => a.index - b.index).map((e) => e.path);
  }
}
