// Event Queue - Bounded FIFO handoff between relay workers
//
// The only state shared between the poll loop, the forwarder, the socket
// handlers and the dispatcher. A full queue evicts its oldest entry.

interface Waiter<T> {
  resolve: (item: T | undefined) => void;
}

export class BoundedQueue<T> {
  private items: T[] = [];
  private waiters: Waiter<T>[] = [];
  private emptyWaiters: Array<() => void> = [];
  private isClosed = false;
  private evicted = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.items.length;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  /** Total entries evicted by overflow since construction. */
  get overflows(): number {
    return this.evicted;
  }

  /**
   * Appends an item. Returns the evicted oldest entry when the queue was full.
   * Items pushed after close() are refused and returned as if evicted.
   */
  push(item: T): T | undefined {
    if (this.isClosed) return item;

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve(item);
      return undefined;
    }

    let dropped: T | undefined;
    if (this.items.length >= this.capacity) {
      dropped = this.items.shift();
      this.evicted++;
    }
    this.items.push(item);
    return dropped;
  }

  shift(): T | undefined {
    const item = this.items.shift();
    if (this.items.length === 0) this.notifyEmpty();
    return item;
  }

  peek(): T | undefined {
    return this.items[0];
  }

  /** Waits for the next item. Resolves undefined once the queue is closed and empty. */
  take(): Promise<T | undefined> {
    if (this.items.length > 0) {
      return Promise.resolve(this.shift());
    }
    if (this.isClosed) {
      return Promise.resolve(undefined);
    }
    return new Promise((resolve) => {
      this.waiters.push({ resolve });
    });
  }

  /** Resolves when the queue holds nothing. */
  whenEmpty(): Promise<void> {
    if (this.items.length === 0) return Promise.resolve();
    return new Promise((resolve) => {
      this.emptyWaiters.push(resolve);
    });
  }

  /** Removes and returns everything still queued. */
  clear(): T[] {
    const removed = this.items;
    this.items = [];
    this.notifyEmpty();
    return removed;
  }

  close(): void {
    this.isClosed = true;
    for (const waiter of this.waiters) waiter.resolve(undefined);
    this.waiters = [];
  }

  reopen(): void {
    this.isClosed = false;
  }

  private notifyEmpty(): void {
    const waiting = this.emptyWaiters;
    this.emptyWaiters = [];
    for (const resolve of waiting) resolve();
  }
}

/** Resolves once `task` settles or `ms` have passed, whichever comes first. */
export function waitAtMost(task: Promise<unknown>, ms: number): Promise<void> {
  return new Promise((resolve) => {
    const timer = setTimeout(resolve, ms);
    const done = () => {
      clearTimeout(timer);
      resolve();
    };
    task.then(done, done);
  });
}
