/**
 * Bounded FIFO buffer between a producer that must never block (the broker
 * read loop) and an async consumer (the dispatcher).
 */

export interface BoundedBuffer<T> {
  /** Enqueue without blocking; false when the buffer is full or closed */
  offer(item: T): boolean;
  /** Resolve with the next item, or undefined once closed or aborted */
  take(signal?: AbortSignal): Promise<T | undefined>;
  /** Check if buffer is at capacity */
  isFull(): boolean;
  /** Get current item count */
  size(): number;
  /** Stop accepting items and release every pending take() */
  close(): void;
}

type Waiter<T> = (item: T | undefined) => void;

/**
 * Drop-newest bounded buffer. Items handed directly to a waiting consumer do
 * not count against capacity.
 */
export class DeliveryQueue<T> implements BoundedBuffer<T> {
  private items: T[] = [];
  private waiters: Waiter<T>[] = [];
  private closed = false;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new Error("DeliveryQueue capacity must be a positive integer");
    }
  }

  offer(item: T): boolean {
    if (this.closed) return false;

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(item);
      return true;
    }

    if (this.items.length >= this.capacity) {
      return false;
    }
    this.items.push(item);
    return true;
  }

  take(signal?: AbortSignal): Promise<T | undefined> {
    const next = this.items.shift();
    if (next !== undefined) return Promise.resolve(next);
    if (this.closed || signal?.aborted) return Promise.resolve(undefined);

    return new Promise((resolve) => {
      const onAbort = () => {
        this.waiters = this.waiters.filter((w) => w !== waiter);
        resolve(undefined);
      };
      const waiter: Waiter<T> = (item) => {
        signal?.removeEventListener("abort", onAbort);
        resolve(item);
      };
      this.waiters.push(waiter);
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }

  isFull(): boolean {
    return this.items.length >= this.capacity;
  }

  size(): number {
    return this.items.length;
  }

  close(): void {
    this.closed = true;
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) waiter(undefined);
  }
}
