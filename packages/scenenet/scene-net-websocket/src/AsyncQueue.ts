import { CancelledError } from "./errors";

type Waiter<T> = {
  resolve: (item: T) => void;
  reject: (error: Error) => void;
};

/**
 * Unbounded FIFO queue with any number of producers. Consumers await `dequeue`, which suspends
 * while the queue is empty.
 */
export class AsyncQueue<T> {
  private items: Array<T> = [];
  private waiters: Array<Waiter<T>> = [];
  private closedWith: Error | null = null;

  public get length(): number {
    return this.items.length;
  }

  public get closed(): boolean {
    return this.closedWith !== null;
  }

  // Returns false once the queue is closed; the item is not kept
  public enqueue(item: T): boolean {
    if (this.closedWith !== null) {
      return false;
    }
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve(item);
    } else {
      this.items.push(item);
    }
    return true;
  }

  public dequeue(signal?: AbortSignal): Promise<T> {
    if (this.items.length > 0) {
      return Promise.resolve(this.items.splice(0, 1)[0]);
    }
    if (this.closedWith !== null) {
      return Promise.reject(this.closedWith);
    }
    if (signal?.aborted) {
      return Promise.reject(new CancelledError());
    }

    return new Promise<T>((resolve, reject) => {
      const onAbort = () => {
        const index = this.waiters.indexOf(waiter);
        if (index !== -1) {
          this.waiters.splice(index, 1);
        }
        reject(new CancelledError());
      };
      const waiter: Waiter<T> = {
        resolve: (item) => {
          signal?.removeEventListener("abort", onAbort);
          resolve(item);
        },
        reject: (error) => {
          signal?.removeEventListener("abort", onAbort);
          reject(error);
        },
      };
      signal?.addEventListener("abort", onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  // Removes and returns every buffered item without waiting
  public drain(): Array<T> {
    return this.items.splice(0);
  }

  /**
   * Stops accepting items. Items already queued are still handed out; once they are gone every
   * pending and later `dequeue` rejects with `error`.
   */
  public close(error: Error = new CancelledError("Queue closed")): void {
    if (this.closedWith !== null) {
      return;
    }
    this.closedWith = error;
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter.reject(error);
    }
  }
}
