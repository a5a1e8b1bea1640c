import { PipelineError } from "../../core/errors/PipelineError";

type Waiter<T> = {
  resolve: (item: T) => void;
  reject: (err: unknown) => void;
};

export type QueueItem = { id: string };

const queueClosed = () =>
  new PipelineError({ code: "QueueClosed", message: "Job queue is closed" });

/**
 * Bounded FIFO hand-off between intake and the worker pool.
 * - submit() never blocks: it either enqueues, hands the item to a waiting consumer, or throws QueueFull.
 * - dequeue() waits while empty and rejects with QueueClosed once the queue is closed and drained.
 * - each item is delivered to exactly one consumer.
 */
export class BoundedJobQueue<T extends QueueItem> {
  private readonly items: T[] = [];
  private readonly waiters: Array<Waiter<T>> = [];
  private closed = false;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error("capacity must be an integer >= 1");
    }
  }

  get depth(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  submit(item: T): string {
    if (this.closed) throw queueClosed();

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve(item);
      return item.id;
    }

    if (this.items.length >= this.capacity) {
      throw new PipelineError({
        code: "QueueFull",
        message: `Job queue is full (capacity ${this.capacity})`,
        context: { jobId: item.id }
      });
    }

    this.items.push(item);
    return item.id;
  }

  dequeue(): Promise<T> {
    const item = this.items.shift();
    if (item) return Promise.resolve(item);
    if (this.closed) return Promise.reject(queueClosed());

    return new Promise<T>((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  /**
   * Withdraws an item that no consumer has taken yet.
   */
  remove(id: string): T | undefined {
    const index = this.items.findIndex((item) => item.id === id);
    if (index === -1) return undefined;
    const [removed] = this.items.splice(index, 1);
    return removed;
  }

  /**
   * Stops intake. Queued items can still be drained; idle consumers are released with QueueClosed.
   */
  close(): void {
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter.reject(queueClosed());
    }
  }
}
