interface PendingSend<T> {
  item: T;
  resolve: (accepted: boolean) => void;
}

/**
 * Fixed-capacity FIFO channel between the watcher and the workers.
 *
 * `send` waits while the buffer is full; `receive` waits while it is empty.
 * After `close()` senders get `false` and receivers get `undefined`.
 */
export class BoundedChannel<T> {
  private buffer: T[] = [];
  private senders: PendingSend<T>[] = [];
  private receivers: Array<(item: T | undefined) => void> = [];
  private closed = false;

  constructor(private readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Channel capacity must be a positive integer, got: ${capacity}`);
    }
  }

  /**
   * Queue an item, waiting for room when the channel is full
   * @returns false if the channel was closed before the item was accepted
   */
  send(item: T): Promise<boolean> {
    if (this.closed) {
      return Promise.resolve(false);
    }

    const receiver = this.receivers.shift();
    if (receiver) {
      receiver(item);
      return Promise.resolve(true);
    }

    if (this.buffer.length < this.capacity) {
      this.buffer.push(item);
      return Promise.resolve(true);
    }

    return new Promise((resolve) => {
      this.senders.push({ item, resolve });
    });
  }

  /**
   * Take the next item, waiting for one if the channel is empty
   * @returns undefined once the channel is closed
   */
  receive(): Promise<T | undefined> {
    const item = this.buffer.shift();
    if (item !== undefined) {
      this.admitWaitingSender();
      return Promise.resolve(item);
    }

    if (this.closed) {
      return Promise.resolve(undefined);
    }

    return new Promise((resolve) => {
      this.receivers.push(resolve);
    });
  }

  /**
   * Stop the channel. Waiting receivers get undefined, waiting senders get
   * false, and the items still buffered are handed back to the caller.
   */
  close(): T[] {
    if (this.closed) {
      return [];
    }
    this.closed = true;

    for (const receiver of this.receivers.splice(0)) {
      receiver(undefined);
    }
    for (const sender of this.senders.splice(0)) {
      sender.resolve(false);
    }

    return this.buffer.splice(0);
  }

  get size(): number {
    return this.buffer.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  private admitWaitingSender(): void {
    const sender = this.senders.shift();
    if (sender) {
      this.buffer.push(sender.item);
      sender.resolve(true);
    }
  }
}
