/**
 * Bounded FIFO channel between the front end and the worker.
 *
 * send() suspends while the buffer is full; receive() suspends while it is
 * empty. After close(), buffered values can still be received, then receive()
 * resolves to undefined.
 */

export class ChannelClosedError extends Error {
  constructor() {
    super('Channel is closed');
    this.name = 'ChannelClosedError';
  }
}

interface PendingSend<T> {
  value: T;
  resolve: () => void;
  reject: (error: Error) => void;
}

export class Channel<T> {
  private readonly buffer: T[] = [];
  private readonly receivers: Array<(value: T | undefined) => void> = [];
  private readonly senders: Array<PendingSend<T>> = [];
  private isClosed = false;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Channel capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.buffer.length;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  /**
   * Enqueue without waiting; false when full
   */
  trySend(value: T): boolean {
    if (this.isClosed) {
      throw new ChannelClosedError();
    }
    const receiver = this.receivers.shift();
    if (receiver) {
      receiver(value);
      return true;
    }
    if (this.buffer.length >= this.capacity) {
      return false;
    }
    this.buffer.push(value);
    return true;
  }

  async send(value: T): Promise<void> {
    if (this.trySend(value)) return;
    await new Promise<void>((resolve, reject) => {
      this.senders.push({ value, resolve, reject });
    });
  }

  tryReceive(): T | undefined {
    if (this.buffer.length === 0) {
      return undefined;
    }
    const value = this.buffer.shift();
    this.admitSender();
    return value;
  }

  async receive(): Promise<T | undefined> {
    if (this.buffer.length > 0) {
      return this.tryReceive();
    }
    if (this.isClosed) {
      return undefined;
    }
    return new Promise<T | undefined>((resolve) => this.receivers.push(resolve));
  }

  /**
   * Everything currently buffered, in order
   */
  drain(): T[] {
    const values: T[] = [];
    let value = this.tryReceive();
    while (value !== undefined) {
      values.push(value);
      value = this.tryReceive();
    }
    return values;
  }

  /**
   * Stop accepting values. Waiting receivers get undefined; blocked senders are rejected.
   */
  close(): void {
    if (this.isClosed) return;
    this.isClosed = true;
    for (const receiver of this.receivers.splice(0)) {
      receiver(undefined);
    }
    for (const sender of this.senders.splice(0)) {
      sender.reject(new ChannelClosedError());
    }
  }

  private admitSender(): void {
    const sender = this.senders.shift();
    if (sender) {
      this.buffer.push(sender.value);
      sender.resolve();
    }
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<T> {
    while (true) {
      const value = await this.receive();
      if (value === undefined) return;
      yield value;
    }
  }
}
