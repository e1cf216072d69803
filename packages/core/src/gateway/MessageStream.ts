import { StreamClosedError, DEFAULT_STREAM_CAPACITY } from '@fleetmon/shared';

interface BlockedProducer<T> {
  message: T;
  resolve: () => void;
  reject: (err: Error) => void;
}

/**
 * Bounded FIFO between a producer (the transport) and one consumption loop.
 *
 * push() resolves once the message is buffered and waits while the buffer
 * is at capacity. receive() resolves with the next message, or undefined
 * once the stream is closed and fully drained.
 */
export class MessageStream<T> implements AsyncIterable<T> {
  readonly name: string;
  readonly capacity: number;
  private buffer: T[] = [];
  private receivers: Array<(message: T | undefined) => void> = [];
  private blocked: BlockedProducer<T>[] = [];
  private isClosed = false;

  constructor(name: string, capacity: number = DEFAULT_STREAM_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Stream capacity must be a positive integer, got ${capacity}`);
    }
    this.name = name;
    this.capacity = capacity;
  }

  get size(): number {
    return this.buffer.length;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  push(message: T): Promise<void> {
    if (this.isClosed) {
      return Promise.reject(new StreamClosedError(this.name));
    }
    if (this.tryPush(message)) {
      return Promise.resolve();
    }
    return new Promise<void>((resolve, reject) => {
      this.blocked.push({ message, resolve, reject });
    });
  }

  /** Non-blocking push; false when the buffer is full. */
  tryPush(message: T): boolean {
    if (this.isClosed) {
      throw new StreamClosedError(this.name);
    }

    const receiver = this.receivers.shift();
    if (receiver) {
      receiver(message);
      return true;
    }

    if (this.buffer.length >= this.capacity) return false;
    this.buffer.push(message);
    return true;
  }

  receive(): Promise<T | undefined> {
    if (this.buffer.length > 0) {
      const message = this.buffer.shift();
      this.admitBlockedProducer();
      return Promise.resolve(message);
    }
    if (this.isClosed) {
      return Promise.resolve(undefined);
    }
    return new Promise((resolve) => {
      this.receivers.push(resolve);
    });
  }

  /**
   * Stop accepting messages. Buffered messages are still delivered; waiting
   * receivers get undefined and blocked producers are rejected.
   */
  close(): void {
    if (this.isClosed) return;
    this.isClosed = true;

    for (const receiver of this.receivers.splice(0)) {
      receiver(undefined);
    }
    for (const producer of this.blocked.splice(0)) {
      producer.reject(new StreamClosedError(this.name));
    }
  }

  async *[Symbol.asyncIterator](): AsyncIterator<T> {
    for (;;) {
      const message = await this.receive();
      if (message === undefined) return;
      yield message;
    }
  }

  private admitBlockedProducer(): void {
    const producer = this.blocked.shift();
    if (!producer) return;
    this.buffer.push(producer.message);
    producer.resolve();
  }
}
