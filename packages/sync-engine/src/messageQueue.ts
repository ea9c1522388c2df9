import { TransportError } from './errors';

export type MessageQueueOptions = Readonly<{
  /** Buffered messages at which `onPause` fires. */
  highWaterMark: number;
  /** Buffered messages at or below which `onResume` fires after a pause. */
  lowWaterMark: number;
  onPause?: () => void;
  onResume?: () => void;
}>;

type Waiter<T> = Readonly<{
  resolve: (result: IteratorResult<T>) => void;
  reject: (error: Error) => void;
}>;

/**
 * Push-to-pull adapter between socket callbacks and an async iterator.
 * Iterable once; `end()` finishes the sequence, `fail()` rejects it after the
 * buffered messages have been read.
 */
export class MessageQueue<T> implements AsyncIterable<T> {
  private readonly buffer: T[] = [];
  private readonly waiters: Waiter<T>[] = [];
  private ended = false;
  private failure: Error | null = null;
  private paused = false;
  private iterated = false;

  constructor(private readonly options: MessageQueueOptions) {}

  get buffered(): number {
    return this.buffer.length;
  }

  get isPaused(): boolean {
    return this.paused;
  }

  push(item: T): void {
    if (this.ended || this.failure) return;
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve({ value: item, done: false });
      return;
    }
    this.buffer.push(item);
    if (!this.paused && this.buffer.length >= this.options.highWaterMark) {
      this.paused = true;
      this.options.onPause?.();
    }
  }

  end(): void {
    if (this.ended || this.failure) return;
    this.ended = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter.resolve({ value: undefined, done: true });
    }
  }

  fail(error: Error): void {
    if (this.ended || this.failure) return;
    this.failure = error;
    for (const waiter of this.waiters.splice(0)) {
      waiter.reject(error);
    }
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    if (this.iterated) {
      throw new TransportError('Message stream can only be consumed once');
    }
    this.iterated = true;
    return {
      next: () => this.next(),
      return: () => {
        this.end();
        return Promise.resolve({ value: undefined, done: true });
      },
    };
  }

  private next(): Promise<IteratorResult<T>> {
    const item = this.buffer.shift();
    if (item !== undefined) {
      this.maybeResume();
      return Promise.resolve({ value: item, done: false });
    }
    if (this.failure) return Promise.reject(this.failure);
    if (this.ended) return Promise.resolve({ value: undefined, done: true });
    return new Promise((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  private maybeResume(): void {
    if (!this.paused || this.buffer.length > this.options.lowWaterMark) return;
    this.paused = false;
    this.options.onResume?.();
  }
}
