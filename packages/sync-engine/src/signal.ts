import type { ReadableSignal, Unsubscribe } from '@deckhand/state-core';
import type { SyncLogger } from './logger';

export class ValueSignal<T> implements ReadableSignal<T> {
  private readonly listeners = new Set<(value: T) => void>();

  constructor(
    private value: T,
    private readonly logger: SyncLogger
  ) {}

  get(): T {
    return this.value;
  }

  subscribe(callback: (value: T) => void): Unsubscribe {
    this.listeners.add(callback);
    return () => {
      this.listeners.delete(callback);
    };
  }

  /** Returns false when `next` equals the current value. */
  set(next: T): boolean {
    if (Object.is(next, this.value)) return false;
    this.value = next;
    for (const listener of [...this.listeners]) {
      try {
        listener(next);
      } catch (error) {
        this.logger.error('Signal listener threw', {
          message: error instanceof Error ? error.message : String(error),
        });
      }
    }
    return true;
  }

  asReadonly(): ReadableSignal<T> {
    return {
      get: () => this.get(),
      subscribe: (callback) => this.subscribe(callback),
    };
  }
}
