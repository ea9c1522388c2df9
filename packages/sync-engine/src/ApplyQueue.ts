import type { SyncLogger } from './logger';

type QueuedTask = Readonly<{
  label: string;
  inbound: boolean;
  run: () => void | Promise<void>;
}>;

export type ApplyQueueOptions = Readonly<{
  /** Maximum queued inbound tasks before producers must wait. */
  capacity: number;
  logger: SyncLogger;
  warnThresholdMs?: number;
}>;

const safeNow = (): number | null => {
  if (
    typeof performance !== 'undefined' &&
    typeof performance.now === 'function'
  ) {
    return performance.now();
  }
  return null;
};

/**
 * The single writer for the state store and the optimistic ledger.
 *
 * Tasks run one at a time in FIFO order. Only inbound stream work counts
 * against `capacity`; timer callbacks and local mutations are always
 * accepted. Producers of inbound work call `whenWritable()` first, which
 * holds the transport read loop while the queue is full.
 */
export class ApplyQueue {
  private readonly tasks: QueuedTask[] = [];
  private inboundQueued = 0;
  private draining = false;
  private writableWaiters: Array<() => void> = [];
  private idleWaiters: Array<() => void> = [];

  constructor(private readonly options: ApplyQueueOptions) {}

  get size(): number {
    return this.tasks.length;
  }

  isFull(): boolean {
    return this.inboundQueued >= this.options.capacity;
  }

  enqueue(label: string, run: () => void | Promise<void>): void {
    this.push({ label, inbound: false, run });
  }

  enqueueInbound(label: string, run: () => void | Promise<void>): void {
    this.inboundQueued += 1;
    this.push({ label, inbound: true, run });
  }

  /**
   * Runs `task` on the apply path and hands its result (or failure) back to
   * the caller instead of logging it.
   */
  run<T>(label: string, task: () => T): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.push({
        label,
        inbound: false,
        run: () => {
          try {
            resolve(task());
          } catch (error) {
            reject(error);
          }
        },
      });
    });
  }

  whenWritable(): Promise<void> {
    if (!this.isFull()) return Promise.resolve();
    return new Promise((resolve) => {
      this.writableWaiters.push(resolve);
    });
  }

  whenIdle(): Promise<void> {
    if (!this.draining && this.tasks.length === 0) return Promise.resolve();
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  private push(task: QueuedTask): void {
    this.tasks.push(task);
    if (!this.draining) {
      this.draining = true;
      void this.drain();
    }
  }

  private async drain(): Promise<void> {
    try {
      let task = this.tasks.shift();
      while (task) {
        await this.execute(task);
        if (task.inbound) {
          this.inboundQueued -= 1;
          this.releaseWriters();
        }
        task = this.tasks.shift();
      }
    } finally {
      this.draining = false;
      const waiters = this.idleWaiters;
      this.idleWaiters = [];
      for (const resolve of waiters) resolve();
    }
  }

  private async execute(task: QueuedTask): Promise<void> {
    const start = safeNow();
    try {
      await task.run();
    } catch (error) {
      this.options.logger.error('Task failed', {
        label: task.label,
        message: error instanceof Error ? error.message : String(error),
      });
    }
    const threshold = this.options.warnThresholdMs;
    if (threshold === undefined || start === null) return;
    const end = safeNow();
    if (end !== null && end - start > threshold) {
      this.options.logger.warn('Task exceeded budget', {
        label: task.label,
        durationMs: end - start,
        budgetMs: threshold,
      });
    }
  }

  private releaseWriters(): void {
    if (this.isFull() || this.writableWaiters.length === 0) return;
    const waiters = this.writableWaiters;
    this.writableWaiters = [];
    for (const resolve of waiters) resolve();
  }
}
