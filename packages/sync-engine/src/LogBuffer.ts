import type { LogLine, Unsubscribe } from '@deckhand/state-core';
import type { SyncLogger } from './logger';

type LogListener = (lines: ReadonlyArray<LogLine>) => void;

const EMPTY: ReadonlyArray<LogLine> = Object.freeze([]);

/**
 * Bounded, sequence-ordered log tail per deployment. Each change replaces
 * the deployment's array, so readers can compare by reference.
 */
export class LogBuffer {
  private readonly lines = new Map<string, ReadonlyArray<LogLine>>();
  private readonly listeners = new Map<string, Set<LogListener>>();

  constructor(
    private readonly capacity: number,
    private readonly logger: SyncLogger
  ) {}

  /** Returns false for a sequence already held or older than the window. */
  append(line: LogLine): boolean {
    const current = this.lines.get(line.deploymentId) ?? EMPTY;
    const index = this.insertionIndex(current, line.sequence);
    if (index < current.length && current[index].sequence === line.sequence) {
      return false;
    }
    if (current.length >= this.capacity && index === 0) {
      return false;
    }
    const next = [...current.slice(0, index), line, ...current.slice(index)];
    const trimmed =
      next.length > this.capacity ? next.slice(next.length - this.capacity) : next;
    this.lines.set(line.deploymentId, trimmed);
    this.notify(line.deploymentId, trimmed);
    return true;
  }

  get(deploymentId: string): ReadonlyArray<LogLine> {
    return this.lines.get(deploymentId) ?? EMPTY;
  }

  clear(deploymentId: string): void {
    if (!this.lines.delete(deploymentId)) return;
    this.notify(deploymentId, EMPTY);
  }

  subscribe(deploymentId: string, listener: LogListener): Unsubscribe {
    let set = this.listeners.get(deploymentId);
    if (!set) {
      set = new Set();
      this.listeners.set(deploymentId, set);
    }
    set.add(listener);
    return () => {
      const current = this.listeners.get(deploymentId);
      if (!current) return;
      current.delete(listener);
      if (current.size === 0) this.listeners.delete(deploymentId);
    };
  }

  private insertionIndex(lines: ReadonlyArray<LogLine>, sequence: number): number {
    let low = 0;
    let high = lines.length;
    while (low < high) {
      const mid = (low + high) >>> 1;
      if (lines[mid].sequence < sequence) {
        low = mid + 1;
      } else {
        high = mid;
      }
    }
    return low;
  }

  private notify(deploymentId: string, lines: ReadonlyArray<LogLine>): void {
    const set = this.listeners.get(deploymentId);
    if (!set) return;
    for (const listener of [...set]) {
      try {
        listener(lines);
      } catch (error) {
        this.logger.error('Log listener threw', {
          deploymentId,
          message: error instanceof Error ? error.message : String(error),
        });
      }
    }
  }
}
