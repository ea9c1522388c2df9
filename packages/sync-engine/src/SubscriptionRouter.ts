import type { EntityKind } from '@deckhand/state-core';
import type { SyncLogger } from './logger';
import type {
  ChangeReason,
  StateChange,
  StateChangeListener,
  Subscription,
} from './types';

type Registration = Readonly<{
  id: number;
  kind: EntityKind | null;
  listener: StateChangeListener;
}>;

/**
 * Fans store mutations out to observers.
 *
 * Changes are delivered in publish order. A change published from inside a
 * listener is queued behind the one being delivered, so every observer sees
 * the per-kind sequence in ascending order.
 */
export class SubscriptionRouter {
  private readonly registrations = new Map<number, Registration>();
  private readonly sequences = new Map<EntityKind, number>();
  private readonly outbox: StateChange[] = [];
  private dispatching = false;
  private nextId = 1;

  constructor(private readonly logger: SyncLogger) {}

  subscribe(kind: EntityKind, listener: StateChangeListener): Subscription {
    return this.register(kind, listener);
  }

  subscribeAll(listener: StateChangeListener): Subscription {
    return this.register(null, listener);
  }

  unsubscribe(handle: Pick<Subscription, 'id'>): void {
    this.registrations.delete(handle.id);
  }

  sequence(kind: EntityKind): number {
    return this.sequences.get(kind) ?? 0;
  }

  subscriberCount(kind?: EntityKind): number {
    if (kind === undefined) return this.registrations.size;
    let count = 0;
    for (const registration of this.registrations.values()) {
      if (registration.kind === kind || registration.kind === null) count += 1;
    }
    return count;
  }

  publish(
    kind: EntityKind,
    reason: ChangeReason,
    entityIds: ReadonlyArray<string>
  ): StateChange {
    const sequence = this.sequence(kind) + 1;
    this.sequences.set(kind, sequence);
    const change: StateChange = { kind, reason, entityIds, sequence };
    this.outbox.push(change);
    if (!this.dispatching) {
      this.flush();
    }
    return change;
  }

  private register(
    kind: EntityKind | null,
    listener: StateChangeListener
  ): Subscription {
    const id = this.nextId;
    this.nextId += 1;
    this.registrations.set(id, { id, kind, listener });
    return {
      id,
      kind,
      unsubscribe: () => this.unsubscribe({ id }),
    };
  }

  private flush(): void {
    this.dispatching = true;
    try {
      let change = this.outbox.shift();
      while (change) {
        this.deliver(change);
        change = this.outbox.shift();
      }
    } finally {
      this.dispatching = false;
    }
  }

  private deliver(change: StateChange): void {
    const targets = [...this.registrations.values()].filter(
      (registration) =>
        registration.kind === null || registration.kind === change.kind
    );
    for (const target of targets) {
      // Skip observers removed by an earlier listener in this round.
      if (!this.registrations.has(target.id)) continue;
      try {
        target.listener(change);
      } catch (error) {
        this.logger.error('Observer threw while handling change', {
          kind: change.kind,
          sequence: change.sequence,
          subscriptionId: target.id,
          message: error instanceof Error ? error.message : String(error),
        });
      }
    }
  }
}
