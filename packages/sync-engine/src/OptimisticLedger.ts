import { uuidv7, type EntityEvent, type EntityKind } from '@deckhand/state-core';
import {
  ExpiryReasons,
  MutationTimeoutError,
  type ExpiryReason,
} from './errors';
import type { SyncLogger } from './logger';
import type { SubscriptionRouter } from './SubscriptionRouter';
import {
  ChangeReasons,
  type MutationOutcome,
  type MutationRequest,
  type OptimisticEntry,
  type PendingMutation,
} from './types';

export type OptimisticLedgerOptions = Readonly<{
  timeoutMs: number;
  /**
   * How far back an uncorrelated server event may reach to confirm a pending
   * entry for the same entity.
   */
  matchWindowMs: number;
  logger: SyncLogger;
  now?: () => number;
  /**
   * Runs timer-driven work. The engine routes it through the apply queue so
   * that expiry never races event application.
   */
  dispatch?: (label: string, task: () => void) => void;
}>;

type LedgerRecord = Readonly<{
  entry: OptimisticEntry;
  resolve: (outcome: MutationOutcome) => void;
  timer: ReturnType<typeof setTimeout>;
}>;

export type ReconcileOptions = Readonly<{
  receivedAt: number;
  /** Only honour an echoed correlation id; used for stale events. */
  correlationOnly?: boolean;
}>;

/**
 * Pending local mutations, keyed by correlation id.
 *
 * Every entry leaves the ledger exactly once, confirmed or expired.
 * Whichever settlement runs second finds nothing and returns false.
 */
export class OptimisticLedger {
  private readonly records = new Map<string, LedgerRecord>();
  private readonly now: () => number;
  private readonly dispatch: (label: string, task: () => void) => void;

  constructor(
    private readonly router: SubscriptionRouter,
    private readonly options: OptimisticLedgerOptions
  ) {
    this.now = options.now ?? Date.now;
    this.dispatch = options.dispatch ?? ((_label, task) => task());
  }

  get size(): number {
    return this.records.size;
  }

  begin(
    request: MutationRequest,
    correlationId: string = uuidv7()
  ): PendingMutation {
    if (this.records.has(correlationId)) {
      throw new Error(`Correlation id already pending: ${correlationId}`);
    }
    const beganAt = this.now();
    const entry: OptimisticEntry = {
      ...request,
      correlationId,
      beganAt,
      expiresAt: beganAt + this.options.timeoutMs,
    };
    let resolve: ((outcome: MutationOutcome) => void) | null = null;
    const settled = new Promise<MutationOutcome>((res) => {
      resolve = res;
    });
    if (!resolve) {
      throw new Error('Failed to create mutation outcome');
    }
    const timer = setTimeout(() => {
      this.dispatch(`expire:${correlationId}`, () => {
        this.expire(correlationId, ExpiryReasons.timeout);
      });
    }, this.options.timeoutMs);
    this.records.set(correlationId, { entry, resolve, timer });
    this.router.publish(request.kind, ChangeReasons.optimistic, [
      request.entityId,
    ]);
    return { correlationId, settled };
  }

  /**
   * Resolves an entry as confirmed and notifies observers. The state store
   * uses `reconcile` instead, which leaves notification to the store.
   */
  confirm(correlationId: string, event: EntityEvent | null = null): boolean {
    const record = this.settle(correlationId);
    if (!record) return false;
    record.resolve({ status: 'confirmed', correlationId, event });
    this.router.publish(record.entry.kind, ChangeReasons.apply, [
      record.entry.entityId,
    ]);
    return true;
  }

  expire(
    correlationId: string,
    reason: ExpiryReason,
    detail: string | null = null
  ): boolean {
    const record = this.rollback(correlationId, reason, detail);
    if (!record) return false;
    this.router.publish(record.entry.kind, ChangeReasons.rollback, [
      record.entry.entityId,
    ]);
    return true;
  }

  expireAll(reason: ExpiryReason): number {
    const ids = [...this.records.keys()];
    let expired = 0;
    for (const id of ids) {
      if (this.expire(id, reason)) expired += 1;
    }
    return expired;
  }

  /**
   * Confirms the entry a server event answers. Returns the confirmed
   * correlation ids without publishing; the caller publishes the change.
   */
  reconcile(event: EntityEvent, options: ReconcileOptions): string[] {
    const match = this.findMatch(event, options);
    if (!match) return [];
    const record = this.settle(match);
    if (!record) return [];
    record.resolve({ status: 'confirmed', correlationId: match, event });
    return [match];
  }

  /**
   * Reconciles an event that changed confirmed state. Entries for the same
   * entity begun before the confirmed one, or all of them when nothing
   * matched, no longer describe a future state and expire as `superseded`.
   * Publishing is left to the caller.
   */
  reconcileWrite(
    event: EntityEvent,
    options: ReconcileOptions
  ): Readonly<{ confirmed: string[]; superseded: string[] }> {
    const earlier = this.entriesFor(event.kind, event.entityId);
    const confirmed = this.reconcile(event, options);
    const position = earlier.findIndex((id) => confirmed.includes(id));
    const cutoff = position >= 0 ? position : earlier.length;
    return { confirmed, superseded: this.supersede(earlier.slice(0, cutoff)) };
  }

  /** Expires every entry for an entity the server removed. */
  supersedeEntity(kind: EntityKind, entityId: string): string[] {
    return this.supersede(this.entriesFor(kind, entityId));
  }

  has(correlationId: string): boolean {
    return this.records.has(correlationId);
  }

  get(correlationId: string): OptimisticEntry | undefined {
    return this.records.get(correlationId)?.entry;
  }

  /** Newest pending entry for the entity, which decides what is displayed. */
  overlayFor(kind: EntityKind, entityId: string): OptimisticEntry | undefined {
    let latest: OptimisticEntry | undefined;
    for (const { entry } of this.records.values()) {
      if (entry.kind === kind && entry.entityId === entityId) {
        latest = entry;
      }
    }
    return latest;
  }

  overlays(kind: EntityKind): ReadonlyArray<OptimisticEntry> {
    return [...this.records.values()]
      .map((record) => record.entry)
      .filter((entry) => entry.kind === kind);
  }

  /** Pending correlation ids for an entity, oldest first. */
  private entriesFor(kind: EntityKind, entityId: string): string[] {
    const ids: string[] = [];
    for (const { entry } of this.records.values()) {
      if (entry.kind === kind && entry.entityId === entityId) {
        ids.push(entry.correlationId);
      }
    }
    return ids;
  }

  private supersede(ids: ReadonlyArray<string>): string[] {
    return ids.filter(
      (id) => this.rollback(id, ExpiryReasons.superseded, null) !== null
    );
  }

  private rollback(
    correlationId: string,
    reason: ExpiryReason,
    detail: string | null
  ): LedgerRecord | null {
    const record = this.settle(correlationId);
    if (!record) return null;
    const error = new MutationTimeoutError(correlationId, reason, detail);
    this.options.logger.warn('Optimistic mutation rolled back', {
      correlationId,
      reason,
      kind: record.entry.kind,
      entityId: record.entry.entityId,
      actionType: record.entry.actionType,
    });
    record.resolve({ status: 'expired', correlationId, reason, error });
    return record;
  }

  private findMatch(
    event: EntityEvent,
    options: ReconcileOptions
  ): string | null {
    if (event.correlationId !== null) {
      return this.records.has(event.correlationId) ? event.correlationId : null;
    }
    if (options.correlationOnly) return null;
    const earliest = options.receivedAt - this.options.matchWindowMs;
    for (const { entry } of this.records.values()) {
      if (
        entry.kind === event.kind &&
        entry.entityId === event.entityId &&
        entry.beganAt >= earliest
      ) {
        return entry.correlationId;
      }
    }
    return null;
  }

  private settle(correlationId: string): LedgerRecord | null {
    const record = this.records.get(correlationId);
    if (!record) return null;
    clearTimeout(record.timer);
    this.records.delete(correlationId);
    return record;
  }
}
