import {
  compareEventOrder,
  entityFromEvent,
  EntityOperations,
  isNewerRevision,
  type Entity,
  type EntityEvent,
  type EntityKind,
} from '@deckhand/state-core';
import { StaleEventError } from './errors';
import type { SyncLogger } from './logger';
import type { OptimisticLedger } from './OptimisticLedger';
import type { SubscriptionRouter } from './SubscriptionRouter';
import {
  ChangeReasons,
  ResyncModes,
  type ApplyResult,
  type EntitySnapshot,
  type OptimisticEntry,
  type ResyncMode,
  type StoreStats,
  type ViewEntity,
} from './types';

type Collection = {
  entities: Map<string, Entity>;
  /** Revision at which an id was deleted; blocks stale resurrection. */
  tombstones: Map<string, number>;
  lastRevision: number;
};

type CachedSnapshot = Readonly<{ sequence: number; snapshot: EntitySnapshot }>;

export type StateStoreOptions = Readonly<{
  logger: SyncLogger;
  now?: () => number;
}>;

export type ResyncOptions = Readonly<{
  mode: ResyncMode;
  /**
   * Replace mode only: entities missing from the batch survive when their
   * revision is above this mark, because they arrived on the live stream
   * after the resync request was issued. Defaults to the kind's current
   * last revision, which removes every missing entity.
   */
  keepAbove?: number;
}>;

const toView = (entity: Entity): ViewEntity => ({
  ...entity,
  pending: false,
  correlationId: null,
});

const overlayView = (
  kind: EntityKind,
  id: string,
  base: Entity | undefined,
  overlay: OptimisticEntry
): ViewEntity | null => {
  if (overlay.prediction.operation === EntityOperations.delete) return null;
  return {
    kind,
    id,
    revision: base?.revision ?? 0,
    status: overlay.prediction.status,
    payload: overlay.prediction.payload,
    pending: true,
    correlationId: overlay.correlationId,
  };
};

/**
 * Canonical snapshot of every synchronized entity.
 *
 * Writes only happen through `apply` and `resync`, and each write publishes
 * exactly one change through the router after the data is in place. Newer
 * confirmed data for an entity settles every prediction it contradicts in
 * the same step, so the view never mixes the two.
 */
export class StateStore {
  private readonly collections = new Map<EntityKind, Collection>();
  private readonly cache = new Map<EntityKind, CachedSnapshot>();
  private readonly now: () => number;
  private applied = 0;
  private stale = 0;
  private resyncs = 0;

  constructor(
    private readonly router: SubscriptionRouter,
    private readonly ledger: OptimisticLedger,
    private readonly options: StateStoreOptions
  ) {
    this.now = options.now ?? Date.now;
  }

  apply(event: EntityEvent, receivedAt: number = this.now()): ApplyResult {
    const collection = this.collection(event.kind);
    if (!this.write(collection, event)) {
      this.recordStale(collection, event);
      // The server may confirm a mutation through an event we already hold
      // (for example one delivered by a resync first).
      const confirmed = this.ledger.reconcile(event, {
        receivedAt,
        correlationOnly: true,
      });
      if (confirmed.length > 0) {
        this.router.publish(event.kind, ChangeReasons.apply, [event.entityId]);
      }
      return 'stale';
    }
    this.ledger.reconcileWrite(event, { receivedAt });
    this.router.publish(event.kind, ChangeReasons.apply, [event.entityId]);
    return 'applied';
  }

  resync(
    kind: EntityKind,
    events: ReadonlyArray<EntityEvent>,
    options: ResyncOptions
  ): void {
    const receivedAt = this.now();
    const collection = this.collection(kind);
    const ordered = events
      .filter((event) => event.kind === kind)
      .sort(compareEventOrder);
    const touched = new Set<string>();

    if (options.mode === ResyncModes.replace) {
      const keepAbove = options.keepAbove ?? collection.lastRevision;
      const incoming = new Set(ordered.map((event) => event.entityId));
      for (const [id, entity] of [...collection.entities]) {
        if (incoming.has(id) || entity.revision > keepAbove) continue;
        collection.entities.delete(id);
        collection.tombstones.set(id, entity.revision);
        this.ledger.supersedeEntity(kind, id);
        touched.add(id);
      }
    }

    for (const event of ordered) {
      touched.add(event.entityId);
      if (this.write(collection, event)) {
        this.ledger.reconcileWrite(event, { receivedAt });
      } else {
        this.recordStale(collection, event);
      }
    }

    this.resyncs += 1;
    this.router.publish(kind, ChangeReasons.resync, [...touched]);
  }

  snapshot(kind: EntityKind): EntitySnapshot {
    const sequence = this.router.sequence(kind);
    const cached = this.cache.get(kind);
    if (cached && cached.sequence === sequence) {
      return cached.snapshot;
    }
    const snapshot = this.materialize(kind);
    this.cache.set(kind, { sequence, snapshot });
    return snapshot;
  }

  get(kind: EntityKind, id: string): ViewEntity | undefined {
    return this.snapshot(kind).byId.get(id);
  }

  /** The confirmed entity, ignoring optimistic overlays. */
  confirmed(kind: EntityKind, id: string): Entity | undefined {
    return this.collections.get(kind)?.entities.get(id);
  }

  lastRevision(kind: EntityKind): number {
    return this.collections.get(kind)?.lastRevision ?? 0;
  }

  stats(): StoreStats {
    return {
      applied: this.applied,
      stale: this.stale,
      resyncs: this.resyncs,
    };
  }

  private materialize(kind: EntityKind): EntitySnapshot {
    const entities =
      this.collections.get(kind)?.entities ?? new Map<string, Entity>();
    const ids = new Set<string>(entities.keys());
    for (const entry of this.ledger.overlays(kind)) {
      ids.add(entry.entityId);
    }
    const views: ViewEntity[] = [];
    for (const id of ids) {
      const base = entities.get(id);
      const overlay = this.ledger.overlayFor(kind, id);
      if (overlay) {
        const view = overlayView(kind, id, base, overlay);
        if (view) views.push(view);
        continue;
      }
      if (base) views.push(toView(base));
    }
    views.sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
    return {
      kind,
      entities: views,
      byId: new Map(views.map((view) => [view.id, view])),
    };
  }

  private write(collection: Collection, event: EntityEvent): boolean {
    const stored = this.storedRevision(collection, event.entityId);
    if (!isNewerRevision(event.revision, stored)) return false;
    if (event.operation === EntityOperations.delete) {
      collection.entities.delete(event.entityId);
      collection.tombstones.set(event.entityId, event.revision);
    } else {
      collection.entities.set(event.entityId, entityFromEvent(event));
      collection.tombstones.delete(event.entityId);
    }
    collection.lastRevision = Math.max(collection.lastRevision, event.revision);
    this.applied += 1;
    return true;
  }

  private recordStale(collection: Collection, event: EntityEvent): void {
    this.stale += 1;
    const stale = new StaleEventError(
      event.entityId,
      event.revision,
      this.storedRevision(collection, event.entityId) ?? event.revision
    );
    this.options.logger.debug(stale.message, {
      kind: event.kind,
      entityId: event.entityId,
      revision: event.revision,
      storedRevision: stale.storedRevision,
    });
  }

  private storedRevision(
    collection: Collection,
    entityId: string
  ): number | undefined {
    return (
      collection.entities.get(entityId)?.revision ??
      collection.tombstones.get(entityId)
    );
  }

  private collection(kind: EntityKind): Collection {
    let collection = this.collections.get(kind);
    if (!collection) {
      collection = { entities: new Map(), tombstones: new Map(), lastRevision: 0 };
      this.collections.set(kind, collection);
    }
    return collection;
  }
}
