import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { EntityEvent } from '@deckhand/state-core';
import { OptimisticLedger } from '../src/OptimisticLedger';
import { StateStore } from '../src/StateStore';
import { SubscriptionRouter } from '../src/SubscriptionRouter';
import type { MutationRequest, StateChange } from '../src/types';
import { createTestLogger } from './testLogger';

const deploymentEvent = (
  entityId: string,
  revision: number,
  overrides: Partial<EntityEvent> = {}
): EntityEvent => ({
  kind: 'deployment',
  entityId,
  revision,
  operation: 'upsert',
  status: 'healthy',
  payload: { revision },
  correlationId: null,
  ...overrides,
});

const setup = () => {
  const logger = createTestLogger();
  const router = new SubscriptionRouter(logger);
  const ledger = new OptimisticLedger(router, {
    timeoutMs: 10_000,
    matchWindowMs: 10_000,
    logger,
  });
  const store = new StateStore(router, ledger, { logger });
  const changes: StateChange[] = [];
  router.subscribe('deployment', (change) => changes.push(change));
  return { store, ledger, router, changes, logger };
};

const viewOf = (store: StateStore) =>
  store.snapshot('deployment').entities.map((entity) => ({
    id: entity.id,
    revision: entity.revision,
    status: entity.status,
  }));

describe('StateStore', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('ignores a stale revision and keeps the newer state', () => {
    const { store, changes, logger } = setup();

    expect(
      store.apply(deploymentEvent('deployment-42', 7, { status: 'healthy' }))
    ).toBe('applied');
    expect(
      store.apply(deploymentEvent('deployment-42', 6, { status: 'error' }))
    ).toBe('stale');

    expect(store.get('deployment', 'deployment-42')?.status).toBe('healthy');
    expect(store.stats()).toEqual({ applied: 1, stale: 1, resyncs: 0 });
    expect(changes).toHaveLength(1);
    expect(logger.debug).toHaveBeenCalledWith(
      'Stale event for deployment-42: revision 6 <= 7',
      {
        kind: 'deployment',
        entityId: 'deployment-42',
        revision: 6,
        storedRevision: 7,
      }
    );
  });

  it('converges regardless of delivery order and duplicates', () => {
    const events = [
      deploymentEvent('a', 1),
      deploymentEvent('b', 2, { status: 'pending' }),
      deploymentEvent('a', 3, { status: 'scaling' }),
      deploymentEvent('b', 4, { operation: 'delete' }),
      deploymentEvent('c', 5, { status: 'degraded' }),
      deploymentEvent('b', 6, { status: 'error' }),
    ];
    const orders = [
      [0, 1, 2, 3, 4, 5],
      [5, 4, 3, 2, 1, 0],
      [2, 0, 0, 5, 3, 1, 4, 4],
    ];

    const views = orders.map((order) => {
      const { store } = setup();
      for (const index of order) store.apply(events[index]);
      return viewOf(store);
    });

    const expected = [
      { id: 'a', revision: 3, status: 'scaling' },
      { id: 'b', revision: 6, status: 'error' },
      { id: 'c', revision: 5, status: 'degraded' },
    ];
    for (const view of views) expect(view).toEqual(expected);
  });

  it('keeps deleted entities down when an older upsert arrives', () => {
    const { store } = setup();
    store.apply(deploymentEvent('a', 5, { operation: 'delete' }));
    expect(store.apply(deploymentEvent('a', 4))).toBe('stale');
    expect(store.get('deployment', 'a')).toBeUndefined();
    expect(store.apply(deploymentEvent('a', 6))).toBe('applied');
    expect(store.get('deployment', 'a')?.revision).toBe(6);
  });

  it('tracks the highest revision per kind', () => {
    const { store } = setup();
    store.apply(deploymentEvent('a', 9));
    store.apply(deploymentEvent('b', 3));
    expect(store.lastRevision('deployment')).toBe(9);
    expect(store.lastRevision('cluster')).toBe(0);
  });

  it('returns the same snapshot until the kind changes', () => {
    const { store } = setup();
    store.apply(deploymentEvent('a', 1));
    const first = store.snapshot('deployment');
    expect(store.snapshot('deployment')).toBe(first);

    store.apply(deploymentEvent('a', 2));
    const second = store.snapshot('deployment');
    expect(second).not.toBe(first);
    expect(second.byId.get('a')?.revision).toBe(2);
  });

  describe('optimistic overlays', () => {
    const scale: MutationRequest = {
      kind: 'deployment',
      entityId: 'deployment-42',
      actionType: 'scale',
      payload: { replicas: 5 },
      prediction: {
        operation: 'upsert',
        status: 'scaling',
        payload: { replicas: 5 },
      },
    };

    it('shows the prediction until the confirming event replaces it', async () => {
      const { store, ledger, changes } = setup();
      store.apply(deploymentEvent('deployment-42', 7));
      const pending = ledger.begin(scale, 'c-1');

      expect(store.get('deployment', 'deployment-42')).toEqual({
        kind: 'deployment',
        id: 'deployment-42',
        revision: 7,
        status: 'scaling',
        payload: { replicas: 5 },
        pending: true,
        correlationId: 'c-1',
      });

      store.apply(
        deploymentEvent('deployment-42', 8, {
          status: 'healthy',
          payload: { replicas: 5 },
          correlationId: 'c-1',
        })
      );

      expect(store.get('deployment', 'deployment-42')).toEqual({
        kind: 'deployment',
        id: 'deployment-42',
        revision: 8,
        status: 'healthy',
        payload: { replicas: 5 },
        pending: false,
        correlationId: null,
      });
      expect((await pending.settled).status).toBe('confirmed');
      expect(changes.map((change) => change.reason)).toEqual([
        'apply',
        'optimistic',
        'apply',
      ]);
    });

    it('reverts to the confirmed entity when the prediction expires', async () => {
      const { store, ledger } = setup();
      store.apply(deploymentEvent('deployment-42', 7));
      const pending = ledger.begin(scale, 'c-1');

      vi.advanceTimersByTime(10_000);

      expect((await pending.settled).status).toBe('expired');
      expect(store.get('deployment', 'deployment-42')).toEqual({
        kind: 'deployment',
        id: 'deployment-42',
        revision: 7,
        status: 'healthy',
        payload: { revision: 7 },
        pending: false,
        correlationId: null,
      });
    });

    it('hides entities predicted as deleted and adds predicted ones', () => {
      const { store, ledger } = setup();
      store.apply(deploymentEvent('a', 1));
      ledger.begin(
        { ...scale, entityId: 'a', prediction: { operation: 'delete' } },
        'c-1'
      );
      ledger.begin({ ...scale, entityId: 'new' }, 'c-2');

      expect(viewOf(store)).toEqual([
        { id: 'new', revision: 0, status: 'scaling' },
      ]);
    });

    it('confirms through a stale event that echoes the correlation id', async () => {
      const { store, ledger, changes } = setup();
      store.apply(deploymentEvent('deployment-42', 8));
      const pending = ledger.begin(scale, 'c-1');

      expect(
        store.apply(
          deploymentEvent('deployment-42', 8, { correlationId: 'c-1' })
        )
      ).toBe('stale');

      expect((await pending.settled).status).toBe('confirmed');
      expect(store.get('deployment', 'deployment-42')?.pending).toBe(false);
      expect(changes.map((change) => change.reason)).toEqual([
        'apply',
        'optimistic',
        'apply',
      ]);
    });

    it('drops a prediction when newer data for the entity confirms something else', async () => {
      const { store, ledger, changes } = setup();
      store.apply(deploymentEvent('deployment-42', 3));
      const pending = ledger.begin(scale, 'c-1');

      store.apply(
        deploymentEvent('deployment-42', 4, {
          status: 'error',
          correlationId: 'other-client',
        })
      );

      expect(store.get('deployment', 'deployment-42')).toEqual({
        kind: 'deployment',
        id: 'deployment-42',
        revision: 4,
        status: 'error',
        payload: { revision: 4 },
        pending: false,
        correlationId: null,
      });
      expect(ledger.size).toBe(0);
      const outcome = await pending.settled;
      if (outcome.status !== 'expired') throw new Error('expected expiry');
      expect(outcome.reason).toBe('superseded');
      expect(outcome.error.message).toBe(
        'Newer server data replaced the predicted state'
      );
      expect(changes.map((change) => change.reason)).toEqual([
        'apply',
        'optimistic',
        'apply',
      ]);
    });

    it('keeps predictions begun after the confirmed one', async () => {
      const { store, ledger } = setup();
      store.apply(deploymentEvent('deployment-42', 7));
      const first = ledger.begin(scale, 'c-1');
      ledger.begin(scale, 'c-2');
      ledger.begin(
        {
          ...scale,
          prediction: { operation: 'upsert', status: 'degraded', payload: {} },
        },
        'c-3'
      );

      store.apply(
        deploymentEvent('deployment-42', 8, { correlationId: 'c-2' })
      );

      expect(await first.settled).toMatchObject({
        status: 'expired',
        reason: 'superseded',
      });
      expect(ledger.has('c-2')).toBe(false);
      expect(ledger.has('c-3')).toBe(true);
      expect(store.get('deployment', 'deployment-42')).toMatchObject({
        revision: 8,
        status: 'degraded',
        pending: true,
        correlationId: 'c-3',
      });
    });

    it('does not let a stale uncorrelated event confirm a prediction', () => {
      const { store, ledger } = setup();
      store.apply(deploymentEvent('deployment-42', 8));
      ledger.begin(scale, 'c-1');

      store.apply(deploymentEvent('deployment-42', 5));

      expect(ledger.has('c-1')).toBe(true);
    });
  });

  describe('resync', () => {
    it('publishes one change for the whole batch', () => {
      const { store, changes } = setup();
      store.resync(
        'deployment',
        [deploymentEvent('b', 2), deploymentEvent('a', 1), deploymentEvent('c', 3)],
        { mode: 'merge' }
      );

      expect(changes).toEqual([
        {
          kind: 'deployment',
          reason: 'resync',
          entityIds: ['a', 'b', 'c'],
          sequence: 1,
        },
      ]);
      expect(store.stats().resyncs).toBe(1);
    });

    it('shows observers the complete batch', () => {
      const { store, router } = setup();
      const sizes: number[] = [];
      router.subscribe('deployment', () => {
        sizes.push(store.snapshot('deployment').entities.length);
      });

      store.resync(
        'deployment',
        [deploymentEvent('a', 1), deploymentEvent('b', 2), deploymentEvent('c', 3)],
        { mode: 'replace' }
      );

      expect(sizes).toEqual([3]);
    });

    it('removes entities missing from a replace batch', () => {
      const { store } = setup();
      store.apply(deploymentEvent('a', 1));
      store.apply(deploymentEvent('b', 2));

      store.resync('deployment', [deploymentEvent('a', 3)], {
        mode: 'replace',
      });

      expect(viewOf(store)).toEqual([{ id: 'a', revision: 3, status: 'healthy' }]);
      expect(store.apply(deploymentEvent('b', 2))).toBe('stale');
    });

    it('drops predictions for entities a replace batch removes', () => {
      const { store, ledger } = setup();
      store.apply(deploymentEvent('a', 1));
      ledger.begin(
        {
          kind: 'deployment',
          entityId: 'a',
          actionType: 'restart',
          payload: {},
          prediction: { operation: 'upsert', status: 'pending', payload: {} },
        },
        'c-1'
      );

      store.resync('deployment', [deploymentEvent('b', 2)], {
        mode: 'replace',
      });

      expect(ledger.has('c-1')).toBe(false);
      expect(viewOf(store)).toEqual([{ id: 'b', revision: 2, status: 'healthy' }]);
    });

    it('keeps entities that arrived live above the keep mark', () => {
      const { store } = setup();
      store.apply(deploymentEvent('a', 1));
      store.apply(deploymentEvent('b', 2));
      store.apply(deploymentEvent('live', 10));

      store.resync('deployment', [deploymentEvent('a', 1)], {
        mode: 'replace',
        keepAbove: 2,
      });

      expect(viewOf(store).map((entity) => entity.id)).toEqual(['a', 'live']);
    });

    it('merges an incremental batch under the revision rule', () => {
      const { store } = setup();
      store.apply(deploymentEvent('a', 4, { status: 'scaling' }));
      store.apply(deploymentEvent('b', 2));

      store.resync(
        'deployment',
        [
          deploymentEvent('a', 3, { status: 'error' }),
          deploymentEvent('b', 5, { operation: 'delete' }),
          deploymentEvent('c', 6),
        ],
        { mode: 'merge' }
      );

      expect(viewOf(store)).toEqual([
        { id: 'a', revision: 4, status: 'scaling' },
        { id: 'c', revision: 6, status: 'healthy' },
      ]);
      expect(store.stats()).toEqual({ applied: 4, stale: 1, resyncs: 1 });
    });

    it('matches a full replay after a gap is filled incrementally', () => {
      const history = [
        deploymentEvent('a', 1),
        deploymentEvent('b', 2),
        deploymentEvent('a', 3, { status: 'scaling' }),
        deploymentEvent('c', 4),
        deploymentEvent('b', 5, { operation: 'delete' }),
        deploymentEvent('c', 6, { status: 'error' }),
      ];

      const reconnected = setup().store;
      for (const event of history.slice(0, 3)) reconnected.apply(event);
      reconnected.resync(
        'deployment',
        history.filter(
          (event) => event.revision > reconnected.lastRevision('deployment')
        ),
        { mode: 'merge' }
      );

      const fresh = setup().store;
      fresh.resync('deployment', history, { mode: 'replace' });

      expect(viewOf(reconnected)).toEqual(viewOf(fresh));
      expect(viewOf(fresh)).toEqual([
        { id: 'a', revision: 3, status: 'scaling' },
        { id: 'c', revision: 6, status: 'error' },
      ]);
    });
  });
});
