import { useCallback, useSyncExternalStore } from 'react';
import type { EntityKind } from '@deckhand/state-core';
import type { EntitySnapshot } from '@deckhand/sync-engine';
import { useSyncEngine } from '../context';

/**
 * Current entities of a kind, optimistic overlays included. Re-renders on
 * every change notification for the kind.
 */
export const useEntities = (kind: EntityKind): EntitySnapshot => {
  const engine = useSyncEngine();
  const subscribe = useCallback(
    (onChange: () => void) => engine.subscribe(kind, onChange).unsubscribe,
    [engine, kind]
  );
  const getSnapshot = useCallback(() => engine.snapshot(kind), [engine, kind]);
  return useSyncExternalStore(subscribe, getSnapshot);
};
