import { useCallback, useSyncExternalStore } from 'react';
import type { ConnectionState } from '@deckhand/state-core';
import { useSyncEngine } from '../context';

export const useConnectionState = (): ConnectionState => {
  const { connectionState } = useSyncEngine();
  const subscribe = useCallback(
    (onChange: () => void) => connectionState.subscribe(onChange),
    [connectionState]
  );
  const getSnapshot = useCallback(
    () => connectionState.get(),
    [connectionState]
  );
  return useSyncExternalStore(subscribe, getSnapshot);
};
