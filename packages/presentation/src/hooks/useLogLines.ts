import { useCallback, useSyncExternalStore } from 'react';
import type { LogLine } from '@deckhand/state-core';
import { useSyncEngine } from '../context';

export const useLogLines = (deploymentId: string): ReadonlyArray<LogLine> => {
  const engine = useSyncEngine();
  const subscribe = useCallback(
    (onChange: () => void) => engine.subscribeLogs(deploymentId, onChange),
    [engine, deploymentId]
  );
  const getSnapshot = useCallback(
    () => engine.logs(deploymentId),
    [engine, deploymentId]
  );
  return useSyncExternalStore(subscribe, getSnapshot);
};
