import type { ReactNode } from 'react';
import { createContext, useContext } from 'react';
import type { SyncEngine } from '@deckhand/sync-engine';

const SyncEngineContext = createContext<SyncEngine | null>(null);

export type SyncEngineProviderProps = {
  engine: SyncEngine;
  children: ReactNode;
};

export const SyncEngineProvider = ({
  engine,
  children,
}: SyncEngineProviderProps) => (
  <SyncEngineContext.Provider value={engine}>
    {children}
  </SyncEngineContext.Provider>
);

export const useSyncEngine = (): SyncEngine => {
  const engine = useContext(SyncEngineContext);
  if (!engine) {
    throw new Error('SyncEngineProvider is missing in the React tree');
  }
  return engine;
};
