export {
  SyncEngineProvider,
  useSyncEngine,
  type SyncEngineProviderProps,
} from './context';
export { useEntities } from './hooks/useEntities';
export { useEntity } from './hooks/useEntity';
export { useConnectionState } from './hooks/useConnectionState';
export { useMutation, type UseMutationResult } from './hooks/useMutation';
export { useLogLines } from './hooks/useLogLines';
