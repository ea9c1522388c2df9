import { useCallback, useEffect, useRef, useState } from 'react';
import type {
  MutationOutcome,
  MutationRequest,
} from '@deckhand/sync-engine';
import { useSyncEngine } from '../context';

export type UseMutationResult = Readonly<{
  /** Starts the mutation and resolves with its outcome. */
  mutate: (request: MutationRequest) => Promise<MutationOutcome>;
  /** Correlation ids of this component's unsettled mutations. */
  pending: ReadonlyArray<string>;
  error: string | null;
}>;

export const useMutation = (): UseMutationResult => {
  const engine = useSyncEngine();
  const [pending, setPending] = useState<ReadonlyArray<string>>([]);
  const [error, setError] = useState<string | null>(null);
  const mounted = useRef(true);

  useEffect(() => {
    mounted.current = true;
    return () => {
      mounted.current = false;
    };
  }, []);

  const mutate = useCallback(
    async (request: MutationRequest): Promise<MutationOutcome> => {
      setError(null);
      const { correlationId, settled } = engine.mutate(request);
      setPending((current) => [...current, correlationId]);
      const outcome = await settled;
      if (mounted.current) {
        setPending((current) => current.filter((id) => id !== correlationId));
        if (outcome.status === 'expired') {
          setError(outcome.error.message);
        }
      }
      return outcome;
    },
    [engine]
  );

  return { mutate, pending, error };
};
