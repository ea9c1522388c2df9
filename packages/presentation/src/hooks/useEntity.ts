import type { EntityKind } from '@deckhand/state-core';
import type { ViewEntity } from '@deckhand/sync-engine';
import { useEntities } from './useEntities';

export const useEntity = (
  kind: EntityKind,
  id: string
): ViewEntity | undefined => useEntities(kind).byId.get(id);
