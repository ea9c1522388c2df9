export type Unsubscribe = () => void;

export { uuidv7 } from './uuid';

/**
 * Stable names of the synchronized collections.
 * These are part of the wire protocol and must never be renamed.
 */
export const EntityKinds = {
  deployment: 'deployment',
  composition: 'composition',
  cluster: 'cluster',
  organization: 'organization',
  gitopsSync: 'gitopsSync',
} as const;

export type EntityKind = (typeof EntityKinds)[keyof typeof EntityKinds];

export const ALL_ENTITY_KINDS: ReadonlyArray<EntityKind> =
  Object.values(EntityKinds);

export const isEntityKind = (value: unknown): value is EntityKind =>
  typeof value === 'string' &&
  ALL_ENTITY_KINDS.some((kind) => kind === value);

export const EntityOperations = {
  upsert: 'upsert',
  delete: 'delete',
} as const;

export type EntityOperation =
  (typeof EntityOperations)[keyof typeof EntityOperations];

export type Entity = Readonly<{
  kind: EntityKind;
  id: string;
  /** Monotonic per id; an update with a lower or equal revision is stale. */
  revision: number;
  status: string;
  payload: unknown;
}>;

export type EntityEvent = Readonly<{
  kind: EntityKind;
  entityId: string;
  revision: number;
  operation: EntityOperation;
  status: string;
  payload: unknown;
  /** Echoed by the backend when the change answers a local mutation. */
  correlationId: string | null;
}>;

export const LogStreams = {
  stdout: 'stdout',
  stderr: 'stderr',
  system: 'system',
} as const;

export type LogStream = (typeof LogStreams)[keyof typeof LogStreams];

export type LogLine = Readonly<{
  deploymentId: string;
  sequence: number;
  stream: LogStream;
  line: string;
  timestamp: number;
}>;

export const ConnectionStates = {
  disconnected: 'disconnected',
  connecting: 'connecting',
  connected: 'connected',
  degraded: 'degraded',
} as const;

export type ConnectionState =
  (typeof ConnectionStates)[keyof typeof ConnectionStates];

/**
 * Read-only reactive value. Owners write through their own API; holders of
 * this interface can only observe.
 */
export interface ReadableSignal<T> {
  get(): T;
  subscribe(callback: (value: T) => void): Unsubscribe;
}

export const RevisionComparisons = {
  before: 'before',
  equal: 'equal',
  after: 'after',
} as const;

export type RevisionComparison =
  (typeof RevisionComparisons)[keyof typeof RevisionComparisons];

export function compareRevision(a: number, b: number): RevisionComparison {
  if (a < b) return RevisionComparisons.before;
  if (a > b) return RevisionComparisons.after;
  return RevisionComparisons.equal;
}

/**
 * True when `incoming` should replace what is stored. A missing stored
 * revision means the id has never been seen.
 */
export function isNewerRevision(
  incoming: number,
  stored: number | undefined
): boolean {
  if (stored === undefined) return true;
  return compareRevision(incoming, stored) === RevisionComparisons.after;
}

export function entityFromEvent(event: EntityEvent): Entity {
  return {
    kind: event.kind,
    id: event.entityId,
    revision: event.revision,
    status: event.status,
    payload: event.payload,
  };
}

/**
 * Orders events the way the backend assigned them: by revision, then by id
 * so that equal revisions across ids stay deterministic.
 */
export function compareEventOrder(a: EntityEvent, b: EntityEvent): number {
  if (a.revision !== b.revision) return a.revision - b.revision;
  if (a.entityId < b.entityId) return -1;
  if (a.entityId > b.entityId) return 1;
  return 0;
}
