import type {
  Entity,
  EntityEvent,
  EntityKind,
  LogLine,
  Unsubscribe,
} from '@deckhand/state-core';
import type { ExpiryReason, MutationTimeoutError } from './errors';

export const SyncMessageTypes = {
  entity: 'entity',
  log: 'log',
  heartbeat: 'heartbeat',
  mutationRejected: 'mutationRejected',
} as const;

export type SyncMessageType =
  (typeof SyncMessageTypes)[keyof typeof SyncMessageTypes];

export type SyncMessage =
  | Readonly<{ type: typeof SyncMessageTypes.entity; event: EntityEvent }>
  | Readonly<{ type: typeof SyncMessageTypes.log; line: LogLine }>
  | Readonly<{ type: typeof SyncMessageTypes.heartbeat; at: number }>
  | Readonly<{
      type: typeof SyncMessageTypes.mutationRejected;
      correlationId: string;
      reason: string;
    }>;

export type CredentialsProvider = () => Promise<string | null>;

/**
 * One open duplex channel. `messages()` may be consumed once; the sequence
 * ends only when the stream is closed locally and throws `TransportError`
 * on any other termination.
 */
export interface TransportStream {
  send(message: string): Promise<void>;
  messages(): AsyncIterable<string>;
  close(): void;
}

export interface TransportChannelPort {
  open(endpoint: string, credentials: string | null): Promise<TransportStream>;
}

export interface ResyncPort {
  /** Raw envelopes for `kind` with revision greater than `sinceRevision`. */
  resync(
    kind: EntityKind,
    sinceRevision: number
  ): Promise<ReadonlyArray<unknown>>;
}

export const ChangeReasons = {
  apply: 'apply',
  resync: 'resync',
  optimistic: 'optimistic',
  rollback: 'rollback',
} as const;

export type ChangeReason = (typeof ChangeReasons)[keyof typeof ChangeReasons];

/**
 * "State may have changed" signal. Observers re-read the snapshot; the
 * entity ids are a hint, not a delta.
 */
export type StateChange = Readonly<{
  kind: EntityKind;
  reason: ChangeReason;
  entityIds: ReadonlyArray<string>;
  /** Monotonic per kind. */
  sequence: number;
}>;

export type StateChangeListener = (change: StateChange) => void;

export type Subscription = Readonly<{
  id: number;
  /** null for subscriptions to every kind. */
  kind: EntityKind | null;
  unsubscribe: Unsubscribe;
}>;

export type EntityPrediction =
  | Readonly<{ operation: 'upsert'; status: string; payload: unknown }>
  | Readonly<{ operation: 'delete' }>;

export type MutationRequest = Readonly<{
  kind: EntityKind;
  entityId: string;
  actionType: string;
  payload: unknown;
  prediction: EntityPrediction;
}>;

export type OptimisticEntry = MutationRequest &
  Readonly<{
    correlationId: string;
    beganAt: number;
    expiresAt: number;
  }>;

export type MutationOutcome =
  | Readonly<{
      status: 'confirmed';
      correlationId: string;
      event: EntityEvent | null;
    }>
  | Readonly<{
      status: 'expired';
      correlationId: string;
      reason: ExpiryReason;
      error: MutationTimeoutError;
    }>;

export type PendingMutation = Readonly<{
  correlationId: string;
  settled: Promise<MutationOutcome>;
}>;

export type ViewEntity = Entity &
  Readonly<{
    /** True while an unconfirmed local mutation decides what is shown. */
    pending: boolean;
    correlationId: string | null;
  }>;

export type EntitySnapshot = Readonly<{
  kind: EntityKind;
  entities: ReadonlyArray<ViewEntity>;
  byId: ReadonlyMap<string, ViewEntity>;
}>;

export const ResyncModes = {
  replace: 'replace',
  merge: 'merge',
} as const;

export type ResyncMode = (typeof ResyncModes)[keyof typeof ResyncModes];

export type ApplyResult = 'applied' | 'stale';

export type StoreStats = Readonly<{
  applied: number;
  stale: number;
  resyncs: number;
}>;
