import {
  ConnectionStates,
  uuidv7,
  type ConnectionState,
  type EntityEvent,
  type EntityKind,
  type LogLine,
  type ReadableSignal,
  type Unsubscribe,
} from '@deckhand/state-core';
import { ApplyQueue } from './ApplyQueue';
import { TransportKinds, type SyncConfig } from './config';
import {
  DecodeError,
  ExpiryReasons,
  toError,
  type PersistentFailureError,
} from './errors';
import {
  decodeMessage,
  decodeResyncEnvelope,
  encodeMutation,
  encodePing,
  encodeSubscribe,
} from './eventCodec';
import { HttpResyncClient } from './httpResyncClient';
import { LogBuffer } from './LogBuffer';
import { consoleLogger, labelLogger, type SyncLogger } from './logger';
import { OptimisticLedger } from './OptimisticLedger';
import { ReconnectionSupervisor } from './ReconnectionSupervisor';
import { SseTransport } from './sseTransport';
import { StateStore } from './StateStore';
import { SubscriptionRouter } from './SubscriptionRouter';
import {
  ResyncModes,
  SyncMessageTypes,
  type EntitySnapshot,
  type MutationOutcome,
  type MutationRequest,
  type PendingMutation,
  type ResyncPort,
  type StateChangeListener,
  type StoreStats,
  type Subscription,
  type SyncMessage,
  type TransportChannelPort,
  type TransportStream,
  type ViewEntity,
} from './types';
import { WebSocketTransport } from './webSocketTransport';

export type SyncEngineOptions = Readonly<{
  config: SyncConfig;
  /** Defaults to the transport named by `config.transport`. */
  transport?: TransportChannelPort;
  /** Defaults to an `HttpResyncClient` on `config.resyncUrl`. */
  resync?: ResyncPort;
  logger?: SyncLogger;
  random?: () => number;
  now?: () => number;
}>;

export type SyncEngineStats = StoreStats &
  Readonly<{
    decodeFailures: number;
    pendingMutations: number;
    outbox: number;
    queuedTasks: number;
  }>;

type OutboxEntry = Readonly<{ correlationId: string; message: string }>;

const APPLY_WARN_THRESHOLD_MS = 50;

const createTransport = (config: SyncConfig): TransportChannelPort =>
  config.transport === TransportKinds.sse
    ? new SseTransport()
    : new WebSocketTransport();

/**
 * Wires the transport, supervisor, apply queue, ledger, store and router
 * into one engine. A host creates one instance and passes it to its views.
 */
export class SyncEngine {
  private readonly config: SyncConfig;
  private readonly logger: SyncLogger;
  private readonly now: () => number;
  private readonly resyncPort: ResyncPort;
  private readonly router: SubscriptionRouter;
  private readonly queue: ApplyQueue;
  private readonly ledger: OptimisticLedger;
  private readonly store: StateStore;
  private readonly logBuffer: LogBuffer;
  private readonly supervisor: ReconnectionSupervisor;
  private readonly kinds: Set<EntityKind>;
  private outbox: OutboxEntry[] = [];
  private flushing: Promise<void> | null = null;
  private decodeFailures = 0;

  constructor(options: SyncEngineOptions) {
    const { config } = options;
    const logger = options.logger ?? consoleLogger;
    this.config = config;
    this.logger = labelLogger(logger, 'SyncEngine');
    this.now = options.now ?? Date.now;
    this.kinds = new Set(config.kinds);
    this.resyncPort =
      options.resync ??
      new HttpResyncClient({
        baseUrl: config.resyncUrl,
        credentials: config.credentials,
        pageSize: config.resyncPageSize,
      });

    this.router = new SubscriptionRouter(
      labelLogger(logger, 'SubscriptionRouter')
    );
    this.queue = new ApplyQueue({
      capacity: config.queueCapacity,
      logger: labelLogger(logger, 'ApplyQueue'),
      warnThresholdMs: APPLY_WARN_THRESHOLD_MS,
    });
    this.ledger = new OptimisticLedger(this.router, {
      timeoutMs: config.optimisticTimeoutMs,
      matchWindowMs: config.matchWindowMs,
      logger: labelLogger(logger, 'OptimisticLedger'),
      now: this.now,
      dispatch: (label, task) => this.queue.enqueue(label, task),
    });
    this.store = new StateStore(this.router, this.ledger, {
      logger: labelLogger(logger, 'StateStore'),
      now: this.now,
    });
    this.logBuffer = new LogBuffer(
      config.logBufferSize,
      labelLogger(logger, 'LogBuffer')
    );
    this.supervisor = new ReconnectionSupervisor({
      transport: options.transport ?? createTransport(config),
      endpoint: config.endpoint,
      credentials: config.credentials,
      backoff: config.backoff,
      heartbeat: config.heartbeat,
      logger: labelLogger(logger, 'Reconnect'),
      pingMessage: encodePing(),
      random: options.random,
      now: this.now,
      onConnected: (stream) => this.handleConnected(stream),
      onMessage: (raw) => this.handleMessage(raw),
    });
  }

  get connectionState(): ReadableSignal<ConnectionState> {
    return this.supervisor.connectionState;
  }

  start(): void {
    if (this.supervisor.isRunning) return;
    this.logger.info('Starting', {
      endpoint: this.config.endpoint,
      kinds: [...this.kinds],
    });
    this.supervisor.start();
  }

  /**
   * Closes the channel, cancels pending reconnects and settles every pending
   * mutation as `closed`. Resolves once the rollback has been applied.
   */
  async stop(): Promise<void> {
    this.supervisor.stop();
    this.outbox = [];
    const expired = await this.queue.run('stop', () =>
      this.ledger.expireAll(ExpiryReasons.closed)
    );
    this.logger.info('Stopped', { expiredMutations: expired });
  }

  /** Drops the channel and reconnects; the reconnect resyncs every kind. */
  reconnect(): void {
    this.supervisor.reconnect();
  }

  snapshot(kind: EntityKind): EntitySnapshot {
    return this.store.snapshot(kind);
  }

  entity(kind: EntityKind, id: string): ViewEntity | undefined {
    return this.store.get(kind, id);
  }

  lastRevision(kind: EntityKind): number {
    return this.store.lastRevision(kind);
  }

  subscribe(kind: EntityKind, listener: StateChangeListener): Subscription {
    this.trackKind(kind);
    return this.router.subscribe(kind, listener);
  }

  subscribeAll(listener: StateChangeListener): Subscription {
    return this.router.subscribeAll(listener);
  }

  unsubscribe(handle: Pick<Subscription, 'id'>): void {
    this.router.unsubscribe(handle);
  }

  onPersistentFailure(
    listener: (error: PersistentFailureError) => void
  ): Unsubscribe {
    return this.supervisor.onPersistentFailure(listener);
  }

  /**
   * Shows the prediction immediately and sends the mutation, or holds it
   * until the next connect. `settled` never rejects: it resolves to the
   * confirmed or expired outcome.
   */
  mutate(request: MutationRequest): PendingMutation {
    const correlationId = uuidv7(this.now());
    const settled = this.queue
      .run(`mutate:${correlationId}`, () => {
        const pending = this.ledger.begin(request, correlationId);
        this.outbox.push({
          correlationId,
          message: encodeMutation(request, correlationId),
        });
        return pending;
      })
      .then((pending): Promise<MutationOutcome> => {
        void this.flushOutbox();
        return pending.settled;
      })
      .then((outcome) => {
        this.outbox = this.outbox.filter(
          (entry) => entry.correlationId !== correlationId
        );
        return outcome;
      });
    return { correlationId, settled };
  }

  /**
   * Full resync of one kind from revision 0. Entities the server no longer
   * returns are removed, except those updated on the live stream while the
   * request was in flight.
   */
  refresh(kind: EntityKind): Promise<void> {
    return this.resyncKind(kind, { full: true });
  }

  logs(deploymentId: string): ReadonlyArray<LogLine> {
    return this.logBuffer.get(deploymentId);
  }

  subscribeLogs(
    deploymentId: string,
    listener: (lines: ReadonlyArray<LogLine>) => void
  ): Unsubscribe {
    return this.logBuffer.subscribe(deploymentId, listener);
  }

  whenIdle(): Promise<void> {
    return this.queue.whenIdle();
  }

  stats(): SyncEngineStats {
    return {
      ...this.store.stats(),
      decodeFailures: this.decodeFailures,
      pendingMutations: this.ledger.size,
      outbox: this.outbox.length,
      queuedTasks: this.queue.size,
    };
  }

  private async handleConnected(stream: TransportStream): Promise<void> {
    const kinds = [...this.kinds];
    await stream.send(encodeSubscribe(kinds));
    for (const kind of kinds) {
      await this.resyncKind(kind, { full: false });
    }
    this.logger.info('Synchronized', {
      kinds,
      revisions: Object.fromEntries(
        kinds.map((kind) => [kind, this.store.lastRevision(kind)])
      ),
    });
    void this.flushOutbox();
  }

  private async handleMessage(raw: string): Promise<void> {
    let message: SyncMessage;
    try {
      message = decodeMessage(raw);
    } catch (error) {
      if (!(error instanceof DecodeError)) throw error;
      this.decodeFailures += 1;
      this.logger.warn('Dropped undecodable message', {
        message: error.message,
        raw: raw.length > 200 ? `${raw.slice(0, 200)}…` : raw,
      });
      return;
    }
    if (message.type === SyncMessageTypes.heartbeat) return;
    await this.queue.whenWritable();
    const receivedAt = this.now();
    this.queue.enqueueInbound(`inbound:${message.type}`, () =>
      this.dispatch(message, receivedAt)
    );
  }

  private dispatch(message: SyncMessage, receivedAt: number): void {
    switch (message.type) {
      case SyncMessageTypes.entity:
        this.store.apply(message.event, receivedAt);
        return;
      case SyncMessageTypes.log:
        this.logBuffer.append(message.line);
        return;
      case SyncMessageTypes.mutationRejected:
        this.ledger.expire(
          message.correlationId,
          ExpiryReasons.rejected,
          message.reason
        );
        return;
      case SyncMessageTypes.heartbeat:
        return;
    }
  }

  private async resyncKind(
    kind: EntityKind,
    options: Readonly<{ full: boolean }>
  ): Promise<void> {
    const keepAbove = this.store.lastRevision(kind);
    const since = options.full ? 0 : keepAbove;
    const envelopes = await this.resyncPort.resync(kind, since);
    const events = this.decodeBatch(kind, envelopes);
    await this.queue.run(`resync:${kind}`, () => {
      this.store.resync(kind, events, {
        mode: since === 0 ? ResyncModes.replace : ResyncModes.merge,
        keepAbove,
      });
    });
    this.logger.debug('Resynced kind', {
      kind,
      since,
      received: events.length,
    });
  }

  private decodeBatch(
    kind: EntityKind,
    envelopes: ReadonlyArray<unknown>
  ): EntityEvent[] {
    const events: EntityEvent[] = [];
    for (const envelope of envelopes) {
      try {
        events.push(decodeResyncEnvelope(kind, envelope));
      } catch (error) {
        if (!(error instanceof DecodeError)) throw error;
        this.decodeFailures += 1;
        this.logger.warn('Dropped undecodable resync envelope', {
          kind,
          message: error.message,
        });
      }
    }
    return events;
  }

  private trackKind(kind: EntityKind): void {
    if (this.kinds.has(kind)) return;
    this.kinds.add(kind);
    if (!this.isConnected()) return;
    this.syncNewKind(kind).catch((error: unknown) => {
      this.logger.warn('Failed to subscribe to kind; next reconnect retries', {
        kind,
        message: toError(error).message,
      });
    });
  }

  private async syncNewKind(kind: EntityKind): Promise<void> {
    await this.supervisor.send(encodeSubscribe([...this.kinds]));
    await this.resyncKind(kind, { full: false });
  }

  private isConnected(): boolean {
    const state = this.supervisor.connectionState.get();
    return (
      state === ConnectionStates.connected ||
      state === ConnectionStates.degraded
    );
  }

  private flushOutbox(): Promise<void> {
    if (this.flushing) return this.flushing;
    const flushing = this.drainOutbox().finally(() => {
      this.flushing = null;
    });
    this.flushing = flushing;
    return flushing;
  }

  private async drainOutbox(): Promise<void> {
    while (this.isConnected()) {
      const next = this.outbox[0];
      if (!next) return;
      if (!this.ledger.has(next.correlationId)) {
        // Settled before it was sent.
        this.outbox.shift();
        continue;
      }
      try {
        await this.supervisor.send(next.message);
      } catch (error) {
        this.logger.warn('Mutation send failed; held for next connect', {
          correlationId: next.correlationId,
          message: toError(error).message,
        });
        return;
      }
      if (this.outbox[0] === next) this.outbox.shift();
    }
  }
}
