import {
  ConnectionStates,
  type ConnectionState,
  type ReadableSignal,
  type Unsubscribe,
} from '@deckhand/state-core';
import { computeBackoffDelay, type BackoffPolicy } from './backoff';
import {
  PersistentFailureError,
  TransportError,
  toTransportError,
} from './errors';
import type { SyncLogger } from './logger';
import { ValueSignal } from './signal';
import type {
  CredentialsProvider,
  TransportChannelPort,
  TransportStream,
} from './types';

export type SupervisorBackoff = BackoffPolicy &
  Readonly<{ maxConsecutiveFailures: number }>;

export type HeartbeatPolicy = Readonly<{
  intervalMs: number;
  /** Silence after which the connection is reported as degraded. */
  timeoutMs: number;
  /** Silence after which the channel is dropped and reopened. */
  degradedTimeoutMs: number;
}>;

export type ReconnectionSupervisorOptions = Readonly<{
  transport: TransportChannelPort;
  endpoint: string;
  credentials: CredentialsProvider;
  backoff: SupervisorBackoff;
  heartbeat: HeartbeatPolicy;
  logger: SyncLogger;
  /** Runs after every successful open, before messages are read. */
  onConnected: (stream: TransportStream) => Promise<void>;
  /** Awaited per message; a slow consumer holds the read loop. */
  onMessage: (raw: string) => Promise<void> | void;
  pingMessage?: string | null;
  random?: () => number;
  now?: () => number;
}>;

type PersistentFailureListener = (error: PersistentFailureError) => void;

/**
 * Owns the transport stream and the connection state machine:
 *
 *   disconnected → connecting → connected ⇄ degraded
 *        ↑______________________________________|
 *
 * Every attempt runs under a generation number; callbacks from an older
 * generation are ignored once `stop()` or a failure has moved on.
 */
export class ReconnectionSupervisor {
  private readonly state: ValueSignal<ConnectionState>;
  readonly connectionState: ReadableSignal<ConnectionState>;
  private readonly persistentListeners = new Set<PersistentFailureListener>();
  private readonly random: () => number;
  private readonly now: () => number;
  private stream: TransportStream | null = null;
  private running = false;
  private generation = 0;
  private consecutiveFailures = 0;
  private persistentReported = false;
  private lastMessageAt = 0;
  private retryTimer: ReturnType<typeof setTimeout> | null = null;
  private heartbeatTimer: ReturnType<typeof setInterval> | null = null;

  constructor(private readonly options: ReconnectionSupervisorOptions) {
    this.state = new ValueSignal<ConnectionState>(
      ConnectionStates.disconnected,
      options.logger
    );
    this.connectionState = this.state.asReadonly();
    this.random = options.random ?? Math.random;
    this.now = options.now ?? Date.now;
  }

  get failures(): number {
    return this.consecutiveFailures;
  }

  get isRunning(): boolean {
    return this.running;
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.connect();
  }

  stop(): void {
    if (!this.running) return;
    this.running = false;
    this.generation += 1;
    this.clearRetry();
    this.stopHeartbeat();
    this.closeStream();
    this.transition(ConnectionStates.disconnected);
  }

  /** Drops the current channel and opens a new one immediately. */
  reconnect(): void {
    if (!this.running) return;
    this.generation += 1;
    this.clearRetry();
    this.stopHeartbeat();
    this.closeStream();
    this.transition(ConnectionStates.disconnected);
    this.connect();
  }

  onPersistentFailure(listener: PersistentFailureListener): Unsubscribe {
    this.persistentListeners.add(listener);
    return () => {
      this.persistentListeners.delete(listener);
    };
  }

  send(message: string): Promise<void> {
    const stream = this.stream;
    const state = this.state.get();
    if (
      !stream ||
      (state !== ConnectionStates.connected &&
        state !== ConnectionStates.degraded)
    ) {
      return Promise.reject(new TransportError('Not connected'));
    }
    return stream.send(message);
  }

  private connect(): void {
    const generation = this.generation;
    void this.attempt(generation);
  }

  private async attempt(generation: number): Promise<void> {
    this.transition(ConnectionStates.connecting);
    let stream: TransportStream;
    try {
      const token = await this.options.credentials();
      if (generation !== this.generation) return;
      stream = await this.options.transport.open(this.options.endpoint, token);
    } catch (error) {
      if (generation !== this.generation) return;
      this.fail(toTransportError(error));
      return;
    }
    if (generation !== this.generation) {
      stream.close();
      return;
    }

    this.stream = stream;
    this.lastMessageAt = this.now();
    this.transition(ConnectionStates.connected);

    try {
      await this.options.onConnected(stream);
    } catch (error) {
      if (generation !== this.generation) return;
      this.fail(toTransportError(error));
      return;
    }
    if (generation !== this.generation) return;

    this.consecutiveFailures = 0;
    this.persistentReported = false;
    this.startHeartbeat(generation);
    await this.readLoop(stream, generation);
  }

  private async readLoop(
    stream: TransportStream,
    generation: number
  ): Promise<void> {
    try {
      for await (const raw of stream.messages()) {
        if (generation !== this.generation) return;
        this.lastMessageAt = this.now();
        if (this.state.get() === ConnectionStates.degraded) {
          this.options.logger.info('Connection recovered');
          this.transition(ConnectionStates.connected);
        }
        await this.options.onMessage(raw);
      }
      if (generation !== this.generation) return;
      this.fail(new TransportError('Transport stream ended'));
    } catch (error) {
      if (generation !== this.generation) return;
      this.fail(toTransportError(error));
    }
  }

  private fail(error: TransportError): void {
    this.generation += 1;
    this.stopHeartbeat();
    this.closeStream();
    this.transition(ConnectionStates.disconnected);
    if (!this.running) return;

    this.consecutiveFailures += 1;
    const delayMs = computeBackoffDelay(
      this.consecutiveFailures - 1,
      this.options.backoff,
      this.random
    );
    this.options.logger.warn('Connection failed; retrying', {
      attempt: this.consecutiveFailures,
      delayMs,
      message: error.message,
    });

    if (
      this.consecutiveFailures >= this.options.backoff.maxConsecutiveFailures &&
      !this.persistentReported
    ) {
      this.persistentReported = true;
      this.reportPersistentFailure(
        new PersistentFailureError(this.consecutiveFailures, error)
      );
    }

    this.clearRetry();
    this.retryTimer = setTimeout(() => {
      this.retryTimer = null;
      if (!this.running) return;
      this.connect();
    }, delayMs);
  }

  private reportPersistentFailure(error: PersistentFailureError): void {
    this.options.logger.error(error.message, {
      consecutiveFailures: error.consecutiveFailures,
      lastError: error.lastError.message,
    });
    for (const listener of [...this.persistentListeners]) {
      try {
        listener(error);
      } catch (listenerError) {
        this.options.logger.error('Persistent failure listener threw', {
          message:
            listenerError instanceof Error
              ? listenerError.message
              : String(listenerError),
        });
      }
    }
  }

  private startHeartbeat(generation: number): void {
    this.stopHeartbeat();
    const { intervalMs, timeoutMs, degradedTimeoutMs } = this.options.heartbeat;
    this.heartbeatTimer = setInterval(() => {
      if (generation !== this.generation) return;
      const silentMs = this.now() - this.lastMessageAt;
      if (silentMs >= degradedTimeoutMs) {
        this.fail(new TransportError(`No messages for ${silentMs}ms`));
        return;
      }
      if (
        silentMs >= timeoutMs &&
        this.state.get() === ConnectionStates.connected
      ) {
        this.options.logger.warn('Heartbeat overdue; connection degraded', {
          silentMs,
        });
        this.transition(ConnectionStates.degraded);
      }
      this.ping();
    }, intervalMs);
  }

  private ping(): void {
    const message = this.options.pingMessage;
    if (!message || !this.stream) return;
    this.stream.send(message).catch((error: unknown) => {
      this.options.logger.debug('Ping failed', {
        message: error instanceof Error ? error.message : String(error),
      });
    });
  }

  private stopHeartbeat(): void {
    if (!this.heartbeatTimer) return;
    clearInterval(this.heartbeatTimer);
    this.heartbeatTimer = null;
  }

  private clearRetry(): void {
    if (!this.retryTimer) return;
    clearTimeout(this.retryTimer);
    this.retryTimer = null;
  }

  private closeStream(): void {
    const stream = this.stream;
    this.stream = null;
    stream?.close();
  }

  private transition(next: ConnectionState): void {
    const previous = this.state.get();
    if (this.state.set(next)) {
      this.options.logger.debug('Connection state changed', {
        from: previous,
        to: next,
      });
    }
  }
}
