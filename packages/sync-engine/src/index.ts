export * from './types';
export * from './errors';
export * from './config';
export * from './logger';
export { computeBackoffDelay, type BackoffPolicy } from './backoff';
export {
  decodeEnvelope,
  decodeMessage,
  decodeResyncEnvelope,
  encodeMutation,
  encodePing,
  encodeSubscribe,
} from './eventCodec';
export { SubscriptionRouter } from './SubscriptionRouter';
export {
  OptimisticLedger,
  type OptimisticLedgerOptions,
  type ReconcileOptions,
} from './OptimisticLedger';
export {
  StateStore,
  type ResyncOptions,
  type StateStoreOptions,
} from './StateStore';
export { ApplyQueue, type ApplyQueueOptions } from './ApplyQueue';
export { LogBuffer } from './LogBuffer';
export { MessageQueue, type MessageQueueOptions } from './messageQueue';
export {
  ReconnectionSupervisor,
  type HeartbeatPolicy,
  type ReconnectionSupervisorOptions,
  type SupervisorBackoff,
} from './ReconnectionSupervisor';
export {
  WebSocketTransport,
  type SocketFactory,
  type SocketLike,
  type WebSocketTransportOptions,
} from './webSocketTransport';
export { SseTransport, parseSseChunk, type SseTransportOptions } from './sseTransport';
export {
  HttpResyncClient,
  type HttpResyncClientOptions,
} from './httpResyncClient';
export {
  SyncEngine,
  type SyncEngineOptions,
  type SyncEngineStats,
} from './SyncEngine';
