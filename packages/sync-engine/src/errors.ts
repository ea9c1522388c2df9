export const SyncErrorCodes = {
  transport: 'transport',
  decode: 'decode',
  stale: 'stale',
  mutationTimeout: 'mutation_timeout',
  persistentFailure: 'persistent_failure',
  invalidConfig: 'invalid_config',
} as const;

export type SyncErrorCode =
  (typeof SyncErrorCodes)[keyof typeof SyncErrorCodes];

export class SyncEngineError extends Error {
  constructor(
    message: string,
    readonly code: SyncErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'SyncEngineError';
  }
}

/**
 * Connection-level failure. The reconnection supervisor retries these with
 * backoff; they never reach observers directly.
 */
export class TransportError extends SyncEngineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, SyncErrorCodes.transport, options);
    this.name = 'TransportError';
  }
}

export class DecodeError extends SyncEngineError {
  constructor(
    message: string,
    readonly raw: unknown,
    options?: { cause?: unknown }
  ) {
    super(message, SyncErrorCodes.decode, options);
    this.name = 'DecodeError';
  }
}

/**
 * Describes an event older than the stored revision. Only used for
 * accounting; the store drops such events without raising.
 */
export class StaleEventError extends SyncEngineError {
  constructor(
    readonly entityId: string,
    readonly revision: number,
    readonly storedRevision: number
  ) {
    super(
      `Stale event for ${entityId}: revision ${revision} <= ${storedRevision}`,
      SyncErrorCodes.stale
    );
    this.name = 'StaleEventError';
  }
}

export const ExpiryReasons = {
  timeout: 'timeout',
  rejected: 'rejected',
  closed: 'closed',
  superseded: 'superseded',
} as const;

export type ExpiryReason = (typeof ExpiryReasons)[keyof typeof ExpiryReasons];

const expiryMessages: Record<ExpiryReason, string> = {
  timeout: 'Mutation was not confirmed in time',
  rejected: 'Mutation was rejected by the server',
  closed: 'Connection closed before the mutation was confirmed',
  superseded: 'Newer server data replaced the predicted state',
};

export class MutationTimeoutError extends SyncEngineError {
  constructor(
    readonly correlationId: string,
    readonly reason: ExpiryReason,
    readonly detail: string | null = null
  ) {
    super(
      detail ? `${expiryMessages[reason]}: ${detail}` : expiryMessages[reason],
      SyncErrorCodes.mutationTimeout
    );
    this.name = 'MutationTimeoutError';
  }
}

export class PersistentFailureError extends SyncEngineError {
  constructor(
    readonly consecutiveFailures: number,
    readonly lastError: Error
  ) {
    super(
      `Connection failed ${consecutiveFailures} times in a row; still retrying`,
      SyncErrorCodes.persistentFailure,
      { cause: lastError }
    );
    this.name = 'PersistentFailureError';
  }
}

export class SyncConfigError extends SyncEngineError {
  constructor(readonly issues: ReadonlyArray<string>) {
    super(`Invalid sync config: ${issues.join('; ')}`, SyncErrorCodes.invalidConfig);
    this.name = 'SyncConfigError';
  }
}

export const toError = (value: unknown): Error =>
  value instanceof Error ? value : new Error(String(value));

export const toTransportError = (value: unknown): TransportError => {
  if (value instanceof TransportError) return value;
  const error = toError(value);
  return new TransportError(error.message, { cause: error });
};
