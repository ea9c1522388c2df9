import { z } from 'zod';
import { ALL_ENTITY_KINDS, EntityKinds } from '@deckhand/state-core';
import { SyncConfigError } from './errors';
import type { CredentialsProvider } from './types';

export const TransportKinds = {
  websocket: 'websocket',
  sse: 'sse',
} as const;

export type TransportKind =
  (typeof TransportKinds)[keyof typeof TransportKinds];

const positiveInt = z.number().int().positive();

const backoffSchema = z
  .object({
    baseDelayMs: positiveInt.default(1_000),
    factor: z.number().min(1).default(2),
    maxDelayMs: positiveInt.default(30_000),
    jitterRatio: z.number().min(0).max(1).default(0.2),
    maxConsecutiveFailures: positiveInt.default(5),
  })
  .refine((value) => value.maxDelayMs >= value.baseDelayMs, {
    message: 'maxDelayMs must be >= baseDelayMs',
    path: ['maxDelayMs'],
  });

const heartbeatSchema = z
  .object({
    intervalMs: positiveInt.default(15_000),
    timeoutMs: positiveInt.default(30_000),
    degradedTimeoutMs: positiveInt.default(60_000),
  })
  .refine((value) => value.degradedTimeoutMs > value.timeoutMs, {
    message: 'degradedTimeoutMs must be greater than timeoutMs',
    path: ['degradedTimeoutMs'],
  });

const wsProtocolToHttp: Record<string, string> = {
  'ws:': 'http:',
  'wss:': 'https:',
};

/** `wss://api.example.com/stream` → `https://api.example.com` */
export const deriveResyncUrl = (endpoint: string): string => {
  const url = new URL(endpoint);
  const protocol = wsProtocolToHttp[url.protocol] ?? url.protocol;
  return `${protocol}//${url.host}`;
};

export const syncConfigSchema = z
  .object({
    endpoint: z.string().url(),
    resyncUrl: z.string().url().optional(),
    transport: z.nativeEnum(TransportKinds).default(TransportKinds.websocket),
    credentials: z
      .custom<CredentialsProvider>((value) => typeof value === 'function', {
        message: 'credentials must be a token provider function',
      })
      .optional(),
    backoff: backoffSchema.default({}),
    heartbeat: heartbeatSchema.default({}),
    optimisticTimeoutMs: positiveInt.default(10_000),
    matchWindowMs: positiveInt.optional(),
    queueCapacity: positiveInt.default(1_000),
    resyncPageSize: positiveInt.default(500),
    logBufferSize: positiveInt.default(1_000),
    kinds: z
      .array(z.nativeEnum(EntityKinds))
      .default([...ALL_ENTITY_KINDS]),
  })
  .transform((config) => ({
    ...config,
    resyncUrl: config.resyncUrl ?? deriveResyncUrl(config.endpoint),
    matchWindowMs: config.matchWindowMs ?? config.optimisticTimeoutMs,
    credentials:
      config.credentials ?? ((): Promise<string | null> => Promise.resolve(null)),
  }));

export type SyncConfigInput = z.input<typeof syncConfigSchema>;
export type SyncConfig = z.output<typeof syncConfigSchema>;

const formatIssue = (issue: z.ZodIssue): string =>
  issue.path.length > 0
    ? `${issue.path.join('.')}: ${issue.message}`
    : issue.message;

export const parseSyncConfig = (input: unknown): SyncConfig => {
  const result = syncConfigSchema.safeParse(input);
  if (!result.success) {
    throw new SyncConfigError(result.error.issues.map(formatIssue));
  }
  return result.data;
};

type Env = Readonly<Record<string, string | undefined>>;

const numberFromEnv = (env: Env, key: string): number | undefined => {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return undefined;
  return Number(raw);
};

const dropUndefined = (
  value: Readonly<Record<string, unknown>>
): Record<string, unknown> =>
  Object.fromEntries(
    Object.entries(value).filter(([, entry]) => entry !== undefined)
  );

/**
 * Reads `SYNC_*` variables. Numeric values are validated by the schema, so a
 * malformed number surfaces as a `SyncConfigError` naming the field.
 */
export const loadSyncConfigFromEnv = (
  env: Env,
  overrides: Partial<SyncConfigInput> = {}
): SyncConfig =>
  parseSyncConfig({
    endpoint: env.SYNC_ENDPOINT ?? 'ws://localhost:4000/sync/stream',
    ...dropUndefined({
      resyncUrl: env.SYNC_RESYNC_URL,
      transport: env.SYNC_TRANSPORT,
      optimisticTimeoutMs: numberFromEnv(env, 'SYNC_OPTIMISTIC_TIMEOUT_MS'),
      queueCapacity: numberFromEnv(env, 'SYNC_QUEUE_CAPACITY'),
    }),
    backoff: dropUndefined({
      baseDelayMs: numberFromEnv(env, 'SYNC_BACKOFF_BASE_MS'),
      factor: numberFromEnv(env, 'SYNC_BACKOFF_FACTOR'),
      maxDelayMs: numberFromEnv(env, 'SYNC_BACKOFF_MAX_MS'),
      jitterRatio: numberFromEnv(env, 'SYNC_BACKOFF_JITTER'),
    }),
    ...overrides,
  });
