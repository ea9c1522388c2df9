import { z } from 'zod';
import {
  EntityKinds,
  EntityOperations,
  LogStreams,
  type EntityEvent,
  type EntityKind,
} from '@deckhand/state-core';
import { DecodeError } from './errors';
import {
  SyncMessageTypes,
  type MutationRequest,
  type SyncMessage,
} from './types';

const entityEnvelope = z.object({
  type: z.literal('entity'),
  kind: z.nativeEnum(EntityKinds),
  entity_id: z.string().min(1),
  revision: z.number().int().nonnegative(),
  operation: z.nativeEnum(EntityOperations),
  status: z.string().optional(),
  payload: z.unknown(),
  correlation_id: z.string().min(1).nullish(),
});

const logEnvelope = z.object({
  type: z.literal('log'),
  deployment_id: z.string().min(1),
  sequence: z.number().int().nonnegative(),
  stream: z.nativeEnum(LogStreams).default(LogStreams.stdout),
  line: z.string(),
  timestamp: z.number(),
});

const heartbeatEnvelope = z.object({
  type: z.literal('heartbeat'),
  at: z.number().default(0),
});

const rejectionEnvelope = z.object({
  type: z.literal('mutation_rejected'),
  correlation_id: z.string().min(1),
  reason: z.string().default('rejected'),
});

const envelopeSchema = z.discriminatedUnion('type', [
  entityEnvelope,
  logEnvelope,
  heartbeatEnvelope,
  rejectionEnvelope,
]);

type Envelope = z.infer<typeof envelopeSchema>;

const toSyncMessage = (envelope: Envelope): SyncMessage => {
  switch (envelope.type) {
    case 'entity':
      return {
        type: SyncMessageTypes.entity,
        event: {
          kind: envelope.kind,
          entityId: envelope.entity_id,
          revision: envelope.revision,
          operation: envelope.operation,
          status: envelope.status ?? '',
          payload: envelope.payload ?? null,
          correlationId: envelope.correlation_id ?? null,
        },
      };
    case 'log':
      return {
        type: SyncMessageTypes.log,
        line: {
          deploymentId: envelope.deployment_id,
          sequence: envelope.sequence,
          stream: envelope.stream,
          line: envelope.line,
          timestamp: envelope.timestamp,
        },
      };
    case 'heartbeat':
      return { type: SyncMessageTypes.heartbeat, at: envelope.at };
    case 'mutation_rejected':
      return {
        type: SyncMessageTypes.mutationRejected,
        correlationId: envelope.correlation_id,
        reason: envelope.reason,
      };
  }
};

const describeIssues = (error: z.ZodError): string =>
  error.issues
    .map((issue) =>
      issue.path.length > 0
        ? `${issue.path.join('.')}: ${issue.message}`
        : issue.message
    )
    .join('; ');

/** Decodes an already-parsed envelope (resync responses carry these). */
export const decodeEnvelope = (value: unknown): SyncMessage => {
  const result = envelopeSchema.safeParse(value);
  if (!result.success) {
    throw new DecodeError(
      `Envelope does not match any message shape: ${describeIssues(result.error)}`,
      value
    );
  }
  return toSyncMessage(result.data);
};

export const decodeMessage = (raw: string): SyncMessage => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new DecodeError('Message is not valid JSON', raw, { cause: error });
  }
  return decodeEnvelope(parsed);
};

/**
 * Resync batches must contain entity envelopes of the requested kind only.
 */
export const decodeResyncEnvelope = (
  kind: EntityKind,
  value: unknown
): EntityEvent => {
  const message = decodeEnvelope(value);
  if (message.type !== SyncMessageTypes.entity) {
    throw new DecodeError(
      `Resync envelope has type ${message.type}, expected entity`,
      value
    );
  }
  if (message.event.kind !== kind) {
    throw new DecodeError(
      `Resync envelope for ${message.event.kind} in ${kind} batch`,
      value
    );
  }
  return message.event;
};

export const encodeMutation = (
  request: MutationRequest,
  correlationId: string
): string =>
  JSON.stringify({
    type: 'mutation',
    action_type: request.actionType,
    kind: request.kind,
    entity_id: request.entityId,
    payload: request.payload,
    correlation_id: correlationId,
  });

export const encodeSubscribe = (kinds: ReadonlyArray<EntityKind>): string =>
  JSON.stringify({ type: 'subscribe', kinds });

export const encodePing = (): string => JSON.stringify({ type: 'ping' });
