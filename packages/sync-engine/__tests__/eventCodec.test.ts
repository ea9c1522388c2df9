import { describe, expect, it } from 'vitest';
import {
  decodeMessage,
  decodeResyncEnvelope,
  encodeMutation,
  encodePing,
  encodeSubscribe,
} from '../src/eventCodec';
import { DecodeError } from '../src/errors';

describe('decodeMessage', () => {
  it('decodes an entity envelope into an event', () => {
    const message = decodeMessage(
      JSON.stringify({
        type: 'entity',
        kind: 'deployment',
        entity_id: 'deployment-42',
        revision: 7,
        operation: 'upsert',
        status: 'healthy',
        payload: { replicas: 3 },
        correlation_id: 'c-1',
      })
    );
    expect(message).toEqual({
      type: 'entity',
      event: {
        kind: 'deployment',
        entityId: 'deployment-42',
        revision: 7,
        operation: 'upsert',
        status: 'healthy',
        payload: { replicas: 3 },
        correlationId: 'c-1',
      },
    });
  });

  it('fills optional entity fields', () => {
    const message = decodeMessage(
      '{"type":"entity","kind":"cluster","entity_id":"eu-1","revision":1,"operation":"delete"}'
    );
    expect(message).toEqual({
      type: 'entity',
      event: {
        kind: 'cluster',
        entityId: 'eu-1',
        revision: 1,
        operation: 'delete',
        status: '',
        payload: null,
        correlationId: null,
      },
    });
  });

  it('decodes log lines, heartbeats and rejections', () => {
    expect(
      decodeMessage(
        '{"type":"log","deployment_id":"d-1","sequence":4,"line":"ready","timestamp":1700000000000}'
      )
    ).toEqual({
      type: 'log',
      line: {
        deploymentId: 'd-1',
        sequence: 4,
        stream: 'stdout',
        line: 'ready',
        timestamp: 1_700_000_000_000,
      },
    });
    expect(decodeMessage('{"type":"heartbeat","at":12}')).toEqual({
      type: 'heartbeat',
      at: 12,
    });
    expect(
      decodeMessage(
        '{"type":"mutation_rejected","correlation_id":"c-9","reason":"quota exceeded"}'
      )
    ).toEqual({
      type: 'mutationRejected',
      correlationId: 'c-9',
      reason: 'quota exceeded',
    });
  });

  it('rejects invalid JSON with the raw message attached', () => {
    let caught: unknown = null;
    try {
      decodeMessage('{nope');
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(DecodeError);
    if (!(caught instanceof DecodeError)) return;
    expect(caught.message).toBe('Message is not valid JSON');
    expect(caught.raw).toBe('{nope');
    expect(caught.code).toBe('decode');
  });

  it('rejects unknown kinds and negative revisions', () => {
    expect(() =>
      decodeMessage(
        '{"type":"entity","kind":"invoice","entity_id":"x","revision":1,"operation":"upsert"}'
      )
    ).toThrow(DecodeError);
    expect(() =>
      decodeMessage(
        '{"type":"entity","kind":"cluster","entity_id":"x","revision":-1,"operation":"upsert"}'
      )
    ).toThrow(DecodeError);
    expect(() => decodeMessage('{"type":"gossip"}')).toThrow(
      'Envelope does not match any message shape'
    );
  });
});

describe('decodeResyncEnvelope', () => {
  const envelope = {
    type: 'entity',
    kind: 'composition',
    entity_id: 'web',
    revision: 3,
    operation: 'upsert',
    status: 'active',
    payload: {},
  };

  it('accepts entity envelopes of the requested kind', () => {
    expect(decodeResyncEnvelope('composition', envelope).entityId).toBe('web');
  });

  it('rejects other kinds and message types', () => {
    expect(() => decodeResyncEnvelope('cluster', envelope)).toThrow(
      'Resync envelope for composition in cluster batch'
    );
    expect(() =>
      decodeResyncEnvelope('cluster', { type: 'heartbeat', at: 1 })
    ).toThrow('Resync envelope has type heartbeat, expected entity');
  });
});

describe('encoders', () => {
  it('encodes mutations in wire form', () => {
    const encoded = encodeMutation(
      {
        kind: 'deployment',
        entityId: 'deployment-42',
        actionType: 'scale',
        payload: { replicas: 5 },
        prediction: { operation: 'upsert', status: 'scaling', payload: {} },
      },
      'c-1'
    );
    expect(JSON.parse(encoded)).toEqual({
      type: 'mutation',
      action_type: 'scale',
      kind: 'deployment',
      entity_id: 'deployment-42',
      payload: { replicas: 5 },
      correlation_id: 'c-1',
    });
  });

  it('encodes subscribe and ping', () => {
    expect(encodeSubscribe(['deployment', 'cluster'])).toBe(
      '{"type":"subscribe","kinds":["deployment","cluster"]}'
    );
    expect(encodePing()).toBe('{"type":"ping"}');
  });
});
