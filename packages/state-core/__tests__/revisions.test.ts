import { describe, expect, it } from 'vitest';
import {
  compareEventOrder,
  compareRevision,
  entityFromEvent,
  isEntityKind,
  isNewerRevision,
  RevisionComparisons,
  type EntityEvent,
} from '../src';

const baseEvent: EntityEvent = {
  kind: 'deployment',
  entityId: 'deployment-42',
  revision: 3,
  operation: 'upsert',
  status: 'healthy',
  payload: { replicas: 3 },
  correlationId: null,
};

describe('compareRevision', () => {
  it('orders lower revisions first', () => {
    expect(compareRevision(1, 2)).toBe(RevisionComparisons.before);
    expect(compareRevision(2, 1)).toBe(RevisionComparisons.after);
  });

  it('returns equal for the same revision', () => {
    expect(compareRevision(4, 4)).toBe(RevisionComparisons.equal);
  });
});

describe('isNewerRevision', () => {
  it('accepts any revision for an unseen id', () => {
    expect(isNewerRevision(0, undefined)).toBe(true);
  });

  it('rejects equal and older revisions', () => {
    expect(isNewerRevision(3, 3)).toBe(false);
    expect(isNewerRevision(2, 3)).toBe(false);
    expect(isNewerRevision(4, 3)).toBe(true);
  });
});

describe('entity helpers', () => {
  it('materializes an entity from an event', () => {
    expect(entityFromEvent(baseEvent)).toEqual({
      kind: 'deployment',
      id: 'deployment-42',
      revision: 3,
      status: 'healthy',
      payload: { replicas: 3 },
    });
  });

  it('orders events by revision then id', () => {
    const events: EntityEvent[] = [
      { ...baseEvent, entityId: 'b', revision: 2 },
      { ...baseEvent, entityId: 'a', revision: 2 },
      { ...baseEvent, entityId: 'c', revision: 1 },
    ];
    expect(
      [...events].sort(compareEventOrder).map((event) => event.entityId)
    ).toEqual(['c', 'a', 'b']);
  });

  it('recognizes known kinds only', () => {
    expect(isEntityKind('composition')).toBe(true);
    expect(isEntityKind('terminal')).toBe(false);
    expect(isEntityKind(42)).toBe(false);
  });
});
