import { describe, expect, test } from 'vitest';
import type { CanonicalPlayer } from '../../types/players';
import { BadRequestError, InvalidRecordError, NotFoundError } from '../errors';
import { assertActivePlayer, parseSourceRecord, validateConfidence } from '../validation';

function player(overrides: Partial<CanonicalPlayer> = {}): CanonicalPlayer {
  const at = new Date('2024-09-01T12:00:00.000Z');
  return {
    playerId: 'player-1',
    canonicalName: 'Travis Kelce',
    firstName: 'Travis',
    lastName: 'Kelce',
    position: 'TE',
    team: 'KC',
    archivedAt: null,
    mergedInto: null,
    createdAt: at,
    updatedAt: at,
    ...overrides,
  };
}

describe('parseSourceRecord', () => {
  test('fills optional fields with null', () => {
    expect(parseSourceRecord({ source: 'draftkings', name: 'Travis Kelce' })).toEqual({
      source: 'draftkings',
      name: 'Travis Kelce',
      team: null,
      position: null,
      externalId: null,
    });
  });

  test('stringifies numeric external ids and drops blank ones', () => {
    expect(parseSourceRecord({ source: 'draftkings', name: 'A', externalId: 2001 }).externalId).toBe('2001');
    expect(parseSourceRecord({ source: 'draftkings', name: 'A', externalId: '   ' }).externalId).toBeNull();
  });

  test('trims team and position', () => {
    const record = parseSourceRecord({ source: 'nfl_api', name: 'T.Kelce', team: ' KC ', position: '' });
    expect(record.team).toBe('KC');
    expect(record.position).toBeNull();
  });

  test('keeps a missing name as an empty string', () => {
    expect(parseSourceRecord({ source: 'nfl_api', externalId: '00-0030506' }).name).toBe('');
  });

  test('rejects a record without a source', () => {
    try {
      parseSourceRecord({ source: '  ', name: 'Travis Kelce' });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidRecordError);
      if (error instanceof InvalidRecordError) {
        expect(error.code).toBe('INVALID_RECORD');
        expect(error.issues).toEqual(['source: source is required']);
      }
    }
  });

  test('rejects values that are not objects', () => {
    expect(() => parseSourceRecord('Travis Kelce')).toThrow(InvalidRecordError);
    expect(() => parseSourceRecord(null)).toThrow(InvalidRecordError);
  });
});

describe('validateConfidence', () => {
  test('accepts the closed unit interval', () => {
    expect(() => validateConfidence(0)).not.toThrow();
    expect(() => validateConfidence(0.85)).not.toThrow();
    expect(() => validateConfidence(1)).not.toThrow();
  });

  test('rejects values outside it', () => {
    for (const value of [-0.01, 1.01, Number.NaN, Number.POSITIVE_INFINITY]) {
      expect(() => validateConfidence(value)).toThrow(BadRequestError);
    }
  });
});

describe('assertActivePlayer', () => {
  test('passes an active player', () => {
    expect(() => assertActivePlayer(player(), 'player-1')).not.toThrow();
  });

  test('throws NotFoundError for a missing player', () => {
    expect(() => assertActivePlayer(null, 'player-9')).toThrow(NotFoundError);
  });

  test('names the merge target of an archived player', () => {
    const archived = player({ archivedAt: new Date('2024-10-01T00:00:00.000Z'), mergedInto: 'player-2' });
    expect(() => assertActivePlayer(archived, 'player-1')).toThrow('Player player-1 is archived (merged into player-2)');
  });
});
