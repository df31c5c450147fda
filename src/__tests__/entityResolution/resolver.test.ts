import { beforeEach, describe, expect, test, vi } from 'vitest';
import { CachedCrosswalkStore } from '../../services/crosswalk/aliasCache';
import type { MemoryCrosswalkStore } from '../../services/crosswalk/memoryStore';
import { EntityResolver, resolutionKey } from '../../services/entityResolution/resolver';
import type { CanonicalPlayer } from '../../types/players';
import { InvalidRecordError } from '../../utils/errors';
import {
  createTestPlayers,
  createTestStore,
  resetRecordCounter,
  salaryRecord,
  statsRecord,
  type TestClock,
} from '../helpers';

describe('EntityResolver', () => {
  let store: MemoryCrosswalkStore;
  let clock: TestClock;
  let resolver: EntityResolver;
  let mccaffrey: CanonicalPlayer;
  let chase: CanonicalPlayer;

  beforeEach(async () => {
    resetRecordCounter();
    ({ store, clock } = createTestStore());
    [mccaffrey, chase] = await createTestPlayers(store, [
      { name: 'Christian McCaffrey', team: 'SF', position: 'RB' },
      { name: "Ja'Marr Chase", team: 'CIN', position: 'WR' },
    ]);
    resolver = new EntityResolver(store);
  });

  describe('exact crosswalk', () => {
    test('takes precedence over the name', async () => {
      await store.upsertExternalId('draftkings', '1001', mccaffrey.playerId, 'Christian McCaffrey', 1.0);

      const result = await resolver.resolve({ source: 'draftkings', name: 'Totally Different', externalId: '1001' });

      expect(result.status).toBe('matched');
      expect(result.method).toBe('exact_crosswalk');
      expect(result.resolvedPlayerId).toBe(mccaffrey.playerId);
      expect(result.similarityScore).toBe(1.0);
    });

    test('accepts numeric external ids', async () => {
      await store.upsertExternalId('draftkings', '1001', mccaffrey.playerId, null, 0.9);

      const result = await resolver.resolve({ source: 'draftkings', name: 'CMC', externalId: 1001 });

      expect(result.method).toBe('exact_crosswalk');
      expect(result.similarityScore).toBe(0.9);
    });

    test('refreshes team and position from the record', async () => {
      await store.upsertExternalId('draftkings', '1001', mccaffrey.playerId, null, 1.0);

      const result = await resolver.resolve({
        source: 'draftkings',
        name: 'Christian McCaffrey',
        externalId: '1001',
        team: 'SFO',
        position: 'RB/FLEX',
      });
      expect(result.player?.team).toBe('SF');

      await resolver.resolve({ source: 'draftkings', name: 'Christian McCaffrey', externalId: '1001', team: 'KC' });
      const stored = await store.getPlayer(mccaffrey.playerId);
      expect(stored?.team).toBe('KC');
      expect(stored?.position).toBe('RB');
    });
  });

  describe('fuzzy match', () => {
    test('matches the abbreviated stats name and learns an alias', async () => {
      const record = statsRecord('C.McCaffrey', { team: 'SF', position: 'RB' });

      const result = await resolver.resolve(record);

      expect(result.status).toBe('matched');
      expect(result.method).toBe('fuzzy_match');
      expect(result.resolvedPlayerId).toBe(mccaffrey.playerId);
      expect(result.similarityScore).toBeCloseTo(22 / 30 + 0.1, 10);

      const aliases = await store.listAliases(mccaffrey.playerId);
      expect(aliases.map((alias) => [alias.aliasName, alias.sourceName])).toEqual([['c mccaffrey', 'nfl_api']]);
    });

    test('resolves the same record deterministically the second time', async () => {
      const first = await resolver.resolve(statsRecord('J.Chase', { team: 'CIN' }));
      const second = await resolver.resolve(statsRecord('J.Chase', { team: 'CIN' }));

      expect(first.method).toBe('fuzzy_match');
      expect(second.method).toBe('alias_lookup');
      expect(second.resolvedPlayerId).toBe(chase.playerId);
      expect(second.similarityScore).toBeCloseTo(14 / 19 + 0.1, 10);
    });

    test('never writes external ids', async () => {
      const record = statsRecord('J.Chase', { team: 'CIN', externalId: '00-0036900' });

      await resolver.resolve(record);

      expect(await store.lookupByExternalId('nfl_api', '00-0036900')).toBeNull();
      expect(await store.listExternalIds(chase.playerId)).toEqual([]);
    });

    test('keeps aliases that keep being used from decaying', async () => {
      await resolver.resolve(statsRecord('J.Chase', { team: 'CIN' }));

      for (let day = 30; day <= 180; day += 30) {
        clock.advanceDays(30);
        const result = await resolver.resolve(statsRecord('J.Chase', { team: 'CIN' }));
        expect(result.method).toBe('alias_lookup');
      }

      expect(await store.decayAliasConfidence({ halfLifeDays: 90, floor: 0.3 })).toBe(0);
      const [alias] = await store.listAliases(chase.playerId);
      expect(alias.confidenceScore).toBeCloseTo(14 / 19 + 0.1, 10);
      expect(alias.lastSeenAt).toEqual(clock.now());
    });

    test('follows a player to a new team and returns to the alias afterwards', async () => {
      await resolver.resolve(statsRecord('J.Chase', { team: 'CIN' }));

      const traded = await resolver.resolve(statsRecord('J.Chase', { team: 'BUF' }));
      expect(traded.method).toBe('fuzzy_match');
      expect(traded.resolvedPlayerId).toBe(chase.playerId);
      expect(traded.player?.team).toBe('BUF');
      expect((await store.getPlayer(chase.playerId))?.team).toBe('BUF');

      const next = await resolver.resolve(statsRecord('J.Chase', { team: 'BUF' }));
      expect(next.method).toBe('alias_lookup');
      expect(next.resolvedPlayerId).toBe(chase.playerId);
    });

    test('leaves a record below the threshold unmatched', async () => {
      const result = await resolver.resolve(statsRecord('Chris Godwin', { team: 'TB' }));

      expect(result.status).toBe('unmatched');
      expect(result.resolvedPlayerId).toBeNull();
      expect(result.method).toBe('fuzzy_match');
      expect(await store.listAliases(mccaffrey.playerId)).toEqual([]);
      expect(await store.listAliases(chase.playerId)).toEqual([]);
    });

    test('gives the same answer with blocking turned off', async () => {
      const unblocked = new EntityResolver(store, { useBlocking: false });

      const result = await unblocked.resolve({ source: 'nfl_api', name: 'Chris Godwin' });

      expect(result.status).toBe('unmatched');
      expect(result.reason).toMatch(/^Best score 0\.\d{3} below threshold 0\.8$/);
    });
  });

  describe('same name on different teams', () => {
    let withTeamA: CanonicalPlayer;
    let withTeamB: CanonicalPlayer;

    beforeEach(async () => {
      [withTeamA, withTeamB] = await createTestPlayers(store, [
        { name: 'Mike Williams', team: 'NYJ', position: 'WR' },
        { name: 'Mike Williams Jr.', team: 'LAC', position: 'WR' },
      ]);
    });

    test('uses the team to pick between identical names', async () => {
      const result = await resolver.resolve(salaryRecord('Mike Williams', { team: 'NYJ', position: 'WR' }));

      expect(result.status).toBe('matched');
      expect(result.method).toBe('fuzzy_match');
      expect(result.resolvedPlayerId).toBe(withTeamA.playerId);
      expect(result.similarityScore).toBe(1);
    });

    test('does not let a learned alias capture the other team', async () => {
      await resolver.resolve(salaryRecord('Mike Williams', { team: 'NYJ' }));

      const other = await resolver.resolve(salaryRecord('Mike Williams', { team: 'LAC' }));

      expect(other.status).toBe('matched');
      expect(other.method).toBe('fuzzy_match');
      expect(other.resolvedPlayerId).toBe(withTeamB.playerId);
    });

    test('disambiguates several alias hits by team and reports the rest as ambiguous', async () => {
      await resolver.resolve(salaryRecord('Mike Williams', { team: 'NYJ' }));
      await resolver.resolve(salaryRecord('Mike Williams', { team: 'LAC' }));

      const byTeam = await resolver.resolve(salaryRecord('Mike Williams', { team: 'NYJ' }));
      expect(byTeam.method).toBe('alias_lookup');
      expect(byTeam.resolvedPlayerId).toBe(withTeamA.playerId);

      const noTeam = await resolver.resolve(salaryRecord('Mike Williams', { position: 'WR' }));
      expect(noTeam.status).toBe('ambiguous');
      expect(noTeam.method).toBe('alias_lookup');
      expect(noTeam.resolvedPlayerId).toBeNull();
      expect(noTeam.candidates?.map((c) => c.playerId).sort()).toEqual(
        [withTeamA.playerId, withTeamB.playerId].sort()
      );
    });

    test('reports ambiguous from the fuzzy scan when nothing separates the players', async () => {
      const result = await resolver.resolve(salaryRecord('Mike Williams'));

      expect(result.status).toBe('ambiguous');
      expect(result.method).toBe('fuzzy_match');
      expect(result.candidates).toHaveLength(2);
      expect(await store.listAliases(withTeamA.playerId)).toEqual([]);
    });
  });

  describe('aliases shared by several players', () => {
    let calvin: CanonicalPlayer;
    let chris: CanonicalPlayer;

    beforeEach(async () => {
      [calvin, chris] = await createTestPlayers(store, [
        { name: 'Calvin Johnson', team: 'DET', position: 'WR' },
        { name: 'Chris Johnson', team: 'TEN', position: 'RB' },
      ]);
    });

    test('picks between them by name and team, not by alias confidence', async () => {
      const first = await resolver.resolve(statsRecord('C.Johnson', { team: 'DET', position: 'WR' }));
      expect(first.method).toBe('fuzzy_match');
      expect(first.resolvedPlayerId).toBe(calvin.playerId);

      await store.upsertAlias(chris.playerId, 'C.Johnson', 'nfl_api', 1.0);

      const detroit = await resolver.resolve(statsRecord('C.Johnson', { team: 'DET', position: 'WR' }));
      expect(detroit.status).toBe('matched');
      expect(detroit.method).toBe('alias_lookup');
      expect(detroit.resolvedPlayerId).toBe(calvin.playerId);
      expect(detroit.similarityScore).toBeCloseTo(18 / 23 + 0.1, 10);

      const tennessee = await resolver.resolve(statsRecord('C.Johnson', { team: 'TEN' }));
      expect(tennessee.method).toBe('alias_lookup');
      expect(tennessee.resolvedPlayerId).toBe(chris.playerId);
      expect(tennessee.similarityScore).toBeCloseTo(18 / 22 + 0.1, 10);
    });
  });

  describe('over the cached store', () => {
    test('learns an alias and serves it on the next call', async () => {
      const cached = new CachedCrosswalkStore(store);
      const cachedResolver = new EntityResolver(cached);

      const first = await cachedResolver.resolve(statsRecord('J.Chase', { team: 'CIN' }));
      const second = await cachedResolver.resolve(statsRecord('J.Chase', { team: 'CIN' }));
      const third = await cachedResolver.resolve(statsRecord('J.Chase', { team: 'CIN' }));

      expect(first.method).toBe('fuzzy_match');
      expect(second.method).toBe('alias_lookup');
      expect(second.resolvedPlayerId).toBe(chase.playerId);
      expect(third.method).toBe('alias_lookup');
      expect(cached.getStats()).toEqual({ hits: 1, misses: 2, size: 1 });
    });
  });

  describe('content problems', () => {
    test('reports a record with no usable name and no id as unmatched', async () => {
      const result = await resolver.resolve({ source: 'nfl_api', name: '!!!' });

      expect(result).toEqual({
        sourceRecord: { source: 'nfl_api', name: '!!!', team: null, position: null, externalId: null },
        resolvedPlayerId: null,
        method: null,
        similarityScore: 0,
        status: 'unmatched',
        reason: 'Record has no usable name and no external id',
      });
    });

    test('reports an empty name with an unknown id as unmatched', async () => {
      const result = await resolver.resolve({ source: 'nfl_api', name: '', externalId: '00-0000001' });

      expect(result.status).toBe('unmatched');
      expect(result.reason).toBe('Name is empty after normalization');
    });

    test('throws for structurally invalid records', async () => {
      await expect(resolver.resolve({ name: 'Travis Kelce' })).rejects.toBeInstanceOf(InvalidRecordError);
      await expect(resolver.resolve('Travis Kelce')).rejects.toBeInstanceOf(InvalidRecordError);
    });
  });

  describe('configuration', () => {
    test('lookupPreference alias consults aliases before the crosswalk', async () => {
      await store.upsertExternalId('draftkings', '1001', mccaffrey.playerId, null, 1.0);
      await store.upsertAlias(chase.playerId, 'CMC', 'draftkings', 0.9);
      const record = { source: 'draftkings', name: 'CMC', externalId: '1001' };

      const byCrosswalk = await resolver.resolve(record);
      const byAlias = await new EntityResolver(store, { lookupPreference: 'alias' }).resolve(record);

      expect(byCrosswalk.method).toBe('exact_crosswalk');
      expect(byCrosswalk.resolvedPlayerId).toBe(mccaffrey.playerId);
      expect(byAlias.method).toBe('alias_lookup');
      expect(byAlias.resolvedPlayerId).toBe(chase.playerId);
    });

    test('ignores aliases below aliasMinConfidence', async () => {
      await store.upsertAlias(chase.playerId, 'JC', 'nfl_api', 0.4);

      const ignored = await resolver.resolve({ source: 'nfl_api', name: 'JC' });
      const accepted = await new EntityResolver(store, { aliasMinConfidence: 0.3 }).resolve({
        source: 'nfl_api',
        name: 'JC',
      });

      expect(ignored.status).toBe('unmatched');
      expect(accepted.method).toBe('alias_lookup');
      expect(accepted.similarityScore).toBe(0.4);
    });

    test('merges partial thresholds with the defaults', () => {
      const custom = new EntityResolver(store, { thresholds: { accept: 0.9, tieBand: 0.05 } });
      expect(custom.config.thresholds).toEqual({ accept: 0.9, tieBand: 0.05 });
      expect(custom.config.lookupPreference).toBe('crosswalk');
    });
  });

  describe('resolveBatch', () => {
    test('keeps input order and resolves records with the same key one after the other', async () => {
      const results = await resolver.resolveBatch(
        [
          { source: 'nfl_api', name: 'J.Chase' },
          { source: 'nfl_api', name: 'C.McCaffrey' },
          { source: 'nfl_api', name: 'Unknown Player' },
          { source: 'nfl_api', name: 'J.Chase' },
        ],
        { concurrency: 3 }
      );

      expect(results.map((result) => [result.sourceRecord.name, result.status, result.method])).toEqual([
        ['J.Chase', 'matched', 'fuzzy_match'],
        ['C.McCaffrey', 'matched', 'fuzzy_match'],
        ['Unknown Player', 'unmatched', 'fuzzy_match'],
        ['J.Chase', 'matched', 'alias_lookup'],
      ]);
    });

    test('stops the other workers once a record fails', async () => {
      const lookupAliases = store.lookupAliases.bind(store);
      vi.spyOn(store, 'lookupAliases').mockImplementation(async (source, name) => {
        if (name === 'boom') throw new Error('connection lost');
        return lookupAliases(source, name);
      });

      await expect(
        resolver.resolveBatch(
          [
            { source: 'nfl_api', name: 'Boom' },
            { source: 'nfl_api', name: 'J.Chase' },
            { source: 'nfl_api', name: 'C.McCaffrey' },
          ],
          { concurrency: 2 }
        )
      ).rejects.toThrow('connection lost');
      await new Promise((resolve) => setTimeout(resolve, 0));

      expect(await store.listAliases(mccaffrey.playerId)).toEqual([]);
    });

    test('returns an empty list for an empty batch', async () => {
      expect(await resolver.resolveBatch([])).toEqual([]);
    });

    test('aborts before resolving anything when a record is structurally invalid', async () => {
      await expect(
        resolver.resolveBatch([{ source: 'nfl_api', name: 'J.Chase' }, { name: 'No Source' }])
      ).rejects.toBeInstanceOf(InvalidRecordError);

      expect(await store.listAliases(chase.playerId)).toEqual([]);
    });
  });

  describe('resolutionKey', () => {
    test('uses the external id when present, otherwise the normalized name', () => {
      expect(resolutionKey({ source: 'nfl_api', name: 'J.Chase', externalId: '7' })).toBe('nfl_api\u0000id\u00007');
      expect(resolutionKey({ source: 'nfl_api', name: 'J.Chase' })).toBe('nfl_api\u0000name\u0000j chase');
    });
  });
});
