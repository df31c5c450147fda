import { mkdtemp, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import { exportSnapshotCsv, parseSnapshotCsv } from '../../services/crosswalk/snapshot';
import { readSnapshotDirectory, writeSnapshotDirectory } from '../../services/crosswalk/snapshotFiles';
import type { CrosswalkSnapshot } from '../../types/players';
import { BadRequestError } from '../../utils/errors';
import { createTestPlayers, createTestStore } from '../helpers';

async function buildSnapshot(): Promise<CrosswalkSnapshot> {
  const { store, clock } = createTestStore();
  const [chase, kelce] = await createTestPlayers(store, [
    { name: "Ja'Marr Chase", team: 'CIN', position: 'WR' },
    { name: 'Travis Kelce', team: 'KC', position: 'TE' },
  ]);
  await store.upsertExternalId('draftkings', '30001', chase.playerId, "Ja'Marr Chase", 1.0);
  await store.upsertExternalId('nfl_api', '00-0036900', chase.playerId, 'J.Chase', 14 / 19 + 0.1);
  await store.upsertAlias(chase.playerId, 'J.Chase', 'nfl_api', 14 / 19 + 0.1);
  clock.advanceDays(10);
  await store.archivePlayer(kelce.playerId);
  return store.snapshot();
}

describe('crosswalk snapshot CSV', () => {
  test('writes one header row per table', async () => {
    const tables = exportSnapshotCsv(await buildSnapshot());

    expect(tables.players.split('\n')[0]).toBe(
      'player_id,canonical_name,first_name,last_name,position,team,merged_into,created_at,updated_at,archived_at'
    );
    expect(tables.externalIds.split('\n')[0]).toBe(
      'source_name,external_id,player_id,external_name,confidence_score,created_at,updated_at'
    );
    expect(tables.aliases.split('\n')[0]).toBe(
      'player_id,alias_name,source_name,confidence_score,last_seen_at,decayed_at,created_at'
    );
  });

  test('reads back what it writes', async () => {
    const snapshot = await buildSnapshot();

    expect(parseSnapshotCsv(exportSnapshotCsv(snapshot))).toEqual(snapshot);
  });

  test('fails the import with the file and row of an invalid row', async () => {
    const tables = exportSnapshotCsv(await buildSnapshot());
    const [header, row] = tables.aliases.split('\n');
    const cells = row.split(',');
    cells[3] = '1.5';

    const attempt = () => parseSnapshotCsv({ ...tables, aliases: [header, cells.join(',')].join('\n') });

    expect(attempt).toThrow(BadRequestError);
    expect(attempt).toThrow(/aliases\.csv row 1: confidenceScore/);
  });

  describe('snapshot directory', () => {
    let directory: string;

    beforeEach(async () => {
      directory = await mkdtemp(path.join(os.tmpdir(), 'crosswalk-'));
    });

    afterEach(async () => {
      await rm(directory, { recursive: true, force: true });
    });

    test('writes the three files and reads them back', async () => {
      const tables = exportSnapshotCsv(await buildSnapshot());

      const written = await writeSnapshotDirectory(directory, tables);

      expect(written.map((file) => path.basename(file))).toEqual(['players.csv', 'external_ids.csv', 'aliases.csv']);
      expect(await readSnapshotDirectory(directory)).toEqual(tables);
    });
  });
});
