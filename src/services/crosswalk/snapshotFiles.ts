import { mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { SNAPSHOT_FILES, type SnapshotCsv, type SnapshotTable } from './snapshot';

const TABLES: readonly SnapshotTable[] = ['players', 'externalIds', 'aliases'];

export async function readSnapshotDirectory(directory: string): Promise<SnapshotCsv> {
  const [players, externalIds, aliases] = await Promise.all(
    TABLES.map((table) => readFile(path.join(directory, SNAPSHOT_FILES[table]), 'utf8'))
  );
  return { players, externalIds, aliases };
}

export async function writeSnapshotDirectory(directory: string, tables: SnapshotCsv): Promise<string[]> {
  await mkdir(directory, { recursive: true });
  const written = TABLES.map((table) => path.join(directory, SNAPSHOT_FILES[table]));
  await Promise.all(TABLES.map((table, index) => writeFile(written[index], tables[table], 'utf8')));
  return written;
}
