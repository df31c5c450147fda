import { createCrosswalkStore } from '../services/crosswalk/factory';
import { parseSnapshotCsv } from '../services/crosswalk/snapshot';
import { readSnapshotDirectory } from '../services/crosswalk/snapshotFiles';
import { logger } from '../utils/logger';

const directory = process.argv[2] ?? process.env.CROSSWALK_SNAPSHOT_DIR;

if (!directory) {
  console.error('Please pass the snapshot directory');
  console.error('Usage: npm run crosswalk:import -- ./data/crosswalk');
  process.exit(1);
}

async function importCrosswalk(snapshotDirectory: string) {
  const store = createCrosswalkStore();
  try {
    const snapshot = parseSnapshotCsv(await readSnapshotDirectory(snapshotDirectory));
    const loaded = await store.load(snapshot);
    console.log(
      `✓ Loaded ${loaded.players} players, ${loaded.externalIds} external ids, ${loaded.aliases} aliases from ${snapshotDirectory}`
    );
    process.exitCode = 0;
  } catch (error) {
    logger.error({ error, directory: snapshotDirectory }, 'Crosswalk import failed');
    console.error('Error importing crosswalk:', error);
    process.exitCode = 1;
  } finally {
    await store.close();
  }
}

void importCrosswalk(directory);
