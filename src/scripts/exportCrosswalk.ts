import { createCrosswalkStore } from '../services/crosswalk/factory';
import { exportSnapshotCsv } from '../services/crosswalk/snapshot';
import { writeSnapshotDirectory } from '../services/crosswalk/snapshotFiles';
import { logger } from '../utils/logger';

const directory = process.argv[2] ?? process.env.CROSSWALK_SNAPSHOT_DIR;

if (!directory) {
  console.error('Please pass the output directory');
  console.error('Usage: npm run crosswalk:export -- ./data/crosswalk');
  process.exit(1);
}

async function exportCrosswalk(outputDirectory: string) {
  const store = createCrosswalkStore({ cache: false });
  try {
    const snapshot = await store.snapshot();
    const files = await writeSnapshotDirectory(outputDirectory, exportSnapshotCsv(snapshot));
    console.log(
      `✓ Exported ${snapshot.players.length} players, ${snapshot.externalIds.length} external ids, ${snapshot.aliases.length} aliases`
    );
    for (const file of files) console.log(`  ${file}`);
    process.exitCode = 0;
  } catch (error) {
    logger.error({ error, directory: outputDirectory }, 'Crosswalk export failed');
    console.error('Error exporting crosswalk:', error);
    process.exitCode = 1;
  } finally {
    await store.close();
  }
}

void exportCrosswalk(directory);
