import { testConnection } from '../config/database';
import { env } from '../config/env';
import { startAliasDecayJob } from '../jobs/decayAliasConfidence';
import { createCrosswalkStore } from '../services/crosswalk/factory';
import { logger } from '../utils/logger';

async function main() {
  if (env.CROSSWALK_STORE === 'postgres' && !(await testConnection())) {
    process.exit(1);
  }

  const store = createCrosswalkStore({ cache: false });
  const task = startAliasDecayJob(store);

  const shutdown = async (signal: string) => {
    logger.info(`${signal} received, stopping alias decay job`);
    task.stop();
    try {
      await store.close();
      process.exit(0);
    } catch (error) {
      logger.error({ error }, 'Failed to close crosswalk store');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));
}

main().catch((error) => {
  logger.error({ error }, 'Alias decay worker failed to start');
  process.exit(1);
});
