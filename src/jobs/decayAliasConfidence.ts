import cron, { type ScheduledTask } from 'node-cron';
import { ALIAS_DECAY_SCHEDULE } from '../config/constants';
import { env } from '../config/env';
import type { CrosswalkStore } from '../services/crosswalk/store.interface';
import { logger } from '../utils/logger';

export interface AliasDecaySettings {
  halfLifeDays: number;
  floor: number;
}

function settingsFromEnv(): AliasDecaySettings {
  return { halfLifeDays: env.ALIAS_DECAY_HALF_LIFE_DAYS, floor: env.ALIAS_DECAY_FLOOR };
}

export async function runAliasDecay(
  store: CrosswalkStore,
  settings: AliasDecaySettings = settingsFromEnv(),
  now: Date = new Date()
): Promise<number> {
  const changed = await store.decayAliasConfidence({ ...settings, now });
  logger.info({ changed, ...settings }, 'Alias confidence decay completed');
  return changed;
}

export function startAliasDecayJob(
  store: CrosswalkStore,
  settings: AliasDecaySettings = settingsFromEnv()
): ScheduledTask {
  const task = cron.schedule(ALIAS_DECAY_SCHEDULE, async () => {
    try {
      await runAliasDecay(store, settings);
    } catch (error) {
      logger.error({ error }, 'Alias confidence decay job failed');
    }
  });

  logger.info({ schedule: ALIAS_DECAY_SCHEDULE }, 'Alias confidence decay job scheduled (runs daily at 3:30 AM)');
  return task;
}
