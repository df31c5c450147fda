import { env } from '../../config/env';
import { logger } from '../../utils/logger';
import { CachedCrosswalkStore } from './aliasCache';
import { MemoryCrosswalkStore } from './memoryStore';
import { PostgresCrosswalkStore } from './postgresStore';
import type { CrosswalkStore, CrosswalkStoreOptions } from './store.interface';

export type CrosswalkStoreKind = 'postgres' | 'memory';

export interface CreateCrosswalkStoreOptions extends CrosswalkStoreOptions {
  kind?: CrosswalkStoreKind;
  /** Wrap the store in the alias lookup cache. Defaults to true. */
  cache?: boolean;
}

export function createCrosswalkStore(options: CreateCrosswalkStoreOptions = {}): CrosswalkStore {
  const kind = options.kind ?? env.CROSSWALK_STORE;
  const base =
    kind === 'memory'
      ? new MemoryCrosswalkStore({ now: options.now })
      : new PostgresCrosswalkStore(undefined, { now: options.now });

  logger.info({ kind, cache: options.cache ?? true }, 'Crosswalk store created');
  return options.cache === false ? base : new CachedCrosswalkStore(base);
}
