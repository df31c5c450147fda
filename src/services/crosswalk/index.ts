export type {
  AliasDecayOptions,
  AliasHit,
  CreatePlayerResult,
  CrosswalkStore,
  CrosswalkStoreOptions,
  ExternalIdHit,
  LoadResult,
} from './store.interface';

export { MemoryCrosswalkStore } from './memoryStore';
export { PostgresCrosswalkStore } from './postgresStore';
export { CachedCrosswalkStore, type AliasCacheStats } from './aliasCache';
export { createCrosswalkStore, type CreateCrosswalkStoreOptions, type CrosswalkStoreKind } from './factory';
export { planExternalIdWrite, decayedConfidence, type ExternalIdWrite } from './rules';
export {
  SNAPSHOT_FILES,
  exportSnapshotCsv,
  parseSnapshotCsv,
  type SnapshotCsv,
  type SnapshotTable,
} from './snapshot';
export { readSnapshotDirectory, writeSnapshotDirectory } from './snapshotFiles';
