import type {
  Alias,
  CanonicalPlayer,
  CreatePlayerInput,
  CrosswalkSnapshot,
  ExternalIdMapping,
  PlayerMerge,
  PlayerObservation,
} from '../../types/players';
import { logger } from '../../utils/logger';
import { normalizeName } from '../entityResolution/normalize';
import type {
  AliasDecayOptions,
  AliasHit,
  CreatePlayerResult,
  CrosswalkStore,
  ExternalIdHit,
  LoadResult,
} from './store.interface';

export interface AliasCacheStats {
  hits: number;
  misses: number;
  size: number;
}

function cacheKey(source: string, name: string): string {
  return `${source.trim()}\u0000${normalizeName(name)}`;
}

/**
 * Read-through cache of alias lookups in front of any crosswalk store.
 *
 * Entries are dropped by key when an alias is written and all at once on
 * writes that can change many lookups (merge, archive, decay, load).
 */
export class CachedCrosswalkStore implements CrosswalkStore {
  private readonly aliasHits = new Map<string, AliasHit[]>();
  // Bumped on every invalidation so a lookup that raced a write is not cached.
  private readonly generations = new Map<string, number>();
  private epoch = 0;
  private hits = 0;
  private misses = 0;

  constructor(private readonly inner: CrosswalkStore) {}

  async lookupAliases(source: string, normalizedName: string): Promise<AliasHit[]> {
    const key = cacheKey(source, normalizedName);
    const cached = this.aliasHits.get(key);
    if (cached) {
      this.hits++;
      return cached.map((hit) => ({ ...hit }));
    }

    this.misses++;
    const epoch = this.epoch;
    const generation = this.generations.get(key) ?? 0;
    const result = await this.inner.lookupAliases(source, normalizedName);
    if (epoch === this.epoch && generation === (this.generations.get(key) ?? 0)) {
      this.aliasHits.set(key, result.map((hit) => ({ ...hit })));
    }
    return result;
  }

  async upsertAlias(playerId: string, aliasName: string, source: string, confidence: number): Promise<Alias> {
    const alias = await this.inner.upsertAlias(playerId, aliasName, source, confidence);
    const key = cacheKey(source, aliasName);
    this.aliasHits.delete(key);
    this.generations.set(key, (this.generations.get(key) ?? 0) + 1);
    return alias;
  }

  async archivePlayer(playerId: string): Promise<CanonicalPlayer> {
    const player = await this.inner.archivePlayer(playerId);
    this.invalidate();
    return player;
  }

  async mergePlayers(sourcePlayerId: string, targetPlayerId: string, reason: string): Promise<PlayerMerge> {
    const merge = await this.inner.mergePlayers(sourcePlayerId, targetPlayerId, reason);
    this.invalidate();
    return merge;
  }

  async decayAliasConfidence(options: AliasDecayOptions): Promise<number> {
    const changed = await this.inner.decayAliasConfidence(options);
    if (changed > 0) this.invalidate();
    return changed;
  }

  async load(snapshot: CrosswalkSnapshot): Promise<LoadResult> {
    const result = await this.inner.load(snapshot);
    this.invalidate();
    return result;
  }

  invalidate(): void {
    if (this.aliasHits.size > 0) {
      logger.debug({ entries: this.aliasHits.size }, 'Alias cache invalidated');
    }
    this.aliasHits.clear();
    this.generations.clear();
    this.epoch++;
  }

  getStats(): AliasCacheStats {
    return { hits: this.hits, misses: this.misses, size: this.aliasHits.size };
  }

  // Pass-through

  lookupByExternalId(source: string, externalId: string): Promise<ExternalIdHit | null> {
    return this.inner.lookupByExternalId(source, externalId);
  }

  upsertExternalId(
    source: string,
    externalId: string,
    playerId: string,
    externalName: string | null,
    confidence: number
  ): Promise<ExternalIdMapping> {
    return this.inner.upsertExternalId(source, externalId, playerId, externalName, confidence);
  }

  // Confidence is unchanged, so cached lookups stay valid.
  touchAlias(playerId: string, aliasName: string, source: string): Promise<boolean> {
    return this.inner.touchAlias(playerId, aliasName, source);
  }

  allPlayers(): AsyncIterable<CanonicalPlayer> {
    return this.inner.allPlayers();
  }

  getPlayer(playerId: string): Promise<CanonicalPlayer | null> {
    return this.inner.getPlayer(playerId);
  }

  createPlayer(input: CreatePlayerInput): Promise<CreatePlayerResult> {
    return this.inner.createPlayer(input);
  }

  updatePlayer(playerId: string, observation: PlayerObservation): Promise<CanonicalPlayer> {
    return this.inner.updatePlayer(playerId, observation);
  }

  listExternalIds(playerId: string): Promise<ExternalIdMapping[]> {
    return this.inner.listExternalIds(playerId);
  }

  listAliases(playerId: string): Promise<Alias[]> {
    return this.inner.listAliases(playerId);
  }

  listMerges(): Promise<PlayerMerge[]> {
    return this.inner.listMerges();
  }

  snapshot(): Promise<CrosswalkSnapshot> {
    return this.inner.snapshot();
  }

  close(): Promise<void> {
    return this.inner.close();
  }
}
