import type {
  Alias,
  CanonicalPlayer,
  CreatePlayerInput,
  CrosswalkSnapshot,
  ExternalIdMapping,
  PlayerMerge,
  PlayerObservation,
} from '../../types/players';

export interface ExternalIdHit {
  /** The active player the mapping resolves to, after following merges. */
  player: CanonicalPlayer;
  mapping: ExternalIdMapping;
}

export interface AliasHit {
  playerId: string;
  confidenceScore: number;
}

export interface CreatePlayerResult {
  player: CanonicalPlayer;
  created: boolean;
}

export interface AliasDecayOptions {
  now?: Date;
  halfLifeDays: number;
  floor: number;
}

export interface LoadResult {
  players: number;
  externalIds: number;
  aliases: number;
}

export interface CrosswalkStoreOptions {
  /** Clock used for every timestamp the store writes. */
  now?: () => Date;
}

/**
 * Persistent mapping from provider identifiers and name variants onto
 * canonical players.
 *
 * Conflict rule for upsertExternalId: a key that already maps to a different
 * player is only reassigned when the new confidence is strictly higher;
 * otherwise ConflictError is thrown and nothing changes.
 */
export interface CrosswalkStore {
  lookupByExternalId(source: string, externalId: string): Promise<ExternalIdHit | null>;
  /** Active players carrying this alias for the source, by confidence descending. */
  lookupAliases(source: string, normalizedName: string): Promise<AliasHit[]>;
  upsertExternalId(
    source: string,
    externalId: string,
    playerId: string,
    externalName: string | null,
    confidence: number
  ): Promise<ExternalIdMapping>;
  upsertAlias(playerId: string, aliasName: string, source: string, confidence: number): Promise<Alias>;
  /**
   * Record that an alias was seen again without changing its confidence.
   * Resets the decay clock. Returns false when no such alias exists.
   */
  touchAlias(playerId: string, aliasName: string, source: string): Promise<boolean>;
  /** Active players, streamed. */
  allPlayers(): AsyncIterable<CanonicalPlayer>;

  /** Any player by id, archived ones included. */
  getPlayer(playerId: string): Promise<CanonicalPlayer | null>;
  createPlayer(input: CreatePlayerInput): Promise<CreatePlayerResult>;
  updatePlayer(playerId: string, observation: PlayerObservation): Promise<CanonicalPlayer>;
  archivePlayer(playerId: string): Promise<CanonicalPlayer>;
  mergePlayers(sourcePlayerId: string, targetPlayerId: string, reason: string): Promise<PlayerMerge>;

  listExternalIds(playerId: string): Promise<ExternalIdMapping[]>;
  listAliases(playerId: string): Promise<Alias[]>;
  listMerges(): Promise<PlayerMerge[]>;

  /** Returns the number of aliases whose confidence changed. */
  decayAliasConfidence(options: AliasDecayOptions): Promise<number>;

  snapshot(): Promise<CrosswalkSnapshot>;
  /** Adds rows whose keys are not present yet; existing rows are left untouched. */
  load(snapshot: CrosswalkSnapshot): Promise<LoadResult>;

  close(): Promise<void>;
}
