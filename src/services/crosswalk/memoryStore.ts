import { randomUUID } from 'node:crypto';
import { MAX_MERGE_HOPS } from '../../config/constants';
import type {
  Alias,
  CanonicalPlayer,
  CreatePlayerInput,
  CrosswalkSnapshot,
  ExternalIdMapping,
  PlayerMerge,
  PlayerObservation,
} from '../../types/players';
import { BadRequestError } from '../../utils/errors';
import { logger } from '../../utils/logger';
import { assertActivePlayer, validateConfidence } from '../../utils/validation';
import {
  normalizeName,
  normalizePosition,
  normalizeTeam,
  playerFingerprint,
  splitDisplayName,
} from '../entityResolution/normalize';
import { decayedConfidence, planExternalIdWrite, validateDecayOptions } from './rules';
import type {
  AliasDecayOptions,
  AliasHit,
  CreatePlayerResult,
  CrosswalkStore,
  CrosswalkStoreOptions,
  ExternalIdHit,
  LoadResult,
} from './store.interface';

function externalIdKey(source: string, externalId: string): string {
  return `${source}\u0000${externalId}`;
}

function aliasKey(playerId: string, aliasName: string, source: string): string {
  return `${playerId}\u0000${aliasName}\u0000${source}`;
}

/**
 * In-process crosswalk store. Used for batch runs loaded from a snapshot and
 * as the stand-in for PostgreSQL in tests.
 */
export class MemoryCrosswalkStore implements CrosswalkStore {
  private readonly players = new Map<string, CanonicalPlayer>();
  private readonly fingerprints = new Map<string, string>();
  private readonly externalIds = new Map<string, ExternalIdMapping>();
  private readonly aliases = new Map<string, Alias>();
  private readonly merges: PlayerMerge[] = [];
  private readonly now: () => Date;

  constructor(options: CrosswalkStoreOptions = {}) {
    this.now = options.now ?? (() => new Date());
  }

  async lookupByExternalId(source: string, externalId: string): Promise<ExternalIdHit | null> {
    const mapping = this.externalIds.get(externalIdKey(source.trim(), externalId.trim()));
    if (!mapping) return null;

    const player = this.followMerges(mapping.playerId);
    if (!player) return null;
    return { player: { ...player }, mapping: { ...mapping } };
  }

  async lookupAliases(source: string, normalizedName: string): Promise<AliasHit[]> {
    const name = normalizeName(normalizedName);
    if (!name) return [];

    const sourceName = source.trim();
    const hits: AliasHit[] = [];
    for (const alias of this.aliases.values()) {
      if (alias.sourceName !== sourceName || alias.aliasName !== name) continue;
      if (!this.isActive(alias.playerId)) continue;
      hits.push({ playerId: alias.playerId, confidenceScore: alias.confidenceScore });
    }
    return hits.sort((a, b) => b.confidenceScore - a.confidenceScore);
  }

  async upsertExternalId(
    source: string,
    externalId: string,
    playerId: string,
    externalName: string | null,
    confidence: number
  ): Promise<ExternalIdMapping> {
    validateConfidence(confidence);
    assertActivePlayer(this.players.get(playerId), playerId);

    const sourceName = source.trim();
    const id = externalId.trim();
    const key = externalIdKey(sourceName, id);
    const existing = this.externalIds.get(key) ?? null;
    const plan = planExternalIdWrite(existing, playerId, confidence);
    const now = this.now();

    let mapping: ExternalIdMapping;
    if (existing && plan === 'refresh') {
      mapping = {
        ...existing,
        externalName: externalName ?? existing.externalName,
        confidenceScore: Math.max(existing.confidenceScore, confidence),
        updatedAt: now,
      };
    } else {
      mapping = {
        sourceName,
        externalId: id,
        playerId,
        externalName,
        confidenceScore: confidence,
        createdAt: existing?.createdAt ?? now,
        updatedAt: now,
      };
    }

    if (existing && plan === 'reassign') {
      logger.warn(
        { sourceName, externalId: id, fromPlayerId: existing.playerId, toPlayerId: playerId, confidence },
        'External id reassigned to a higher-confidence player'
      );
    }

    this.externalIds.set(key, mapping);
    return { ...mapping };
  }

  async upsertAlias(playerId: string, aliasName: string, source: string, confidence: number): Promise<Alias> {
    const normalized = normalizeName(aliasName);
    if (!normalized) {
      throw new BadRequestError(`Alias "${aliasName}" is empty after normalization`, 'EMPTY_ALIAS');
    }
    validateConfidence(confidence);
    assertActivePlayer(this.players.get(playerId), playerId);

    const sourceName = source.trim();
    const key = aliasKey(playerId, normalized, sourceName);
    const existing = this.aliases.get(key);
    const now = this.now();

    const alias: Alias = existing
      ? { ...existing, confidenceScore: Math.max(existing.confidenceScore, confidence), lastSeenAt: now }
      : {
          playerId,
          aliasName: normalized,
          sourceName,
          confidenceScore: confidence,
          lastSeenAt: now,
          decayedAt: null,
          createdAt: now,
        };

    this.aliases.set(key, alias);
    return { ...alias };
  }

  async touchAlias(playerId: string, aliasName: string, source: string): Promise<boolean> {
    const key = aliasKey(playerId, normalizeName(aliasName), source.trim());
    const alias = this.aliases.get(key);
    if (!alias) return false;

    this.aliases.set(key, { ...alias, lastSeenAt: this.now() });
    return true;
  }

  async *allPlayers(): AsyncIterable<CanonicalPlayer> {
    for (const player of [...this.players.values()]) {
      if (!player.archivedAt) yield { ...player };
    }
  }

  async getPlayer(playerId: string): Promise<CanonicalPlayer | null> {
    const player = this.players.get(playerId);
    return player ? { ...player } : null;
  }

  async createPlayer(input: CreatePlayerInput): Promise<CreatePlayerResult> {
    const canonicalName = input.canonicalName.trim();
    if (!normalizeName(canonicalName)) {
      throw new BadRequestError(`Player name "${input.canonicalName}" is empty after normalization`, 'EMPTY_NAME');
    }

    const fingerprint = playerFingerprint(canonicalName, input.position, input.team);
    const existingId = this.fingerprints.get(fingerprint);
    const existing = existingId ? this.players.get(existingId) : undefined;
    if (existing && !existing.archivedAt) {
      return { player: { ...existing }, created: false };
    }

    const parts = splitDisplayName(canonicalName);
    const now = this.now();
    const player: CanonicalPlayer = {
      playerId: randomUUID(),
      canonicalName,
      firstName: input.firstName ?? parts.firstName,
      lastName: input.lastName ?? parts.lastName,
      position: normalizePosition(input.position),
      team: normalizeTeam(input.team),
      archivedAt: null,
      mergedInto: null,
      createdAt: now,
      updatedAt: now,
    };

    this.players.set(player.playerId, player);
    this.fingerprints.set(fingerprint, player.playerId);
    logger.debug({ playerId: player.playerId, canonicalName }, 'Player created');
    return { player: { ...player }, created: true };
  }

  async updatePlayer(playerId: string, observation: PlayerObservation): Promise<CanonicalPlayer> {
    const player = this.players.get(playerId);
    assertActivePlayer(player, playerId);

    const team = normalizeTeam(observation.team);
    const position = normalizePosition(observation.position);
    const updated: CanonicalPlayer = {
      ...player,
      team: team ?? player.team,
      position: position ?? player.position,
      updatedAt: this.now(),
    };

    this.unindexFingerprint(player);
    this.players.set(playerId, updated);
    this.fingerprints.set(playerFingerprint(updated.canonicalName, updated.position, updated.team), playerId);
    return { ...updated };
  }

  async archivePlayer(playerId: string): Promise<CanonicalPlayer> {
    const player = this.players.get(playerId);
    assertActivePlayer(player, playerId);

    const now = this.now();
    const archived: CanonicalPlayer = { ...player, archivedAt: now, updatedAt: now };
    this.unindexFingerprint(player);
    this.players.set(playerId, archived);
    logger.info({ playerId }, 'Player archived');
    return { ...archived };
  }

  async mergePlayers(sourcePlayerId: string, targetPlayerId: string, reason: string): Promise<PlayerMerge> {
    if (sourcePlayerId === targetPlayerId) {
      throw new BadRequestError('Cannot merge a player into itself', 'SELF_MERGE');
    }
    const source = this.players.get(sourcePlayerId);
    const target = this.players.get(targetPlayerId);
    assertActivePlayer(source, sourcePlayerId);
    assertActivePlayer(target, targetPlayerId);

    const now = this.now();
    let movedExternalIds = 0;
    for (const [key, mapping] of this.externalIds) {
      if (mapping.playerId !== sourcePlayerId) continue;
      this.externalIds.set(key, { ...mapping, playerId: targetPlayerId, updatedAt: now });
      movedExternalIds++;
    }

    let movedAliases = 0;
    for (const [key, alias] of [...this.aliases]) {
      if (alias.playerId !== sourcePlayerId) continue;
      this.aliases.delete(key);
      movedAliases++;

      const targetKey = aliasKey(targetPlayerId, alias.aliasName, alias.sourceName);
      const existing = this.aliases.get(targetKey);
      this.aliases.set(
        targetKey,
        existing
          ? {
              ...existing,
              confidenceScore: Math.max(existing.confidenceScore, alias.confidenceScore),
              lastSeenAt: existing.lastSeenAt > alias.lastSeenAt ? existing.lastSeenAt : alias.lastSeenAt,
            }
          : { ...alias, playerId: targetPlayerId }
      );
    }

    this.unindexFingerprint(source);
    this.players.set(sourcePlayerId, { ...source, archivedAt: now, mergedInto: targetPlayerId, updatedAt: now });

    const merge: PlayerMerge = { sourcePlayerId, targetPlayerId, reason, mergedAt: now };
    this.merges.push(merge);

    logger.info(
      { sourcePlayerId, targetPlayerId, reason, movedExternalIds, movedAliases },
      'Players merged'
    );
    return { ...merge };
  }

  async listExternalIds(playerId: string): Promise<ExternalIdMapping[]> {
    return [...this.externalIds.values()]
      .filter((mapping) => mapping.playerId === playerId)
      .map((mapping) => ({ ...mapping }));
  }

  async listAliases(playerId: string): Promise<Alias[]> {
    return [...this.aliases.values()]
      .filter((alias) => alias.playerId === playerId)
      .map((alias) => ({ ...alias }));
  }

  async listMerges(): Promise<PlayerMerge[]> {
    return this.merges.map((merge) => ({ ...merge }));
  }

  async decayAliasConfidence(options: AliasDecayOptions): Promise<number> {
    validateDecayOptions(options);
    const now = options.now ?? this.now();

    let changed = 0;
    for (const [key, alias] of this.aliases) {
      const next = decayedConfidence(alias, options, now);
      if (next === null) continue;
      this.aliases.set(key, { ...alias, confidenceScore: next, decayedAt: now });
      changed++;
    }
    return changed;
  }

  async snapshot(): Promise<CrosswalkSnapshot> {
    return {
      players: [...this.players.values()].map((player) => ({ ...player })),
      externalIds: [...this.externalIds.values()].map((mapping) => ({ ...mapping })),
      aliases: [...this.aliases.values()].map((alias) => ({ ...alias })),
    };
  }

  async load(snapshot: CrosswalkSnapshot): Promise<LoadResult> {
    const knownIds = new Set([...this.players.keys(), ...snapshot.players.map((player) => player.playerId)]);
    for (const row of [...snapshot.externalIds, ...snapshot.aliases]) {
      if (!knownIds.has(row.playerId)) {
        throw new BadRequestError(`Snapshot references unknown player ${row.playerId}`, 'UNKNOWN_PLAYER');
      }
    }

    const result: LoadResult = { players: 0, externalIds: 0, aliases: 0 };

    for (const player of snapshot.players) {
      if (this.players.has(player.playerId)) continue;
      this.players.set(player.playerId, { ...player });
      if (!player.archivedAt) {
        this.fingerprints.set(playerFingerprint(player.canonicalName, player.position, player.team), player.playerId);
      }
      result.players++;
    }

    for (const mapping of snapshot.externalIds) {
      const key = externalIdKey(mapping.sourceName, mapping.externalId);
      if (this.externalIds.has(key)) continue;
      this.externalIds.set(key, { ...mapping });
      result.externalIds++;
    }

    for (const alias of snapshot.aliases) {
      const key = aliasKey(alias.playerId, alias.aliasName, alias.sourceName);
      if (this.aliases.has(key)) continue;
      this.aliases.set(key, { ...alias });
      result.aliases++;
    }

    logger.info(result, 'Crosswalk snapshot loaded');
    return result;
  }

  async close(): Promise<void> {}

  private isActive(playerId: string): boolean {
    const player = this.players.get(playerId);
    return Boolean(player && !player.archivedAt);
  }

  private followMerges(playerId: string): CanonicalPlayer | null {
    let player = this.players.get(playerId);
    for (let hops = 0; player && player.archivedAt; hops++) {
      if (!player.mergedInto || hops >= MAX_MERGE_HOPS) return null;
      player = this.players.get(player.mergedInto);
    }
    return player ?? null;
  }

  private unindexFingerprint(player: CanonicalPlayer): void {
    const fingerprint = playerFingerprint(player.canonicalName, player.position, player.team);
    if (this.fingerprints.get(fingerprint) === player.playerId) {
      this.fingerprints.delete(fingerprint);
    }
  }
}
