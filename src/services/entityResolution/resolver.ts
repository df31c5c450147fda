/**
 * Entity Resolution Orchestrator
 *
 * Resolves provider records onto canonical players:
 * 1. Exact crosswalk lookup on (source, external id)
 * 2. Alias lookup on (source, normalized name)
 * 3. Fuzzy scan over active players, then disambiguation
 *
 * Fuzzy matches are written back as aliases so the next run of the same
 * record resolves deterministically. Alias hits that are used are touched so
 * aliases in active use do not decay.
 */

import type { CanonicalPlayer, MatchMethod, MatchResult, SourceRecord } from '../../types/players';
import { logger } from '../../utils/logger';
import { parseSourceRecord } from '../../utils/validation';
import type { CrosswalkStore } from '../crosswalk/store.interface';
import { canReachThreshold, createBlockingStats } from './blocking';
import { disambiguate } from './disambiguation';
import { normalizeName, normalizePosition, normalizeTeam } from './normalize';
import { similarityOfNormalized } from './scoring';
import type { Disambiguation, ResolutionConfig, ScoredCandidate } from './types';
import { DEFAULT_CONFIG } from './types';

/** State carried between the steps of one resolution. */
interface ResolutionContext {
  /** Player of a single alias hit skipped for naming another team. */
  staleAliasPlayerId: string | null;
}

export interface BatchOptions {
  /** Independent records resolved at once. Defaults to 1. */
  concurrency?: number;
}

function matched(record: SourceRecord, player: CanonicalPlayer, method: MatchMethod, score: number): MatchResult {
  return {
    sourceRecord: record,
    resolvedPlayerId: player.playerId,
    method,
    similarityScore: score,
    status: 'matched',
    player,
  };
}

function unmatched(record: SourceRecord, method: MatchMethod | null, score: number, reason: string): MatchResult {
  return {
    sourceRecord: record,
    resolvedPlayerId: null,
    method,
    similarityScore: score,
    status: 'unmatched',
    reason,
  };
}

function ambiguous(record: SourceRecord, method: MatchMethod, decision: Disambiguation): MatchResult {
  return {
    sourceRecord: record,
    resolvedPlayerId: null,
    method,
    similarityScore: decision.contenders[0]?.score ?? 0,
    status: 'ambiguous',
    reason: decision.reason,
    candidates: decision.contenders.map(({ player, score }) => ({
      playerId: player.playerId,
      canonicalName: player.canonicalName,
      team: player.team,
      position: player.position,
      score,
    })),
  };
}

/** Records sharing a key must not resolve concurrently. */
export function resolutionKey(record: SourceRecord): string {
  if (record.externalId) return `${record.source}\u0000id\u0000${record.externalId}`;
  return `${record.source}\u0000name\u0000${normalizeName(record.name)}`;
}

function teamsConflict(record: SourceRecord, player: CanonicalPlayer): boolean {
  const recordTeam = normalizeTeam(record.team);
  const playerTeam = normalizeTeam(player.team);
  return Boolean(recordTeam && playerTeam && recordTeam !== playerTeam);
}

export class EntityResolver {
  readonly config: ResolutionConfig;

  constructor(
    private readonly store: CrosswalkStore,
    config: Partial<ResolutionConfig> = {}
  ) {
    this.config = {
      ...DEFAULT_CONFIG,
      ...config,
      thresholds: { ...DEFAULT_CONFIG.thresholds, ...config.thresholds },
    };
  }

  /**
   * Resolve one record. Throws InvalidRecordError for structurally invalid
   * input; every content problem comes back as an unmatched result.
   */
  async resolve(input: unknown): Promise<MatchResult> {
    return this.resolveRecord(parseSourceRecord(input));
  }

  /**
   * Resolve a slate of records. Output order follows input order. Every record
   * is validated before any is resolved, so a structural error aborts the
   * batch without partial writes.
   */
  async resolveBatch(inputs: readonly unknown[], options: BatchOptions = {}): Promise<MatchResult[]> {
    const records = inputs.map((input) => parseSourceRecord(input));
    const concurrency = Math.max(1, Math.floor(options.concurrency ?? 1));

    const groups = new Map<string, number[]>();
    records.forEach((record, index) => {
      const key = resolutionKey(record);
      const group = groups.get(key);
      if (group) {
        group.push(index);
      } else {
        groups.set(key, [index]);
      }
    });

    logger.info(
      { records: records.length, keys: groups.size, concurrency },
      'Entity resolution: Starting batch'
    );

    const results = new Array<MatchResult>(records.length);
    const queue = [...groups.values()];
    let next = 0;
    let failed = false;

    const worker = async (): Promise<void> => {
      while (!failed && next < queue.length) {
        const group = queue[next++];
        for (const index of group) {
          if (failed) return;
          try {
            results[index] = await this.resolveRecord(records[index]);
          } catch (error) {
            failed = true;
            throw error;
          }
        }
      }
    };

    await Promise.all(Array.from({ length: Math.min(concurrency, queue.length) }, () => worker()));

    const counts = { matched: 0, unmatched: 0, ambiguous: 0 };
    for (const result of results) counts[result.status]++;
    logger.info({ records: records.length, ...counts }, 'Entity resolution: Batch complete');

    return results;
  }

  private async resolveRecord(record: SourceRecord): Promise<MatchResult> {
    const normalizedName = normalizeName(record.name);

    if (!normalizedName && !record.externalId) {
      return unmatched(record, null, 0, 'Record has no usable name and no external id');
    }

    const context: ResolutionContext = { staleAliasPlayerId: null };
    const lookups =
      this.config.lookupPreference === 'alias'
        ? [() => this.matchAlias(record, normalizedName, context), () => this.matchExternalId(record)]
        : [() => this.matchExternalId(record), () => this.matchAlias(record, normalizedName, context)];

    for (const lookup of lookups) {
      const result = await lookup();
      if (result) return result;
    }

    return this.matchFuzzy(record, normalizedName, context);
  }

  private async matchExternalId(record: SourceRecord): Promise<MatchResult | null> {
    if (!record.externalId) return null;

    const hit = await this.store.lookupByExternalId(record.source, record.externalId);
    if (!hit) return null;

    const player = this.config.refreshOnExactMatch ? await this.refreshPlayer(hit.player, record) : hit.player;
    return matched(record, player, 'exact_crosswalk', hit.mapping.confidenceScore);
  }

  private async matchAlias(
    record: SourceRecord,
    normalizedName: string,
    context: ResolutionContext
  ): Promise<MatchResult | null> {
    if (!normalizedName) return null;

    const hits = (await this.store.lookupAliases(record.source, normalizedName)).filter(
      (hit) => hit.confidenceScore >= this.config.aliasMinConfidence
    );
    if (hits.length === 0) return null;

    const players: CanonicalPlayer[] = [];
    for (const hit of hits) {
      const player = await this.store.getPlayer(hit.playerId);
      if (player && !player.archivedAt) players.push(player);
    }

    if (players.length === 1) {
      const [only] = players;
      if (teamsConflict(record, only)) {
        logger.debug(
          { source: record.source, name: normalizedName, playerId: only.playerId, team: record.team },
          'Alias hit on a different team, falling through to fuzzy match'
        );
        context.staleAliasPlayerId = only.playerId;
        return null;
      }
      await this.store.touchAlias(only.playerId, normalizedName, record.source);
      const confidence = hits.find((hit) => hit.playerId === only.playerId)?.confidenceScore ?? 0;
      return matched(record, only, 'alias_lookup', confidence);
    }
    if (players.length === 0) return null;

    // Several players share the alias: compare names, not alias confidence.
    const candidates: ScoredCandidate[] = players.map((player) => ({
      player,
      score: similarityOfNormalized(normalizedName, normalizeName(player.canonicalName)),
    }));
    const decision = disambiguate(record, candidates, this.config.thresholds);
    if (decision.status === 'matched' && decision.accepted) {
      const { player, score } = decision.accepted;
      await this.store.touchAlias(player.playerId, normalizedName, record.source);
      return matched(record, player, 'alias_lookup', score);
    }
    if (decision.status === 'ambiguous') {
      return ambiguous(record, 'alias_lookup', decision);
    }
    return null;
  }

  private async matchFuzzy(
    record: SourceRecord,
    normalizedName: string,
    context: ResolutionContext
  ): Promise<MatchResult> {
    if (!normalizedName) {
      return unmatched(record, null, 0, 'Name is empty after normalization');
    }

    const threshold = this.config.thresholds.accept;
    const stats = createBlockingStats();
    const candidates: ScoredCandidate[] = [];

    for await (const player of this.store.allPlayers()) {
      stats.considered++;
      const candidateName = normalizeName(player.canonicalName);
      if (this.config.useBlocking && !canReachThreshold(normalizedName, candidateName, threshold)) {
        stats.blocked++;
        continue;
      }
      stats.scored++;
      candidates.push({ player, score: similarityOfNormalized(normalizedName, candidateName) });
    }

    logger.debug({ source: record.source, name: normalizedName, ...stats }, 'Entity resolution: Fuzzy scan');

    const decision = disambiguate(record, candidates, this.config.thresholds);

    if (decision.status === 'matched' && decision.accepted) {
      const { score } = decision.accepted;
      let { player } = decision.accepted;
      if (player.playerId === context.staleAliasPlayerId) {
        // Same player by alias and by name on a new team: a team change.
        player = await this.refreshPlayer(player, record);
      }
      await this.store.upsertAlias(player.playerId, normalizedName, record.source, score);
      return matched(record, player, 'fuzzy_match', score);
    }

    if (decision.status === 'ambiguous') {
      return ambiguous(record, 'fuzzy_match', decision);
    }

    const best = candidates.reduce((max, candidate) => Math.max(max, candidate.score), 0);
    return unmatched(record, 'fuzzy_match', best, decision.reason);
  }

  private async refreshPlayer(player: CanonicalPlayer, record: SourceRecord): Promise<CanonicalPlayer> {
    const team = normalizeTeam(record.team);
    const position = normalizePosition(record.position);
    const teamChanged = team !== null && team !== player.team;
    const positionChanged = position !== null && position !== player.position;
    if (!teamChanged && !positionChanged) return player;

    logger.info(
      { playerId: player.playerId, from: { team: player.team, position: player.position }, to: { team, position } },
      'Player attributes refreshed from crosswalk hit'
    );
    return this.store.updatePlayer(player.playerId, { team, position });
  }
}
