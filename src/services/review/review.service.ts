import { distance } from 'fastest-levenshtein';
import { DEFAULT_SUGGESTION_LIMIT, DEFAULT_SUGGESTION_MIN_SCORE } from '../../config/constants';
import type { CanonicalPlayer, MatchCandidate, PlayerMerge } from '../../types/players';
import { BadRequestError } from '../../utils/errors';
import { logger } from '../../utils/logger';
import { assertActivePlayer, parseSourceRecord, validateConfidence } from '../../utils/validation';
import type { CrosswalkStore } from '../crosswalk/store.interface';
import { normalizeName, normalizePosition, normalizeTeam } from '../entityResolution/normalize';
import { similarityOfNormalized } from '../entityResolution/scoring';

export interface SuggestOptions {
  limit?: number;
  minScore?: number;
}

export interface ConfirmResult {
  player: CanonicalPlayer;
  externalIdWritten: boolean;
  aliasWritten: boolean;
}

interface RankedSuggestion extends MatchCandidate {
  editDistance: number;
}

function narrow(
  pool: CanonicalPlayer[],
  wanted: string | null,
  valueOf: (player: CanonicalPlayer) => string | null
): CanonicalPlayer[] {
  if (!wanted) return pool;
  const filtered = pool.filter((player) => valueOf(player) === wanted);
  return filtered.length > 0 ? filtered : pool;
}

/**
 * Manual review of unmatched and ambiguous records: candidate suggestions,
 * confirmations, new players and merges.
 */
export class ReviewService {
  constructor(private readonly store: CrosswalkStore) {}

  async suggestCandidates(input: unknown, options: SuggestOptions = {}): Promise<MatchCandidate[]> {
    const record = parseSourceRecord(input);
    const limit = options.limit ?? DEFAULT_SUGGESTION_LIMIT;
    const minScore = options.minScore ?? DEFAULT_SUGGESTION_MIN_SCORE;
    const name = normalizeName(record.name);
    if (!name || limit <= 0) return [];

    let pool: CanonicalPlayer[] = [];
    for await (const player of this.store.allPlayers()) {
      pool.push(player);
    }
    pool = narrow(pool, normalizePosition(record.position), (player) => normalizePosition(player.position));
    pool = narrow(pool, normalizeTeam(record.team), (player) => normalizeTeam(player.team));

    const ranked: RankedSuggestion[] = [];
    for (const player of pool) {
      const candidateName = normalizeName(player.canonicalName);
      const score = similarityOfNormalized(name, candidateName);
      if (score <= minScore) continue;
      ranked.push({
        playerId: player.playerId,
        canonicalName: player.canonicalName,
        team: player.team,
        position: player.position,
        score,
        editDistance: distance(name, candidateName),
      });
    }

    ranked.sort((a, b) => b.score - a.score || a.editDistance - b.editDistance);
    return ranked.slice(0, limit).map(({ editDistance: _editDistance, ...candidate }) => candidate);
  }

  /**
   * Record a reviewer's decision: the crosswalk row when the record carries an
   * external id, and the record's name as an alias.
   */
  async confirmMatch(input: unknown, playerId: string, confidence: number = 1.0): Promise<ConfirmResult> {
    const record = parseSourceRecord(input);
    validateConfidence(confidence);
    const player = await this.store.getPlayer(playerId);
    assertActivePlayer(player, playerId);

    let externalIdWritten = false;
    if (record.externalId) {
      await this.store.upsertExternalId(record.source, record.externalId, playerId, record.name || null, confidence);
      externalIdWritten = true;
    }

    let aliasWritten = false;
    if (normalizeName(record.name)) {
      await this.store.upsertAlias(playerId, record.name, record.source, confidence);
      aliasWritten = true;
    }

    logger.info(
      { source: record.source, externalId: record.externalId, playerId, confidence },
      'Match confirmed'
    );
    return { player, externalIdWritten, aliasWritten };
  }

  async createPlayerFromRecord(input: unknown, confidence: number = 1.0): Promise<ConfirmResult> {
    const record = parseSourceRecord(input);
    if (!normalizeName(record.name)) {
      throw new BadRequestError('Cannot create a player from a record without a usable name', 'EMPTY_NAME');
    }

    const { player, created } = await this.store.createPlayer({
      canonicalName: record.name,
      position: record.position,
      team: record.team,
    });
    logger.info({ playerId: player.playerId, created, source: record.source }, 'Player created from record');

    return this.confirmMatch(record, player.playerId, confidence);
  }

  async mergePlayers(sourcePlayerId: string, targetPlayerId: string, reason: string): Promise<PlayerMerge> {
    if (!reason.trim()) {
      throw new BadRequestError('A merge needs a reason', 'MERGE_REASON_REQUIRED');
    }
    return this.store.mergePlayers(sourcePlayerId, targetPlayerId, reason.trim());
  }
}
