/**
 * Picks at most one candidate from a scored pool, or reports why it could not.
 *
 * Ties near the top are broken by team and then position; anything still
 * tied is ambiguous. A candidate below the acceptance threshold is never
 * returned.
 */

import type { SourceRecord } from '../../types/players';
import { normalizePosition, normalizeTeam } from './normalize';
import type { Disambiguation, ResolutionThresholds, ScoredCandidate } from './types';
import { DEFAULT_THRESHOLDS } from './types';

type Attribute = 'team' | 'position';

function attributeOf(value: string | null | undefined, attribute: Attribute): string | null {
  return attribute === 'team' ? normalizeTeam(value) : normalizePosition(value);
}

function accept(candidate: ScoredCandidate, reason: string): Disambiguation {
  return { status: 'matched', accepted: candidate, contenders: [candidate], reason };
}

/**
 * Keep candidates whose attribute equals the record's. An empty result means
 * the filter does not apply and the pool is returned unchanged.
 */
function narrowBy(
  pool: ScoredCandidate[],
  recordValue: string | null | undefined,
  attribute: Attribute
): ScoredCandidate[] {
  const wanted = attributeOf(recordValue, attribute);
  if (!wanted) return pool;
  const survivors = pool.filter((candidate) => attributeOf(candidate.player[attribute], attribute) === wanted);
  return survivors.length > 0 ? survivors : pool;
}

export function rankCandidates(candidates: readonly ScoredCandidate[]): ScoredCandidate[] {
  // Array.prototype.sort is stable, so equal scores keep input order.
  return [...candidates].sort((a, b) => b.score - a.score);
}

export function disambiguate(
  record: Pick<SourceRecord, 'team' | 'position'>,
  candidates: readonly ScoredCandidate[],
  thresholds: ResolutionThresholds = DEFAULT_THRESHOLDS
): Disambiguation {
  const ranked = rankCandidates(candidates);
  const top = ranked[0];

  if (!top) {
    return { status: 'unmatched', accepted: null, contenders: [], reason: 'No candidates' };
  }

  if (top.score < thresholds.accept) {
    return {
      status: 'unmatched',
      accepted: null,
      contenders: [],
      reason: `Best score ${top.score.toFixed(3)} below threshold ${thresholds.accept}`,
    };
  }

  const contenders = ranked.filter(
    (candidate) => candidate.score >= thresholds.accept && candidate.score >= top.score - thresholds.tieBand
  );
  if (contenders.length === 1) {
    return accept(top, `Single candidate above threshold (${top.score.toFixed(3)})`);
  }

  const byTeam = narrowBy(contenders, record.team, 'team');
  if (byTeam.length === 1) {
    return accept(byTeam[0], `${contenders.length} tied candidates, resolved by team`);
  }

  const byPosition = narrowBy(byTeam, record.position, 'position');
  if (byPosition.length === 1) {
    return accept(byPosition[0], `${contenders.length} tied candidates, resolved by position`);
  }

  return {
    status: 'ambiguous',
    accepted: null,
    contenders: byPosition,
    reason: `${byPosition.length} candidates within ${thresholds.tieBand} of top score ${top.score.toFixed(3)}`,
  };
}
