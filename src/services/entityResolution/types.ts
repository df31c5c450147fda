/**
 * Entity Resolution Types
 *
 * Deterministic-first, fuzzy-fallback matching of provider records onto
 * canonical players.
 */

import type { CanonicalPlayer, MatchStatus } from '../../types/players';

// ========== Thresholds ==========

export interface ResolutionThresholds {
  /** Minimum score a candidate needs to be accepted. */
  accept: number;
  /** Candidates within this distance of the top score are treated as tied. */
  tieBand: number;
}

export const DEFAULT_THRESHOLDS: ResolutionThresholds = {
  accept: 0.8,
  tieBand: 0.05,
};

// ========== Resolution Config ==========

/** Which deterministic lookup runs first when a record carries an external id. */
export type LookupPreference = 'crosswalk' | 'alias';

export interface ResolutionConfig {
  thresholds: ResolutionThresholds;
  /** Aliases stored below this confidence are ignored by alias lookup. */
  aliasMinConfidence: number;
  lookupPreference: LookupPreference;
  /** Update a player's team and position from records that hit the crosswalk. */
  refreshOnExactMatch: boolean;
  /** Skip fuzzy candidates whose score bound cannot reach the threshold. */
  useBlocking: boolean;
}

export const DEFAULT_CONFIG: ResolutionConfig = {
  thresholds: DEFAULT_THRESHOLDS,
  aliasMinConfidence: 0.5,
  lookupPreference: 'crosswalk',
  refreshOnExactMatch: true,
  useBlocking: true,
};

// ========== Candidates ==========

export interface ScoredCandidate {
  player: CanonicalPlayer;
  score: number;
}

export interface Disambiguation {
  status: MatchStatus;
  accepted: ScoredCandidate | null;
  /** Candidates still tied when the status is ambiguous. */
  contenders: ScoredCandidate[];
  reason: string;
}
