/**
 * Entity Resolution Service
 *
 * Deterministic-first, fuzzy-fallback matching of provider records onto
 * canonical players.
 */

// Types
export type {
  Disambiguation,
  LookupPreference,
  ResolutionConfig,
  ResolutionThresholds,
  ScoredCandidate,
} from './types';

export { DEFAULT_CONFIG, DEFAULT_THRESHOLDS } from './types';

// Main resolver
export { EntityResolver, resolutionKey, type BatchOptions } from './resolver';

// Normalization
export {
  TEAM_ALIASES,
  abbreviatedForm,
  normalizeName,
  normalizePosition,
  normalizeTeam,
  playerFingerprint,
  splitDisplayName,
} from './normalize';

// Scoring
export {
  countMatchingCharacters,
  hasContainment,
  sequenceRatio,
  similarity,
  similarityOfNormalized,
} from './scoring';

// Disambiguation
export { disambiguate, rankCandidates } from './disambiguation';

// Blocking
export {
  canReachThreshold,
  createBlockingStats,
  lengthRatioBound,
  quickRatioBound,
  type BlockingStats,
} from './blocking';
