import type { ResolutionConfig } from '../services/entityResolution/types';
import { env } from './env';

// Similarity
const CONTAINMENT_BONUS = 0.1;

// Store
const ALL_PLAYERS_PAGE_SIZE = 500;
const MAX_MERGE_HOPS = 16;

// Review
const DEFAULT_SUGGESTION_LIMIT = 5;
const DEFAULT_SUGGESTION_MIN_SCORE = 0.3;

// Alias decay
const ALIAS_DECAY_SCHEDULE = '30 3 * * *';

// Well-known provider names
export const SOURCES = {
  salary: 'draftkings',
  stats: 'nfl_api',
} as const;

export function resolutionConfigFromEnv(): Partial<ResolutionConfig> {
  return {
    thresholds: {
      accept: env.MATCH_ACCEPT_THRESHOLD,
      tieBand: env.MATCH_TIE_BAND,
    },
    aliasMinConfidence: env.ALIAS_MIN_CONFIDENCE,
    lookupPreference: env.LOOKUP_PREFERENCE,
  };
}

export {
  CONTAINMENT_BONUS,
  ALL_PLAYERS_PAGE_SIZE,
  MAX_MERGE_HOPS,
  DEFAULT_SUGGESTION_LIMIT,
  DEFAULT_SUGGESTION_MIN_SCORE,
  ALIAS_DECAY_SCHEDULE,
};
