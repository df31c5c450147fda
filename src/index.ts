/**
 * Player crosswalk: canonical player identities across DFS salary and stats
 * providers.
 */

export * from './types/players';
export * from './services/entityResolution';
export * from './services/crosswalk';
export * from './services/sources';
export { buildMatchReport, summarizeReport, type MatchReport } from './services/report/matchReport';
export {
  ReviewService,
  type ConfirmResult,
  type SuggestOptions,
} from './services/review/review.service';
export { seedFromSource, type SeedOptions, type SeedResult } from './services/bootstrap';
export { runAliasDecay, startAliasDecayJob, type AliasDecaySettings } from './jobs/decayAliasConfidence';
export { resolutionConfigFromEnv } from './config/constants';
export { parseCsv, toCsv, type CsvParseReport, type CsvRowError } from './utils/csv';
export { AppError, BadRequestError, ConflictError, InvalidRecordError, NotFoundError } from './utils/errors';
