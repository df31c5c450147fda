/**
 * Domain types for canonical players and their cross-source mappings.
 */

export interface CanonicalPlayer {
  playerId: string;
  canonicalName: string;
  firstName: string | null;
  lastName: string | null;
  position: string | null;
  team: string | null;
  archivedAt: Date | null;
  mergedInto: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface CreatePlayerInput {
  canonicalName: string;
  firstName?: string | null;
  lastName?: string | null;
  position?: string | null;
  team?: string | null;
}

export interface PlayerObservation {
  team?: string | null;
  position?: string | null;
}

export interface ExternalIdMapping {
  sourceName: string;
  externalId: string;
  playerId: string;
  externalName: string | null;
  confidenceScore: number;
  createdAt: Date;
  updatedAt: Date;
}

export interface Alias {
  playerId: string;
  /** Normalized form; see normalizeName. */
  aliasName: string;
  sourceName: string;
  confidenceScore: number;
  lastSeenAt: Date;
  decayedAt: Date | null;
  createdAt: Date;
}

export interface PlayerMerge {
  sourcePlayerId: string;
  targetPlayerId: string;
  reason: string;
  mergedAt: Date;
}

/** One row from a provider feed, already adapted to the common shape. */
export interface SourceRecord {
  source: string;
  name: string;
  team?: string | null;
  position?: string | null;
  externalId?: string | null;
}

export type MatchMethod = 'exact_crosswalk' | 'alias_lookup' | 'fuzzy_match';

export type MatchStatus = 'matched' | 'unmatched' | 'ambiguous';

export interface MatchCandidate {
  playerId: string;
  canonicalName: string;
  team: string | null;
  position: string | null;
  score: number;
}

export interface MatchResult {
  sourceRecord: SourceRecord;
  resolvedPlayerId: string | null;
  method: MatchMethod | null;
  similarityScore: number;
  status: MatchStatus;
  reason?: string;
  /** Tied candidates, present on ambiguous results. */
  candidates?: MatchCandidate[];
  /** Resolved player with its current attributes, present on matched results. */
  player?: CanonicalPlayer;
}

export interface CrosswalkSnapshot {
  players: CanonicalPlayer[];
  externalIds: ExternalIdMapping[];
  aliases: Alias[];
}
