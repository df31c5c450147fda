/**
 * Write rules shared by every store implementation.
 */

import type { Alias, ExternalIdMapping } from '../../types/players';
import { BadRequestError, ConflictError } from '../../utils/errors';
import { getDaysBetween } from '../../utils/softDelete';
import type { AliasDecayOptions } from './store.interface';

export type ExternalIdWrite = 'insert' | 'refresh' | 'reassign';

/**
 * Decide how an external id write applies on top of the current mapping.
 * Throws when it would overwrite a different player's mapping without
 * strictly higher confidence.
 */
export function planExternalIdWrite(
  existing: Pick<ExternalIdMapping, 'sourceName' | 'externalId' | 'playerId' | 'confidenceScore'> | null,
  playerId: string,
  confidence: number
): ExternalIdWrite {
  if (!existing) return 'insert';
  if (existing.playerId === playerId) return 'refresh';

  if (existing.confidenceScore >= confidence) {
    throw new ConflictError(
      `External id ${existing.sourceName}:${existing.externalId} already maps to player ${existing.playerId}`,
      'EXTERNAL_ID_CONFLICT',
      {
        sourceName: existing.sourceName,
        externalId: existing.externalId,
        existingPlayerId: existing.playerId,
        existingConfidence: existing.confidenceScore,
        attemptedPlayerId: playerId,
        attemptedConfidence: confidence,
      }
    );
  }

  return 'reassign';
}

export function validateDecayOptions(options: AliasDecayOptions): void {
  if (!Number.isFinite(options.halfLifeDays) || options.halfLifeDays <= 0) {
    throw new BadRequestError(`halfLifeDays must be positive, got ${options.halfLifeDays}`, 'INVALID_DECAY_OPTIONS');
  }
  if (!Number.isFinite(options.floor) || options.floor < 0 || options.floor > 1) {
    throw new BadRequestError(`floor must be between 0 and 1, got ${options.floor}`, 'INVALID_DECAY_OPTIONS');
  }
}

/**
 * Confidence an alias should hold at `now`, or null when it stays as is.
 * Age is counted from the later of the last sighting and the last decay, so
 * repeated runs compound instead of re-applying the full age.
 */
export function decayedConfidence(
  alias: Pick<Alias, 'confidenceScore' | 'lastSeenAt' | 'decayedAt'>,
  options: AliasDecayOptions,
  now: Date
): number | null {
  const current = alias.confidenceScore;
  if (current >= 1 || current <= options.floor) return null;

  const since =
    alias.decayedAt && alias.decayedAt.getTime() > alias.lastSeenAt.getTime() ? alias.decayedAt : alias.lastSeenAt;
  const ageDays = getDaysBetween(since, now);
  if (ageDays <= 0) return null;

  const next = Math.max(options.floor, current * 0.5 ** (ageDays / options.halfLifeDays));
  return next < current ? next : null;
}
