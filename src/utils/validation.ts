import { z } from 'zod';
import type { CanonicalPlayer, SourceRecord } from '../types/players';
import { BadRequestError, InvalidRecordError, NotFoundError } from './errors';

const optionalText = z
  .string()
  .nullish()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : null;
  });

export const SourceRecordSchema = z.object({
  source: z.string().trim().min(1, 'source is required'),
  name: z
    .string()
    .nullish()
    .transform((value) => value ?? ''),
  team: optionalText,
  position: optionalText,
  externalId: z
    .union([z.string(), z.number()])
    .nullish()
    .transform((value) => {
      if (value === null || value === undefined) return null;
      const text = String(value).trim();
      return text === '' ? null : text;
    }),
});

/**
 * Validate the shape of an incoming record. Content problems (an empty or
 * garbage name) are left for the resolver to report as unmatched.
 */
export function parseSourceRecord(value: unknown): SourceRecord {
  const parsed = SourceRecordSchema.safeParse(value);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || 'record'}: ${issue.message}`);
    throw new InvalidRecordError(`Invalid source record: ${issues.join('; ')}`, issues);
  }
  return parsed.data;
}

export function validateConfidence(confidence: number): void {
  if (!Number.isFinite(confidence) || confidence < 0 || confidence > 1) {
    throw new BadRequestError(`Confidence must be between 0 and 1, got ${confidence}`, 'INVALID_CONFIDENCE');
  }
}

export function assertActivePlayer(
  player: CanonicalPlayer | null | undefined,
  playerId: string
): asserts player is CanonicalPlayer {
  if (!player) {
    throw new NotFoundError(`Player ${playerId} not found`, 'PLAYER_NOT_FOUND');
  }

  if (player.archivedAt) {
    const suffix = player.mergedInto ? ` (merged into ${player.mergedInto})` : '';
    throw new BadRequestError(`Player ${playerId} is archived${suffix}`, 'PLAYER_ARCHIVED');
  }
}
