/**
 * Crosswalk tables as CSV text, one file per table.
 */

import { z } from 'zod';
import type { Alias, CanonicalPlayer, CrosswalkSnapshot, ExternalIdMapping } from '../../types/players';
import { type CsvRowError, parseCsv, toCsv } from '../../utils/csv';
import { BadRequestError } from '../../utils/errors';
import { normalizeName, normalizePosition, normalizeTeam } from '../entityResolution/normalize';

export const SNAPSHOT_FILES = {
  players: 'players.csv',
  externalIds: 'external_ids.csv',
  aliases: 'aliases.csv',
} as const;

export type SnapshotTable = keyof typeof SNAPSHOT_FILES;
export type SnapshotCsv = Record<SnapshotTable, string>;

const PLAYER_COLUMNS = {
  player_id: 'playerId',
  canonical_name: 'canonicalName',
  first_name: 'firstName',
  last_name: 'lastName',
  position: 'position',
  team: 'team',
  merged_into: 'mergedInto',
  created_at: 'createdAt',
  updated_at: 'updatedAt',
  archived_at: 'archivedAt',
} as const;

const EXTERNAL_ID_COLUMNS = {
  source_name: 'sourceName',
  external_id: 'externalId',
  player_id: 'playerId',
  external_name: 'externalName',
  confidence_score: 'confidenceScore',
  created_at: 'createdAt',
  updated_at: 'updatedAt',
} as const;

const ALIAS_COLUMNS = {
  player_id: 'playerId',
  alias_name: 'aliasName',
  source_name: 'sourceName',
  confidence_score: 'confidenceScore',
  last_seen_at: 'lastSeenAt',
  decayed_at: 'decayedAt',
  created_at: 'createdAt',
} as const;

const requiredText = z.string().trim().min(1, 'is required');

const nullableText = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : null;
  });

const timestamp = z.string().trim().min(1, 'is required').pipe(z.coerce.date());

const nullableTimestamp = nullableText.pipe(z.coerce.date().nullable());

const confidence = z.string().trim().min(1, 'is required').pipe(z.coerce.number().min(0).max(1));

const PlayerRowSchema: z.ZodType<CanonicalPlayer, z.ZodTypeDef, unknown> = z.object({
  playerId: z.string().trim().uuid(),
  canonicalName: requiredText,
  firstName: nullableText,
  lastName: nullableText,
  position: nullableText.transform((value) => normalizePosition(value)),
  team: nullableText.transform((value) => normalizeTeam(value)),
  mergedInto: nullableText.pipe(z.string().uuid().nullable()),
  createdAt: timestamp,
  updatedAt: timestamp,
  archivedAt: nullableTimestamp,
});

const ExternalIdRowSchema: z.ZodType<ExternalIdMapping, z.ZodTypeDef, unknown> = z.object({
  sourceName: requiredText,
  externalId: requiredText,
  playerId: z.string().trim().uuid(),
  externalName: nullableText,
  confidenceScore: confidence,
  createdAt: timestamp,
  updatedAt: timestamp,
});

const AliasRowSchema: z.ZodType<Alias, z.ZodTypeDef, unknown> = z.object({
  playerId: z.string().trim().uuid(),
  aliasName: z
    .string()
    .transform((value) => normalizeName(value))
    .pipe(z.string().min(1, 'is empty after normalization')),
  sourceName: requiredText,
  confidenceScore: confidence,
  lastSeenAt: timestamp,
  decayedAt: nullableTimestamp,
  createdAt: timestamp,
});

function columnsOf(mapping: Record<string, string>): string[] {
  return Object.keys(mapping);
}

function toRow(mapping: Record<string, string>, value: object): Record<string, string | number | Date | null> {
  const source = new Map(Object.entries(value));
  const row: Record<string, string | number | Date | null> = {};
  for (const [column, key] of Object.entries(mapping)) {
    const cell: unknown = source.get(key);
    row[column] = typeof cell === 'string' || typeof cell === 'number' || cell instanceof Date ? cell : null;
  }
  return row;
}

export function exportSnapshotCsv(snapshot: CrosswalkSnapshot): SnapshotCsv {
  return {
    players: toCsv(
      columnsOf(PLAYER_COLUMNS),
      snapshot.players.map((player) => toRow(PLAYER_COLUMNS, player))
    ),
    externalIds: toCsv(
      columnsOf(EXTERNAL_ID_COLUMNS),
      snapshot.externalIds.map((mapping) => toRow(EXTERNAL_ID_COLUMNS, mapping))
    ),
    aliases: toCsv(
      columnsOf(ALIAS_COLUMNS),
      snapshot.aliases.map((alias) => toRow(ALIAS_COLUMNS, alias))
    ),
  };
}

function describeErrors(table: SnapshotTable, errors: CsvRowError[]): string {
  return errors.map((error) => `${SNAPSHOT_FILES[table]} row ${error.row}: ${error.message}`).join('; ');
}

/**
 * Parse the three snapshot tables. Any invalid row fails the whole import.
 */
export function parseSnapshotCsv(tables: SnapshotCsv): CrosswalkSnapshot {
  const players = parseCsv(tables.players, PlayerRowSchema, PLAYER_COLUMNS);
  const externalIds = parseCsv(tables.externalIds, ExternalIdRowSchema, EXTERNAL_ID_COLUMNS);
  const aliases = parseCsv(tables.aliases, AliasRowSchema, ALIAS_COLUMNS);

  const problems = [
    describeErrors('players', players.errors),
    describeErrors('externalIds', externalIds.errors),
    describeErrors('aliases', aliases.errors),
  ].filter(Boolean);

  if (problems.length > 0) {
    throw new BadRequestError(`Invalid crosswalk snapshot: ${problems.join('; ')}`, 'INVALID_SNAPSHOT');
  }

  return { players: players.rows, externalIds: externalIds.rows, aliases: aliases.rows };
}
