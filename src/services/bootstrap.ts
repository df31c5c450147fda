import type { SourceRecord } from '../types/players';
import { logger } from '../utils/logger';
import { parseSourceRecord, validateConfidence } from '../utils/validation';
import type { CrosswalkStore } from './crosswalk/store.interface';
import { normalizeName } from './entityResolution/normalize';

export interface SeedOptions {
  /** Confidence of the external ids written. 1.0 marks a verified provider export. */
  confidence?: number;
}

export interface SeedResult {
  created: number;
  linked: number;
  skipped: number;
}

/**
 * Seed the crosswalk from a provider export. Each record without a crosswalk
 * entry gets a canonical player (reused when one with the same fingerprint
 * exists), its external id and its name as an alias.
 */
export async function seedFromSource(
  store: CrosswalkStore,
  inputs: readonly unknown[],
  options: SeedOptions = {}
): Promise<SeedResult> {
  const confidence = options.confidence ?? 1.0;
  validateConfidence(confidence);

  const records: SourceRecord[] = inputs.map((input) => parseSourceRecord(input));
  const result: SeedResult = { created: 0, linked: 0, skipped: 0 };

  for (const record of records) {
    if (!record.externalId || !normalizeName(record.name)) {
      result.skipped++;
      continue;
    }

    const existing = await store.lookupByExternalId(record.source, record.externalId);
    if (existing) {
      result.skipped++;
      continue;
    }

    const { player, created } = await store.createPlayer({
      canonicalName: record.name,
      position: record.position,
      team: record.team,
    });
    await store.upsertExternalId(record.source, record.externalId, player.playerId, record.name, confidence);
    await store.upsertAlias(player.playerId, record.name, record.source, confidence);

    if (created) {
      result.created++;
    } else {
      result.linked++;
    }
  }

  logger.info({ records: records.length, ...result }, 'Crosswalk seeded from source');
  return result;
}
