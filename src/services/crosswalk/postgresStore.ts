import { and, asc, desc, eq, gt, inArray, isNull, lt } from 'drizzle-orm';
import { ALL_PLAYERS_PAGE_SIZE, MAX_MERGE_HOPS } from '../../config/constants';
import { type Database, type Executor, closeDatabase, getDatabase } from '../../config/database';
import { aliases, externalIds, playerMerges, players } from '../../models/schema';
import type {
  Alias,
  CanonicalPlayer,
  CreatePlayerInput,
  CrosswalkSnapshot,
  ExternalIdMapping,
  PlayerMerge,
  PlayerObservation,
} from '../../types/players';
import { BadRequestError } from '../../utils/errors';
import { logger } from '../../utils/logger';
import { buildActiveRecordsFilter, buildArchiveUpdate } from '../../utils/softDelete';
import { assertActivePlayer, validateConfidence } from '../../utils/validation';
import {
  normalizeName,
  normalizePosition,
  normalizeTeam,
  playerFingerprint,
  splitDisplayName,
} from '../entityResolution/normalize';
import { decayedConfidence, planExternalIdWrite, validateDecayOptions } from './rules';
import type {
  AliasDecayOptions,
  AliasHit,
  CreatePlayerResult,
  CrosswalkStore,
  CrosswalkStoreOptions,
  ExternalIdHit,
  LoadResult,
} from './store.interface';

type PlayerRow = typeof players.$inferSelect;
type ExternalIdRow = typeof externalIds.$inferSelect;
type AliasRow = typeof aliases.$inferSelect;

function toPlayer(row: PlayerRow): CanonicalPlayer {
  return {
    playerId: row.id,
    canonicalName: row.canonicalName,
    firstName: row.firstName,
    lastName: row.lastName,
    position: row.position,
    team: row.team,
    archivedAt: row.archivedAt,
    mergedInto: row.mergedInto,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

function toMapping(row: ExternalIdRow): ExternalIdMapping {
  return {
    sourceName: row.sourceName,
    externalId: row.externalId,
    playerId: row.playerId,
    externalName: row.externalName,
    confidenceScore: row.confidenceScore,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

function toAlias(row: AliasRow): Alias {
  return {
    playerId: row.playerId,
    aliasName: row.aliasName,
    sourceName: row.sourceName,
    confidenceScore: row.confidenceScore,
    lastSeenAt: row.lastSeenAt,
    decayedAt: row.decayedAt,
    createdAt: row.createdAt,
  };
}

async function findPlayer(db: Executor, playerId: string): Promise<CanonicalPlayer | null> {
  const [row] = await db.select().from(players).where(eq(players.id, playerId)).limit(1);
  return row ? toPlayer(row) : null;
}

/**
 * Crosswalk store backed by PostgreSQL through drizzle.
 *
 * External id writes lock the existing row (SELECT ... FOR UPDATE) inside a
 * transaction so concurrent writers for the same key go through the conflict
 * check one at a time.
 */
export class PostgresCrosswalkStore implements CrosswalkStore {
  private readonly now: () => Date;

  constructor(
    private readonly db: Database = getDatabase(),
    options: CrosswalkStoreOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
  }

  async lookupByExternalId(source: string, externalId: string): Promise<ExternalIdHit | null> {
    const [row] = await this.db
      .select()
      .from(externalIds)
      .where(and(eq(externalIds.sourceName, source.trim()), eq(externalIds.externalId, externalId.trim())))
      .limit(1);
    if (!row) return null;

    let player = await findPlayer(this.db, row.playerId);
    for (let hops = 0; player && player.archivedAt; hops++) {
      if (!player.mergedInto || hops >= MAX_MERGE_HOPS) return null;
      player = await findPlayer(this.db, player.mergedInto);
    }
    if (!player) return null;

    return { player, mapping: toMapping(row) };
  }

  async lookupAliases(source: string, normalizedName: string): Promise<AliasHit[]> {
    const name = normalizeName(normalizedName);
    if (!name) return [];

    return this.db
      .select({ playerId: aliases.playerId, confidenceScore: aliases.confidenceScore })
      .from(aliases)
      .innerJoin(players, eq(aliases.playerId, players.id))
      .where(
        and(
          eq(aliases.sourceName, source.trim()),
          eq(aliases.aliasName, name),
          buildActiveRecordsFilter(players.archivedAt)
        )
      )
      .orderBy(desc(aliases.confidenceScore), asc(aliases.createdAt));
  }

  async upsertExternalId(
    source: string,
    externalId: string,
    playerId: string,
    externalName: string | null,
    confidence: number
  ): Promise<ExternalIdMapping> {
    validateConfidence(confidence);
    const sourceName = source.trim();
    const id = externalId.trim();

    return this.db.transaction(async (tx) => {
      assertActivePlayer(await findPlayer(tx, playerId), playerId);
      const now = this.now();

      const [existing] = await tx
        .select()
        .from(externalIds)
        .where(and(eq(externalIds.sourceName, sourceName), eq(externalIds.externalId, id)))
        .limit(1)
        .for('update');

      if (!existing) {
        const [inserted] = await tx
          .insert(externalIds)
          .values({
            sourceName,
            externalId: id,
            playerId,
            externalName,
            confidenceScore: confidence,
            createdAt: now,
            updatedAt: now,
          })
          .onConflictDoNothing()
          .returning();
        if (inserted) return toMapping(inserted);

        // Lost an insert race; the other writer's row is now visible, apply the rule to it.
        const [raced] = await tx
          .select()
          .from(externalIds)
          .where(and(eq(externalIds.sourceName, sourceName), eq(externalIds.externalId, id)))
          .limit(1)
          .for('update');
        if (!raced) {
          throw new Error(`External id ${sourceName}:${id} vanished during upsert`);
        }
        return this.applyToExisting(tx, raced, playerId, externalName, confidence, now);
      }

      return this.applyToExisting(tx, existing, playerId, externalName, confidence, now);
    });
  }

  async upsertAlias(playerId: string, aliasName: string, source: string, confidence: number): Promise<Alias> {
    const normalized = normalizeName(aliasName);
    if (!normalized) {
      throw new BadRequestError(`Alias "${aliasName}" is empty after normalization`, 'EMPTY_ALIAS');
    }
    validateConfidence(confidence);
    assertActivePlayer(await findPlayer(this.db, playerId), playerId);

    const sourceName = source.trim();
    const now = this.now();

    return this.db.transaction(async (tx) => {
      const [existing] = await tx
        .select()
        .from(aliases)
        .where(
          and(eq(aliases.playerId, playerId), eq(aliases.aliasName, normalized), eq(aliases.sourceName, sourceName))
        )
        .limit(1)
        .for('update');

      if (existing) {
        const [updated] = await tx
          .update(aliases)
          .set({ confidenceScore: Math.max(existing.confidenceScore, confidence), lastSeenAt: now })
          .where(eq(aliases.id, existing.id))
          .returning();
        return toAlias(updated);
      }

      const [inserted] = await tx
        .insert(aliases)
        .values({
          playerId,
          aliasName: normalized,
          sourceName,
          confidenceScore: confidence,
          lastSeenAt: now,
          createdAt: now,
        })
        .onConflictDoUpdate({
          target: [aliases.playerId, aliases.aliasName, aliases.sourceName],
          set: { lastSeenAt: now },
        })
        .returning();
      return toAlias(inserted);
    });
  }

  async touchAlias(playerId: string, aliasName: string, source: string): Promise<boolean> {
    const touched = await this.db
      .update(aliases)
      .set({ lastSeenAt: this.now() })
      .where(
        and(
          eq(aliases.playerId, playerId),
          eq(aliases.aliasName, normalizeName(aliasName)),
          eq(aliases.sourceName, source.trim())
        )
      )
      .returning({ id: aliases.id });
    return touched.length > 0;
  }

  async *allPlayers(): AsyncIterable<CanonicalPlayer> {
    let cursor: string | null = null;

    while (true) {
      const filter = buildActiveRecordsFilter(players.archivedAt);
      const page: PlayerRow[] = await this.db
        .select()
        .from(players)
        .where(cursor ? and(filter, gt(players.id, cursor)) : filter)
        .orderBy(asc(players.id))
        .limit(ALL_PLAYERS_PAGE_SIZE);

      for (const row of page) {
        yield toPlayer(row);
      }

      if (page.length < ALL_PLAYERS_PAGE_SIZE) return;
      cursor = page[page.length - 1].id;
    }
  }

  async getPlayer(playerId: string): Promise<CanonicalPlayer | null> {
    return findPlayer(this.db, playerId);
  }

  async createPlayer(input: CreatePlayerInput): Promise<CreatePlayerResult> {
    const canonicalName = input.canonicalName.trim();
    if (!normalizeName(canonicalName)) {
      throw new BadRequestError(`Player name "${input.canonicalName}" is empty after normalization`, 'EMPTY_NAME');
    }

    const fingerprint = playerFingerprint(canonicalName, input.position, input.team);
    const [existing] = await this.db
      .select()
      .from(players)
      .where(and(eq(players.fingerprint, fingerprint), isNull(players.archivedAt)))
      .orderBy(asc(players.createdAt))
      .limit(1);
    if (existing) {
      return { player: toPlayer(existing), created: false };
    }

    const parts = splitDisplayName(canonicalName);
    const now = this.now();
    const [row] = await this.db
      .insert(players)
      .values({
        canonicalName,
        firstName: input.firstName ?? parts.firstName,
        lastName: input.lastName ?? parts.lastName,
        position: normalizePosition(input.position),
        team: normalizeTeam(input.team),
        fingerprint,
        createdAt: now,
        updatedAt: now,
      })
      .returning();

    logger.debug({ playerId: row.id, canonicalName }, 'Player created');
    return { player: toPlayer(row), created: true };
  }

  async updatePlayer(playerId: string, observation: PlayerObservation): Promise<CanonicalPlayer> {
    const player = await findPlayer(this.db, playerId);
    assertActivePlayer(player, playerId);

    const team = normalizeTeam(observation.team) ?? player.team;
    const position = normalizePosition(observation.position) ?? player.position;
    const [row] = await this.db
      .update(players)
      .set({
        team,
        position,
        fingerprint: playerFingerprint(player.canonicalName, position, team),
        updatedAt: this.now(),
      })
      .where(eq(players.id, playerId))
      .returning();

    return toPlayer(row);
  }

  async archivePlayer(playerId: string): Promise<CanonicalPlayer> {
    assertActivePlayer(await findPlayer(this.db, playerId), playerId);

    const [row] = await this.db
      .update(players)
      .set(buildArchiveUpdate(this.now()))
      .where(eq(players.id, playerId))
      .returning();

    logger.info({ playerId }, 'Player archived');
    return toPlayer(row);
  }

  async mergePlayers(sourcePlayerId: string, targetPlayerId: string, reason: string): Promise<PlayerMerge> {
    if (sourcePlayerId === targetPlayerId) {
      throw new BadRequestError('Cannot merge a player into itself', 'SELF_MERGE');
    }

    const result = await this.db.transaction(async (tx) => {
      const locked = await tx
        .select()
        .from(players)
        .where(inArray(players.id, [sourcePlayerId, targetPlayerId]))
        .for('update');
      const source = locked.find((row) => row.id === sourcePlayerId);
      const target = locked.find((row) => row.id === targetPlayerId);
      assertActivePlayer(source ? toPlayer(source) : null, sourcePlayerId);
      assertActivePlayer(target ? toPlayer(target) : null, targetPlayerId);

      const now = this.now();
      const moved = await tx
        .update(externalIds)
        .set({ playerId: targetPlayerId, updatedAt: now })
        .where(eq(externalIds.playerId, sourcePlayerId))
        .returning({ id: externalIds.id });

      const sourceAliases = await tx.select().from(aliases).where(eq(aliases.playerId, sourcePlayerId));
      for (const alias of sourceAliases) {
        await tx
          .insert(aliases)
          .values({ ...toAlias(alias), playerId: targetPlayerId })
          .onConflictDoUpdate({
            target: [aliases.playerId, aliases.aliasName, aliases.sourceName],
            set: { lastSeenAt: alias.lastSeenAt },
            setWhere: lt(aliases.lastSeenAt, alias.lastSeenAt),
          });
        await tx
          .update(aliases)
          .set({ confidenceScore: alias.confidenceScore })
          .where(
            and(
              eq(aliases.playerId, targetPlayerId),
              eq(aliases.aliasName, alias.aliasName),
              eq(aliases.sourceName, alias.sourceName),
              lt(aliases.confidenceScore, alias.confidenceScore)
            )
          );
      }
      await tx.delete(aliases).where(eq(aliases.playerId, sourcePlayerId));

      await tx
        .update(players)
        .set({ ...buildArchiveUpdate(now), mergedInto: targetPlayerId })
        .where(eq(players.id, sourcePlayerId));

      const [merge] = await tx
        .insert(playerMerges)
        .values({ sourcePlayerId, targetPlayerId, reason, mergedAt: now })
        .returning();

      return { merge, movedExternalIds: moved.length, movedAliases: sourceAliases.length };
    });

    logger.info(
      {
        sourcePlayerId,
        targetPlayerId,
        reason,
        movedExternalIds: result.movedExternalIds,
        movedAliases: result.movedAliases,
      },
      'Players merged'
    );

    return {
      sourcePlayerId: result.merge.sourcePlayerId,
      targetPlayerId: result.merge.targetPlayerId,
      reason: result.merge.reason,
      mergedAt: result.merge.mergedAt,
    };
  }

  async listExternalIds(playerId: string): Promise<ExternalIdMapping[]> {
    const rows = await this.db
      .select()
      .from(externalIds)
      .where(eq(externalIds.playerId, playerId))
      .orderBy(asc(externalIds.sourceName), asc(externalIds.externalId));
    return rows.map(toMapping);
  }

  async listAliases(playerId: string): Promise<Alias[]> {
    const rows = await this.db
      .select()
      .from(aliases)
      .where(eq(aliases.playerId, playerId))
      .orderBy(desc(aliases.confidenceScore), asc(aliases.aliasName));
    return rows.map(toAlias);
  }

  async listMerges(): Promise<PlayerMerge[]> {
    const rows = await this.db.select().from(playerMerges).orderBy(asc(playerMerges.mergedAt));
    return rows.map((row) => ({
      sourcePlayerId: row.sourcePlayerId,
      targetPlayerId: row.targetPlayerId,
      reason: row.reason,
      mergedAt: row.mergedAt,
    }));
  }

  async decayAliasConfidence(options: AliasDecayOptions): Promise<number> {
    validateDecayOptions(options);
    const now = options.now ?? this.now();

    const candidates = await this.db
      .select()
      .from(aliases)
      .where(and(lt(aliases.confidenceScore, 1), gt(aliases.confidenceScore, options.floor)));

    let changed = 0;
    for (const row of candidates) {
      const next = decayedConfidence(row, options, now);
      if (next === null) continue;
      await this.db
        .update(aliases)
        .set({ confidenceScore: next, decayedAt: now })
        .where(eq(aliases.id, row.id));
      changed++;
    }
    return changed;
  }

  async snapshot(): Promise<CrosswalkSnapshot> {
    const [playerRows, externalIdRows, aliasRows] = await Promise.all([
      this.db.select().from(players).orderBy(asc(players.createdAt)),
      this.db.select().from(externalIds).orderBy(asc(externalIds.sourceName), asc(externalIds.externalId)),
      this.db.select().from(aliases).orderBy(asc(aliases.sourceName), asc(aliases.aliasName)),
    ]);

    return {
      players: playerRows.map(toPlayer),
      externalIds: externalIdRows.map(toMapping),
      aliases: aliasRows.map(toAlias),
    };
  }

  async load(snapshot: CrosswalkSnapshot): Promise<LoadResult> {
    const result = await this.db.transaction(async (tx) => {
      const counts: LoadResult = { players: 0, externalIds: 0, aliases: 0 };

      for (const player of snapshot.players) {
        const inserted = await tx
          .insert(players)
          .values({
            id: player.playerId,
            canonicalName: player.canonicalName,
            firstName: player.firstName,
            lastName: player.lastName,
            position: player.position,
            team: player.team,
            fingerprint: playerFingerprint(player.canonicalName, player.position, player.team),
            mergedInto: player.mergedInto,
            createdAt: player.createdAt,
            updatedAt: player.updatedAt,
            archivedAt: player.archivedAt,
          })
          .onConflictDoNothing()
          .returning({ id: players.id });
        counts.players += inserted.length;
      }

      const referenced = [
        ...new Set([...snapshot.externalIds, ...snapshot.aliases].map((row) => row.playerId)),
      ];
      if (referenced.length > 0) {
        const found = await tx.select({ id: players.id }).from(players).where(inArray(players.id, referenced));
        const known = new Set(found.map((row) => row.id));
        const missing = referenced.find((id) => !known.has(id));
        if (missing) {
          throw new BadRequestError(`Snapshot references unknown player ${missing}`, 'UNKNOWN_PLAYER');
        }
      }

      for (const mapping of snapshot.externalIds) {
        const inserted = await tx.insert(externalIds).values(mapping).onConflictDoNothing().returning({ id: externalIds.id });
        counts.externalIds += inserted.length;
      }

      for (const alias of snapshot.aliases) {
        const inserted = await tx.insert(aliases).values(alias).onConflictDoNothing().returning({ id: aliases.id });
        counts.aliases += inserted.length;
      }

      return counts;
    });

    logger.info(result, 'Crosswalk snapshot loaded');
    return result;
  }

  async close(): Promise<void> {
    await closeDatabase();
  }

  private async applyToExisting(
    tx: Executor,
    existing: ExternalIdRow,
    playerId: string,
    externalName: string | null,
    confidence: number,
    now: Date
  ): Promise<ExternalIdMapping> {
    const plan = planExternalIdWrite(existing, playerId, confidence);

    const values =
      plan === 'refresh'
        ? {
            externalName: externalName ?? existing.externalName,
            confidenceScore: Math.max(existing.confidenceScore, confidence),
            updatedAt: now,
          }
        : { playerId, externalName, confidenceScore: confidence, updatedAt: now };

    const [row] = await tx.update(externalIds).set(values).where(eq(externalIds.id, existing.id)).returning();

    if (plan === 'reassign') {
      logger.warn(
        {
          sourceName: existing.sourceName,
          externalId: existing.externalId,
          fromPlayerId: existing.playerId,
          toPlayerId: playerId,
          confidence,
        },
        'External id reassigned to a higher-confidence player'
      );
    }

    return toMapping(row);
  }
}
