import {
  pgTable,
  uuid,
  varchar,
  timestamp,
  doublePrecision,
  index,
  uniqueIndex,
  text,
} from 'drizzle-orm/pg-core';
import { relations } from 'drizzle-orm';

export const players = pgTable('players', {
  id: uuid('id').defaultRandom().primaryKey(),
  canonicalName: varchar('canonical_name', { length: 255 }).notNull(),
  firstName: varchar('first_name', { length: 120 }),
  lastName: varchar('last_name', { length: 160 }),
  position: varchar('position', { length: 10 }),
  team: varchar('team', { length: 8 }),
  fingerprint: varchar('fingerprint', { length: 300 }).notNull(),
  mergedInto: uuid('merged_into'),
  createdAt: timestamp('created_at').defaultNow().notNull(),
  updatedAt: timestamp('updated_at').defaultNow().notNull(),
  archivedAt: timestamp('archived_at'),
}, (table) => ({
  fingerprintIdx: index('players_fingerprint_idx').on(table.fingerprint),
  canonicalNameIdx: index('players_canonical_name_idx').on(table.canonicalName),
}));

export const externalIds = pgTable('external_ids', {
  id: uuid('id').defaultRandom().primaryKey(),
  playerId: uuid('player_id')
    .notNull()
    .references(() => players.id),
  sourceName: varchar('source_name', { length: 50 }).notNull(),
  externalId: varchar('external_id', { length: 100 }).notNull(),
  externalName: varchar('external_name', { length: 255 }),
  confidenceScore: doublePrecision('confidence_score').default(1).notNull(),
  createdAt: timestamp('created_at').defaultNow().notNull(),
  updatedAt: timestamp('updated_at').defaultNow().notNull(),
}, (table) => ({
  sourceExternalIdx: uniqueIndex('external_ids_source_external_idx').on(table.sourceName, table.externalId),
  playerIdx: index('external_ids_player_id_idx').on(table.playerId),
}));

export const aliases = pgTable('aliases', {
  id: uuid('id').defaultRandom().primaryKey(),
  playerId: uuid('player_id')
    .notNull()
    .references(() => players.id),
  aliasName: varchar('alias_name', { length: 255 }).notNull(),
  sourceName: varchar('source_name', { length: 50 }).notNull(),
  confidenceScore: doublePrecision('confidence_score').default(1).notNull(),
  lastSeenAt: timestamp('last_seen_at').defaultNow().notNull(),
  decayedAt: timestamp('decayed_at'),
  createdAt: timestamp('created_at').defaultNow().notNull(),
}, (table) => ({
  playerAliasSourceIdx: uniqueIndex('aliases_player_alias_source_idx').on(
    table.playerId,
    table.aliasName,
    table.sourceName
  ),
  sourceAliasIdx: index('aliases_source_alias_idx').on(table.sourceName, table.aliasName),
}));

export const playerMerges = pgTable('player_merges', {
  id: uuid('id').defaultRandom().primaryKey(),
  sourcePlayerId: uuid('source_player_id')
    .notNull()
    .references(() => players.id),
  targetPlayerId: uuid('target_player_id')
    .notNull()
    .references(() => players.id),
  reason: text('reason').notNull(),
  mergedAt: timestamp('merged_at').defaultNow().notNull(),
});

export const playersRelations = relations(players, ({ many }) => ({
  externalIds: many(externalIds),
  aliases: many(aliases),
}));

export const externalIdsRelations = relations(externalIds, ({ one }) => ({
  player: one(players, {
    fields: [externalIds.playerId],
    references: [players.id],
  }),
}));

export const aliasesRelations = relations(aliases, ({ one }) => ({
  player: one(players, {
    fields: [aliases.playerId],
    references: [players.id],
  }),
}));
