import type { AnyColumn } from 'drizzle-orm';
import { type SQL, sql } from 'drizzle-orm';

export function buildActiveRecordsFilter(archivedAtColumn: AnyColumn): SQL {
  return sql`${archivedAtColumn} IS NULL`;
}

export function buildArchiveUpdate(now: Date = new Date()): { archivedAt: Date; updatedAt: Date } {
  return { archivedAt: now, updatedAt: now };
}

export function getDaysBetween(from: Date, to: Date): number {
  return (to.getTime() - from.getTime()) / 86_400_000;
}
