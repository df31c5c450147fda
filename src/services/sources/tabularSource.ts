import type { z } from 'zod';
import type { SourceRecord } from '../../types/players';
import { parseCsv } from '../../utils/csv';
import { InvalidRecordError } from '../../utils/errors';
import type { SourceAdapter, SourceParseReport } from './provider.interface';

/** Fields an adapter's row schema produces before the source name is attached. */
export type SourceRow = Omit<SourceRecord, 'source'>;

/**
 * Adapter over a provider whose rows are flat tables with known headers.
 */
export abstract class TabularSourceAdapter implements SourceAdapter {
  abstract readonly name: string;
  /** Lower-cased header name to row field. */
  protected abstract readonly columns: Record<string, string>;
  protected abstract readonly rowSchema: z.ZodType<SourceRow, z.ZodTypeDef, unknown>;

  toRecord(row: Record<string, unknown>): SourceRecord {
    const mapped: Record<string, unknown> = {};
    for (const [header, value] of Object.entries(row)) {
      const key = header.trim().toLowerCase();
      if (Object.hasOwn(this.columns, key)) mapped[this.columns[key]] = value;
    }

    const parsed = this.rowSchema.safeParse(mapped);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || 'row'}: ${issue.message}`);
      throw new InvalidRecordError(`Invalid ${this.name} row: ${issues.join('; ')}`, issues);
    }
    return { source: this.name, ...parsed.data };
  }

  parseCsv(text: string): SourceParseReport {
    const report = parseCsv(text, this.rowSchema, this.columns);
    return {
      records: report.rows.map((row) => ({ source: this.name, ...row })),
      errors: report.errors,
      rowCount: report.rowCount,
      unknownColumns: report.unknownColumns,
    };
  }
}
