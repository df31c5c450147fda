import type { SourceRecord } from '../../types/players';
import type { CsvRowError } from '../../utils/csv';

export interface SourceParseReport {
  records: SourceRecord[];
  errors: CsvRowError[];
  rowCount: number;
  unknownColumns: string[];
}

/**
 * Turns one provider's rows into SourceRecords. Adapters sit outside the
 * resolution core; the resolver only ever sees SourceRecords.
 */
export interface SourceAdapter {
  readonly name: string;

  /**
   * Convert one row keyed by the provider's column headers (any case).
   * Throws InvalidRecordError when required columns are missing or malformed.
   */
  toRecord(row: Record<string, unknown>): SourceRecord;

  /**
   * Parse a provider CSV export. Invalid rows are reported, not thrown.
   */
  parseCsv(text: string): SourceParseReport;
}
