import Papa from 'papaparse';
import type { z } from 'zod';

export interface CsvRowError {
  /** 1-based data row, the header not counted. */
  row: number;
  message: string;
}

export interface CsvParseReport<T> {
  rows: T[];
  errors: CsvRowError[];
  rowCount: number;
  droppedRows: number;
  unknownColumns: string[];
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
}

/**
 * Parse CSV text with header aliasing and per-row validation.
 *
 * `columns` maps lower-cased header names onto the keys the schema expects;
 * headers it does not name are reported in `unknownColumns` and ignored.
 */
export function parseCsv<T>(
  text: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  columns: Record<string, string>
): CsvParseReport<T> {
  const parsed = Papa.parse<Record<string, string>>(text, {
    header: true,
    dynamicTyping: false,
    skipEmptyLines: true,
    transformHeader: (header) => header.trim().toLowerCase(),
  });

  const rows: T[] = [];
  const errors: CsvRowError[] = parsed.errors.map((error) => ({
    row: (error.row ?? -1) + 1,
    message: error.message,
  }));
  const fields = parsed.meta.fields ?? [];
  const unknownColumns = fields.filter((field) => !Object.hasOwn(columns, field));

  parsed.data.forEach((raw, index) => {
    const mapped: Record<string, unknown> = {};
    for (const [header, value] of Object.entries(raw)) {
      if (Object.hasOwn(columns, header)) mapped[columns[header]] = value;
    }

    const result = schema.safeParse(mapped);
    if (result.success) {
      rows.push(result.data);
    } else {
      errors.push({ row: index + 1, message: formatIssues(result.error) });
    }
  });

  return {
    rows,
    errors,
    rowCount: parsed.data.length,
    droppedRows: parsed.data.length - rows.length,
    unknownColumns,
  };
}

type CsvCell = string | number | Date | null | undefined;

/** Serialize rows with a fixed column order; dates become ISO strings, nulls empty cells. */
export function toCsv(columns: readonly string[], rows: ReadonlyArray<Record<string, CsvCell>>): string {
  const data = rows.map((row) =>
    columns.map((column) => {
      const value = row[column];
      if (value === null || value === undefined) return '';
      if (value instanceof Date) return value.toISOString();
      return value;
    })
  );
  return Papa.unparse({ fields: [...columns], data }, { newline: '\n' });
}
