import { parse } from 'csv-parse/sync';

export type CsvRow = Record<string, string | undefined>;

export function detectDelimiter(text: string): ';' | ',' {
  const firstLine = text.split(/\r?\n/, 1)[0] ?? '';
  return firstLine.includes(';') ? ';' : ',';
}

/**
 * Parses a headed CSV document into rows keyed by lower-cased column name.
 * Both `;` and `,` separated exports are accepted.
 */
export function parseCsvRows(text: string): CsvRow[] {
  const records: CsvRow[] = parse(text, {
    columns: true,
    delimiter: detectDelimiter(text),
    bom: true,
    skip_empty_lines: true,
    trim: true,
    relax_column_count: true,
  });

  return records.map(record => {
    const normalized: CsvRow = {};
    for (const [key, value] of Object.entries(record)) {
      normalized[key.trim().toLowerCase()] = value;
    }
    return normalized;
  });
}
