import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';

export type CsvRow = Record<string, string>;
export type CsvTable = { columns: string[]; rows: CsvRow[] };

function isStringRow(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(cell => typeof cell === 'string');
}

/** Parses CSV text into its header and one record per data line. */
export function parseCsvTable(text: string): CsvTable {
  const records: unknown = parse(text, { bom: true, skip_empty_lines: true, relax_column_count: true });
  if (!Array.isArray(records) || !records.length) return { columns: [], rows: [] };

  const [header, ...lines] = records;
  if (!isStringRow(header)) throw new Error('CSV header is not a list of column names');
  const rows = lines.map((line, i) => {
    if (!isStringRow(line)) throw new Error(`CSV line ${i + 2} is malformed`);
    const row: CsvRow = {};
    header.forEach((column, c) => {
      row[column] = line[c] ?? '';
    });
    return row;
  });
  return { columns: header, rows };
}

export function stringifyCsv(columns: readonly string[], rows: readonly CsvRow[], header = true): string {
  return stringify(
    rows.map(row => columns.map(c => row[c] ?? '')),
    { header, columns: [...columns] },
  );
}
