import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';

function isStringRow(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((cell) => typeof cell === 'string');
}

/**
 * Rows of a CSV document. Quotes in the middle of an unquoted field are kept
 * as plain characters, and rows may be shorter than the header.
 */
export function parseCsv(text: string): string[][] {
  const rows: unknown = parse(text, {
    bom: true,
    relax_quotes: true,
    relax_column_count: true,
    record_delimiter: ['\r\n', '\n', '\r'],
    skip_empty_lines: true,
  });
  if (!Array.isArray(rows)) return [];
  return rows
    .filter(isStringRow)
    .filter((cells) => cells.some((cell) => cell.trim() !== ''));
}

export function formatCsv(rows: string[][]): string {
  return stringify(rows, { record_delimiter: 'unix' });
}

/**
 * Rows as objects keyed by the trimmed header cells.
 */
export function csvRecords(text: string): Array<Record<string, string>> {
  const [header, ...rows] = parseCsv(text);
  if (!header) return [];
  const keys = header.map((cell) => cell.trim());
  return rows.map((cells) => {
    const record: Record<string, string> = {};
    keys.forEach((key, index) => {
      record[key] = cells[index] ?? '';
    });
    return record;
  });
}
