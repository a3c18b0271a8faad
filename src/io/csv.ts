import { CSV_DELIMITER } from '../config.js';
import type { Table } from '../normalize/flatten.js';

export const UTF8_BOM = '\uFEFF';

const DOUBLE_QUOTE = '"';

export type CsvOptions = {
  readonly delimiter?: string;
  readonly bom?: boolean;
};

const needsQuoting = (value: string, delimiter: string): boolean =>
  value.includes(delimiter) || value.includes(DOUBLE_QUOTE) || /[\r\n]/.test(value);

export function escapeCsvValue(value: string, delimiter: string = CSV_DELIMITER): string {
  if (!needsQuoting(value, delimiter)) {
    return value;
  }
  return `${DOUBLE_QUOTE}${value.split(DOUBLE_QUOTE).join(DOUBLE_QUOTE + DOUBLE_QUOTE)}${DOUBLE_QUOTE}`;
}

export function formatCsvCell(value: unknown, delimiter: string = CSV_DELIMITER): string {
  if (value === null || value === undefined) {
    return '';
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? String(value) : '';
  }
  if (typeof value === 'string') {
    return escapeCsvValue(value, delimiter);
  }
  if (typeof value === 'boolean' || typeof value === 'bigint') {
    return String(value);
  }
  // Lists (and anything else structured) stay in one cell as JSON text.
  return escapeCsvValue(JSON.stringify(value) ?? '', delimiter);
}

export function toCsvLine(
  columns: readonly string[],
  row: Readonly<Record<string, unknown>>,
  delimiter: string = CSV_DELIMITER,
): string {
  return columns.map((column) => formatCsvCell(row[column], delimiter)).join(delimiter);
}

export function toCsvDocument(table: Table, options: CsvOptions = {}): string {
  const { delimiter = CSV_DELIMITER, bom = true } = options;
  const header = table.columns.map((column) => escapeCsvValue(column, delimiter)).join(delimiter);
  const lines = [header, ...table.rows.map((row) => toCsvLine(table.columns, row, delimiter))];
  return `${bom ? UTF8_BOM : ''}${lines.join('\n')}\n`;
}
