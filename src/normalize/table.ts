import { AMOUNT_COLUMNS, DATE_COLUMNS, FLATTEN_SEPARATOR } from '../config.js';
import { formatAmountCell, formatDateCell } from './coerce.js';
import { flattenRecords, type FlatRecord, type Table } from './flatten.js';

export type CoerceOptions = {
  readonly dateColumns?: readonly string[];
  readonly amountColumns?: readonly string[];
};

export type TableOptions = CoerceOptions & {
  readonly separator?: string;
};

const isEmptyCell = (value: unknown): boolean => value === null || value === undefined;

export function dropEmptyColumns(table: Table): Table {
  const columns = table.columns.filter((column) => table.rows.some((row) => !isEmptyCell(row[column])));
  if (columns.length === table.columns.length) {
    return table;
  }

  const rows = table.rows.map((row) => {
    const kept: FlatRecord = {};
    for (const column of columns) {
      kept[column] = row[column];
    }
    return kept;
  });
  return { columns, rows };
}

/**
 * Applies the display conversions column by column. Only columns present in
 * the table are touched; a cell that cannot be converted becomes `null`.
 */
export function coerceTable(table: Table, options: CoerceOptions = {}): Table {
  const { dateColumns = DATE_COLUMNS, amountColumns = AMOUNT_COLUMNS } = options;
  const converters = new Map<string, (value: unknown) => string | null>();
  for (const column of dateColumns) {
    converters.set(column, formatDateCell);
  }
  for (const column of amountColumns) {
    converters.set(column, formatAmountCell);
  }

  const active = table.columns.filter((column) => converters.has(column));
  if (active.length === 0) {
    return table;
  }

  const rows = table.rows.map((row) => {
    const converted: FlatRecord = { ...row };
    for (const column of active) {
      const convert = converters.get(column);
      if (convert) {
        converted[column] = convert(row[column]);
      }
    }
    return converted;
  });
  return { columns: table.columns, rows };
}

/** Flatten, drop all-empty columns, then coerce: the tabular export pipeline. */
export function toTable(records: readonly Record<string, unknown>[], options: TableOptions = {}): Table {
  const { separator = FLATTEN_SEPARATOR, ...coerce } = options;
  return coerceTable(dropEmptyColumns(flattenRecords(records, separator)), coerce);
}
