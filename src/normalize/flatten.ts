import { FLATTEN_SEPARATOR } from '../config.js';
import { isRecord } from '../utils/payload.js';

export type FlatRecord = Record<string, unknown>;

/**
 * Rows sharing one column list. `columns` carries the order; row objects are
 * looked up by key so integer-like keys keep their column position.
 */
export type Table = {
  readonly columns: readonly string[];
  readonly rows: readonly FlatRecord[];
};

function collectLeaves(
  source: Record<string, unknown>,
  separator: string,
  parentKey: string,
  into: Map<string, unknown>,
): Map<string, unknown> {
  for (const [key, value] of Object.entries(source)) {
    const path = parentKey ? `${parentKey}${separator}${key}` : key;
    if (isRecord(value)) {
      collectLeaves(value, separator, path, into);
      continue;
    }
    into.set(path, value);
  }
  return into;
}

/** Leaf paths of one record, in walk order. Lists are leaves. */
export function flattenEntries(
  record: Record<string, unknown>,
  separator: string = FLATTEN_SEPARATOR,
): Array<[string, unknown]> {
  return [...collectLeaves(record, separator, '', new Map())];
}

export function flattenRecord(record: Record<string, unknown>, separator: string = FLATTEN_SEPARATOR): FlatRecord {
  return Object.fromEntries(flattenEntries(record, separator));
}

/**
 * Column policy: union of every record's leaf paths in first-seen order;
 * records missing a column get `null` for it.
 */
export function flattenRecords(
  records: readonly Record<string, unknown>[],
  separator: string = FLATTEN_SEPARATOR,
): Table {
  const columns: string[] = [];
  const seen = new Set<string>();
  const flattened = records.map((record) => {
    const entries = flattenEntries(record, separator);
    for (const [key] of entries) {
      if (!seen.has(key)) {
        seen.add(key);
        columns.push(key);
      }
    }
    return new Map(entries);
  });

  const rows = flattened.map((entries) => {
    const row: FlatRecord = {};
    for (const column of columns) {
      row[column] = entries.has(column) ? entries.get(column) : null;
    }
    return row;
  });

  return { columns, rows };
}
