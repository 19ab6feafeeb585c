import { MissingRequiredInputError } from '../errors';
import type { CellValue, ColumnKind, PipelineContext, RecordSet, Row, StageName } from '../types';

export function createRecordSet(rows: Row[], columns?: string[]): RecordSet {
  if (columns) {
    return { columns: [...columns], rows };
  }

  const seen = new Set<string>();
  for (const row of rows) {
    for (const key of Object.keys(row)) seen.add(key);
  }
  return { columns: [...seen], rows };
}

export function requireRecords(context: PipelineContext, stage: StageName): RecordSet {
  if (!context.records) {
    throw new MissingRequiredInputError(stage, 'records');
  }
  return context.records;
}

export function hasColumn(records: RecordSet, column: string): boolean {
  return records.columns.includes(column);
}

export function requireColumn(records: RecordSet, column: string, stage: StageName): void {
  if (!hasColumn(records, column)) {
    throw new MissingRequiredInputError(stage, column);
  }
}

export function getColumn(records: RecordSet, column: string): CellValue[] {
  return records.rows.map((row) => row[column] ?? null);
}

/**
 * Writes a column, appending it to the column order when it is new.
 * Existing columns keep their position.
 */
export function setColumn(records: RecordSet, column: string, values: CellValue[]): RecordSet {
  if (values.length !== records.rows.length) {
    throw new Error(`Column "${column}" has ${values.length} values for ${records.rows.length} rows`);
  }

  const columns = hasColumn(records, column) ? records.columns : [...records.columns, column];
  const rows = records.rows.map((row, idx) => ({ ...row, [column]: values[idx] }));
  return { columns, rows };
}

export function mapColumn(
  records: RecordSet,
  column: string,
  fn: (value: CellValue, row: Row) => CellValue
): RecordSet {
  if (!hasColumn(records, column)) return records;
  return setColumn(
    records,
    column,
    records.rows.map((row) => fn(row[column] ?? null, row))
  );
}

/** Drops the listed columns; names that are absent are ignored. */
export function dropColumns(records: RecordSet, columns: string[]): RecordSet {
  const drop = new Set(columns.filter((column) => hasColumn(records, column)));
  if (drop.size === 0) return records;

  const rows = records.rows.map((row) => {
    const next: Row = {};
    for (const [key, value] of Object.entries(row)) {
      if (!drop.has(key)) next[key] = value;
    }
    return next;
  });

  return { columns: records.columns.filter((column) => !drop.has(column)), rows };
}

export function filterRows(records: RecordSet, predicate: (row: Row, idx: number) => boolean): RecordSet {
  return { columns: records.columns, rows: records.rows.filter(predicate) };
}

export function isMissing(value: CellValue | undefined): value is null | undefined {
  return value == null || (typeof value === 'number' && Number.isNaN(value));
}

/** `String(value)` for present cells, '' for missing ones. */
export function textOf(value: CellValue | undefined): string {
  return isMissing(value) ? '' : String(value);
}

/**
 * Try-parse-or-missing numeric conversion. Never turns an unparsable value
 * into zero.
 */
export function toNumber(value: CellValue | undefined): number | null {
  if (isMissing(value)) return null;
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'boolean') return value ? 1 : 0;

  const trimmed = value.trim();
  if (!trimmed) return null;
  const n = Number(trimmed);
  return Number.isFinite(n) ? n : null;
}

/**
 * Column dtype as seen by the encoder: all present values numbers, all
 * booleans, anything else text. A column with no present value is `empty`.
 */
export function columnKind(records: RecordSet, column: string): ColumnKind {
  let kind: ColumnKind = 'empty';

  for (const row of records.rows) {
    const value = row[column];
    if (isMissing(value)) continue;

    const current: ColumnKind = typeof value === 'number' ? 'numeric' : typeof value === 'boolean' ? 'boolean' : 'text';
    if (kind === 'empty') {
      kind = current;
    } else if (kind !== current) {
      return 'text';
    }
  }

  return kind;
}

export function median(values: number[]): number | null {
  if (values.length === 0) return null;
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid];
}

export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

/** Stable identity of a row across the given columns, missing kept distinct from ''. */
export function rowKey(row: Row, columns: string[]): string {
  return JSON.stringify(columns.map((column) => (isMissing(row[column]) ? null : row[column])));
}
