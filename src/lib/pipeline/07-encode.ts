import type { Logger } from '@/lib/logger';
import { MALE } from './03-basic-features';
import { SCHEDULE_DELIMITER } from './04-category-features';
import type { CellValue, PipelineStage, RecordSet, Row } from './types';
import { SOURCE_COLUMNS } from './utils/column-mapper';
import {
  columnKind,
  dropColumns,
  filterRows,
  getColumn,
  hasColumn,
  isMissing,
  mapColumn,
  median,
  requireRecords,
  round2,
  rowKey,
  setColumn,
  textOf,
  toNumber
} from './utils/record-set';

export const OTHER_CATEGORY = 'OTHER';
export const UNKNOWN_CATEGORY = 'UNKNOWN';
export const SCHEDULE_PREFIX = 'schedule__';
export const DEFAULT_SALARY_COLUMN = 'salary';

/** Explicit ranks; order carries meaning, so never derive it from sorting. */
export const DEFAULT_ORDINAL_MAPS: Record<string, Record<string, number>> = {
  education_level: { school: 0, vocational: 1, higher: 2 },
  business_trips: { none: 0, rare: 1, regular: 2 }
};

export const DEFAULT_DEDUP_KEYS = [
  'age',
  'sex',
  'experience_years',
  'education_level',
  'has_master',
  'education_last_year',
  'city',
  'position',
  'last_position',
  'relocation',
  'business_trips',
  'schedule',
  'has_car',
  'currency'
];

export const DEFAULT_RAW_COLUMNS = [
  'last_work',
  SOURCE_COLUMNS.sexAge,
  SOURCE_COLUMNS.salary,
  SOURCE_COLUMNS.location,
  SOURCE_COLUMNS.experience,
  SOURCE_COLUMNS.education
];

export type EncodeOptions = {
  /** Kept through the empty-column and non-numeric drops so the split stage finds it */
  targetColumn: string;
  /** Column whose group median survives dedup and whose range is filtered; defaults to `salary` */
  salaryColumn?: string;
  minSalary: number;
  maxSalary: number;
  /** Column → how many of its most frequent values survive before one-hot */
  topCategories: Record<string, number>;
  ordinalMaps?: Record<string, Record<string, number>>;
  dedupKeys?: string[];
  rawColumns?: string[];
};

export type EncodeSummary = {
  rowsIn: number;
  droppedUnknown: number;
  /** Rows removed by the dedup pass, merged into a group or missing a key value */
  collapsedDuplicates: number;
  droppedEmptyColumns: string[];
  droppedTextColumns: string[];
  outliersDropped: number;
  rowsOut: number;
  columnsOut: number;
};

function toInteger(value: CellValue): number | null {
  const n = toNumber(value);
  return n == null ? null : Math.trunc(n);
}

// ── Pass 1 ──

export function dropUnknownCategories(records: RecordSet): RecordSet {
  const columns = ['business_trips', 'education_level'].filter((column) => hasColumn(records, column));
  if (columns.length === 0) return records;
  return filterRows(records, (row) => columns.every((column) => row[column] !== 'unknown'));
}

// ── Pass 2 ──

export function encodeBinaryFlags(records: RecordSet): RecordSet {
  let out = mapColumn(records, 'sex', (value) => (value === MALE ? 1 : 0));
  out = mapColumn(out, 'relocation', toInteger);
  return mapColumn(out, 'has_car', toInteger);
}

// ── Pass 3 ──

export function fixNumericTypes(records: RecordSet): RecordSet {
  const out = mapColumn(records, 'experience_years', (value) => {
    const n = toNumber(value);
    return n == null ? null : round2(n);
  });
  return mapColumn(out, 'education_last_year', toInteger);
}

// ── Pass 4 ──

function compareCells(a: CellValue, b: CellValue): number {
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  const left = textOf(a);
  const right = textOf(b);
  if (left === right) return 0;
  return left < right ? -1 : 1;
}

function compareByKeys(a: Row, b: Row, keys: string[]): number {
  for (const key of keys) {
    const order = compareCells(a[key] ?? null, b[key] ?? null);
    if (order !== 0) return order;
  }
  return 0;
}

/**
 * Collapses rows sharing every present key column into one row whose salary
 * is the group median. Rows missing any key value are dropped. Groups come
 * out sorted by key, column by column; each keeps its first row's non-key
 * values.
 */
export function dedupByFeatures(
  records: RecordSet,
  salaryColumn: string,
  keyColumns: string[] = DEFAULT_DEDUP_KEYS
): RecordSet {
  if (!hasColumn(records, salaryColumn)) return records;

  const keys = keyColumns.filter((column) => column !== salaryColumn && hasColumn(records, column));
  if (keys.length === 0) return records;

  const groups = new Map<string, { first: Row; salaries: number[] }>();
  for (const row of records.rows) {
    if (keys.some((column) => isMissing(row[column]))) continue;

    const key = rowKey(row, keys);
    let group = groups.get(key);
    if (!group) {
      group = { first: row, salaries: [] };
      groups.set(key, group);
    }
    const salary = toNumber(row[salaryColumn]);
    if (salary != null) group.salaries.push(salary);
  }

  const rows = [...groups.values()]
    .map((group) => ({ ...group.first, [salaryColumn]: median(group.salaries) }))
    .sort((a, b) => compareByKeys(a, b, keys));
  return { columns: records.columns, rows };
}

// ── Pass 5 ──

export function ordinalEncode(
  records: RecordSet,
  maps: Record<string, Record<string, number>> = DEFAULT_ORDINAL_MAPS
): RecordSet {
  let out = records;
  for (const [column, ranks] of Object.entries(maps)) {
    out = mapColumn(out, column, (value) => {
      const key = textOf(value);
      return Object.hasOwn(ranks, key) ? ranks[key] : null;
    });
  }
  return out;
}

// ── Pass 6 ──

/** Values outside the `topN` most frequent become OTHER; ties keep first-seen order. */
export function keepTopCategories(values: CellValue[], topN: number): string[] {
  const labels = values.map((value) => (isMissing(value) ? UNKNOWN_CATEGORY : String(value)));

  const counts = new Map<string, number>();
  for (const label of labels) counts.set(label, (counts.get(label) ?? 0) + 1);

  const top = new Set(
    [...counts.entries()]
      .sort((a, b) => b[1] - a[1])
      .slice(0, topN)
      .map(([label]) => label)
  );

  return labels.map((label) => (top.has(label) ? label : OTHER_CATEGORY));
}

/**
 * Collapses rare categories, then one-hot encodes every listed column that is
 * present. Indicator columns are `<column>_<value>` booleans, sorted by
 * value, appended after the remaining columns. No category is dropped.
 */
export function oneHotHighCardinality(records: RecordSet, topCategories: Record<string, number>): RecordSet {
  const columns = Object.keys(topCategories).filter((column) => hasColumn(records, column));
  if (columns.length === 0) return records;

  const indicators: Array<{ name: string; values: boolean[] }> = [];
  for (const column of columns) {
    const labels = keepTopCategories(getColumn(records, column), topCategories[column]);
    for (const category of [...new Set(labels)].sort()) {
      indicators.push({ name: `${column}_${category}`, values: labels.map((label) => label === category) });
    }
  }

  let out = dropColumns(records, columns);
  for (const indicator of indicators) {
    out = setColumn(out, indicator.name, indicator.values);
  }
  return out;
}

// ── Pass 7 ──

/** One `schedule__<token>` 0/1 column per token seen anywhere in the dataset. */
export function multiHotSchedule(records: RecordSet, column = 'schedule'): RecordSet {
  if (!hasColumn(records, column)) return records;

  const parts = getColumn(records, column).map((value) => textOf(value).split(SCHEDULE_DELIMITER).filter(Boolean));
  const tokens = [...new Set(parts.flat())].sort();

  let out = dropColumns(records, [column]);
  for (const token of tokens) {
    out = setColumn(
      out,
      `${SCHEDULE_PREFIX}${token}`,
      parts.map((row) => (row.includes(token) ? 1 : 0))
    );
  }
  return out;
}

// ── Pass 8 ──

export function dropRawTextColumns(records: RecordSet, rawColumns: string[] = DEFAULT_RAW_COLUMNS): RecordSet {
  const tagged = records.columns.filter((column) => column.startsWith('raw_'));
  return dropColumns(records, [...tagged, ...rawColumns]);
}

// ── Pass 9 ──

/**
 * Fills missing numeric cells with their column's median. Medians are all
 * computed first, over the rows that survived earlier passes, then applied.
 * Columns with no value at all have no median and are dropped, except the
 * `keep` columns (target and salary), which later stages still look for.
 */
export function imputeMissingNumeric(
  records: RecordSet,
  keep: string | string[]
): { records: RecordSet; droppedEmptyColumns: string[] } {
  const kept = [keep].flat();
  const medians = new Map<string, number>();
  const empty: string[] = [];

  for (const column of records.columns) {
    const kind = columnKind(records, column);
    if (kind === 'empty' && !kept.includes(column)) {
      empty.push(column);
      continue;
    }
    if (kind !== 'numeric') continue;

    const values = getColumn(records, column);
    if (!values.some(isMissing)) continue;

    const present = values.filter((value): value is number => typeof value === 'number' && !Number.isNaN(value));
    const m = median(present);
    if (m != null) medians.set(column, m);
  }

  let out = dropColumns(records, empty);
  for (const [column, m] of medians) {
    out = mapColumn(out, column, (value) => (isMissing(value) ? m : value));
  }
  return { records: out, droppedEmptyColumns: empty };
}

// ── Pass 10 ──

export function dropNonNumericExceptTarget(
  records: RecordSet,
  keep: string | string[]
): { records: RecordSet; droppedTextColumns: string[] } {
  const kept = [keep].flat();
  const text = records.columns.filter((column) => !kept.includes(column) && columnKind(records, column) === 'text');
  return { records: dropColumns(records, text), droppedTextColumns: text };
}

// ── Pass 11 ──

/** Keeps rows whose salary lies within [min, max]; a missing salary is dropped. */
export function dropExtremeSalaries(
  records: RecordSet,
  salaryColumn: string,
  minSalary: number,
  maxSalary: number
): { records: RecordSet; dropped: number } {
  if (!hasColumn(records, salaryColumn)) return { records, dropped: 0 };

  const out = filterRows(records, (row) => {
    const salary = toNumber(row[salaryColumn]);
    return salary != null && salary >= minSalary && salary <= maxSalary;
  });
  return { records: out, dropped: records.rows.length - out.rows.length };
}

// ── Pass 12 ──

export function castBooleansToInt(records: RecordSet): RecordSet {
  let out = records;
  for (const column of records.columns) {
    if (columnKind(records, column) !== 'boolean') continue;
    out = mapColumn(out, column, (value) => (typeof value === 'boolean' ? Number(value) : value));
  }
  return out;
}

/**
 * Runs the twelve encoding passes in their fixed order. Each pass sees the
 * previous pass's output, so raw columns stay readable until pass 8 and
 * medians are taken after every structural change.
 */
export function encodeRecords(
  records: RecordSet,
  options: EncodeOptions
): { records: RecordSet; summary: EncodeSummary } {
  const salaryColumn = options.salaryColumn ?? DEFAULT_SALARY_COLUMN;
  const keep = [...new Set([options.targetColumn, salaryColumn])];
  const rowsIn = records.rows.length;

  let out = dropUnknownCategories(records);
  const droppedUnknown = rowsIn - out.rows.length;

  out = encodeBinaryFlags(out);
  out = fixNumericTypes(out);

  const beforeDedup = out.rows.length;
  out = dedupByFeatures(out, salaryColumn, options.dedupKeys);
  const collapsedDuplicates = beforeDedup - out.rows.length;

  out = ordinalEncode(out, options.ordinalMaps);
  out = oneHotHighCardinality(out, options.topCategories);
  out = multiHotSchedule(out);
  out = dropRawTextColumns(out, options.rawColumns);

  const imputed = imputeMissingNumeric(out, keep);
  const numeric = dropNonNumericExceptTarget(imputed.records, keep);
  const filtered = dropExtremeSalaries(numeric.records, salaryColumn, options.minSalary, options.maxSalary);
  out = castBooleansToInt(filtered.records);

  return {
    records: out,
    summary: {
      rowsIn,
      droppedUnknown,
      collapsedDuplicates,
      droppedEmptyColumns: imputed.droppedEmptyColumns,
      droppedTextColumns: numeric.droppedTextColumns,
      outliersDropped: filtered.dropped,
      rowsOut: out.rows.length,
      columnsOut: out.columns.length
    }
  };
}

export function createEncodeStage(options: EncodeOptions & { logger?: Logger }): PipelineStage {
  return {
    name: 'encode',
    process(context) {
      const { records, summary } = encodeRecords(requireRecords(context, 'encode'), options);

      options.logger?.info({ stage: 'encode', ...summary }, 'encoding summary');
      if (summary.outliersDropped > 0) {
        options.logger?.warn(
          `Dropped ${summary.outliersDropped} rows with ${options.salaryColumn ?? DEFAULT_SALARY_COLUMN} outside [${options.minSalary}, ${options.maxSalary}]`
        );
      }

      return { ...context, records };
    }
  };
}
