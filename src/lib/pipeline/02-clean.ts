import type { CellValue, PipelineStage, RecordSet } from './types';
import { filterRows, requireRecords, rowKey } from './utils/record-set';

const BOM = /\uFEFF/g;
const NBSP = /\u00A0/g;

export function cleanText(value: CellValue): CellValue {
  if (typeof value !== 'string') return value;
  return value.replace(BOM, '').replace(NBSP, ' ');
}

/**
 * Removes BOM and non-breaking space artifacts from every text cell, then
 * drops exact duplicate rows keeping the first occurrence. Text is cleaned
 * first so rows that differ only by invisible characters are merged.
 */
export function cleanRecords(records: RecordSet): RecordSet {
  const rows = records.rows.map((row) => {
    const next = { ...row };
    for (const column of records.columns) {
      next[column] = cleanText(row[column] ?? null);
    }
    return next;
  });

  const seen = new Set<string>();
  return filterRows({ columns: records.columns, rows }, (row) => {
    const key = rowKey(row, records.columns);
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

export function createCleanStage(): PipelineStage {
  return {
    name: 'clean',
    process(context) {
      return { ...context, records: cleanRecords(requireRecords(context, 'clean')) };
    }
  };
}
