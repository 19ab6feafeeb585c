import fs from 'node:fs';
import path from 'node:path';
import * as XLSX from 'xlsx';
import Papa from 'papaparse';
import { InputFileNotFoundError, PipelineError } from './errors';
import type { CellValue, PipelineStage, RecordSet, Row } from './types';
import { buildHeaderMap, INDEX_COLUMNS } from './utils/column-mapper';
import { createRecordSet, dropColumns } from './utils/record-set';

function toCell(value: unknown): CellValue {
  if (value == null) return null;
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'boolean') return value;
  const text = String(value);
  // empty cells are missing, the same as a blank CSV field
  return text === '' ? null : text;
}

function toRecordSet(headers: string[], rawRows: Record<string, unknown>[]): RecordSet {
  const headerMap = buildHeaderMap(headers.filter((header) => !INDEX_COLUMNS.includes(header)));
  const columns = [...new Set(headerMap.values())];

  const rows = rawRows.map((raw) => {
    const row: Row = {};
    for (const [header, column] of headerMap) {
      row[column] = toCell(raw[header]);
    }
    return row;
  });

  return dropColumns(createRecordSet(rows, columns), INDEX_COLUMNS);
}

/**
 * Parses a resume export into a Record Set. CSV is read as text (no dynamic
 * typing, every value stays a string until a stage parses it); XLSX takes
 * the first sheet.
 */
export function parseDatasetFile(fileBuffer: Buffer, filename: string): RecordSet {
  const lower = filename.toLowerCase();

  if (lower.endsWith('.csv')) {
    const parsed = Papa.parse<Record<string, unknown>>(fileBuffer.toString('utf-8'), {
      header: true,
      skipEmptyLines: true,
      dynamicTyping: false,
      transformHeader: (header) => header.replace(/^\uFEFF/, '')
    });

    return toRecordSet(parsed.meta.fields ?? [], parsed.data);
  }

  if (lower.endsWith('.xlsx') || lower.endsWith('.xls')) {
    const workbook = XLSX.read(fileBuffer, { type: 'buffer', cellDates: false, raw: false });
    const sheetName = workbook.SheetNames[0];
    if (!sheetName) {
      throw new PipelineError(`Workbook ${filename} has no sheets`, 'UNPARSABLE_INPUT');
    }

    const sheet = workbook.Sheets[sheetName];
    const headerRows = XLSX.utils.sheet_to_json<unknown[]>(sheet, { header: 1, raw: false });
    const headers = (headerRows[0] ?? []).map((value) => String(value ?? ''));
    const rows = XLSX.utils.sheet_to_json<Record<string, unknown>>(sheet, { raw: false, defval: null });

    return toRecordSet(headers, rows);
  }

  throw new PipelineError(`Unsupported input format: ${filename}`, 'UNSUPPORTED_INPUT', { filename });
}

export function createLoadStage(options: { path: string }): PipelineStage {
  return {
    name: 'load',
    process(context) {
      const filePath = path.resolve(options.path);
      if (!fs.existsSync(filePath) || !fs.statSync(filePath).isFile()) {
        throw new InputFileNotFoundError(filePath);
      }

      const records = parseDatasetFile(fs.readFileSync(filePath), path.basename(filePath));
      return { ...context, records };
    }
  };
}
