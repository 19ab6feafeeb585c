import fs from 'node:fs';
import path from 'node:path';
import Papa from 'papaparse';
import type { Logger } from '@/lib/logger';
import type { PipelineStage, RecordSet } from './types';
import { requireRecords } from './utils/record-set';

export function toCsvString(records: RecordSet): string {
  return Papa.unparse(
    {
      fields: records.columns,
      data: records.rows.map((row) => records.columns.map((column) => row[column] ?? ''))
    },
    { newline: '\n' }
  );
}

/** Writes the current Record Set to a CSV file without changing the context. */
export function createSnapshotStage(options: { outputPath: string; logger?: Logger }): PipelineStage {
  return {
    name: 'snapshot',
    process(context) {
      const records = requireRecords(context, 'snapshot');

      fs.mkdirSync(path.dirname(options.outputPath), { recursive: true });
      fs.writeFileSync(options.outputPath, `${toCsvString(records)}\n`);

      options.logger?.info({ stage: 'snapshot', path: options.outputPath, rows: records.rows.length }, 'saved record set');
      return context;
    }
  };
}
