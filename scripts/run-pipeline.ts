/**
 * Runs the full resume pipeline over one export file.
 *
 * Usage:
 *   npx tsx scripts/run-pipeline.ts <path/to/resumes.csv> [--target salary] [--out dir] [--snapshot file.csv]
 *
 * Writes x_data.npy, y_data.npy and feature_names.json next to the input
 * file unless --out (or PIPELINE_OUTPUT_DIR) says otherwise. Other settings
 * come from PIPELINE_* variables (or .env).
 */

import 'dotenv/config';
import { parseArgs } from 'node:util';
import { loadPipelineConfig } from '@/lib/config';
import logger from '@/lib/logger';
import { runResumePipeline } from '@/lib/pipeline';

function main() {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      target: { type: 'string' },
      out: { type: 'string' },
      snapshot: { type: 'string' }
    }
  });

  const inputPath = positionals[0];
  if (!inputPath) {
    logger.error('Usage: run-pipeline <csv_path> [--target salary] [--out dir] [--snapshot file.csv]');
    process.exitCode = 1;
    return;
  }

  const config = loadPipelineConfig(process.env, {
    targetColumn: values.target,
    outputDir: values.out
  });

  const context = runResumePipeline({ inputPath, config, snapshotPath: values.snapshot });

  logger.info(
    {
      rows: context.target?.length ?? 0,
      features: context.featureNames?.length ?? 0,
      stages: context.reports.map((report) => `${report.stage}:${report.rowsIn ?? '-'}→${report.rowsOut ?? '-'}`)
    },
    'Pipeline completed'
  );
}

try {
  main();
} catch (error) {
  logger.error({ err: error }, 'Pipeline failed');
  process.exitCode = 1;
}
