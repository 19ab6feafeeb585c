import type { Logger } from '@/lib/logger';
import type { PipelineStage, RecordSet } from './types';
import { getColumn, isMissing, requireColumn, requireRecords, toNumber } from './utils/record-set';

export type SplitResult = {
  features: number[][];
  featureNames: string[];
  target: number[];
  /** Present cells that could not be parsed as numbers and became NaN */
  coercedToMissing: Record<string, number>;
};

/**
 * Separates the target column from the feature columns. Every cell is run
 * through try-parse-or-missing; failures become NaN.
 */
export function splitTarget(records: RecordSet, targetColumn: string): SplitResult {
  requireColumn(records, targetColumn, 'split');

  const featureNames = records.columns.filter((column) => column !== targetColumn);
  const coercedToMissing: Record<string, number> = {};

  const target = getColumn(records, targetColumn).map((value) => toNumber(value) ?? Number.NaN);
  const features = records.rows.map((row) =>
    featureNames.map((column) => {
      const value = row[column];
      const n = toNumber(value);
      if (n != null) return n;
      if (!isMissing(value)) {
        coercedToMissing[column] = (coercedToMissing[column] ?? 0) + 1;
      }
      return Number.NaN;
    })
  );

  return { features, featureNames, target, coercedToMissing };
}

export function createSplitStage(options: { targetColumn: string; logger?: Logger }): PipelineStage {
  return {
    name: 'split',
    process(context) {
      const result = splitTarget(requireRecords(context, 'split'), options.targetColumn);

      const violations = Object.entries(result.coercedToMissing);
      if (violations.length > 0) {
        options.logger?.warn(
          { stage: 'split', columns: Object.fromEntries(violations) },
          'non-numeric values after encoding were coerced to NaN'
        );
      }

      return {
        ...context,
        features: result.features,
        featureNames: result.featureNames,
        target: result.target
      };
    }
  };
}
