import { randomUUID } from 'node:crypto';
import path from 'node:path';
import type { PipelineConfig } from '@/lib/config';
import logger, { createRunLogger, type Logger } from '@/lib/logger';
import { createLoadStage } from './01-load';
import { createCleanStage } from './02-clean';
import { createBasicFeaturesStage } from './03-basic-features';
import { createCategoryFeaturesStage } from './04-category-features';
import { createComplexFeaturesStage } from './05-complex-features';
import { createNormalizeStage } from './06-normalize';
import { createEncodeStage } from './07-encode';
import { createSplitStage } from './08-split';
import { createPersistStage } from './09-persist';
import { createSnapshotStage } from './10-snapshot';
import type { PipelineContext, PipelineStage, StageReport } from './types';

export type { PipelineContext, PipelineStage, StageReport } from './types';

type StageStatus = 'RUNNING' | 'DONE' | 'FAILED';

function markStage(
  log: Logger,
  stageIndex: number,
  total: number,
  stage: PipelineStage,
  status: StageStatus,
  extra: Record<string, unknown> = {}
) {
  const payload = { stage: stage.name, index: stageIndex, total, status, ...extra };
  if (status === 'FAILED') {
    log.error(payload, `Stage ${stageIndex}/${total} (${stage.name}): ${status}`);
  } else {
    log.info(payload, `Stage ${stageIndex}/${total} (${stage.name}): ${status}`);
  }
}

export function createContext(runId: string = randomUUID()): PipelineContext {
  return { runId, reports: [] };
}

/**
 * Runs stages strictly in order, each receiving the previous stage's
 * context. The first error aborts the run and is rethrown; later stages
 * (persistence included) never see a partial result.
 */
export function runPipeline(
  stages: PipelineStage[],
  initial: PipelineContext = createContext(),
  log: Logger = createRunLogger(initial.runId)
): PipelineContext {
  return stages.reduce<PipelineContext>((context, stage, idx) => {
    const stageIndex = idx + 1;
    const rowsIn = context.records?.rows.length ?? null;
    const startedAt = Date.now();

    markStage(log, stageIndex, stages.length, stage, 'RUNNING', { rowsIn });

    let next: PipelineContext;
    try {
      next = stage.process(context);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      markStage(log, stageIndex, stages.length, stage, 'FAILED', { rowsIn, error: message });
      throw error;
    }

    const report: StageReport = {
      stage: stage.name,
      rowsIn,
      rowsOut: next.records?.rows.length ?? null,
      columnsOut: next.records?.columns.length ?? null,
      durationMs: Date.now() - startedAt
    };
    markStage(log, stageIndex, stages.length, stage, 'DONE', {
      rowsIn,
      rowsOut: report.rowsOut,
      durationMs: report.durationMs
    });

    return { ...next, reports: [...next.reports, report] };
  }, initial);
}

export type BuildPipelineArgs = {
  inputPath: string;
  config: PipelineConfig;
  /** Defaults to `config.outputDir`, then to the input file's directory */
  outputDir?: string;
  /** When set, the encoded Record Set is also written to this CSV before the split */
  snapshotPath?: string;
  logger?: Logger;
};

/**
 * The default chain: load → clean → basic → category → complex →
 * normalize → encode → (snapshot) → split → persist.
 */
export function buildPipeline(args: BuildPipelineArgs): PipelineStage[] {
  const { config } = args;
  const log = args.logger ?? logger;
  const outputDir = args.outputDir ?? config.outputDir ?? path.dirname(path.resolve(args.inputPath));

  const stages: PipelineStage[] = [
    createLoadStage({ path: args.inputPath }),
    createCleanStage(),
    createBasicFeaturesStage(),
    createCategoryFeaturesStage(),
    createComplexFeaturesStage({
      keepRawEducation: config.keepRawEducation,
      strictEducation: config.strictEducation
    }),
    createNormalizeStage({ currencyRates: config.currencyRates }),
    createEncodeStage({
      targetColumn: config.targetColumn,
      minSalary: config.minSalary,
      maxSalary: config.maxSalary,
      topCategories: config.topCategories,
      logger: log
    })
  ];

  if (args.snapshotPath) {
    stages.push(createSnapshotStage({ outputPath: args.snapshotPath, logger: log }));
  }

  stages.push(
    createSplitStage({ targetColumn: config.targetColumn, logger: log }),
    createPersistStage({ outputDir, logger: log })
  );

  return stages;
}

export function runResumePipeline(args: Omit<BuildPipelineArgs, 'logger'> & { runId?: string }): PipelineContext {
  const context = createContext(args.runId);
  const log = createRunLogger(context.runId, { input: args.inputPath });
  return runPipeline(buildPipeline({ ...args, logger: log }), context, log);
}
