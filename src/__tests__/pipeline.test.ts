import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { afterAll, beforeAll, describe, it, expect, vi } from 'vitest';
import { loadPipelineConfig } from '@/lib/config';
import logger from '@/lib/logger';
import { buildPipeline, createContext, runPipeline, runResumePipeline, type PipelineContext } from '@/lib/pipeline';
import { OUTPUT_FILES } from '@/lib/pipeline/09-persist';
import type { PipelineStage } from '@/lib/pipeline/types';
import { createRecordSet } from '@/lib/pipeline/utils/record-set';

const FIXTURE = fileURLToPath(new URL('./fixtures/resumes.csv', import.meta.url));

const EXPECTED_FEATURES = [
  'age',
  'sex',
  'experience_years',
  'education_last_year',
  'has_car',
  'relocation',
  'business_trips',
  'education_level',
  'has_master',
  'city_казань',
  'city_москва',
  'city_санкт-петербург',
  'position_бухгалтер',
  'position_инженер-конструктор',
  'position_курьер',
  'last_position_бухгалтер',
  'last_position_инженер',
  'last_position_курьер',
  'currency_usd',
  'currency_руб',
  'schedule__flexible',
  'schedule__fullday',
  'schedule__remote',
  'schedule__shifts'
];

describe('runPipeline', () => {
  const loadStage: PipelineStage = {
    name: 'load',
    process: (context) => ({ ...context, records: createRecordSet([{ a: 1 }, { a: 2 }]) })
  };

  it('threads the context through every stage and records a report each', () => {
    const clean: PipelineStage = {
      name: 'clean',
      process: (context: PipelineContext) => ({
        ...context,
        records: createRecordSet(context.records?.rows.slice(0, 1) ?? [])
      })
    };

    const result = runPipeline([loadStage, clean], createContext('runner-test'), logger);

    expect(result.runId).toBe('runner-test');
    expect(result.reports.map((report) => [report.stage, report.rowsIn, report.rowsOut])).toEqual([
      ['load', null, 2],
      ['clean', 2, 1]
    ]);
  });

  it('aborts on the first failure and never runs later stages', () => {
    const failing: PipelineStage = {
      name: 'clean',
      process: () => {
        throw new Error('boom');
      }
    };
    const persist = vi.fn((context: PipelineContext) => context);

    expect(() =>
      runPipeline([loadStage, failing, { name: 'persist', process: persist }], createContext('abort-test'), logger)
    ).toThrow('boom');
    expect(persist).not.toHaveBeenCalled();
  });
});

describe('buildPipeline', () => {
  it('inserts the snapshot stage before the split when asked', () => {
    const config = loadPipelineConfig({});
    const names = (snapshotPath?: string) =>
      buildPipeline({ inputPath: FIXTURE, config, snapshotPath, logger }).map((stage) => stage.name);

    expect(names()).toEqual([
      'load',
      'clean',
      'basic-features',
      'category-features',
      'complex-features',
      'normalize',
      'encode',
      'split',
      'persist'
    ]);
    expect(names('snap.csv')).toContain('snapshot');
    expect(names('snap.csv').indexOf('snapshot')).toBe(names('snap.csv').indexOf('split') - 1);
  });
});

describe('runResumePipeline on the sample export', () => {
  let outputDir: string;
  let context: PipelineContext;

  beforeAll(() => {
    outputDir = fs.mkdtempSync(path.join(os.tmpdir(), 'resume-pipeline-'));
    context = runResumePipeline({
      inputPath: FIXTURE,
      config: loadPipelineConfig({}),
      outputDir,
      snapshotPath: path.join(outputDir, 'encoded.csv'),
      runId: 'fixture-run'
    });
  });

  afterAll(() => {
    fs.rmSync(outputDir, { recursive: true, force: true });
  });

  it('reports row counts per stage', () => {
    expect(context.reports.map((report) => [report.stage, report.rowsOut])).toEqual([
      ['load', 5],
      ['clean', 4],
      ['basic-features', 4],
      ['category-features', 4],
      ['complex-features', 4],
      ['normalize', 4],
      ['encode', 2],
      ['snapshot', 2],
      ['split', 2],
      ['persist', 2]
    ]);
  });

  it('produces the feature matrix and salary target', () => {
    expect(context.featureNames).toEqual(EXPECTED_FEATURES);
    expect(context.target).toEqual([76_550, 60_000]);
    expect(context.features).toEqual([
      [30, 0, 5.5, 2010, 0, 1, 1, 1, 0, 0, 0, 1, 1, 0, 0, 1, 0, 0, 1, 0, 1, 0, 1, 0],
      [42, 1, 13.17, 2001, 1, 0, 2, 2, 0, 0, 1, 0, 0, 1, 0, 0, 1, 0, 0, 1, 0, 1, 0, 0]
    ]);
  });

  it('writes the three output files', () => {
    const x = fs.readFileSync(path.join(outputDir, OUTPUT_FILES.features));
    const xHeaderLength = x.readUInt16LE(8);
    expect(x.subarray(10, 10 + xHeaderLength).toString('latin1')).toContain("'shape': (2, 24)");
    expect(x.length).toBe(10 + xHeaderLength + 2 * 24 * 8);
    expect(x.readDoubleLE(10 + xHeaderLength)).toBe(30);

    const y = fs.readFileSync(path.join(outputDir, OUTPUT_FILES.target));
    const yHeaderLength = y.readUInt16LE(8);
    expect(y.readDoubleLE(10 + yHeaderLength + 8)).toBe(60_000);

    const names: unknown = JSON.parse(fs.readFileSync(path.join(outputDir, OUTPUT_FILES.featureNames), 'utf-8'));
    expect(names).toEqual(EXPECTED_FEATURES);
  });

  it('writes the encoded snapshot with the target still in place', () => {
    const lines = fs.readFileSync(path.join(outputDir, 'encoded.csv'), 'utf-8').split('\n');

    expect(lines[0]).toBe(['age', 'sex', 'salary', ...EXPECTED_FEATURES.slice(2)].join(','));
    expect(lines[1]).toBe('30,0,76550,5.5,2010,0,1,1,1,0,0,0,1,1,0,0,1,0,0,1,0,1,0,1,0');
    expect(lines).toHaveLength(4);
  });

  it('still filters on salary when another column is the target', () => {
    const ageDir = fs.mkdtempSync(path.join(os.tmpdir(), 'resume-pipeline-age-'));
    try {
      const byAge = runResumePipeline({
        inputPath: FIXTURE,
        config: loadPipelineConfig({}, { targetColumn: 'age' }),
        outputDir: ageDir
      });

      expect(byAge.target).toEqual([30, 42]);
      expect(byAge.featureNames).toEqual(['sex', 'salary', ...EXPECTED_FEATURES.slice(2)]);
      expect(byAge.features?.map((row) => row[1])).toEqual([76_550, 60_000]);
    } finally {
      fs.rmSync(ageDir, { recursive: true, force: true });
    }
  });

  it('fails before writing anything when the input is missing', () => {
    const emptyDir = fs.mkdtempSync(path.join(os.tmpdir(), 'resume-pipeline-missing-'));
    try {
      expect(() =>
        runResumePipeline({
          inputPath: path.join(emptyDir, 'absent.csv'),
          config: loadPipelineConfig({}),
          outputDir: emptyDir
        })
      ).toThrow('Input file not found');
      expect(fs.readdirSync(emptyDir)).toEqual([]);
    } finally {
      fs.rmSync(emptyDir, { recursive: true, force: true });
    }
  });
});
