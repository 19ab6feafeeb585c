export type StageName =
  | 'load'
  | 'clean'
  | 'basic-features'
  | 'category-features'
  | 'complex-features'
  | 'normalize'
  | 'encode'
  | 'split'
  | 'persist'
  | 'snapshot';

/** A single table cell. `null` is the missing sentinel, never zero or ''. */
export type CellValue = string | number | boolean | null;

export type Row = Record<string, CellValue>;

export type RecordSet = {
  /** Column order, used for the final matrix layout */
  columns: string[];
  rows: Row[];
};

export type ColumnKind = 'numeric' | 'boolean' | 'text' | 'empty';

export type StageReport = {
  stage: StageName;
  rowsIn: number | null;
  rowsOut: number | null;
  columnsOut: number | null;
  durationMs: number;
};

export type PipelineContext = {
  runId: string;
  records?: RecordSet;
  /** Set by the split stage */
  features?: number[][];
  featureNames?: string[];
  target?: number[];
  reports: StageReport[];
};

export type PipelineStage = {
  readonly name: StageName;
  process(context: PipelineContext): PipelineContext;
};
