import type { CellValue, PipelineStage, RecordSet } from './types';
import { SOURCE_COLUMNS } from './utils/column-mapper';
import { getColumn, hasColumn, requireRecords, setColumn, textOf } from './utils/record-set';

export type EducationLevel = 'school' | 'vocational' | 'higher' | 'unknown';

export type ComplexFeatureOptions = {
  /** Copy the education text into `raw_education` (dropped by the encoder) */
  keepRawEducation?: boolean;
  /** Unmatched text becomes `unknown` instead of `school` */
  strictEducation?: boolean;
};

// Checked in order: the first tier with a matching phrase wins.
const EDUCATION_TIERS: Array<{ level: Exclude<EducationLevel, 'unknown'>; phrases: string[] }> = [
  { level: 'higher', phrases: ['высшее', 'бакалавр', 'магистр', 'higher', 'bachelor', 'master'] },
  {
    level: 'vocational',
    phrases: ['среднее профессиональное', 'среднее специальное', 'secondary special', 'vocational']
  },
  { level: 'school', phrases: ['среднее общее', 'secondary education'] }
];

const MASTER_PHRASES = ['магистр', 'master'];

export function parseEducationLevel(value: CellValue, strict = false): EducationLevel {
  const text = textOf(value).toLowerCase();
  const tier = EDUCATION_TIERS.find((candidate) => candidate.phrases.some((phrase) => text.includes(phrase)));
  if (tier) return tier.level;
  return strict ? 'unknown' : 'school';
}

export function parseHasMaster(value: CellValue): number {
  const text = textOf(value).toLowerCase();
  return MASTER_PHRASES.some((phrase) => text.includes(phrase)) ? 1 : 0;
}

export function extractComplexFeatures(records: RecordSet, options: ComplexFeatureOptions = {}): RecordSet {
  if (!hasColumn(records, SOURCE_COLUMNS.education)) return records;

  const source = getColumn(records, SOURCE_COLUMNS.education);
  let out = setColumn(
    records,
    'education_level',
    source.map((value) => parseEducationLevel(value, options.strictEducation ?? false))
  );
  out = setColumn(out, 'has_master', source.map(parseHasMaster));

  if (options.keepRawEducation ?? true) {
    out = setColumn(out, 'raw_education', source);
  }

  return out;
}

export function createComplexFeaturesStage(options: ComplexFeatureOptions = {}): PipelineStage {
  return {
    name: 'complex-features',
    process(context) {
      return { ...context, records: extractComplexFeatures(requireRecords(context, 'complex-features'), options) };
    }
  };
}
