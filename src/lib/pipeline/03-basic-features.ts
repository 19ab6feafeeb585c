import type { CellValue, PipelineStage, RecordSet } from './types';
import { SOURCE_COLUMNS } from './utils/column-mapper';
import { getColumn, hasColumn, requireRecords, round2, setColumn, textOf } from './utils/record-set';

export const MALE = 'Мужчина';
export const FEMALE = 'Женщина';
export const UNKNOWN_CURRENCY = 'unknown';

const SEX_RU = /^(Мужчина|Женщина)/;
const SEX_EN = /^(Male|Female)/;
const SEX_EN_TO_RU: Record<string, string> = { Male: MALE, Female: FEMALE };

const AGE_RU = /(\d+)\s*(?:год|года|лет)/;
const AGE_EN = /(\d+)\s*(?:year|years)/;

const YEARS_RU = /(\d+)\s*(?:год|года|лет)/;
const MONTHS_RU = /(\d+)\s*(?:месяц|месяца|месяцев)/;
const YEARS_EN = /(\d+)\s*years?/;
const MONTHS_EN = /(\d+)\s*months?/;

// 19xx/20xx not glued to letters or digits on either side
const EDUCATION_YEAR = /(?<![\p{L}\p{N}_])(19\d{2}|20\d{2})(?![\p{L}\p{N}_])/gu;

const CURRENCY_SEPARATOR = /[^0-9a-zA-Zа-яА-Я]+/;
const CAR_PHRASES = ['имеется собственный автомобиль', 'having own car'];

export function parseSex(value: CellValue): string | null {
  const text = textOf(value);
  const ru = SEX_RU.exec(text);
  if (ru) return ru[1];

  const en = SEX_EN.exec(text);
  return en ? SEX_EN_TO_RU[en[1]] : null;
}

export function parseAge(value: CellValue): number | null {
  const text = textOf(value).toLowerCase();
  const match = AGE_RU.exec(text) ?? AGE_EN.exec(text);
  return match ? Number.parseInt(match[1], 10) : null;
}

/**
 * `"27 000 руб."` → `{ salary: 27000, currency: 'руб' }`. The currency is the
 * last alphanumeric token after the leading number.
 */
export function parseSalary(value: CellValue): { salary: number | null; currency: string } {
  const compact = textOf(value).replace(/[\u00A0 ]/g, '');

  const amount = /(\d+)/.exec(compact);
  const salary = amount ? Number.parseInt(amount[1], 10) : null;

  const tail = (/\d+(.*)/.exec(compact)?.[1] ?? '').trim().toLowerCase();
  const tokens = tail.split(CURRENCY_SEPARATOR).filter(Boolean);
  const currency = tokens.length > 0 ? tokens[tokens.length - 1] : UNKNOWN_CURRENCY;

  return { salary, currency };
}

/** Years of experience from the first line, e.g. "13 лет 2 месяца" → 13.17. Zero is missing. */
export function parseExperienceYears(value: CellValue): number | null {
  const firstLine = textOf(value).split('\n')[0];

  let years = YEARS_RU.exec(firstLine);
  let months = MONTHS_RU.exec(firstLine);
  if (!years && !months) {
    const lower = firstLine.toLowerCase();
    years = YEARS_EN.exec(lower);
    months = MONTHS_EN.exec(lower);
  }

  const total = (years ? Number(years[1]) : 0) + (months ? Number(months[1]) : 0) / 12;
  return total === 0 ? null : round2(total);
}

export function parseEducationLastYear(value: CellValue): number | null {
  const years = [...textOf(value).matchAll(EDUCATION_YEAR)].map((match) => Number(match[1]));
  return years.length > 0 ? Math.max(...years) : null;
}

export function parseHasCar(value: CellValue): number {
  const text = textOf(value).toLowerCase();
  return CAR_PHRASES.some((phrase) => text.includes(phrase)) ? 1 : 0;
}

/**
 * Adds sex, age, salary, currency, experience_years, education_last_year
 * and has_car. Each field is skipped when its source column is absent.
 */
export function extractBasicFeatures(records: RecordSet): RecordSet {
  let out = records;

  if (hasColumn(records, SOURCE_COLUMNS.sexAge)) {
    const source = getColumn(records, SOURCE_COLUMNS.sexAge);
    out = setColumn(out, 'age', source.map(parseAge));
    out = setColumn(out, 'sex', source.map(parseSex));
  }

  if (hasColumn(records, SOURCE_COLUMNS.salary)) {
    const parsed = getColumn(records, SOURCE_COLUMNS.salary).map(parseSalary);
    out = setColumn(
      out,
      'salary',
      parsed.map((entry) => entry.salary)
    );
    out = setColumn(
      out,
      'currency',
      parsed.map((entry) => entry.currency)
    );
  }

  if (hasColumn(records, SOURCE_COLUMNS.experience)) {
    out = setColumn(out, 'experience_years', getColumn(records, SOURCE_COLUMNS.experience).map(parseExperienceYears));
  }

  if (hasColumn(records, SOURCE_COLUMNS.education)) {
    out = setColumn(out, 'education_last_year', getColumn(records, SOURCE_COLUMNS.education).map(parseEducationLastYear));
  }

  if (hasColumn(records, SOURCE_COLUMNS.car)) {
    out = setColumn(out, 'has_car', getColumn(records, SOURCE_COLUMNS.car).map(parseHasCar));
  }

  return out;
}

export function createBasicFeaturesStage(): PipelineStage {
  return {
    name: 'basic-features',
    process(context) {
      return { ...context, records: extractBasicFeatures(requireRecords(context, 'basic-features')) };
    }
  };
}
