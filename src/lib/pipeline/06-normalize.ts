import type { CellValue, PipelineStage, RecordSet } from './types';
import { SOURCE_COLUMNS } from './utils/column-mapper';
import { dropColumns, getColumn, hasColumn, requireRecords, setColumn, textOf, toNumber } from './utils/record-set';

/** Fixed RUB rates keyed by the lowercase currency token. Not live rates. */
export const DEFAULT_CURRENCY_RATES: Record<string, number> = {
  usd: 76.55,
  eur: 91.46,
  руб: 1.0,
  грн: 1.8,
  azn: 45.03,
  kzt: 0.15,
  kgs: 0.88,
  сум: 0.006
};

export const CAPITAL = 'москва';
export const CAPITAL_REGION = 'московская область';

const CAPITAL_PATTERN = /(?<![\p{L}\p{N}_])москва(?![\p{L}\p{N}_])/u;
const CAPITAL_REGION_PATTERN = /московск(?:ая|ой)\s+обл|московская область/;

export type NormalizeOptions = {
  currencyRates?: Record<string, number>;
};

export function normalizePosition(value: CellValue): string {
  return textOf(value)
    .trim()
    .toLowerCase()
    .replace(/\s*,\s*/g, ', ')
    .replace(/\s*\/\s*/g, ' / ');
}

/**
 * Lowercases and trims a city; anything naming the capital (even with
 * metro or district detail) becomes the capital, the capital region
 * phrase becomes the region, trailing "(...)" notes are removed.
 */
export function normalizeCity(value: CellValue): string {
  let city = textOf(value).trim().toLowerCase();

  if (CAPITAL_PATTERN.test(city)) {
    city = CAPITAL;
  } else if (CAPITAL_REGION_PATTERN.test(city)) {
    city = CAPITAL_REGION;
  }

  return city.replace(/\s*\(.*\)$/, '').replace(/\s+/g, ' ');
}

export function convertSalary(salary: CellValue, currency: CellValue, rates: Record<string, number>): number | null {
  const amount = toNumber(salary);
  if (amount == null) return null;
  const key = textOf(currency).toLowerCase();
  const rate = Object.hasOwn(rates, key) ? rates[key] : 1.0;
  return amount * rate;
}

/**
 * Converts salary to RUB, normalizes city and positions, copies the last
 * workplace to `last_work` and drops the three raw position/work columns.
 */
export function normalizeRecords(records: RecordSet, options: NormalizeOptions = {}): RecordSet {
  const rates = { ...DEFAULT_CURRENCY_RATES, ...options.currencyRates };
  let out = records;

  if (hasColumn(out, 'salary') && hasColumn(out, 'currency')) {
    out = setColumn(
      out,
      'salary',
      out.rows.map((row) => convertSalary(row.salary ?? null, row.currency ?? null, rates))
    );
  }

  if (hasColumn(out, 'city')) {
    out = setColumn(out, 'city', getColumn(out, 'city').map(normalizeCity));
  }

  if (hasColumn(out, SOURCE_COLUMNS.desiredPosition)) {
    out = setColumn(out, 'position', getColumn(out, SOURCE_COLUMNS.desiredPosition).map(normalizePosition));
  }
  if (hasColumn(out, SOURCE_COLUMNS.lastPosition)) {
    out = setColumn(out, 'last_position', getColumn(out, SOURCE_COLUMNS.lastPosition).map(normalizePosition));
  }
  if (hasColumn(out, SOURCE_COLUMNS.lastWorkplace)) {
    out = setColumn(out, 'last_work', getColumn(out, SOURCE_COLUMNS.lastWorkplace));
  }

  return dropColumns(out, [SOURCE_COLUMNS.desiredPosition, SOURCE_COLUMNS.lastPosition, SOURCE_COLUMNS.lastWorkplace]);
}

export function createNormalizeStage(options: NormalizeOptions = {}): PipelineStage {
  return {
    name: 'normalize',
    process(context) {
      return { ...context, records: normalizeRecords(requireRecords(context, 'normalize'), options) };
    }
  };
}
