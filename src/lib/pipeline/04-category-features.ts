import type { CellValue, PipelineStage, RecordSet } from './types';
import { SOURCE_COLUMNS } from './utils/column-mapper';
import { getColumn, hasColumn, requireRecords, setColumn, textOf } from './utils/record-set';

export type TripsLevel = 'none' | 'rare' | 'regular' | 'unknown';

export type ScheduleToken = 'fullday' | 'flexible' | 'remote' | 'shifts' | 'rotation' | 'other';

export const SCHEDULE_DELIMITER = '|';

const RELOCATION_MARKERS = ['переезд', 'relocat'];
const TRIP_MARKERS = ['командиров', 'business trip'];
const REFUSAL_MARKERS = ['не готов', 'not ready', 'not willing'];
const RELOCATION_CONSENT = ['готов к переезду', 'готова к переезду', 'ready to relocate', 'willing to relocate'];
const RARITY_MARKERS = ['редк', 'rare', 'occasional'];
const CONSENT_MARKERS = ['готов', 'ready', 'willing'];

const SCHEDULE_PHRASES: Record<string, ScheduleToken> = {
  'полный день': 'fullday',
  'full day': 'fullday',
  'гибкий график': 'flexible',
  'flexible schedule': 'flexible',
  'удаленная работа': 'remote',
  'remote working': 'remote',
  'сменный график': 'shifts',
  'shift schedule': 'shifts',
  'вахтовый метод': 'rotation',
  'rotation based work': 'rotation'
};

function containsAny(text: string, markers: string[]) {
  return markers.some((marker) => text.includes(marker));
}

function splitParts(value: CellValue): string[] {
  return textOf(value)
    .split(',')
    .map((part) => part.trim())
    .filter(Boolean);
}

/**
 * Relocation is 1 only when some part consents and no part refuses;
 * a refusal anywhere wins regardless of part order.
 */
export function parseRelocation(parts: string[]): number {
  let consent = false;
  let refusal = false;

  for (const part of parts.map((p) => p.toLowerCase())) {
    if (!containsAny(part, RELOCATION_MARKERS)) continue;
    if (containsAny(part, REFUSAL_MARKERS)) {
      refusal = true;
    } else if (containsAny(part, RELOCATION_CONSENT)) {
      consent = true;
    }
  }

  return consent && !refusal ? 1 : 0;
}

export function parseBusinessTrips(parts: string[]): TripsLevel {
  let rare = false;
  let regular = false;

  for (const part of parts.map((p) => p.toLowerCase())) {
    if (!containsAny(part, TRIP_MARKERS)) continue;
    if (containsAny(part, REFUSAL_MARKERS)) return 'none';
    if (containsAny(part, RARITY_MARKERS)) {
      rare = true;
    } else if (containsAny(part, CONSENT_MARKERS)) {
      regular = true;
    }
  }

  if (rare) return 'rare';
  return regular ? 'regular' : 'unknown';
}

export function parseLocation(value: CellValue): { city: string; relocation: number; businessTrips: TripsLevel } {
  const parts = splitParts(value);
  return {
    city: parts[0] ?? '',
    relocation: parseRelocation(parts),
    businessTrips: parseBusinessTrips(parts)
  };
}

export function normalizeScheduleToken(token: string): ScheduleToken {
  const key = token.trim().toLowerCase();
  return Object.hasOwn(SCHEDULE_PHRASES, key) ? SCHEDULE_PHRASES[key] : 'other';
}

/** "удаленная работа, полный день" → "fullday|remote" */
export function parseSchedule(value: CellValue): string {
  const tokens = new Set(splitParts(value).map(normalizeScheduleToken));
  return [...tokens].sort().join(SCHEDULE_DELIMITER);
}

/**
 * Adds city, relocation, business_trips (from the location field) and the
 * normalized schedule set.
 */
export function extractCategoryFeatures(records: RecordSet): RecordSet {
  let out = records;

  if (hasColumn(records, SOURCE_COLUMNS.location)) {
    const parsed = getColumn(records, SOURCE_COLUMNS.location).map(parseLocation);
    out = setColumn(out, 'city', parsed.map((entry) => entry.city));
    out = setColumn(out, 'relocation', parsed.map((entry) => entry.relocation));
    out = setColumn(out, 'business_trips', parsed.map((entry) => entry.businessTrips));
  }

  if (hasColumn(records, SOURCE_COLUMNS.schedule)) {
    out = setColumn(out, 'schedule', getColumn(records, SOURCE_COLUMNS.schedule).map(parseSchedule));
  }

  return out;
}

export function createCategoryFeaturesStage(): PipelineStage {
  return {
    name: 'category-features',
    process(context) {
      return { ...context, records: extractCategoryFeatures(requireRecords(context, 'category-features')) };
    }
  };
}
