export type SourceField =
  | 'sexAge'
  | 'salary'
  | 'desiredPosition'
  | 'location'
  | 'employment'
  | 'schedule'
  | 'experience'
  | 'lastWorkplace'
  | 'lastPosition'
  | 'education'
  | 'updatedAt'
  | 'car';

/** Column headers of the job-board export, spelled exactly as the export spells them. */
export const SOURCE_COLUMNS: Record<SourceField, string> = {
  sexAge: 'Пол, возраст',
  salary: 'ЗП',
  desiredPosition: 'Ищет работу на должность:',
  location: 'Город',
  employment: 'Занятость',
  schedule: 'График',
  experience: 'Опыт (двойное нажатие для полной версии)',
  lastWorkplace: 'Последенее/нынешнее место работы',
  lastPosition: 'Последеняя/нынешняя должность',
  education: 'Образование и ВУЗ',
  updatedAt: 'Обновление резюме',
  car: 'Авто'
};

/** Index columns left behind by dataframe exports. */
export const INDEX_COLUMNS = ['Unnamed: 0', 'Unnamed: 0.1', ''];

const MAX_HEADER_DISTANCE = 2;

function normalizeHeader(value: string): string {
  return value.replace(/\uFEFF/g, '').replace(/\u00A0/g, ' ').toLowerCase().replace(/\s+/g, ' ').trim();
}

function levenshtein(a: string, b: string): number {
  const dp: number[][] = Array.from({ length: a.length + 1 }, () => Array<number>(b.length + 1).fill(0));

  for (let i = 0; i <= a.length; i += 1) dp[i][0] = i;
  for (let j = 0; j <= b.length; j += 1) dp[0][j] = j;

  for (let i = 1; i <= a.length; i += 1) {
    for (let j = 1; j <= b.length; j += 1) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      dp[i][j] = Math.min(dp[i - 1][j] + 1, dp[i][j - 1] + 1, dp[i - 1][j - 1] + cost);
    }
  }

  return dp[a.length][b.length];
}

/**
 * Maps headers as found in the file to canonical source column names.
 * Exact names win; otherwise a header matches after whitespace/case
 * normalization, or (for longer names) within a small edit distance. Headers that match
 * nothing keep their own name.
 */
export function buildHeaderMap(headers: string[]): Map<string, string> {
  const result = new Map<string, string>();
  const claimed = new Set<string>();
  const canonical = Object.values(SOURCE_COLUMNS);

  for (const header of headers) {
    if (canonical.includes(header)) {
      result.set(header, header);
      claimed.add(header);
    }
  }

  for (const header of headers) {
    if (result.has(header)) continue;

    const normalized = normalizeHeader(header);
    const candidates = canonical
      .filter((name) => !claimed.has(name))
      .map((name) => {
        const target = normalizeHeader(name);
        // short names (ЗП, Авто) only match after normalization
        const limit = target.length > 6 ? MAX_HEADER_DISTANCE : 0;
        return { name, distance: levenshtein(normalized, target), limit };
      })
      .filter((candidate) => candidate.distance <= candidate.limit)
      .sort((a, b) => a.distance - b.distance);

    const best = candidates[0];
    if (best) {
      result.set(header, best.name);
      claimed.add(best.name);
    } else {
      result.set(header, header);
    }
  }

  return result;
}
