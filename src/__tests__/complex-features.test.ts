import { describe, it, expect } from 'vitest';
import { extractComplexFeatures, parseEducationLevel, parseHasMaster } from '@/lib/pipeline/05-complex-features';
import { createRecordSet } from '@/lib/pipeline/utils/record-set';

describe('parseEducationLevel', () => {
  it('applies the tiers in priority order', () => {
    expect(parseEducationLevel('Высшее образование 2010')).toBe('higher');
    expect(parseEducationLevel('Среднее специальное образование, затем бакалавр')).toBe('higher');
    expect(parseEducationLevel('Среднее профессиональное образование 2008')).toBe('vocational');
    expect(parseEducationLevel('Среднее общее образование 2005')).toBe('school');
  });

  it('defaults to school when nothing matches', () => {
    expect(parseEducationLevel('Курсы кройки и шитья')).toBe('school');
    expect(parseEducationLevel(null)).toBe('school');
  });

  it('reports unknown in strict mode', () => {
    expect(parseEducationLevel('Курсы кройки и шитья', true)).toBe('unknown');
    expect(parseEducationLevel('Bachelor of Arts', true)).toBe('higher');
  });
});

describe('parseHasMaster', () => {
  it('flags master degrees independently of the level', () => {
    expect(parseHasMaster('Высшее образование (Магистр) 2015')).toBe(1);
    expect(parseHasMaster('Высшее образование (Бакалавр) 2013')).toBe(0);
  });
});

describe('extractComplexFeatures', () => {
  const records = createRecordSet([{ 'Образование и ВУЗ': 'Высшее образование (Магистр) 2015' }]);

  it('adds education_level, has_master and raw_education', () => {
    const out = extractComplexFeatures(records);
    expect(out.columns).toEqual(['Образование и ВУЗ', 'education_level', 'has_master', 'raw_education']);
    expect(out.rows[0]).toEqual({
      'Образование и ВУЗ': 'Высшее образование (Магистр) 2015',
      education_level: 'higher',
      has_master: 1,
      raw_education: 'Высшее образование (Магистр) 2015'
    });
  });

  it('can skip the raw copy', () => {
    const out = extractComplexFeatures(records, { keepRawEducation: false });
    expect(out.columns).toEqual(['Образование и ВУЗ', 'education_level', 'has_master']);
  });
});
