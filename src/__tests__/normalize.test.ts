import { describe, it, expect } from 'vitest';
import { convertSalary, normalizeCity, normalizePosition, normalizeRecords } from '@/lib/pipeline/06-normalize';
import { createRecordSet } from '@/lib/pipeline/utils/record-set';

describe('normalizePosition', () => {
  it('lowercases and canonicalizes comma and slash spacing', () => {
    expect(normalizePosition('  Менеджер ,Продавец/Кассир ')).toBe('менеджер, продавец / кассир');
  });

  it('turns missing into an empty string', () => {
    expect(normalizePosition(null)).toBe('');
  });
});

describe('normalizeCity', () => {
  it('canonicalizes the capital even with metro detail', () => {
    expect(normalizeCity('Москва, м. Ясенево')).toBe('москва');
    expect(normalizeCity('г. Москва (ЦАО)')).toBe('москва');
  });

  it('does not treat other words containing the capital name as the capital', () => {
    expect(normalizeCity('Москворецкий')).toBe('москворецкий');
  });

  it('maps the capital region phrase', () => {
    expect(normalizeCity('Московская обл., Химки')).toBe('московская область');
  });

  it('strips trailing parenthetical notes and collapses spaces', () => {
    expect(normalizeCity('Нижний   Новгород (Нижегородская область)')).toBe('нижний новгород');
  });
});

describe('convertSalary', () => {
  const rates = { usd: 76.55, руб: 1 };

  it('multiplies by the fixed rate', () => {
    expect(convertSalary(1000, 'USD', rates)).toBe(76550);
  });

  it('uses rate 1.0 for unknown currencies', () => {
    expect(convertSalary(1000, 'unknown', rates)).toBe(1000);
    expect(convertSalary(1000, 'toString', rates)).toBe(1000);
  });

  it('keeps a missing salary missing', () => {
    expect(convertSalary(null, 'usd', rates)).toBeNull();
  });
});

describe('normalizeRecords', () => {
  it('derives position columns and drops their sources', () => {
    const records = createRecordSet([
      {
        'Ищет работу на должность:': 'Водитель/Экспедитор',
        'Последеняя/нынешняя должность': 'Водитель',
        'Последенее/нынешнее место работы': 'ООО Перевозки',
        salary: 500,
        currency: 'eur',
        city: 'Москва'
      }
    ]);

    const out = normalizeRecords(records, { currencyRates: { eur: 100 } });

    expect(out.columns).toEqual(['salary', 'currency', 'city', 'position', 'last_position', 'last_work']);
    expect(out.rows[0]).toEqual({
      salary: 50000,
      currency: 'eur',
      city: 'москва',
      position: 'водитель / экспедитор',
      last_position: 'водитель',
      last_work: 'ООО Перевозки'
    });
  });
});
