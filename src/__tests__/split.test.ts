import { describe, it, expect } from 'vitest';
import { MissingRequiredInputError } from '@/lib/pipeline/errors';
import { createSplitStage, splitTarget } from '@/lib/pipeline/08-split';
import { createContext } from '@/lib/pipeline';
import { createRecordSet } from '@/lib/pipeline/utils/record-set';

describe('splitTarget', () => {
  it('fails when the target column is absent', () => {
    const records = createRecordSet([{ a: 1 }]);
    expect(() => splitTarget(records, 'salary')).toThrow(MissingRequiredInputError);
    expect(() => splitTarget(records, 'salary')).toThrow('Stage "split" requires "salary", which is missing');
  });

  it('separates the target and coerces unparsable cells to NaN', () => {
    const records = createRecordSet([
      { a: 1, b: 'x', salary: '100' },
      { a: null, b: 2, salary: 'n/a' }
    ]);

    const result = splitTarget(records, 'salary');

    expect(result.featureNames).toEqual(['a', 'b']);
    expect(result.features).toEqual([
      [1, Number.NaN],
      [Number.NaN, 2]
    ]);
    expect(result.target).toEqual([100, Number.NaN]);
    expect(result.coercedToMissing).toEqual({ b: 1 });
  });
});

describe('createSplitStage', () => {
  it('puts the matrix on the context', () => {
    const stage = createSplitStage({ targetColumn: 'salary' });
    const context = { ...createContext('split-run'), records: createRecordSet([{ age: 30, salary: 60_000 }]) };

    const next = stage.process(context);

    expect(next.features).toEqual([[30]]);
    expect(next.featureNames).toEqual(['age']);
    expect(next.target).toEqual([60_000]);
  });
});
