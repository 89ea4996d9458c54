import { describe, it, expect } from '@jest/globals';
import { DeduplicationEngine } from '../DeduplicationEngine';
import { makeRecord, pick, seededRandom } from '../../__tests__/helpers/fixtures';

describe('DeduplicationEngine', () => {
  it('should build keys that ignore case and spacing', () => {
    const a = makeRecord({ operator: 'Acme Air', location: 'Springfield' });
    const b = makeRecord({ operator: '  ACME   air', location: 'springfield ' });
    const c = makeRecord({ operator: 'Acme Air', date: '2020-01-06' });

    expect(DeduplicationEngine.generateCompositeKey(a)).toBe(DeduplicationEngine.generateCompositeKey(b));
    expect(DeduplicationEngine.generateCompositeKey(a)).not.toBe(DeduplicationEngine.generateCompositeKey(c));
  });

  it('should give a missing location its own key', () => {
    const missing = makeRecord({ location: null });
    const other = makeRecord({ location: 'Springfield' });
    expect(DeduplicationEngine.generateCompositeKey(missing)).not.toBe(DeduplicationEngine.generateCompositeKey(other));
  });

  it('should keep the first record and report later ones as duplicates', () => {
    const engine = new DeduplicationEngine();
    const first = makeRecord({ source_id: { path: 'a.csv', row: 1 }, fatalities: 0 });
    const second = makeRecord({ source_id: { path: 'b.csv', row: 4 }, fatalities: 3, operator: 'ACME AIR' });

    expect(engine.admit(first)).toEqual({ status: 'valid', record: first });
    expect(engine.admit(second)).toEqual({
      status: 'duplicate',
      record: second,
      duplicateOf: { path: 'a.csv', row: 1 }
    });

    const result = engine.getResult();
    expect(result.unique).toEqual([first]);
    expect(result.duplicates).toEqual([{
      source_id: { path: 'b.csv', row: 4 },
      duplicateOf: { path: 'a.csv', row: 1 },
      conflicts: [
        { field: 'fatalities', values: [0, 3], resolution: 'keep_first' },
        { field: 'operator', values: ['Acme Air', 'ACME AIR'], resolution: 'keep_first' }
      ]
    }]);
    expect(result.metrics).toEqual({
      totalRecords: 2,
      uniqueRecords: 1,
      duplicatesRemoved: 1,
      conflictsCount: 2
    });
  });

  it('should report no conflicts for identical duplicates', () => {
    const engine = new DeduplicationEngine();
    const result = engine.deduplicate([
      makeRecord({ source_id: { path: 'a.csv', row: 1 } }),
      makeRecord({ source_id: { path: 'a.csv', row: 2 } })
    ]);

    expect(result.duplicates[0].conflicts).toEqual([]);
    expect(result.metrics.conflictsCount).toBe(0);
  });

  it('should remove exactly input size minus distinct keys', () => {
    const random = seededRandom(42);
    const operators = ['Acme Air', 'acme air', 'Beta Cargo', 'Gamma'];
    const dates = ['2019-03-01', '2020-01-05', '2021-07-30'];

    for (let trial = 0; trial < 20; trial++) {
      const records = Array.from({ length: 50 }, (_, row) => makeRecord({
        date: pick(random, dates),
        operator: pick(random, operators),
        fatalities: Math.floor(random() * 5),
        source_id: { path: 'gen.csv', row: row + 1 }
      }));
      const distinct = new Set(records.map(record => DeduplicationEngine.generateCompositeKey(record))).size;

      const result = new DeduplicationEngine().deduplicate(records);

      expect(result.unique).toHaveLength(distinct);
      expect(result.metrics.duplicatesRemoved).toBe(records.length - distinct);
    }
  });
});
