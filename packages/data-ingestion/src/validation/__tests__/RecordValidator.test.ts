import { describe, it, expect } from '@jest/globals';
import { DAMAGE_LEVELS, DamageLevel, type CanonicalRecord } from '@incident-atlas/types';
import { RecordValidator, type RecordValidation } from '../RecordValidator';
import { DamageClassifier } from '../DamageClassifier';
import { SchemaNormalizer } from '../SchemaNormalizer';
import { ReasonCode, type CandidateRecord, type RawRow } from '../../types';
import { pick, seededRandom } from '../../__tests__/helpers/fixtures';

function makeCandidate(overrides: Partial<CandidateRecord> = {}): CandidateRecord {
  return {
    date: '2020-01-05',
    sourceYear: null,
    operator: 'Acme Air',
    aircraft_type: 'B737',
    fatalities: 2,
    damageText: 'Substantial',
    latitude: 40.7,
    longitude: -74.1,
    location: 'Springfield',
    source_id: { path: 'a.csv', row: 1 },
    missingFields: [],
    ...overrides
  };
}

function reasonOf(validation: RecordValidation): ReasonCode | null {
  return validation.outcome.status === 'invalid' ? validation.outcome.reason : null;
}

describe('RecordValidator', () => {
  const validator = new RecordValidator();

  it('should produce a frozen canonical record', () => {
    const { outcome, warnings } = validator.validate(makeCandidate());

    expect(warnings).toEqual([]);
    expect(outcome.status).toBe('valid');
    if (outcome.status !== 'valid') return;

    expect(outcome.record).toEqual({
      date: '2020-01-05',
      year: 2020,
      operator: 'Acme Air',
      aircraft_type: 'B737',
      fatalities: 2,
      damage_level: DamageLevel.SUBSTANTIAL,
      latitude: 40.7,
      longitude: -74.1,
      location: 'Springfield',
      source_id: { path: 'a.csv', row: 1 }
    });
    expect(Object.isFrozen(outcome.record)).toBe(true);
  });

  it('should reject missing required fields first', () => {
    const validation = validator.validate(makeCandidate({ date: null, missingFields: ['date'], sourceYear: 1999 }));

    expect(reasonOf(validation)).toBe(ReasonCode.MISSING_REQUIRED_FIELD);
    expect(validation.outcome).toEqual({
      status: 'invalid',
      reason: ReasonCode.MISSING_REQUIRED_FIELD,
      message: 'Missing required field(s): date',
      source_id: { path: 'a.csv', row: 1 }
    });
  });

  it('should reject a year column that disagrees with the date', () => {
    expect(reasonOf(validator.validate(makeCandidate({ sourceYear: 2019 })))).toBe(ReasonCode.YEAR_MISMATCH);
    expect(reasonOf(validator.validate(makeCandidate({ sourceYear: 2020 })))).toBeNull();
  });

  it('should reject negative and fractional fatalities', () => {
    expect(reasonOf(validator.validate(makeCandidate({ fatalities: -1 })))).toBe(ReasonCode.NEGATIVE_FATALITIES);
    expect(reasonOf(validator.validate(makeCandidate({ fatalities: 2.5 })))).toBe(ReasonCode.INVALID_FATALITIES);
  });

  it('should default missing fatalities to zero with a warning', () => {
    const { outcome, warnings } = validator.validate(makeCandidate({ fatalities: null }));

    expect(outcome.status === 'valid' && outcome.record.fatalities).toBe(0);
    expect(warnings).toEqual([{ field: 'fatalities', value: '', message: 'Fatalities missing, defaulted to 0' }]);
  });

  it('should resolve unmatched damage text to unknown', () => {
    const { outcome } = validator.validate(makeCandidate({ damageText: 'fell off a truck' }));
    expect(outcome.status === 'valid' && outcome.record.damage_level).toBe(DamageLevel.UNKNOWN);
  });

  it('should require both coordinates or neither', () => {
    expect(reasonOf(validator.validate(makeCandidate({ longitude: null })))).toBe(ReasonCode.PARTIAL_COORDINATES);
    expect(reasonOf(validator.validate(makeCandidate({ latitude: null, longitude: null })))).toBeNull();
  });

  it('should range-check coordinates', () => {
    expect(reasonOf(validator.validate(makeCandidate({ latitude: 91 })))).toBe(ReasonCode.COORDINATES_OUT_OF_RANGE);
    expect(reasonOf(validator.validate(makeCandidate({ longitude: -180.5 })))).toBe(ReasonCode.COORDINATES_OUT_OF_RANGE);
    expect(reasonOf(validator.validate(makeCandidate({ latitude: -90, longitude: 180 })))).toBeNull();
  });
});

describe('normalized and validated rows', () => {
  const pad = (value: number): string => String(value).padStart(2, '0');

  function generateRow(random: () => number): RawRow {
    const year = 1990 + Math.floor(random() * 35);
    const month = 1 + Math.floor(random() * 12);
    const day = 1 + Math.floor(random() * 28);
    const row: RawRow = {};

    const dateStyle = random();
    if (dateStyle < 0.4) {
      row['Incident Date'] = `${year}-${pad(month)}-${pad(day)}`;
    } else if (dateStyle < 0.7) {
      row['Incident Date'] = `${pad(day)}/${pad(month)}/${year}`;
    } else if (dateStyle < 0.85) {
      row['Incident Date'] = pick(random, ['soon', '2020-13-45', '']);
    }

    const yearStyle = random();
    if (yearStyle < 0.3) {
      row.Year = String(year);
    } else if (yearStyle < 0.4) {
      row.Year = String(year + 1);
    }

    if (random() < 0.9) row.Operator = pick(random, ['Acme Air', 'Beta Cargo', '  gamma  ', 'n/a']);
    if (random() < 0.5) row.Type = pick(random, ['B737', 'A320', 'ATR 72']);
    if (random() < 0.9) {
      row.Fatalities = pick(random, [
        String(Math.floor(random() * 300)),
        String(-1 - Math.floor(random() * 5)),
        '1,234',
        '2.5',
        'unknown',
        ''
      ]);
    }
    if (random() < 0.8) row.Damage = pick(random, ['Destroyed', 'substantial damage', 'MINOR', 'none', 'hull loss', 'odd']);
    if (random() < 0.6) row.Lat = String(random() * 200 - 100);
    if (random() < 0.6) row.Lon = String(random() * 400 - 200);

    return row;
  }

  it('should only accept records whose invariants hold', () => {
    const random = seededRandom(42);
    const normalizer = new SchemaNormalizer();
    const validator = new RecordValidator();
    const accepted: CanonicalRecord[] = [];
    const reasons = new Set<string>(Object.values(ReasonCode));

    for (let i = 1; i <= 400; i++) {
      const { candidate } = normalizer.normalizeRow(generateRow(random), { path: 'gen.csv', row: i });
      const { outcome } = validator.validate(candidate);

      if (outcome.status === 'valid') {
        accepted.push(outcome.record);
      } else if (outcome.status === 'invalid') {
        expect(reasons.has(outcome.reason)).toBe(true);
      }
    }

    expect(accepted.length).toBeGreaterThan(0);
    for (const record of accepted) {
      expect(record.year).toBe(Number(record.date.slice(0, 4)));
      expect(record.date).toMatch(/^\d{4}-\d{2}-\d{2}$/);
      expect(Number.isInteger(record.fatalities)).toBe(true);
      expect(record.fatalities).toBeGreaterThanOrEqual(0);
      expect(DAMAGE_LEVELS).toContain(record.damage_level);
      expect((record.latitude === null) === (record.longitude === null)).toBe(true);
      if (record.latitude !== null && record.longitude !== null) {
        expect(Math.abs(record.latitude)).toBeLessThanOrEqual(90);
        expect(Math.abs(record.longitude)).toBeLessThanOrEqual(180);
      }
      expect(Object.isFrozen(record)).toBe(true);
    }
  });
});

describe('DamageClassifier', () => {
  const classifier = new DamageClassifier();

  it.each([
    ['Substantial', DamageLevel.SUBSTANTIAL],
    ['DESTROYED', DamageLevel.DESTROYED],
    ['W/O', DamageLevel.DESTROYED],
    ['Aircraft destroyed by fire', DamageLevel.DESTROYED],
    ['damaged beyond repair, hull loss', DamageLevel.DESTROYED],
    ['no damage reported', DamageLevel.NONE],
    ['None', DamageLevel.NONE],
    ['minor damage to wing', DamageLevel.MINOR],
    ['heavy damage', DamageLevel.SUBSTANTIAL],
    ['N/A', DamageLevel.UNKNOWN],
    ['banana', DamageLevel.UNKNOWN],
    ['', DamageLevel.UNKNOWN]
  ])('should classify %p', (text, expected) => {
    expect(classifier.classify(text)).toBe(expected);
  });

  it('should treat absent text as unknown', () => {
    expect(classifier.classify(null)).toBe(DamageLevel.UNKNOWN);
  });

  it('should not match synonyms inside other words', () => {
    // "lightning" contains "light" but not as a whole word
    expect(classifier.classify('lightning strike')).toBe(DamageLevel.UNKNOWN);
  });

  it('should accept a custom synonym table', () => {
    const custom = new DamageClassifier({ minor: ['scratched'] });
    expect(custom.classify('Scratched paint')).toBe(DamageLevel.MINOR);
    expect(custom.classify('destroyed')).toBe(DamageLevel.UNKNOWN);
  });
});
