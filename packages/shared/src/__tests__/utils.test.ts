import { describe, it, expect } from '@jest/globals';
import { collapseWhitespace, compareKeys, foldText, formatFileSize } from '../utils';
import { CANONICAL_COLUMNS, UNKNOWN_KEY } from '../constants';

describe('Text utils', () => {
  it('should collapse internal whitespace and trim', () => {
    expect(collapseWhitespace('  Acme \t  Air\n')).toBe('Acme Air');
    expect(collapseWhitespace('   ')).toBe('');
  });

  it('should fold case, width and spacing', () => {
    expect(foldText('  ACME   Air ')).toBe('acme air');
    expect(foldText('ＡＣＭＥ')).toBe('acme');
    expect(foldText(null)).toBe('');
    expect(foldText(undefined)).toBe('');
  });

  it('should compare keys ordinally', () => {
    expect(['b', 'B', 'a', 'unknown', '2020'].sort(compareKeys)).toEqual(['2020', 'B', 'a', 'b', 'unknown']);
    expect(compareKeys('x', 'x')).toBe(0);
  });
});

describe('formatFileSize', () => {
  it('should format bytes with binary units', () => {
    expect(formatFileSize(0)).toBe('0 Bytes');
    expect(formatFileSize(512)).toBe('512 Bytes');
    expect(formatFileSize(1536)).toBe('1.5 KB');
    expect(formatFileSize(500 * 1024 * 1024)).toBe('500 MB');
  });
});

describe('Constants', () => {
  it('should keep canonical column order', () => {
    expect(CANONICAL_COLUMNS).toEqual([
      'date', 'year', 'operator', 'aircraft_type', 'fatalities',
      'damage_level', 'latitude', 'longitude', 'location'
    ]);
    expect(UNKNOWN_KEY).toBe('unknown');
  });
});
