import { format as formatDate, isValid, parse } from 'date-fns';
import { collapseWhitespace } from '@incident-atlas/shared';
import { DEFAULT_DATE_FORMATS } from '../config/pipelineConfig';

export interface NormalizationResult<T> {
  normalized: T | null;
  original: string;
  isValid: boolean;
  error?: string;
}

// Fixed reference so parse() never borrows fields from "today"
const REFERENCE_DATE = new Date(2000, 0, 1);

// A trailing time of day ("14:30", "2:05:10 PM", "T08:00:00Z", "+02:00") that dates may carry
const TIME_SUFFIX = /[T\s]+\d{1,2}:\d{2}(:\d{2}(\.\d+)?)?\s*([AP]M)?\s*(Z|[+-]\d{2}:?\d{2})?$/i;

// 1,234 / 1 234 / 1'234 / 1_234, optionally signed and with decimals
const GROUPED_NUMBER = /^[+-]?\d{1,3}([,\s'_]\d{3})+(\.\d+)?$/;
const PLAIN_NUMBER = /^[+-]?(\d+(\.\d*)?|\.\d+)$/;

const TEXT_PLACEHOLDERS = new Set(['null', 'none', 'nan', 'n/a', 'na', '-', '?', 'unknown', 'unk']);

const COORDINATE_WITH_HEMISPHERE = /^([+-]?\d+(\.\d+)?)\s*°?\s*([NSEW])$/i;

/**
 * Value coercion for the schema normalizer.
 * Every method returns the same result shape and never throws on bad input.
 */
export class DataNormalizer {
  private readonly dateFormats: readonly string[];

  constructor(dateFormats: readonly string[] = DEFAULT_DATE_FORMATS) {
    this.dateFormats = dateFormats;
  }

  /**
   * Parse a calendar date by trying each known format in order.
   * Normalized value is YYYY-MM-DD.
   */
  normalizeDate(value: string): NormalizationResult<string> {
    const result: NormalizationResult<string> = { normalized: null, original: value, isValid: false };

    const trimmed = collapseWhitespace(value);
    if (!trimmed) {
      result.error = 'Empty date';
      return result;
    }

    const datePart = trimmed.replace(TIME_SUFFIX, '').trim();

    for (const pattern of this.dateFormats) {
      const date = parse(datePart, pattern, REFERENCE_DATE);
      if (isValid(date) && date.getFullYear() >= 1000 && date.getFullYear() <= 9999) {
        result.normalized = formatDate(date, 'yyyy-MM-dd');
        result.isValid = true;
        return result;
      }
    }

    result.error = `Unrecognized date format: "${trimmed}"`;
    return result;
  }

  /**
   * Parse a number, tolerating thousands separators
   */
  normalizeNumber(value: string): NormalizationResult<number> {
    const result: NormalizationResult<number> = { normalized: null, original: value, isValid: false };

    const trimmed = value.trim();
    if (!trimmed) {
      result.error = 'Empty number';
      return result;
    }

    let numeric: string | null = null;
    if (PLAIN_NUMBER.test(trimmed)) {
      numeric = trimmed;
    } else if (GROUPED_NUMBER.test(trimmed)) {
      numeric = trimmed.replace(/[,\s'_]/g, '');
    }

    const parsed = numeric === null ? NaN : Number(numeric);
    if (Number.isFinite(parsed)) {
      result.normalized = parsed;
      result.isValid = true;
    } else {
      result.error = `Not a number: "${trimmed}"`;
    }
    return result;
  }

  /**
   * Parse a latitude/longitude component. Accepts signed decimals and
   * hemisphere suffixes (40.5N, 73.2 W). Range checks are the validator's job.
   */
  normalizeCoordinate(value: string, axis: 'latitude' | 'longitude'): NormalizationResult<number> {
    const trimmed = value.trim();
    const hemisphere = trimmed.match(COORDINATE_WITH_HEMISPHERE);

    if (!hemisphere) {
      return this.normalizeNumber(trimmed);
    }

    const result: NormalizationResult<number> = { normalized: null, original: value, isValid: false };
    const letter = hemisphere[3].toUpperCase();
    const matchesAxis = axis === 'latitude' ? letter === 'N' || letter === 'S' : letter === 'E' || letter === 'W';
    if (!matchesAxis) {
      result.error = `Hemisphere ${letter} does not apply to ${axis}`;
      return result;
    }

    const magnitude = Math.abs(Number(hemisphere[1]));
    result.normalized = letter === 'S' || letter === 'W' ? -magnitude : magnitude;
    result.isValid = true;
    return result;
  }

  /**
   * Trim and collapse whitespace; blank and placeholder values become null
   */
  normalizeText(value: string): NormalizationResult<string> {
    const cleaned = collapseWhitespace(value);
    if (!cleaned || TEXT_PLACEHOLDERS.has(cleaned.toLowerCase())) {
      return { normalized: null, original: value, isValid: true };
    }
    return { normalized: cleaned, original: value, isValid: true };
  }
}

export default DataNormalizer;
