import { collapseWhitespace } from '@incident-atlas/shared';
import type { SourceRef } from '@incident-atlas/types';
import fieldAliases from '../mappings/field-aliases.json';
import type {
  CandidateRecord,
  CoercionWarning,
  NormalizedCandidate,
  RawFile,
  RawRow
} from '../types';
import { DataNormalizer } from './DataNormalizer';
import type { GeocodeCache } from './GeocodeCache';
import logger from '../utils/logger';

export type SourceField = keyof typeof fieldAliases;

const SOURCE_FIELDS: readonly SourceField[] = [
  'date',
  'year',
  'operator',
  'aircraft_type',
  'fatalities',
  'damage_level',
  'latitude',
  'longitude',
  'location'
];

export interface SchemaNormalizerOptions {
  dateFormats?: readonly string[];
  geocodeCache?: GeocodeCache;
}

/**
 * Lowercase, trim, and fold spaces/hyphens/dots/slashes to underscores
 */
export function normalizeHeader(header: string): string {
  return header
    .normalize('NFKC')
    .trim()
    .toLowerCase()
    .replace(/[\s\-./]+/g, '_')
    .replace(/^_+|_+$/g, '');
}

/**
 * Maps source-native rows onto candidate records.
 * Never rejects a row: structural gaps are flagged in `missingFields` for the validator.
 */
export class SchemaNormalizer {
  private readonly aliasIndex = new Map<string, SourceField>();
  private readonly normalizer: DataNormalizer;
  private readonly geocodeCache?: GeocodeCache;

  constructor(options: SchemaNormalizerOptions = {}) {
    for (const field of SOURCE_FIELDS) {
      for (const alias of fieldAliases[field]) {
        this.aliasIndex.set(normalizeHeader(alias), field);
      }
    }
    this.normalizer = new DataNormalizer(options.dateFormats);
    this.geocodeCache = options.geocodeCache;
  }

  resolveColumn(header: string): SourceField | null {
    return this.aliasIndex.get(normalizeHeader(header)) ?? null;
  }

  /**
   * Lazily normalize the rows of one file, one candidate per parsed row.
   * Blank rows come out as candidates with every required field missing.
   */
  async *normalizeRows(rows: AsyncIterable<RawRow>, file: RawFile): AsyncGenerator<NormalizedCandidate> {
    const columns = new Map<string, SourceField | null>();
    const unmapped: string[] = [];
    let rowNumber = 0;

    for await (const row of rows) {
      rowNumber++;

      const headers = Object.keys(row);
      const newlyUnmapped: string[] = [];
      for (const header of headers) {
        if (columns.has(header)) continue;
        const field = this.resolveColumn(header);
        columns.set(header, field);
        if (field === null) newlyUnmapped.push(header);
      }

      if (newlyUnmapped.length > 0) {
        unmapped.push(...newlyUnmapped);
        logger.warn('Ignoring unmapped columns', { path: file.path, columns: newlyUnmapped });
      }

      yield this.normalizeRow(row, { path: file.path, row: rowNumber }, columns);
    }

    logger.debug('File normalized', { path: file.path, rows: rowNumber, unmappedColumns: unmapped.length });
  }

  normalizeRow(
    row: RawRow,
    source: SourceRef,
    columns: ReadonlyMap<string, SourceField | null> = this.columnsFor(row)
  ): NormalizedCandidate {
    const values = this.pickValues(row, columns);
    const warnings: CoercionWarning[] = [];
    const missingFields: string[] = [];

    const warn = (field: string, value: string, message?: string): void => {
      warnings.push({ field, value, message: message ?? `Could not interpret ${field}` });
    };

    let date: string | null = null;
    if (values.date === undefined) {
      missingFields.push('date');
    } else {
      const result = this.normalizer.normalizeDate(values.date);
      if (result.isValid) {
        date = result.normalized;
      } else {
        missingFields.push('date');
        warn('date', values.date, result.error);
      }
    }

    let sourceYear: number | null = null;
    if (values.year !== undefined) {
      const result = this.normalizer.normalizeNumber(values.year);
      if (result.normalized !== null && Number.isInteger(result.normalized)) {
        sourceYear = result.normalized;
      } else {
        warn('year', values.year, result.error ?? 'Year is not a whole number');
      }
    }

    const operator = this.text(values.operator);
    const aircraftType = this.text(values.aircraft_type);
    if (operator === null && aircraftType === null) {
      missingFields.push('operator', 'aircraft_type');
    }

    let fatalities: number | null = null;
    if (values.fatalities !== undefined) {
      const result = this.normalizer.normalizeNumber(values.fatalities);
      if (result.isValid) {
        fatalities = result.normalized;
      } else {
        warn('fatalities', values.fatalities, result.error);
      }
    }

    let latitude = this.coordinate(values.latitude, 'latitude', warn);
    let longitude = this.coordinate(values.longitude, 'longitude', warn);
    const location = this.text(values.location);

    if (latitude === null && longitude === null && this.geocodeCache) {
      const cached = this.geocodeCache.lookup(location);
      if (cached) {
        latitude = cached.latitude;
        longitude = cached.longitude;
      }
    }

    const damageText = values.damage_level === undefined ? null : collapseWhitespace(values.damage_level);

    const candidate: CandidateRecord = {
      date,
      sourceYear,
      operator,
      aircraft_type: aircraftType,
      fatalities,
      damageText,
      latitude,
      longitude,
      location,
      source_id: source,
      missingFields
    };

    return { candidate, warnings };
  }

  // First non-empty value per canonical field, in source column order
  private pickValues(
    row: RawRow,
    columns: ReadonlyMap<string, SourceField | null>
  ): Partial<Record<SourceField, string>> {
    const values: Partial<Record<SourceField, string>> = {};
    for (const [header, raw] of Object.entries(row)) {
      const field = columns.get(header);
      if (!field || values[field] !== undefined || raw.trim() === '') continue;
      values[field] = raw;
    }
    return values;
  }

  private columnsFor(row: RawRow): Map<string, SourceField | null> {
    const columns = new Map<string, SourceField | null>();
    for (const header of Object.keys(row)) {
      columns.set(header, this.resolveColumn(header));
    }
    return columns;
  }

  private text(value: string | undefined): string | null {
    return value === undefined ? null : this.normalizer.normalizeText(value).normalized;
  }

  private coordinate(
    value: string | undefined,
    axis: 'latitude' | 'longitude',
    warn: (field: string, value: string, message?: string) => void
  ): number | null {
    if (value === undefined) return null;
    const result = this.normalizer.normalizeCoordinate(value, axis);
    if (!result.isValid) {
      warn(axis, value, result.error);
    }
    return result.normalized;
  }
}
