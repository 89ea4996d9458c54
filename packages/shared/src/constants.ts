import type { CanonicalField } from '@incident-atlas/types';

// Column order of the canonical record table
export const CANONICAL_COLUMNS: readonly CanonicalField[] = [
  'date',
  'year',
  'operator',
  'aircraft_type',
  'fatalities',
  'damage_level',
  'latitude',
  'longitude',
  'location',
] as const;

export const AGGREGATE_COLUMNS = ['dimension_key', 'count', 'fatality_sum'] as const;

// Output artifact names, relative to the output directory
export const ARTIFACTS = {
  RECORDS: 'records.csv',
  AGGREGATES_DIR: 'aggregates',
  RUN_REPORT: 'run-report.json',
} as const;

// Grouping key used for missing dimension values
export const UNKNOWN_KEY = 'unknown';

// Pipeline limits
export const PIPELINE_DEFAULTS = {
  MAX_ARCHIVE_DEPTH: 3,
  MAX_EXTRACTED_BYTES: 500 * 1024 * 1024, // 500MB
  INVALID_FRACTION_THRESHOLD: 0.2,
  GRID_RESOLUTION: 1.0,
  DEADLINE_MS: 10 * 60 * 1000, // 10 minutes
  CONCURRENCY: 4,
  BATCH_SIZE: 1000,
} as const;

// Environment variable prefix for configuration overrides
export const ENV_PREFIX = 'INCIDENT_ATLAS_';
