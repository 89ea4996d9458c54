import type { CanonicalRecord, SourceRef } from '@incident-atlas/types';

// File processing types
export const FileFormat = {
  CSV: 'csv' as const,
  JSON: 'json' as const,
  ZIP: 'zip' as const,
  GZIP: 'gzip' as const,
  UNKNOWN: 'unknown' as const
} as const;

export type FileFormat = typeof FileFormat[keyof typeof FileFormat];

export type TabularFormat = typeof FileFormat.CSV | typeof FileFormat.JSON;

// A file discovered by the scanner
export interface RawFile {
  path: string;
  detectedFormat: FileFormat;
  byteSize: number;
  archiveDepth: number;
  sequence: number; // discovery order within a scan
}

export interface ScannedFile {
  file: RawFile & { detectedFormat: TabularFormat };
  content: Buffer;
}

// A source row keyed by the source's own column names
export type RawRow = Record<string, string>;

// Processing Step const enum
export const ProcessingStep = {
  QUEUED: 'queued' as const,
  SCANNING: 'scanning' as const,
  DEDUPLICATION: 'deduplication' as const,
  AGGREGATION: 'aggregation' as const,
  STORAGE: 'storage' as const,
  COMPLETED: 'completed' as const
} as const;

export type ProcessingStep = typeof ProcessingStep[keyof typeof ProcessingStep];

// Invalid-record reason codes
export const ReasonCode = {
  MISSING_REQUIRED_FIELD: 'MissingRequiredField' as const,
  YEAR_MISMATCH: 'YearMismatch' as const,
  NEGATIVE_FATALITIES: 'NegativeFatalities' as const,
  INVALID_FATALITIES: 'InvalidFatalities' as const,
  PARTIAL_COORDINATES: 'PartialCoordinates' as const,
  COORDINATES_OUT_OF_RANGE: 'CoordinatesOutOfRange' as const
} as const;

export type ReasonCode = typeof ReasonCode[keyof typeof ReasonCode];

// Normalizer output: every field optional, damage still free text
export interface CandidateRecord {
  date: string | null;
  sourceYear: number | null;
  operator: string | null;
  aircraft_type: string | null;
  fatalities: number | null;
  damageText: string | null;
  latitude: number | null;
  longitude: number | null;
  location: string | null;
  source_id: SourceRef;
  missingFields: string[];
}

export interface CoercionWarning {
  field: string;
  value: string;
  message: string;
}

export interface NormalizedCandidate {
  candidate: CandidateRecord;
  warnings: CoercionWarning[];
}

export type ValidationOutcome =
  | { status: 'valid'; record: CanonicalRecord }
  | { status: 'invalid'; reason: ReasonCode; message: string; source_id: SourceRef }
  | { status: 'duplicate'; record: CanonicalRecord; duplicateOf: SourceRef };

export interface MergeConflict {
  field: string;
  values: unknown[];
  resolution: 'keep_first';
}

export interface DuplicateRef {
  source_id: SourceRef;
  duplicateOf: SourceRef;
  conflicts: MergeConflict[];
}

export interface ValidationReport {
  total: number;
  valid: number;
  invalidByReason: Partial<Record<ReasonCode, number>>;
  duplicates: number;
  duplicateRefs: DuplicateRef[];
  conflicts: number;
}

// Aggregation
export const Dimension = {
  YEAR: 'year' as const,
  OPERATOR: 'operator' as const,
  DAMAGE_LEVEL: 'damage_level' as const,
  GEOGRAPHY: 'geography' as const,
  AIRCRAFT_TYPE: 'aircraft_type' as const,
  LOCATION: 'location' as const,
  FATALITY_RANGE: 'fatality_range' as const,
  YEAR_DAMAGE_LEVEL: 'year_damage_level' as const,
  OPERATOR_DAMAGE_LEVEL: 'operator_damage_level' as const
} as const;

export type Dimension = typeof Dimension[keyof typeof Dimension];

export interface AggregationBucket {
  dimension: Dimension;
  key: string;
  count: number;
  fatalitySum: number;
}

export type AggregationTables = Partial<Record<Dimension, AggregationBucket[]>>;

// File-level error kinds counted in the run report
export type FileErrorKind = 'ScanError' | 'ResourceLimitError' | 'FormatError';

export const RunStatus = {
  SUCCESS: 'success' as const,
  SUCCESS_DEGRADED: 'success_degraded' as const,
  FATAL: 'fatal' as const
} as const;

export type RunStatus = typeof RunStatus[keyof typeof RunStatus];

export const EXIT_CODES: Record<RunStatus, number> = {
  success: 0,
  fatal: 1,
  success_degraded: 2
};

export interface RunReport {
  status: RunStatus;
  exitCode: number;
  filesScanned: number;
  filesSkipped: Record<FileErrorKind, number>;
  total: number;
  valid: number;
  invalidByReason: Partial<Record<ReasonCode, number>>;
  duplicates: number;
  conflicts: number;
  degraded: boolean;
  incomplete: boolean;
  fatalReason: string | null;
}

// Progress tracking
export interface RunProgress {
  runId: string;
  step: ProcessingStep;
  filesScanned: number;
  filesSkipped: number;
  rowsProcessed: number;
  warningsCount: number;
}
