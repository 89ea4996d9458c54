// Normalization, validation and deduplication components

export { default as DataNormalizer } from './DataNormalizer';
export type { NormalizationResult } from './DataNormalizer';
export { SchemaNormalizer, normalizeHeader } from './SchemaNormalizer';
export type { SchemaNormalizerOptions, SourceField } from './SchemaNormalizer';
export { GeocodeCache } from './GeocodeCache';
export type { Coordinates } from './GeocodeCache';
export { DamageClassifier, toPhrase } from './DamageClassifier';
export { RecordValidator } from './RecordValidator';
export type { RecordCheckOutcome, RecordValidation } from './RecordValidator';
export { DeduplicationEngine } from './DeduplicationEngine';
export type { DeduplicationResult } from './DeduplicationEngine';
