// Main exports for the data-ingestion package

// Types
export * from './types';

// Configuration
export {
  DEFAULT_DATE_FORMATS,
  DEFAULT_DIMENSIONS,
  PipelineConfigSchema,
  isUsableDateFormat,
  loadPipelineConfig
} from './config/pipelineConfig';
export type { PipelineConfig, PipelineConfigInput } from './config/pipelineConfig';

// Errors and logging
export * from './utils/errors';
export { getErrorMessage, isError } from './utils/errorUtils';
export { default as logger } from './utils/logger';

// Discovery and parsing
export { ArchiveScanner, ENTRY_SEPARATOR } from './scanner/ArchiveScanner';
export type { ScanEvent, ScannerLimits } from './scanner/ArchiveScanner';
export { FileDetectionService } from './utils/fileDetection';
export { BaseParser } from './parsers/BaseParser';
export { CsvParser } from './parsers/CsvParser';
export { JsonParser } from './parsers/JsonParser';
export { MultiFormatParser } from './parsers/MultiFormatParser';

// Normalization, validation and deduplication
export * from './validation';

// Aggregation and output
export {
  aggregate,
  combineAggregates,
  dimensionKey,
  emptyAggregate,
  fatalityRangeKey,
  finalize,
  geographyKey,
  rankBuckets,
  CROSS_KEY_SEPARATOR,
  FATALITY_BINS
} from './aggregation/Aggregator';
export type { AggregationOptions, BucketTotals, PartialAggregate, RankOptions } from './aggregation/Aggregator';
export { DatasetWriter, escapeCsvValue } from './output/DatasetWriter';
export type { WrittenArtifacts } from './output/DatasetWriter';

// Orchestration
export { ETLOrchestrator, runPipeline } from './workers/ETLOrchestrator';
export type { PipelineRunResult, RunOptions } from './workers/ETLOrchestrator';
export { ShardWorker } from './workers/ShardWorker';
export type { InvalidRecord, ShardResult } from './workers/ShardWorker';
export { RunTracker } from './workers/RunTracker';
