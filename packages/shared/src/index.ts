// Export shared utilities
export * from './utils';

// Export constants
export {
  CANONICAL_COLUMNS,
  AGGREGATE_COLUMNS,
  ARTIFACTS,
  UNKNOWN_KEY,
  PIPELINE_DEFAULTS,
  ENV_PREFIX
} from './constants';
