import type { ReasonCode } from '../types';

export type PipelineErrorCode =
  | 'SCAN_ERROR'
  | 'RESOURCE_LIMIT'
  | 'FORMAT_ERROR'
  | 'VALIDATION_ERROR'
  | 'OUTPUT_ERROR'
  | 'CONFIG_ERROR';

/**
 * Base class for every error the pipeline raises on purpose.
 * `path` names the file or container the error is scoped to, when there is one.
 */
export abstract class PipelineError extends Error {
  abstract readonly code: PipelineErrorCode;
  readonly path?: string;

  constructor(message: string, options: { path?: string; cause?: unknown } = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.path = options.path;
  }
}

// Unreadable file or corrupt container. Skips that file.
export class ScanError extends PipelineError {
  readonly code = 'SCAN_ERROR';
}

// Archive depth or extracted-size cap exceeded. Skips that container.
export class ResourceLimitError extends PipelineError {
  readonly code = 'RESOURCE_LIMIT';
  readonly limit: 'depth' | 'size';

  constructor(message: string, limit: 'depth' | 'size', options: { path?: string; cause?: unknown } = {}) {
    super(message, options);
    this.limit = limit;
  }
}

// Content not parseable as any known format. Skips that file.
export class FormatError extends PipelineError {
  readonly code = 'FORMAT_ERROR';
}

// Per-record invariant violation. Excludes that record.
export class ValidationError extends PipelineError {
  readonly code = 'VALIDATION_ERROR';
  readonly reason: ReasonCode;

  constructor(reason: ReasonCode, message: string) {
    super(message);
    this.reason = reason;
  }
}

// Artifact write failure. Fatal.
export class OutputError extends PipelineError {
  readonly code = 'OUTPUT_ERROR';
}

export class ConfigError extends PipelineError {
  readonly code = 'CONFIG_ERROR';
}

export type FileLevelError = ScanError | ResourceLimitError | FormatError;
