import type { CanonicalRecord, SourceRef } from '@incident-atlas/types';
import { MultiFormatParser } from '../parsers/MultiFormatParser';
import type { RawFile, ReasonCode, ScannedFile } from '../types';
import type { SchemaNormalizer } from '../validation/SchemaNormalizer';
import type { RecordValidator } from '../validation/RecordValidator';
import { FormatError } from '../utils/errors';
import { getErrorMessage } from '../utils/errorUtils';
import logger from '../utils/logger';

export interface InvalidRecord {
  reason: ReasonCode;
  message: string;
  source_id: SourceRef;
}

/**
 * Everything one file contributed. Records are in row order.
 */
export interface ShardResult {
  file: RawFile;
  records: CanonicalRecord[];
  invalid: InvalidRecord[];
  rowsProcessed: number;
  warningsCount: number;
  error: FormatError | null;
  truncated: boolean;
}

/**
 * Parses, normalizes and validates a single file. Holds no state between files,
 * so any number of workers can run side by side.
 */
export class ShardWorker {
  private readonly normalizer: SchemaNormalizer;
  private readonly validator: RecordValidator;

  constructor(normalizer: SchemaNormalizer, validator: RecordValidator) {
    this.normalizer = normalizer;
    this.validator = validator;
  }

  /**
   * Stops pulling rows once `signal` aborts and returns what it has, marked truncated.
   * A FormatError discards the file's rows and is returned, not thrown.
   */
  async process(scanned: ScannedFile, signal?: AbortSignal): Promise<ShardResult> {
    const result: ShardResult = {
      file: scanned.file,
      records: [],
      invalid: [],
      rowsProcessed: 0,
      warningsCount: 0,
      error: null,
      truncated: false
    };

    const rows = MultiFormatParser.parseRows(scanned);

    try {
      for await (const { candidate, warnings } of this.normalizer.normalizeRows(rows, scanned.file)) {
        if (signal?.aborted) {
          result.truncated = true;
          break;
        }

        const { outcome, warnings: validationWarnings } = this.validator.validate(candidate);
        result.rowsProcessed++;
        result.warningsCount += warnings.length + validationWarnings.length;

        if (outcome.status === 'valid') {
          result.records.push(outcome.record);
        } else {
          result.invalid.push({
            reason: outcome.reason,
            message: outcome.message,
            source_id: outcome.source_id
          });
          logger.debug('Record rejected', { source: outcome.source_id, reason: outcome.reason });
        }
      }
    } catch (error) {
      if (!(error instanceof FormatError)) {
        throw error;
      }
      logger.warn('Skipping unparseable file', { path: scanned.file.path, error: getErrorMessage(error) });
      return { ...result, records: [], invalid: [], rowsProcessed: 0, warningsCount: 0, error };
    }

    logger.debug('File processed', {
      path: scanned.file.path,
      rows: result.rowsProcessed,
      valid: result.records.length,
      invalid: result.invalid.length,
      truncated: result.truncated
    });

    return result;
  }
}
