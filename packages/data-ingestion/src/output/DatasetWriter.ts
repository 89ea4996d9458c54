import { promises as fs } from 'fs';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import {
  AGGREGATE_COLUMNS,
  ARTIFACTS,
  CANONICAL_COLUMNS,
  compareKeys
} from '@incident-atlas/shared';
import { formatSourceRef, type CanonicalRecord } from '@incident-atlas/types';
import {
  Dimension,
  ReasonCode,
  type AggregationBucket,
  type AggregationTables,
  type RunReport
} from '../types';
import { DeduplicationEngine } from '../validation/DeduplicationEngine';
import { OutputError } from '../utils/errors';
import { getErrorCode, getErrorMessage } from '../utils/errorUtils';
import logger from '../utils/logger';

export interface WrittenArtifacts {
  records: string;
  aggregates: string[];
  report: string;
}

const REASON_ORDER: readonly ReasonCode[] = Object.values(ReasonCode);

/**
 * Writes the dataset artifacts. Output bytes depend only on the records,
 * tables and report handed in, so identical runs produce identical files.
 */
export class DatasetWriter {
  private readonly outputDir: string;

  constructor(outputDir: string) {
    this.outputDir = outputDir;
  }

  async write(
    records: readonly CanonicalRecord[],
    tables: AggregationTables,
    report: RunReport
  ): Promise<WrittenArtifacts> {
    const recordsPath = await this.writeRecords(records);
    const aggregates = await this.writeAggregates(tables);
    const reportPath = await this.writeReport(report);

    logger.info('Dataset written', {
      outputDir: this.outputDir,
      records: records.length,
      aggregates: aggregates.length
    });

    return { records: recordsPath, aggregates, report: reportPath };
  }

  async writeRecords(records: readonly CanonicalRecord[]): Promise<string> {
    const target = path.join(this.outputDir, ARTIFACTS.RECORDS);
    await this.writeAtomic(target, DatasetWriter.formatRecordsCsv(records));
    return target;
  }

  /**
   * Write one table per dimension and remove tables a previous run left for
   * dimensions not present now
   */
  async writeAggregates(tables: AggregationTables): Promise<string[]> {
    const directory = path.join(this.outputDir, ARTIFACTS.AGGREGATES_DIR);
    const written: string[] = [];

    const dimensions = Object.values(Dimension)
      .filter(dimension => tables[dimension] !== undefined)
      .sort(compareKeys);
    for (const dimension of dimensions) {
      const buckets = tables[dimension] ?? [];
      const target = path.join(directory, `${dimension}.csv`);
      await this.writeAtomic(target, DatasetWriter.formatAggregateCsv(buckets));
      written.push(target);
    }

    await this.removeStaleTables(directory, new Set(written.map(target => path.basename(target))));
    return written;
  }

  /**
   * Output of a failed run: the report alone. Records and aggregates from an
   * earlier run are removed so they cannot be read as this run's result.
   */
  async writeFailure(report: RunReport): Promise<string> {
    await this.clearDataset();
    return this.writeReport(report);
  }

  async clearDataset(): Promise<void> {
    const targets = [
      path.join(this.outputDir, ARTIFACTS.RECORDS),
      path.join(this.outputDir, ARTIFACTS.AGGREGATES_DIR)
    ];

    for (const target of targets) {
      try {
        await fs.rm(target, { recursive: true, force: true });
      } catch (error) {
        throw new OutputError(`Failed to remove ${target}: ${getErrorMessage(error)}`, {
          path: target,
          cause: error
        });
      }
    }
  }

  async writeReport(report: RunReport): Promise<string> {
    const target = path.join(this.outputDir, ARTIFACTS.RUN_REPORT);
    await this.writeAtomic(target, DatasetWriter.formatReport(report));
    return target;
  }

  static formatRecordsCsv(records: readonly CanonicalRecord[]): string {
    const sorted = records
      .map(record => ({
        record,
        key: DeduplicationEngine.generateCompositeKey(record),
        sourceId: formatSourceRef(record.source_id)
      }))
      .sort((a, b) => compareKeys(a.key, b.key) || compareKeys(a.sourceId, b.sourceId));

    const lines = [[...CANONICAL_COLUMNS, 'source_id'].join(',')];
    for (const { record, sourceId } of sorted) {
      const values = CANONICAL_COLUMNS.map(column => escapeCsvValue(record[column]));
      values.push(escapeCsvValue(sourceId));
      lines.push(values.join(','));
    }
    return lines.join('\n') + '\n';
  }

  static formatAggregateCsv(buckets: readonly AggregationBucket[]): string {
    const lines = [AGGREGATE_COLUMNS.join(',')];
    for (const bucket of buckets) {
      lines.push([escapeCsvValue(bucket.key), bucket.count, bucket.fatalitySum].join(','));
    }
    return lines.join('\n') + '\n';
  }

  /**
   * Serialize the run report with a fixed key order
   */
  static formatReport(report: RunReport): string {
    const invalidByReason: Partial<Record<ReasonCode, number>> = {};
    for (const reason of REASON_ORDER) {
      const count = report.invalidByReason[reason];
      if (count !== undefined) invalidByReason[reason] = count;
    }

    const ordered = {
      status: report.status,
      exitCode: report.exitCode,
      filesScanned: report.filesScanned,
      filesSkipped: {
        ScanError: report.filesSkipped.ScanError,
        ResourceLimitError: report.filesSkipped.ResourceLimitError,
        FormatError: report.filesSkipped.FormatError
      },
      total: report.total,
      valid: report.valid,
      invalidByReason,
      duplicates: report.duplicates,
      conflicts: report.conflicts,
      degraded: report.degraded,
      incomplete: report.incomplete,
      fatalReason: report.fatalReason
    };

    return JSON.stringify(ordered, null, 2) + '\n';
  }

  private async removeStaleTables(directory: string, keep: ReadonlySet<string>): Promise<void> {
    let entries: string[];
    try {
      entries = await fs.readdir(directory);
    } catch (error) {
      if (getErrorCode(error) === 'ENOENT') return;
      throw new OutputError(`Failed to list ${directory}: ${getErrorMessage(error)}`, { path: directory, cause: error });
    }

    for (const name of entries) {
      if (!name.endsWith('.csv') || keep.has(name)) continue;
      const target = path.join(directory, name);
      try {
        await fs.rm(target, { force: true });
        logger.debug('Removed stale aggregate table', { path: target });
      } catch (error) {
        throw new OutputError(`Failed to remove ${target}: ${getErrorMessage(error)}`, { path: target, cause: error });
      }
    }
  }

  private async writeAtomic(target: string, content: string): Promise<void> {
    const directory = path.dirname(target);
    const tempPath = path.join(directory, `.${path.basename(target)}.${uuidv4()}.tmp`);

    try {
      await fs.mkdir(directory, { recursive: true });
      await fs.writeFile(tempPath, content, 'utf8');
      await fs.rename(tempPath, target);
    } catch (error) {
      await fs.rm(tempPath, { force: true }).catch(cleanupError => {
        logger.debug('Could not remove temp file', { path: tempPath, error: getErrorMessage(cleanupError) });
      });
      throw new OutputError(`Failed to write ${target}: ${getErrorMessage(error)}`, {
        path: target,
        cause: error
      });
    }
  }
}

/**
 * Quote values containing a delimiter, quote or line break; double embedded quotes
 */
export function escapeCsvValue(value: string | number | null): string {
  if (value === null) return '';
  const text = String(value);

  if (/[",\r\n]/.test(text)) {
    return `"${text.replace(/"/g, '""')}"`;
  }

  return text;
}
