import { EventEmitter } from 'events';
import { v4 as uuidv4 } from 'uuid';
import type { CanonicalRecord } from '@incident-atlas/types';
import {
  EXIT_CODES,
  ProcessingStep,
  RunStatus,
  type AggregationTables,
  type FileErrorKind,
  type ReasonCode,
  type RunReport,
  type ValidationReport
} from '../types';
import {
  loadPipelineConfig,
  type PipelineConfig,
  type PipelineConfigInput
} from '../config/pipelineConfig';
import { ArchiveScanner, type ScanEvent } from '../scanner/ArchiveScanner';
import { SchemaNormalizer } from '../validation/SchemaNormalizer';
import { RecordValidator } from '../validation/RecordValidator';
import { DeduplicationEngine } from '../validation/DeduplicationEngine';
import { GeocodeCache } from '../validation/GeocodeCache';
import {
  aggregate,
  combineAggregates,
  emptyAggregate,
  finalize
} from '../aggregation/Aggregator';
import { DatasetWriter, type WrittenArtifacts } from '../output/DatasetWriter';
import { ShardWorker, type ShardResult } from './ShardWorker';
import { RunTracker } from './RunTracker';
import { PipelineError, type FileLevelError } from '../utils/errors';
import { getErrorMessage, getErrorStack } from '../utils/errorUtils';
import logger, { type Logger } from '../utils/logger';

export interface RunOptions {
  signal?: AbortSignal;
}

export interface PipelineRunResult {
  runId: string;
  report: RunReport;
  validation: ValidationReport;
  records: CanonicalRecord[];
  tables: AggregationTables;
  artifacts: WrittenArtifacts | null;
}

interface CollectedShards {
  shards: ShardResult[];
  filesSkipped: Record<FileErrorKind, number>;
  exhausted: boolean;
}

interface MergeResult {
  validation: ValidationReport;
  records: CanonicalRecord[];
  tables: AggregationTables;
}

/**
 * ETL Orchestrator coordinates one run: scan, per-file workers, a single
 * merge stage (dedup + aggregation), then the writer.
 *
 * Events: `stage` (ProcessingStep), `fileScanned` (RawFile),
 * `fileSkipped` (FileLevelError), `runCompleted` (RunReport).
 */
export class ETLOrchestrator extends EventEmitter {
  private readonly config: PipelineConfig;
  private readonly tracker: RunTracker;

  constructor(config: PipelineConfig, tracker: RunTracker = new RunTracker()) {
    super();
    this.config = config;
    this.tracker = tracker;
  }

  getTracker(): RunTracker {
    return this.tracker;
  }

  /**
   * Process every file under `roots`. Always resolves with a run report;
   * failures surface as a `fatal` status rather than a rejection.
   */
  async run(roots: string[], options: RunOptions = {}): Promise<PipelineRunResult> {
    const runId = uuidv4();
    const runLogger = logger.child({ runId });
    const controller = new AbortController();

    const deadline = setTimeout(() => {
      runLogger.warn('Run deadline reached, finishing with partial input', { deadlineMs: this.config.deadlineMs });
      controller.abort();
    }, this.config.deadlineMs);
    deadline.unref();

    const onCallerAbort = (): void => {
      runLogger.warn('Run cancelled by caller, finishing with partial input');
      controller.abort();
    };
    if (options.signal?.aborted) {
      controller.abort();
    } else {
      options.signal?.addEventListener('abort', onCallerAbort, { once: true });
    }

    this.tracker.startRun(runId);
    runLogger.info('Pipeline run started', { roots, concurrency: this.config.concurrency });

    const writer = new DatasetWriter(this.config.outputDir);
    let collected: CollectedShards = { shards: [], filesSkipped: emptySkipCounts(), exhausted: false };
    let merged: MergeResult = { validation: emptyValidationReport(), records: [], tables: {} };
    let report: RunReport;
    let artifacts: WrittenArtifacts | null = null;

    try {
      const geocodeCache = this.config.geocodeCachePath
        ? await GeocodeCache.load(this.config.geocodeCachePath)
        : undefined;
      const worker = new ShardWorker(
        new SchemaNormalizer({ dateFormats: this.config.dateFormats, geocodeCache }),
        new RecordValidator()
      );

      this.setStage(runId, ProcessingStep.SCANNING);
      collected = await this.collect(runId, roots, worker, controller);

      merged = this.merge(runId, collected.shards);
      report = this.buildReport(collected, merged.validation);

      this.setStage(runId, ProcessingStep.STORAGE);
      if (report.status === RunStatus.FATAL) {
        await writer.writeFailure(report);
      } else {
        artifacts = await writer.write(merged.records, merged.tables, report);
      }
    } catch (error) {
      const reason = error instanceof PipelineError
        ? error.message
        : `Unexpected failure: ${getErrorMessage(error)}`;
      runLogger.error('Pipeline run failed', { error: getErrorMessage(error), stack: getErrorStack(error) });

      report = { ...this.buildReport(collected, merged.validation), ...fatal(reason) };
      artifacts = null;
      await this.writeReportBestEffort(writer, report, runLogger);
    } finally {
      clearTimeout(deadline);
      options.signal?.removeEventListener('abort', onCallerAbort);
    }

    this.tracker.completeRun(runId, report);
    this.emit('stage', ProcessingStep.COMPLETED);
    this.emit('runCompleted', report);

    runLogger.info('Pipeline run finished', {
      status: report.status,
      valid: report.valid,
      total: report.total,
      duplicates: report.duplicates,
      incomplete: report.incomplete
    });

    return {
      runId,
      report,
      validation: merged.validation,
      records: report.status === RunStatus.FATAL ? [] : merged.records,
      tables: report.status === RunStatus.FATAL ? {} : merged.tables,
      artifacts
    };
  }

  /**
   * Run `concurrency` workers over the shared scan sequence until it is
   * exhausted or the run is cut off
   */
  private async collect(
    runId: string,
    roots: string[],
    worker: ShardWorker,
    controller: AbortController
  ): Promise<CollectedShards> {
    const scanner = new ArchiveScanner(roots, {
      maxArchiveDepth: this.config.maxArchiveDepth,
      maxExtractedBytes: this.config.maxExtractedBytes
    });
    const iterator = scanner.scan();
    const signal = controller.signal;

    const shards: ShardResult[] = [];
    const filesSkipped = emptySkipCounts();
    let exhausted = false;
    let truncated = false;

    const skip = (error: FileLevelError): void => {
      filesSkipped[fileErrorKind(error)]++;
      this.tracker.increment(runId, 'filesSkipped');
      this.emit('fileSkipped', error);
    };

    const pull = async (): Promise<void> => {
      while (!signal.aborted) {
        const step: IteratorResult<ScanEvent> = await iterator.next();
        if (step.done) {
          exhausted = true;
          return;
        }

        const event = step.value;
        if (signal.aborted) {
          // Pulled but never started; the scan counts as not exhausted
          return;
        }
        if (event.kind === 'error') {
          skip(event.error);
          continue;
        }

        this.emit('fileScanned', event.scanned.file);
        const shard = await worker.process(event.scanned, signal);
        if (shard.truncated && shard.rowsProcessed === 0) {
          truncated = true;
          return;
        }
        shards.push(shard);

        if (shard.error) {
          skip(shard.error);
        } else {
          this.tracker.increment(runId, 'filesScanned');
        }
        this.tracker.increment(runId, 'rowsProcessed', shard.rowsProcessed);
        this.tracker.increment(runId, 'warningsCount', shard.warningsCount);
      }
    };

    const workers = Array.from({ length: this.config.concurrency }, async () => {
      try {
        await pull();
      } catch (error) {
        // Stop the other workers; the failure itself propagates
        controller.abort();
        throw error;
      }
    });

    try {
      await Promise.all(workers);
    } finally {
      await iterator.return(undefined);
    }

    return {
      shards,
      filesSkipped,
      exhausted: exhausted && !truncated && !shards.some(shard => shard.truncated)
    };
  }

  /**
   * Single-threaded merge: order shards by discovery, dedup globally,
   * aggregate in batches
   */
  private merge(runId: string, shards: ShardResult[]): MergeResult {
    const ordered = shards
      .filter(shard => shard.error === null)
      .sort((a, b) => a.file.sequence - b.file.sequence);

    this.setStage(runId, ProcessingStep.DEDUPLICATION);
    const engine = new DeduplicationEngine();
    const invalidByReason: Partial<Record<ReasonCode, number>> = {};
    let total = 0;

    for (const shard of ordered) {
      total += shard.rowsProcessed;
      for (const invalid of shard.invalid) {
        invalidByReason[invalid.reason] = (invalidByReason[invalid.reason] ?? 0) + 1;
      }
      for (const record of shard.records) {
        engine.admit(record);
      }
    }

    const deduplication = engine.getResult();

    this.setStage(runId, ProcessingStep.AGGREGATION);
    const options = { dimensions: this.config.dimensions, gridResolution: this.config.gridResolution };
    let partial = emptyAggregate(this.config.dimensions);
    for (let i = 0; i < deduplication.unique.length; i += this.config.batchSize) {
      const batch = deduplication.unique.slice(i, i + this.config.batchSize);
      partial = combineAggregates(partial, aggregate(batch, options));
    }

    return {
      validation: {
        total,
        valid: deduplication.unique.length,
        invalidByReason,
        duplicates: deduplication.metrics.duplicatesRemoved,
        duplicateRefs: deduplication.duplicates,
        conflicts: deduplication.metrics.conflictsCount
      },
      records: deduplication.unique,
      tables: finalize(partial)
    };
  }

  private buildReport(collected: CollectedShards, validation: ValidationReport): RunReport {
    const invalid = Object.values(validation.invalidByReason).reduce<number>((sum, count) => sum + (count ?? 0), 0);
    const degraded = validation.total > 0 && invalid / validation.total > this.config.invalidFractionThreshold;
    const filesScanned = collected.shards.filter(shard => shard.error === null).length;

    const base: RunReport = {
      status: degraded ? RunStatus.SUCCESS_DEGRADED : RunStatus.SUCCESS,
      exitCode: degraded ? EXIT_CODES.success_degraded : EXIT_CODES.success,
      filesScanned,
      filesSkipped: { ...collected.filesSkipped },
      total: validation.total,
      valid: validation.valid,
      invalidByReason: { ...validation.invalidByReason },
      duplicates: validation.duplicates,
      conflicts: validation.conflicts,
      degraded,
      incomplete: !collected.exhausted,
      fatalReason: null
    };

    if (validation.valid === 0) {
      return { ...base, ...fatal('No valid records') };
    }
    if (this.config.strict && invalid > 0) {
      return { ...base, ...fatal(`Strict mode: ${invalid} invalid record(s)`) };
    }
    return base;
  }

  private async writeReportBestEffort(writer: DatasetWriter, report: RunReport, runLogger: Logger): Promise<void> {
    try {
      await writer.writeFailure(report);
    } catch (error) {
      runLogger.error('Could not write run report', { error: getErrorMessage(error) });
    }
  }

  private setStage(runId: string, step: ProcessingStep): void {
    this.tracker.updateProgress(runId, { step });
    this.emit('stage', step);
  }
}

function fatal(reason: string): Pick<RunReport, 'status' | 'exitCode' | 'fatalReason'> {
  return { status: RunStatus.FATAL, exitCode: EXIT_CODES.fatal, fatalReason: reason };
}

function emptySkipCounts(): Record<FileErrorKind, number> {
  return { ScanError: 0, ResourceLimitError: 0, FormatError: 0 };
}

function emptyValidationReport(): ValidationReport {
  return { total: 0, valid: 0, invalidByReason: {}, duplicates: 0, duplicateRefs: [], conflicts: 0 };
}

function fileErrorKind(error: FileLevelError): FileErrorKind {
  switch (error.code) {
    case 'SCAN_ERROR':
      return 'ScanError';
    case 'RESOURCE_LIMIT':
      return 'ResourceLimitError';
    case 'FORMAT_ERROR':
      return 'FormatError';
  }
}

/**
 * Load configuration (defaults, INCIDENT_ATLAS_* env, overrides) and run once
 */
export async function runPipeline(
  roots: string[],
  overrides: PipelineConfigInput = {},
  options: RunOptions = {}
): Promise<PipelineRunResult> {
  const orchestrator = new ETLOrchestrator(loadPipelineConfig(overrides));
  return orchestrator.run(roots, options);
}
