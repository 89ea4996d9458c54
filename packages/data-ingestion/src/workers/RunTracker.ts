import { EventEmitter } from 'events';
import { ProcessingStep, type RunProgress, type RunReport } from '../types';

type CounterField = 'filesScanned' | 'filesSkipped' | 'rowsProcessed' | 'warningsCount';

/**
 * In-memory progress for pipeline runs.
 * Emits `runStarted`, `progressUpdated` and `runCompleted` with the current snapshot.
 */
export class RunTracker extends EventEmitter {
  private activeRuns = new Map<string, RunProgress>();

  startRun(runId: string): RunProgress {
    const progress: RunProgress = {
      runId,
      step: ProcessingStep.QUEUED,
      filesScanned: 0,
      filesSkipped: 0,
      rowsProcessed: 0,
      warningsCount: 0
    };

    this.activeRuns.set(runId, progress);
    this.emit('runStarted', { ...progress });
    return { ...progress };
  }

  /**
   * Update run progress
   */
  updateProgress(runId: string, updates: Partial<Omit<RunProgress, 'runId'>>): RunProgress {
    const current = this.activeRuns.get(runId);
    if (!current) {
      throw new Error(`Run ${runId} not found in active runs`);
    }

    const updated: RunProgress = { ...current, ...updates };
    this.activeRuns.set(runId, updated);
    this.emit('progressUpdated', { ...updated });
    return { ...updated };
  }

  increment(runId: string, field: CounterField, by: number = 1): RunProgress {
    const current = this.activeRuns.get(runId);
    if (!current) {
      throw new Error(`Run ${runId} not found in active runs`);
    }
    const updates: Partial<Pick<RunProgress, CounterField>> = {};
    updates[field] = current[field] + by;
    return this.updateProgress(runId, updates);
  }

  /**
   * Mark a run as finished and stop tracking it
   */
  completeRun(runId: string, report: RunReport): void {
    const progress = this.activeRuns.get(runId);
    if (!progress) return;

    const final: RunProgress = { ...progress, step: ProcessingStep.COMPLETED };
    this.activeRuns.delete(runId);
    this.emit('runCompleted', { progress: final, report });
  }

  getProgress(runId: string): RunProgress | null {
    const progress = this.activeRuns.get(runId);
    return progress ? { ...progress } : null;
  }

  getActiveRuns(): RunProgress[] {
    return [...this.activeRuns.values()].map(progress => ({ ...progress }));
  }
}
