import type { ScorerDefinition } from '../../core/entities/Scorer.js';
import type { IEvaluationRunner } from '../../core/interfaces/IEvaluationRunner.js';
import type { IJobRegistry } from '../../core/interfaces/IJobRegistry.js';
import type { IResultsExporter } from '../../core/interfaces/IResultsExporter.js';
import { errorMessage } from '../../core/errors.js';
import { aggregateScores } from './ScoreAggregator.js';
import { toResultsView } from './views.js';

export interface JobExecutorOptions {
  maxConcurrent: number;
  exporter?: IResultsExporter;
  debugLog?: (message: string) => void;
}

/**
 * Runs submitted jobs in the background.
 *
 * Each scheduled job becomes one promise. At most `maxConcurrent` evaluations
 * run at once; the rest wait in submission order and stay queued in the
 * registry. Nothing thrown by an evaluation escapes `schedule`: failures end up
 * as the job's error.
 */
export class JobExecutor {
  private pending: string[] = [];
  private active = new Set<string>();
  private idleWaiters: Array<() => void> = [];
  private maxConcurrent: number;
  private exporter?: IResultsExporter;
  private debugLog: (message: string) => void;

  constructor(
    private registry: IJobRegistry,
    private runner: IEvaluationRunner,
    private scorers: ScorerDefinition[],
    options: JobExecutorOptions
  ) {
    this.maxConcurrent = Math.max(1, options.maxConcurrent);
    this.exporter = options.exporter;
    this.debugLog = options.debugLog ?? (() => {});
  }

  /**
   * Queue a job for execution
   */
  schedule(jobId: string): void {
    this.pending.push(jobId);
    // Start on a later tick; submitters always observe the job as queued
    setImmediate(() => this.processQueue());
  }

  getStatistics() {
    return {
      pending: this.pending.length,
      running: this.active.size,
      maxConcurrent: this.maxConcurrent,
    };
  }

  /**
   * Resolves once no job is pending or running
   */
  waitForIdle(): Promise<void> {
    if (this.isIdle()) return Promise.resolve();
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  private isIdle(): boolean {
    return this.pending.length === 0 && this.active.size === 0;
  }

  private processQueue(): void {
    while (this.pending.length > 0 && this.active.size < this.maxConcurrent) {
      const jobId = this.pending.shift();
      if (jobId === undefined) break;

      this.active.add(jobId);
      void this.execute(jobId)
        .catch((error) => {
          console.error(`[JobExecutor] ✗ Unexpected failure while running job ${jobId}:`, error);
        })
        .finally(() => {
          this.active.delete(jobId);
          this.processQueue();
          if (this.isIdle()) {
            const waiters = this.idleWaiters.splice(0);
            waiters.forEach((resolve) => resolve());
          }
        });
    }
  }

  /**
   * Execute one job end to end. Never rejects for evaluation failures.
   */
  private async execute(jobId: string): Promise<void> {
    const job = this.registry.get(jobId);
    if (!job) {
      console.error(`[JobExecutor] ✗ Job ${jobId} vanished before execution`);
      return;
    }

    try {
      this.registry.updateStatus(jobId, 'running');
      this.debugLog(`[JobExecutor] Job ${jobId} started: ${job.request.questions.length} questions against ${job.request.targetUrl}`);

      const report = await this.runner.run(
        {
          jobId,
          targetUrl: job.request.targetUrl,
          questions: job.request.questions,
          scorers: this.scorers,
        },
        ({ questionsCompleted, unitsCompleted }) => {
          this.registry.updateProgress(jobId, questionsCompleted, unitsCompleted);
        }
      );

      const outcome = aggregateScores(job.request.questions, this.scorers, report);

      // Results before status: no reader may see completed without them
      this.registry.setResults(jobId, outcome);
      this.registry.updateStatus(jobId, 'completed');
      console.error(`[JobExecutor] ✓ Job ${jobId} completed (overall score ${outcome.overallScore.toFixed(2)})`);
    } catch (error) {
      const message = errorMessage(error);
      this.registry.setError(jobId, message);
      console.error(`[JobExecutor] ✗ Job ${jobId} failed: ${message}`);
      return;
    }

    this.exportResults(jobId);
  }

  /**
   * Hand completed results to the exporter without waiting for it
   */
  private exportResults(jobId: string): void {
    if (!this.exporter) return;

    const completed = this.registry.get(jobId);
    if (!completed || completed.status !== 'completed') return;

    void this.exporter.export(toResultsView(completed)).then(
      () => this.debugLog(`[JobExecutor] Results for job ${jobId} exported`),
      (error) => console.error(`[JobExecutor] ⚠️ Failed to export results for job ${jobId}: ${errorMessage(error)}`)
    );
  }
}
