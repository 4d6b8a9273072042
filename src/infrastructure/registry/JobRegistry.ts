import { randomBytes } from 'crypto';
import type {
  EvaluationJob,
  EvaluationOutcome,
  EvaluationRequest,
  JobStatistics,
  JobStatus,
  QueuedJob,
} from '../../core/entities/EvaluationJob.js';
import type { CreateJobOptions, IJobRegistry } from '../../core/interfaces/IJobRegistry.js';
import {
  DuplicateJobError,
  InvalidStatusTransitionError,
  RegistryInvariantError,
} from '../../core/errors.js';
import { canTransition, computePercent, isTerminalStatus } from '../../core/jobLifecycle.js';

/**
 * Generate a job ID of the form eval_YYYYMMDD_HHMMSS_xxxxxx (UTC timestamp + random hex)
 */
export function generateJobId(now: Date = new Date()): string {
  const stamp = now.toISOString().slice(0, 19).replace(/-/g, '').replace(/:/g, '').replace('T', '_');
  return `eval_${stamp}_${randomBytes(3).toString('hex')}`;
}

interface RegistryEntry {
  job: EvaluationJob;
  // Results attached by setResults, published when the job moves to completed
  stagedResults: EvaluationOutcome | null;
}

/**
 * In-memory job registry.
 *
 * Every method is synchronous and performs no I/O, so each call runs to
 * completion before any other registry call can observe the maps. The job map
 * and the idempotency-key map are only touched inside these calls, which makes
 * each method one critical section. Do not introduce `await` in here.
 *
 * Readers always get deep copies; live records never leave the registry.
 */
export class JobRegistry implements IJobRegistry {
  private entries: Map<string, RegistryEntry> = new Map();
  private idempotencyKeys: Map<string, string> = new Map();

  constructor(
    private scorerCount: number,
    private debugLog: (message: string) => void = () => {}
  ) {
    if (!Number.isInteger(scorerCount) || scorerCount < 0) {
      throw new RangeError(`scorerCount must be a non-negative integer, got ${scorerCount}`);
    }
  }

  findByIdempotencyKey(key: string): string | null {
    return this.idempotencyKeys.get(key) ?? null;
  }

  create(jobId: string, request: EvaluationRequest, options: CreateJobOptions = {}): void {
    if (this.entries.has(jobId)) {
      throw new DuplicateJobError(jobId);
    }

    const { idempotencyKey } = options;
    if (idempotencyKey !== undefined) {
      const existing = this.idempotencyKeys.get(idempotencyKey);
      if (existing !== undefined) {
        throw new RegistryInvariantError(
          `Idempotency key "${idempotencyKey}" already belongs to job ${existing}`,
          jobId
        );
      }
    }

    const questionsTotal = request.questions.length;
    const job: QueuedJob = {
      jobId,
      status: 'queued',
      request: structuredClone(request),
      submittedAt: new Date(),
      startedAt: null,
      completedAt: null,
      progress: {
        questionsCompleted: 0,
        questionsTotal,
        unitsCompleted: 0,
        unitsTotal: questionsTotal * this.scorerCount,
        percent: 0,
      },
    };
    if (idempotencyKey !== undefined) {
      job.idempotencyKey = idempotencyKey;
    }

    // Record first, then the key, both inside this call
    this.entries.set(jobId, { job, stagedResults: null });
    if (idempotencyKey !== undefined) {
      this.idempotencyKeys.set(idempotencyKey, jobId);
    }

    this.debugLog(`[JobRegistry] Job ${jobId} created (${questionsTotal} questions)`);
  }

  get(jobId: string): EvaluationJob | null {
    const entry = this.entries.get(jobId);
    return entry ? structuredClone(entry.job) : null;
  }

  updateStatus(jobId: string, status: JobStatus): void {
    const entry = this.entries.get(jobId);
    if (!entry) return;

    const { job } = entry;
    if (job.status === status) return;

    if (!canTransition(job.status, status)) {
      throw new InvalidStatusTransitionError(jobId, job.status, status);
    }

    const now = new Date();
    if (status === 'running' && job.status === 'queued') {
      entry.job = { ...job, status: 'running', startedAt: job.startedAt ?? now };
    } else if (status === 'completed' && job.status === 'running') {
      const results = entry.stagedResults;
      if (!results) {
        throw new InvalidStatusTransitionError(jobId, job.status, status, 'no results attached');
      }
      const { questionsTotal, unitsTotal } = job.progress;
      entry.job = {
        ...job,
        status: 'completed',
        completedAt: job.completedAt ?? now,
        results,
        progress: {
          questionsCompleted: questionsTotal,
          questionsTotal,
          unitsCompleted: unitsTotal,
          unitsTotal,
          percent: computePercent(unitsTotal, unitsTotal),
        },
      };
      entry.stagedResults = null;
    } else {
      // The only remaining legal target is failed, which needs an error message
      throw new InvalidStatusTransitionError(jobId, job.status, status, 'use setError to fail a job');
    }

    this.debugLog(`[JobRegistry] Job ${jobId}: ${job.status} -> ${status}`);
  }

  updateProgress(jobId: string, questionsCompleted: number, unitsCompleted: number): void {
    const entry = this.entries.get(jobId);
    if (!entry) return;

    const { job } = entry;
    if (isTerminalStatus(job.status)) return;

    const { questionsTotal, unitsTotal } = job.progress;
    const units = clamp(unitsCompleted, unitsTotal);
    entry.job = {
      ...job,
      progress: {
        questionsCompleted: clamp(questionsCompleted, questionsTotal),
        questionsTotal,
        unitsCompleted: units,
        unitsTotal,
        percent: computePercent(units, unitsTotal),
      },
    };
  }

  setResults(jobId: string, results: EvaluationOutcome): void {
    const entry = this.entries.get(jobId);
    if (!entry) return;

    if (isTerminalStatus(entry.job.status)) {
      throw new RegistryInvariantError(
        `Cannot attach results to job ${jobId}: already ${entry.job.status}`,
        jobId
      );
    }
    entry.stagedResults = structuredClone(results);
  }

  setError(jobId: string, message: string): void {
    const entry = this.entries.get(jobId);
    if (!entry) return;

    const { job } = entry;
    if (isTerminalStatus(job.status)) {
      console.error(`[JobRegistry] ✗ Ignoring error for job ${jobId} (already ${job.status}): ${message}`);
      return;
    }

    entry.job = { ...job, status: 'failed', completedAt: job.completedAt ?? new Date(), error: message };
    entry.stagedResults = null;

    this.debugLog(`[JobRegistry] Job ${jobId}: ${job.status} -> failed`);
  }

  list(): EvaluationJob[] {
    return Array.from(this.entries.values(), (entry) => structuredClone(entry.job));
  }

  getStatistics(): JobStatistics {
    const stats: JobStatistics = { total: 0, queued: 0, running: 0, completed: 0, failed: 0 };
    for (const { job } of this.entries.values()) {
      stats.total++;
      stats[job.status]++;
    }
    return stats;
  }
}

function clamp(value: number, max: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(max, Math.max(0, Math.floor(value)));
}
