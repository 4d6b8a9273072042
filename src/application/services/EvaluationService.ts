import type { EvaluationRequest, JobStatistics } from '../../core/entities/EvaluationJob.js';
import type {
  EvaluationResultsView,
  JobStatusView,
  JobSummary,
} from '../../core/entities/EvaluationViews.js';
import type { ScorerDefinition } from '../../core/entities/Scorer.js';
import type { IJobRegistry } from '../../core/interfaces/IJobRegistry.js';
import { InvalidJobStateError, JobNotFoundError } from '../../core/errors.js';
import { generateJobId } from '../../infrastructure/registry/JobRegistry.js';
import type { JobExecutor } from './JobExecutor.js';
import { toResultsView, toStatusView, toSummary } from './views.js';

export interface SubmitResult {
  jobId: string;
  duplicate: boolean;
}

/**
 * Submission façade over the job registry and the background executor
 */
export class EvaluationService {
  constructor(
    private registry: IJobRegistry,
    private executor: JobExecutor,
    private scorers: ScorerDefinition[],
    private idGenerator: () => string = () => generateJobId()
  ) {}

  /**
   * Create a job and schedule it, or return the job already created for the key
   */
  submit(request: EvaluationRequest, idempotencyKey?: string): SubmitResult {
    if (idempotencyKey !== undefined) {
      const existing = this.registry.findByIdempotencyKey(idempotencyKey);
      if (existing !== null) {
        console.error(`[EvaluationService] Duplicate idempotency key "${idempotencyKey}" - returning existing job ${existing}`);
        return { jobId: existing, duplicate: true };
      }
    }

    const jobId = this.idGenerator();
    this.registry.create(jobId, request, idempotencyKey !== undefined ? { idempotencyKey } : {});
    this.executor.schedule(jobId);

    return { jobId, duplicate: false };
  }

  getStatus(jobId: string): JobStatusView {
    const job = this.registry.get(jobId);
    if (!job) {
      throw new JobNotFoundError(jobId);
    }
    return toStatusView(job);
  }

  getResults(jobId: string): EvaluationResultsView {
    const job = this.registry.get(jobId);
    if (!job) {
      throw new JobNotFoundError(jobId);
    }
    if (job.status !== 'completed') {
      throw new InvalidJobStateError(jobId, job.status);
    }
    return toResultsView(job);
  }

  list(): JobSummary[] {
    return this.registry.list().map(toSummary);
  }

  listScorers(): ScorerDefinition[] {
    return this.scorers.map((scorer) => ({ ...scorer }));
  }

  getStatistics(): JobStatistics & { maxConcurrent: number } {
    return {
      ...this.registry.getStatistics(),
      maxConcurrent: this.executor.getStatistics().maxConcurrent,
    };
  }

  /**
   * Wait for every scheduled job to settle
   */
  waitForIdle(): Promise<void> {
    return this.executor.waitForIdle();
  }
}
