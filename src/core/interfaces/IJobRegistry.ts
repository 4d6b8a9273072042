import type {
  EvaluationJob,
  EvaluationOutcome,
  EvaluationRequest,
  JobStatistics,
  JobStatus,
} from '../entities/EvaluationJob.js';

export interface CreateJobOptions {
  idempotencyKey?: string;
}

/**
 * Store of all evaluation jobs and single source of truth for their status
 */
export interface IJobRegistry {
  findByIdempotencyKey(key: string): string | null;

  create(jobId: string, request: EvaluationRequest, options?: CreateJobOptions): void;

  get(jobId: string): EvaluationJob | null;

  updateStatus(jobId: string, status: JobStatus): void;

  updateProgress(jobId: string, questionsCompleted: number, unitsCompleted: number): void;

  setResults(jobId: string, results: EvaluationOutcome): void;

  setError(jobId: string, message: string): void;

  list(): EvaluationJob[];

  getStatistics(): JobStatistics;
}
