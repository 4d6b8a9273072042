import type { EvaluationOutcome, JobProgress, JobStatus } from './EvaluationJob.js';

/**
 * Read models handed out by the evaluation service
 */

export interface JobStatusView {
  jobId: string;
  status: JobStatus;
  submittedAt: Date;
  startedAt: Date | null;
  completedAt: Date | null;
  targetUrl: string;
  totalQuestions: number;
  progress?: JobProgress; // only while running
  error?: string; // only once failed
}

export interface EvaluationResultsView extends EvaluationOutcome {
  jobId: string;
  status: 'completed';
  submittedAt: Date;
  startedAt: Date;
  completedAt: Date;
  targetUrl: string;
  totalQuestions: number;
  questionsCompleted: number;
}

export interface JobSummary {
  jobId: string;
  status: JobStatus;
  submittedAt: Date;
  totalQuestions: number;
}
