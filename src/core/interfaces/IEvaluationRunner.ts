import type { Question } from '../entities/EvaluationJob.js';
import type { ScorerDefinition } from '../entities/Scorer.js';

export interface RunnerProgress {
  questionsCompleted: number;
  unitsCompleted: number;
}

export interface EvaluationRunInput {
  jobId: string;
  targetUrl: string;
  questions: Question[];
  scorers: ScorerDefinition[];
}

export interface ReportedScore {
  scorer: string;
  score: number;
  rationale?: string;
}

export interface ReportedQuestion {
  question: string;
  response?: string | null;
  agent?: string | null;
  routingReason?: string | null;
  scores: ReportedScore[];
}

/**
 * Raw report produced by an evaluation run, before weighting
 */
export interface EvaluationReport {
  questions: ReportedQuestion[];
  reportJsonPath?: string;
  reportHtmlPath?: string;
}

/**
 * Opaque scoring boundary. Rejects with an error whose message becomes the job error.
 */
export interface IEvaluationRunner {
  run(
    input: EvaluationRunInput,
    onProgress?: (progress: RunnerProgress) => void
  ): Promise<EvaluationReport>;
}
