/**
 * Evaluation job domain entities
 */

export type JobStatus = 'queued' | 'running' | 'completed' | 'failed';

export interface ExpectedOutcome {
  response: string;
  agent: string;
  reason: string;
}

export interface Question {
  question: string;
  expectedOutcome: ExpectedOutcome;
}

export interface EvaluationRequest {
  targetUrl: string;
  questions: Question[];
}

export interface JobProgress {
  questionsCompleted: number;
  questionsTotal: number;
  unitsCompleted: number; // one unit = one (question x scorer) evaluation
  unitsTotal: number;
  percent: number; // 0-100
}

export interface ScorerResult {
  scorerName: string;
  score: number;
  weight: number;
  weightedScore: number;
  rationale?: string;
}

export interface QuestionResult {
  question: string;
  expectedOutcome: ExpectedOutcome;
  actualResponse: string | null;
  actualAgent: string | null;
  actualRoutingReason: string | null;
  scorerResults: ScorerResult[];
  overallScore: number;
}

/**
 * Results artifact attached to a completed job
 */
export interface EvaluationOutcome {
  overallScore: number;
  questionResults: QuestionResult[];
  reportJsonPath?: string;
  reportHtmlPath?: string;
}

interface JobBase {
  jobId: string;
  idempotencyKey?: string;
  request: EvaluationRequest;
  submittedAt: Date;
  startedAt: Date | null;
  completedAt: Date | null;
  progress: JobProgress;
}

export interface QueuedJob extends JobBase {
  status: 'queued';
}

export interface RunningJob extends JobBase {
  status: 'running';
  startedAt: Date;
}

export interface CompletedJob extends JobBase {
  status: 'completed';
  startedAt: Date;
  completedAt: Date;
  results: EvaluationOutcome;
}

export interface FailedJob extends JobBase {
  status: 'failed';
  completedAt: Date;
  error: string;
}

export type EvaluationJob = QueuedJob | RunningJob | CompletedJob | FailedJob;

export interface JobStatistics {
  total: number;
  queued: number;
  running: number;
  completed: number;
  failed: number;
}
