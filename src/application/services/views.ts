import type { CompletedJob, EvaluationJob } from '../../core/entities/EvaluationJob.js';
import type {
  EvaluationResultsView,
  JobStatusView,
  JobSummary,
} from '../../core/entities/EvaluationViews.js';

export function toStatusView(job: EvaluationJob): JobStatusView {
  const view: JobStatusView = {
    jobId: job.jobId,
    status: job.status,
    submittedAt: job.submittedAt,
    startedAt: job.startedAt,
    completedAt: job.completedAt,
    targetUrl: job.request.targetUrl,
    totalQuestions: job.request.questions.length,
  };
  if (job.status === 'running') {
    view.progress = job.progress;
  } else if (job.status === 'failed') {
    view.error = job.error;
  }
  return view;
}

export function toResultsView(job: CompletedJob): EvaluationResultsView {
  return {
    jobId: job.jobId,
    status: 'completed',
    submittedAt: job.submittedAt,
    startedAt: job.startedAt,
    completedAt: job.completedAt,
    targetUrl: job.request.targetUrl,
    totalQuestions: job.request.questions.length,
    questionsCompleted: job.results.questionResults.length,
    ...job.results,
  };
}

export function toSummary(job: EvaluationJob): JobSummary {
  return {
    jobId: job.jobId,
    status: job.status,
    submittedAt: job.submittedAt,
    totalQuestions: job.request.questions.length,
  };
}
