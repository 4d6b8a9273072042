import type { JobProgress } from '../core/entities/EvaluationJob.js';
import type {
  EvaluationResultsView,
  JobStatusView,
  JobSummary,
} from '../core/entities/EvaluationViews.js';
import type { ScorerDefinition } from '../core/entities/Scorer.js';

/**
 * snake_case wire format shared by the HTTP API and the MCP tools
 */

function serializeProgress(progress: JobProgress) {
  return {
    questions_completed: progress.questionsCompleted,
    questions_total: progress.questionsTotal,
    scoring_units_completed: progress.unitsCompleted,
    scoring_units_total: progress.unitsTotal,
    percent: progress.percent,
  };
}

export function serializeStatus(view: JobStatusView) {
  return {
    job_id: view.jobId,
    status: view.status,
    submitted_at: view.submittedAt.toISOString(),
    started_at: view.startedAt?.toISOString() ?? null,
    completed_at: view.completedAt?.toISOString() ?? null,
    target_url: view.targetUrl,
    total_questions: view.totalQuestions,
    progress: view.progress ? serializeProgress(view.progress) : null,
    error: view.error ?? null,
  };
}

export function serializeResults(view: EvaluationResultsView) {
  return {
    job_id: view.jobId,
    status: view.status,
    submitted_at: view.submittedAt.toISOString(),
    started_at: view.startedAt.toISOString(),
    completed_at: view.completedAt.toISOString(),
    target_url: view.targetUrl,
    total_questions: view.totalQuestions,
    questions_completed: view.questionsCompleted,
    overall_score: view.overallScore,
    question_results: view.questionResults.map((q) => ({
      question: q.question,
      expected_outcome: { ...q.expectedOutcome },
      actual_response: q.actualResponse,
      actual_agent: q.actualAgent,
      actual_routing_reason: q.actualRoutingReason,
      scorer_results: q.scorerResults.map((s) => ({
        scorer_name: s.scorerName,
        score: s.score,
        weight: s.weight,
        weighted_score: s.weightedScore,
        rationale: s.rationale ?? null,
      })),
      overall_score: q.overallScore,
    })),
    report_json_path: view.reportJsonPath ?? null,
    report_html_path: view.reportHtmlPath ?? null,
  };
}

export function serializeSummary(summary: JobSummary) {
  return {
    job_id: summary.jobId,
    status: summary.status,
    submitted_at: summary.submittedAt.toISOString(),
    total_questions: summary.totalQuestions,
  };
}

export function serializeScorer(scorer: ScorerDefinition) {
  return {
    name: scorer.name,
    weight: scorer.weight,
    description: scorer.description,
  };
}
