import Database from 'better-sqlite3';
import type { EvaluationResultsView } from '../../../core/entities/EvaluationViews.js';

export interface ResultRow {
  job_id: string;
  status: string;
  question_index: number;
  question: string | null;
  scorer_name: string | null;
  scorer_score: number | null;
  scorer_weight: number | null;
  scorer_weighted_score: number | null;
  scorer_rationale: string | null;
  overall_score: number | null;
  question_score: number | null;
  actual_agent: string | null;
}

/**
 * SQLite table of exported results, one row per question per scorer
 */
export class ResultsRepository {
  constructor(private db: Database.Database) {}

  /**
   * Replace every row of a job with the given results in one transaction
   */
  saveResults(results: EvaluationResultsView): number {
    const remove = this.db.prepare('DELETE FROM eval_results WHERE job_id = ?');
    const insert = this.db.prepare(`
      INSERT INTO eval_results (
        job_id, submitted_at, started_at, completed_at, status, target_url,
        total_questions, questions_completed, overall_score,
        question_index, question, expected_response, expected_agent, expected_reason,
        actual_response, actual_agent, actual_routing_reason, question_score,
        scorer_name, scorer_score, scorer_weight, scorer_weighted_score, scorer_rationale,
        report_json_path, report_html_path
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);

    const write = this.db.transaction((r: EvaluationResultsView) => {
      remove.run(r.jobId);
      let rows = 0;
      r.questionResults.forEach((q, index) => {
        for (const scorer of q.scorerResults) {
          insert.run(
            r.jobId,
            r.submittedAt.toISOString(),
            r.startedAt.toISOString(),
            r.completedAt.toISOString(),
            r.status,
            r.targetUrl,
            r.totalQuestions,
            r.questionsCompleted,
            r.overallScore,
            index,
            q.question,
            q.expectedOutcome.response,
            q.expectedOutcome.agent,
            q.expectedOutcome.reason,
            q.actualResponse,
            q.actualAgent,
            q.actualRoutingReason,
            q.overallScore,
            scorer.scorerName,
            scorer.score,
            scorer.weight,
            scorer.weightedScore,
            scorer.rationale ?? null,
            r.reportJsonPath ?? null,
            r.reportHtmlPath ?? null
          );
          rows++;
        }
      });
      return rows;
    });

    return write(results);
  }

  getRowsForJob(jobId: string): ResultRow[] {
    return this.db
      .prepare(
        `SELECT job_id, status, question_index, question, scorer_name, scorer_score, scorer_weight,
                scorer_weighted_score, scorer_rationale, overall_score, question_score, actual_agent
         FROM eval_results WHERE job_id = ? ORDER BY id`
      )
      .all(jobId) as ResultRow[];
  }
}
