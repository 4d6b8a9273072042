import type {
  EvaluationOutcome,
  Question,
  QuestionResult,
  ScorerResult,
} from '../../core/entities/EvaluationJob.js';
import type { ScorerDefinition } from '../../core/entities/Scorer.js';
import type { EvaluationReport, ReportedQuestion } from '../../core/interfaces/IEvaluationRunner.js';

/**
 * Weight a raw evaluation report with the configured scorers.
 *
 * Questions are matched to the report by position. A scorer absent from the
 * report counts as 0. The overall score is the mean of the question scores.
 */
export function aggregateScores(
  questions: Question[],
  scorers: ScorerDefinition[],
  report: EvaluationReport
): EvaluationOutcome {
  const questionResults = questions.map((question, index) =>
    scoreQuestion(question, scorers, report.questions[index])
  );

  const overallScore =
    questionResults.length > 0
      ? questionResults.reduce((sum, result) => sum + result.overallScore, 0) / questionResults.length
      : 0;

  const outcome: EvaluationOutcome = { overallScore, questionResults };
  if (report.reportJsonPath) outcome.reportJsonPath = report.reportJsonPath;
  if (report.reportHtmlPath) outcome.reportHtmlPath = report.reportHtmlPath;
  return outcome;
}

function scoreQuestion(
  question: Question,
  scorers: ScorerDefinition[],
  reported: ReportedQuestion | undefined
): QuestionResult {
  const scorerResults: ScorerResult[] = scorers.map((scorer) => {
    const entry = reported?.scores.find((s) => s.scorer === scorer.name);
    if (!entry) {
      return {
        scorerName: scorer.name,
        score: 0,
        weight: scorer.weight,
        weightedScore: 0,
        rationale: 'No score reported',
      };
    }

    const result: ScorerResult = {
      scorerName: scorer.name,
      score: entry.score,
      weight: scorer.weight,
      weightedScore: entry.score * scorer.weight,
    };
    if (entry.rationale !== undefined) result.rationale = entry.rationale;
    return result;
  });

  return {
    question: question.question,
    expectedOutcome: { ...question.expectedOutcome },
    actualResponse: reported?.response ?? null,
    actualAgent: reported?.agent ?? null,
    actualRoutingReason: reported?.routingReason ?? null,
    scorerResults,
    overallScore: scorerResults.reduce((sum, s) => sum + s.weightedScore, 0),
  };
}
