/**
 * Tests for exporting results into SQLite
 */

import { DatabaseConnection } from '../src/infrastructure/database/DatabaseConnection.js';
import { ResultsRepository } from '../src/infrastructure/database/repositories/ResultsRepository.js';
import { SqliteResultsExporter } from '../src/infrastructure/export/SqliteResultsExporter.js';
import { aggregateScores } from '../src/application/services/ScoreAggregator.js';
import type { EvaluationResultsView } from '../src/core/entities/EvaluationViews.js';
import { TEST_SCORERS, makeReport, makeRequest } from './helpers.js';

function makeResultsView(jobId = 'eval_test_1'): EvaluationResultsView {
  const request = makeRequest(2);
  const outcome = aggregateScores(request.questions, TEST_SCORERS, makeReport());
  return {
    jobId,
    status: 'completed',
    submittedAt: new Date('2024-03-05T07:08:09.000Z'),
    startedAt: new Date('2024-03-05T07:08:10.000Z'),
    completedAt: new Date('2024-03-05T07:12:00.000Z'),
    targetUrl: request.targetUrl,
    totalQuestions: 2,
    questionsCompleted: 2,
    ...outcome,
    reportJsonPath: '/reports/eval_test_1/report.json',
  };
}

describe('SqliteResultsExporter', () => {
  let connection: DatabaseConnection;
  let exporter: SqliteResultsExporter;
  let consoleSpy: jest.SpyInstance;

  beforeEach(() => {
    connection = new DatabaseConnection(':memory:');
    exporter = new SqliteResultsExporter(connection, {
      maxAttempts: 2,
      initialDelayMs: 10,
      maxDelayMs: 10,
      multiplier: 1,
      timeoutMs: 1000,
    });
    consoleSpy = jest.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    exporter.close();
    consoleSpy.mockRestore();
  });

  test('should write one row per question per scorer', async () => {
    await exporter.export(makeResultsView());

    const rows = new ResultsRepository(connection.getDatabase()).getRowsForJob('eval_test_1');
    expect(rows).toHaveLength(6);
    expect(rows.map((r) => [r.question_index, r.scorer_name])).toEqual([
      [0, 'accuracy'],
      [0, 'routing'],
      [0, 'completeness'],
      [1, 'accuracy'],
      [1, 'routing'],
      [1, 'completeness'],
    ]);
    expect(rows[3]).toMatchObject({
      job_id: 'eval_test_1',
      status: 'completed',
      question: 'Question 2?',
      scorer_score: 0.8,
      scorer_weight: 0.5,
      scorer_rationale: 'Close but rounded',
      actual_agent: 'general_agent',
    });
    expect(rows[4].scorer_rationale).toBeNull();
    expect(rows[0].overall_score).toBeCloseTo(0.83, 10);
    expect(rows[0].question_score).toBe(1);
    expect(exporter.getStatistics()).toMatchObject({ totalRows: 6, totalJobs: 1, databaseSize: 0 });
  });

  test('should replace earlier rows when a job is exported again', async () => {
    await exporter.export(makeResultsView());
    await exporter.export(makeResultsView());
    await exporter.export(makeResultsView('eval_test_2'));

    expect(exporter.getStatistics()).toMatchObject({ totalRows: 12, totalJobs: 2 });
  });

  test('should fail without retrying when the store is closed', async () => {
    connection.close();

    await expect(exporter.export(makeResultsView())).rejects.toThrow('database connection is not open');
    expect(consoleSpy).toHaveBeenCalledTimes(1);
  });
});
