/**
 * Tests for the submission façade
 */

import { EvaluationService } from '../src/application/services/EvaluationService.js';
import { JobExecutor } from '../src/application/services/JobExecutor.js';
import { JobRegistry } from '../src/infrastructure/registry/JobRegistry.js';
import { InvalidJobStateError, JobNotFoundError } from '../src/core/errors.js';
import type { IEvaluationRunner } from '../src/core/interfaces/IEvaluationRunner.js';
import { DeferredRunner, StaticRunner, TEST_SCORERS, makeReport, makeRequest, waitFor } from './helpers.js';

function createService(runner: IEvaluationRunner, maxConcurrent = 4) {
  const registry = new JobRegistry(TEST_SCORERS.length);
  const executor = new JobExecutor(registry, runner, TEST_SCORERS, { maxConcurrent });
  let counter = 0;
  const service = new EvaluationService(registry, executor, TEST_SCORERS, () => `eval_test_${++counter}`);
  return { registry, service };
}

describe('EvaluationService', () => {
  let consoleSpy: jest.SpyInstance;

  beforeEach(() => {
    consoleSpy = jest.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    consoleSpy.mockRestore();
  });

  describe('submit', () => {
    test('should create a queued job', async () => {
      const { service } = createService(new StaticRunner());

      const { jobId, duplicate } = service.submit(makeRequest(2));

      expect(duplicate).toBe(false);
      const status = service.getStatus(jobId);
      expect(status.status).toBe('queued');
      expect(status.totalQuestions).toBe(2);
      expect(status.progress).toBeUndefined();

      await service.waitForIdle();
    });

    test('should return the same job for a repeated idempotency key', async () => {
      const { service } = createService(new StaticRunner());
      const request = makeRequest(2);

      const plain = service.submit(request);
      const first = service.submit(request, 'abc');
      const second = service.submit(request, 'abc');
      const other = service.submit(request, 'xyz');

      expect(first.duplicate).toBe(false);
      expect(second).toEqual({ jobId: first.jobId, duplicate: true });
      expect(other.jobId).not.toBe(first.jobId);
      expect(plain.jobId).not.toBe(first.jobId);
      expect(service.list()).toHaveLength(3);

      await service.waitForIdle();
    });

    test('should return one job for concurrent submissions with one key', async () => {
      const runner = new StaticRunner();
      const { service } = createService(runner);

      const results = await Promise.all(
        Array.from({ length: 10 }, async () => service.submit(makeRequest(1), 'batch-42'))
      );

      const jobIds = new Set(results.map((r) => r.jobId));
      expect(jobIds.size).toBe(1);
      expect(results.filter((r) => !r.duplicate)).toHaveLength(1);

      await service.waitForIdle();
      expect(runner.runs).toBe(1);
    });
  });

  describe('getStatus', () => {
    test('should fail for an unknown job', () => {
      const { service } = createService(new StaticRunner());
      expect(() => service.getStatus('missing')).toThrow(JobNotFoundError);
      expect(() => service.getStatus('missing')).toThrow('Job missing not found');
    });

    test('should show progress strictly between 0 and 100 mid-run', async () => {
      const runner = new DeferredRunner();
      const { service } = createService(runner);
      const { jobId } = service.submit(makeRequest(2));
      await waitFor(() => runner.calls.length === 1);

      runner.call(0).onProgress?.({ questionsCompleted: 1, unitsCompleted: 4 });

      const status = service.getStatus(jobId);
      expect(status.status).toBe('running');
      expect(status.startedAt).toBeInstanceOf(Date);
      expect(status.progress?.percent).toBe(66);
      expect(status.progress?.percent).toBeGreaterThan(0);
      expect(status.progress?.percent).toBeLessThan(100);

      runner.call(0).resolve(makeReport());
      await service.waitForIdle();
    });
  });

  describe('getResults', () => {
    test('should fail for an unknown job', () => {
      const { service } = createService(new StaticRunner());
      expect(() => service.getResults('missing')).toThrow(JobNotFoundError);
    });

    test('should refuse results before completion', async () => {
      const runner = new DeferredRunner();
      const { service } = createService(runner);
      const { jobId } = service.submit(makeRequest(2));

      expect(() => service.getResults(jobId)).toThrow(new InvalidJobStateError(jobId, 'queued'));

      await waitFor(() => runner.calls.length === 1);
      expect(() => service.getResults(jobId)).toThrow('Results not available. Job status: running');

      runner.call(0).resolve(makeReport());
      await service.waitForIdle();
    });

    test('should return the results of a completed job', async () => {
      const { service } = createService(new StaticRunner());
      const { jobId } = service.submit(makeRequest(2));
      await service.waitForIdle();

      const results = service.getResults(jobId);

      expect(results.jobId).toBe(jobId);
      expect(results.status).toBe('completed');
      expect(results.totalQuestions).toBe(2);
      expect(results.questionsCompleted).toBe(2);
      expect(results.overallScore).toBeCloseTo(0.83, 10);
      expect(results.questionResults).toHaveLength(2);
      expect(results.questionResults[1]).toEqual({
        question: 'Question 2?',
        expectedOutcome: { response: 'Answer 2', agent: 'finance_agent', reason: 'Numeric question' },
        actualResponse: 'Something else',
        actualAgent: 'general_agent',
        actualRoutingReason: 'Fallback',
        scorerResults: [
          {
            scorerName: 'accuracy',
            score: 0.8,
            weight: 0.5,
            weightedScore: expect.closeTo(0.4, 10),
            rationale: 'Close but rounded',
          },
          { scorerName: 'routing', score: 0.64, weight: 0.25, weightedScore: expect.closeTo(0.16, 10) },
          { scorerName: 'completeness', score: 0.4, weight: 0.25, weightedScore: expect.closeTo(0.1, 10) },
        ],
        overallScore: expect.closeTo(0.66, 10),
      });
    });

    test('should report a failed job with its error', async () => {
      const runner = new DeferredRunner();
      const { service } = createService(runner);
      const { jobId } = service.submit(makeRequest(2));
      await waitFor(() => runner.calls.length === 1);

      runner.call(0).reject(new Error('connection refused'));
      await service.waitForIdle();

      const status = service.getStatus(jobId);
      expect(status.status).toBe('failed');
      expect(status.error).toBe('connection refused');
      expect(status.completedAt).toBeInstanceOf(Date);
      expect(() => service.getResults(jobId)).toThrow(InvalidJobStateError);
      expect(() => service.getResults(jobId)).toThrow('Results not available. Job status: failed');
    });
  });

  describe('list and scorers', () => {
    test('should summarize every job', async () => {
      const { service } = createService(new StaticRunner());
      const { jobId } = service.submit(makeRequest(3));

      expect(service.list()).toEqual([
        { jobId, status: 'queued', submittedAt: expect.any(Date), totalQuestions: 3 },
      ]);

      await service.waitForIdle();
      expect(service.list()[0].status).toBe('completed');
    });

    test('should hand out copies of the scorer list', () => {
      const { service } = createService(new StaticRunner());
      const scorers = service.listScorers();
      scorers[0].weight = 1;

      expect(service.listScorers()[0].weight).toBe(0.5);
    });

    test('should combine registry and executor statistics', async () => {
      const { service } = createService(new StaticRunner(), 2);
      service.submit(makeRequest(1));

      expect(service.getStatistics()).toEqual({
        total: 1,
        queued: 1,
        running: 0,
        completed: 0,
        failed: 0,
        maxConcurrent: 2,
      });

      await service.waitForIdle();
    });
  });
});
