/**
 * Shared fixtures for the evaluation tests
 */

import type { EvaluationRequest } from '../src/core/entities/EvaluationJob.js';
import type { ScorerDefinition } from '../src/core/entities/Scorer.js';
import type {
  EvaluationReport,
  EvaluationRunInput,
  IEvaluationRunner,
  RunnerProgress,
} from '../src/core/interfaces/IEvaluationRunner.js';

export const TEST_SCORERS: ScorerDefinition[] = [
  { name: 'accuracy', weight: 0.5, description: 'Answer matches the expected response' },
  { name: 'routing', weight: 0.25, description: 'Question reached the expected agent' },
  { name: 'completeness', weight: 0.25, description: 'Answer covers every part of the question' },
];

export function makeRequest(questionCount = 2, targetUrl = 'http://agent.test/chat'): EvaluationRequest {
  return {
    targetUrl,
    questions: Array.from({ length: questionCount }, (_, i) => ({
      question: `Question ${i + 1}?`,
      expectedOutcome: {
        response: `Answer ${i + 1}`,
        agent: 'finance_agent',
        reason: 'Numeric question',
      },
    })),
  };
}

/**
 * Report scoring question 1 at 1.0 and question 2 at 0.66 with TEST_SCORERS,
 * for an overall score of 0.83
 */
export function makeReport(): EvaluationReport {
  return {
    questions: [
      {
        question: 'Question 1?',
        response: 'Answer 1',
        agent: 'finance_agent',
        routingReason: 'Numeric question',
        scores: [
          { scorer: 'accuracy', score: 1 },
          { scorer: 'routing', score: 1 },
          { scorer: 'completeness', score: 1 },
        ],
      },
      {
        question: 'Question 2?',
        response: 'Something else',
        agent: 'general_agent',
        routingReason: 'Fallback',
        scores: [
          { scorer: 'accuracy', score: 0.8, rationale: 'Close but rounded' },
          { scorer: 'routing', score: 0.64 },
          { scorer: 'completeness', score: 0.4 },
        ],
      },
    ],
  };
}

export interface PendingRun {
  input: EvaluationRunInput;
  onProgress?: (progress: RunnerProgress) => void;
  resolve: (report: EvaluationReport) => void;
  reject: (error: unknown) => void;
}

/**
 * Runner whose evaluations finish only when the test says so
 */
export class DeferredRunner implements IEvaluationRunner {
  calls: PendingRun[] = [];
  private fallback: EvaluationReport | null = null;

  run(input: EvaluationRunInput, onProgress?: (progress: RunnerProgress) => void): Promise<EvaluationReport> {
    return new Promise((resolve, reject) => {
      this.calls.push({ input, onProgress, resolve, reject });
      if (this.fallback) resolve(structuredClone(this.fallback));
    });
  }

  /**
   * Finish every open run with the report, and every later one as soon as it starts
   */
  settleAll(report: EvaluationReport = makeReport()): void {
    this.fallback = report;
    this.calls.forEach((call) => call.resolve(structuredClone(report)));
  }

  call(index: number): PendingRun {
    const pending = this.calls[index];
    if (!pending) {
      throw new Error(`No runner call #${index} (have ${this.calls.length})`);
    }
    return pending;
  }
}

/**
 * Runner that answers every evaluation at once with the same report
 */
export class StaticRunner implements IEvaluationRunner {
  runs = 0;

  constructor(private report: EvaluationReport = makeReport()) {}

  async run(): Promise<EvaluationReport> {
    this.runs++;
    return structuredClone(this.report);
  }
}

export async function waitFor(predicate: () => boolean, timeoutMs = 2000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!predicate()) {
    if (Date.now() > deadline) {
      throw new Error(`Condition not met within ${timeoutMs}ms`);
    }
    await new Promise((resolve) => setTimeout(resolve, 5));
  }
}
