import { z } from 'zod';
import type { EvaluationRequest } from '../core/entities/EvaluationJob.js';

export const ExpectedOutcomeSchema = z.object({
  response: z.string({ required_error: 'expected_outcome.response is required' }),
  agent: z.string({ required_error: 'expected_outcome.agent is required' }),
  reason: z.string({ required_error: 'expected_outcome.reason is required' }),
});

export const QuestionSchema = z.object({
  question: z.string().min(1, 'question must not be empty'),
  expected_outcome: ExpectedOutcomeSchema,
});

export const EvaluationSubmissionSchema = z.object({
  target_url: z.string().url('target_url must be a valid URL'),
  questions: z.array(QuestionSchema).min(1, 'At least 1 question is required'),
  idempotency_key: z.string().min(1, 'idempotency_key must not be empty').max(256).optional(),
});

export type EvaluationSubmission = z.infer<typeof EvaluationSubmissionSchema>;

export interface ParsedSubmission {
  request: EvaluationRequest;
  idempotencyKey?: string;
}

/**
 * Validate a snake_case submission payload. Throws a ZodError when invalid.
 */
export function parseSubmission(payload: unknown, fallbackIdempotencyKey?: string): ParsedSubmission {
  const submission = EvaluationSubmissionSchema.parse(payload);
  const request: EvaluationRequest = {
    targetUrl: submission.target_url,
    questions: submission.questions.map((q) => ({
      question: q.question,
      expectedOutcome: {
        response: q.expected_outcome.response,
        agent: q.expected_outcome.agent,
        reason: q.expected_outcome.reason,
      },
    })),
  };

  const idempotencyKey = submission.idempotency_key ?? (fallbackIdempotencyKey || undefined);
  return idempotencyKey !== undefined ? { request, idempotencyKey } : { request };
}
