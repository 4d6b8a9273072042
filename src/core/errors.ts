import type { JobStatus } from './entities/EvaluationJob.js';

export class EvaluationServiceError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

export class JobNotFoundError extends EvaluationServiceError {
  constructor(readonly jobId: string) {
    super(`Job ${jobId} not found`);
  }
}

export class InvalidJobStateError extends EvaluationServiceError {
  constructor(readonly jobId: string, readonly status: JobStatus) {
    super(`Results not available. Job status: ${status}`);
  }
}

export class ExecutionFailureError extends EvaluationServiceError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
  }
}

/**
 * Raised when a caller breaks a registry invariant. Always a bug in the caller.
 */
export class RegistryInvariantError extends EvaluationServiceError {
  constructor(message: string, readonly jobId: string) {
    super(message);
  }
}

export class InvalidStatusTransitionError extends RegistryInvariantError {
  constructor(jobId: string, readonly from: JobStatus, readonly to: JobStatus, detail?: string) {
    super(`Job ${jobId}: illegal status transition ${from} -> ${to}${detail ? ` (${detail})` : ''}`, jobId);
  }
}

export class DuplicateJobError extends RegistryInvariantError {
  constructor(jobId: string) {
    super(`Job ${jobId} already exists`, jobId);
  }
}

export class ConfigurationError extends EvaluationServiceError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
