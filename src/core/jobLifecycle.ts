import type { JobStatus } from './entities/EvaluationJob.js';

const TRANSITIONS: Record<JobStatus, readonly JobStatus[]> = {
  queued: ['running', 'failed'],
  running: ['completed', 'failed'],
  completed: [],
  failed: [],
};

export function isTerminalStatus(status: JobStatus): boolean {
  return TRANSITIONS[status].length === 0;
}

/**
 * Whether a job may move from one status to another.
 * Staying in the same status is not a transition.
 */
export function canTransition(from: JobStatus, to: JobStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

/**
 * Completion percentage from scoring-unit counters, floored and clamped to 0-100
 */
export function computePercent(unitsCompleted: number, unitsTotal: number): number {
  if (!(unitsTotal > 0)) return 0;
  const percent = Math.floor((100 * unitsCompleted) / unitsTotal);
  if (!Number.isFinite(percent)) return 0;
  return Math.min(100, Math.max(0, percent));
}
