/**
 * Tests for the job status machine and progress arithmetic
 */

import { canTransition, computePercent, isTerminalStatus } from '../src/core/jobLifecycle.js';

describe('computePercent', () => {
  test('should floor the percentage of completed units', () => {
    expect(computePercent(3, 6)).toBe(50);
    expect(computePercent(4, 6)).toBe(66);
    expect(computePercent(1, 3)).toBe(33);
    expect(computePercent(6, 6)).toBe(100);
  });

  test('should return 0 when there is nothing to do', () => {
    expect(computePercent(0, 0)).toBe(0);
    expect(computePercent(5, 0)).toBe(0);
  });

  test('should stay within 0-100', () => {
    expect(computePercent(7, 6)).toBe(100);
    expect(computePercent(-1, 6)).toBe(0);
  });

  test('should treat non-numeric input as 0', () => {
    expect(computePercent(Number.NaN, 6)).toBe(0);
    expect(computePercent(1, Number.NaN)).toBe(0);
  });
});

describe('status transitions', () => {
  test('should allow the forward transitions', () => {
    expect(canTransition('queued', 'running')).toBe(true);
    expect(canTransition('queued', 'failed')).toBe(true);
    expect(canTransition('running', 'completed')).toBe(true);
    expect(canTransition('running', 'failed')).toBe(true);
  });

  test('should forbid regressions and skips', () => {
    expect(canTransition('running', 'queued')).toBe(false);
    expect(canTransition('completed', 'running')).toBe(false);
    expect(canTransition('failed', 'running')).toBe(false);
    expect(canTransition('queued', 'completed')).toBe(false);
    expect(canTransition('completed', 'failed')).toBe(false);
  });

  test('should mark completed and failed as terminal', () => {
    expect(isTerminalStatus('completed')).toBe(true);
    expect(isTerminalStatus('failed')).toBe(true);
    expect(isTerminalStatus('queued')).toBe(false);
    expect(isTerminalStatus('running')).toBe(false);
  });
});
