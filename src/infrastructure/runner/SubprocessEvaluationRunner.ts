import { spawn, SpawnOptions } from 'child_process';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { StringDecoder } from 'string_decoder';
import * as yaml from 'js-yaml';
import { z } from 'zod';
import type { Question } from '../../core/entities/EvaluationJob.js';
import type {
  EvaluationReport,
  EvaluationRunInput,
  IEvaluationRunner,
  RunnerProgress,
} from '../../core/interfaces/IEvaluationRunner.js';
import { ExecutionFailureError, errorMessage } from '../../core/errors.js';

/**
 * The slice of a child process the runner relies on
 */
export interface RunnerProcess {
  stdout: { on(event: 'data', listener: (chunk: Buffer | string) => void): unknown } | null;
  stderr: { on(event: 'data', listener: (chunk: Buffer | string) => void): unknown } | null;
  on(event: 'error', listener: (error: Error) => void): unknown;
  on(event: 'close', listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
  kill(signal?: NodeJS.Signals): boolean;
}

export type SpawnFn = (command: string, args: string[], options: SpawnOptions) => RunnerProcess;

export interface SubprocessRunnerOptions {
  command: string;
  args: string[];
  configPath?: string;
  reportsDir: string;
  timeoutMs: number;
  extraArgs: string[];
  cwd?: string;
  spawn?: SpawnFn;
  debugLog?: (message: string) => void;
}

const STDERR_TAIL_CHARS = 2000;

const ProgressLineSchema = z.object({
  type: z.literal('progress'),
  questions_completed: z.number().int().nonnegative(),
  units_completed: z.number().int().nonnegative(),
});

const ReportSchema = z.object({
  results: z.array(
    z.object({
      question: z.string(),
      response: z.string().nullish(),
      agent: z.string().nullish(),
      routing_reason: z.string().nullish(),
      scores: z
        .array(
          z.object({
            scorer: z.string(),
            score: z.number().min(0).max(1),
            rationale: z.string().optional(),
          })
        )
        .default([]),
    })
  ),
});

/**
 * Dataset file handed to the runner. The expected outcome travels as a JSON string.
 */
export function buildDatasetYaml(questions: Question[]): string {
  const dataset = questions.map((q) => ({
    question: q.question,
    expected_outcome: JSON.stringify(
      {
        response: q.expectedOutcome.response,
        agent: q.expectedOutcome.agent,
        reason: q.expectedOutcome.reason,
      },
      null,
      2
    ),
  }));
  return yaml.dump(dataset);
}

/**
 * Parse one stdout line; returns progress when the line is a progress event
 */
export function parseProgressLine(line: string): RunnerProgress | null {
  const trimmed = line.trim();
  if (!trimmed.startsWith('{')) return null;

  let parsed: unknown;
  try {
    parsed = JSON.parse(trimmed);
  } catch {
    return null;
  }

  const result = ProgressLineSchema.safeParse(parsed);
  if (!result.success) return null;
  return {
    questionsCompleted: result.data.questions_completed,
    unitsCompleted: result.data.units_completed,
  };
}

/**
 * Validate a JSON report written by the runner
 */
export function parseReport(content: string): EvaluationReport {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new ExecutionFailureError(`Malformed evaluation report: ${errorMessage(error)}`, { cause: error });
  }

  const result = ReportSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.') || 'root'}: ${i.message}`).join('; ');
    throw new ExecutionFailureError(`Malformed evaluation report: ${issues}`);
  }

  return {
    questions: result.data.results.map((r) => ({
      question: r.question,
      response: r.response ?? null,
      agent: r.agent ?? null,
      routingReason: r.routing_reason ?? null,
      scores: r.scores,
    })),
  };
}

const defaultSpawn: SpawnFn = (command, args, options) => spawn(command, args, options);

/**
 * Runs the external evaluation CLI as a subprocess, one process per job
 */
export class SubprocessEvaluationRunner implements IEvaluationRunner {
  private spawnProcess: SpawnFn;
  private debugLog: (message: string) => void;

  constructor(private options: SubprocessRunnerOptions) {
    this.spawnProcess = options.spawn ?? defaultSpawn;
    this.debugLog = options.debugLog ?? (() => {});
  }

  async run(
    input: EvaluationRunInput,
    onProgress?: (progress: RunnerProgress) => void
  ): Promise<EvaluationReport> {
    const outputDir = path.resolve(this.options.reportsDir, input.jobId);
    await fs.promises.mkdir(outputDir, { recursive: true });

    const datasetDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'eval-dataset-'));
    const datasetPath = path.join(datasetDir, 'dataset.yaml');

    try {
      await fs.promises.writeFile(datasetPath, buildDatasetYaml(input.questions), 'utf8');

      const args = this.buildArgs(input, datasetPath, outputDir);
      console.error(`[EvaluationRunner] Running evaluation for job ${input.jobId}...`);
      this.debugLog(`[EvaluationRunner] Command: ${this.options.command} ${args.join(' ')}`);

      await this.execute(args, onProgress);
      return await this.collectReport(outputDir);
    } finally {
      await fs.promises.rm(datasetDir, { recursive: true, force: true });
    }
  }

  buildArgs(input: EvaluationRunInput, datasetPath: string, outputDir: string): string[] {
    const scorers = input.scorers.map((s) => ({
      name: s.name,
      weight: s.weight,
      threshold: s.threshold,
      required: s.required ?? false,
    }));

    const args = [
      ...this.options.args,
      '--dataset-path', datasetPath,
      '--scorers', JSON.stringify(scorers),
      '--target-endpoint', input.targetUrl,
      '--out', outputDir,
    ];
    if (this.options.configPath) {
      args.push('--config', this.options.configPath);
    }
    args.push(...this.options.extraArgs);
    return args;
  }

  private execute(args: string[], onProgress?: (progress: RunnerProgress) => void): Promise<void> {
    return new Promise((resolve, reject) => {
      let child: RunnerProcess;
      try {
        child = this.spawnProcess(this.options.command, args, {
          cwd: this.options.cwd,
          stdio: ['ignore', 'pipe', 'pipe'],
          env: process.env,
        });
      } catch (error) {
        reject(new ExecutionFailureError(`Failed to start evaluation runner: ${errorMessage(error)}`, { cause: error }));
        return;
      }

      let settled = false;
      let timedOut = false;
      let stdoutBuffer = '';
      let stderrTail = '';
      // Multi-byte characters can be split across chunks
      const stdoutDecoder = new StringDecoder('utf8');
      const stderrDecoder = new StringDecoder('utf8');

      const settle = (error?: Error) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        if (error) reject(error);
        else resolve();
      };

      const timer = setTimeout(() => {
        timedOut = true;
        console.error(`[EvaluationRunner] ✗ Timed out after ${this.options.timeoutMs}ms, killing runner`);
        child.kill('SIGKILL');
      }, this.options.timeoutMs);

      const handleLine = (line: string) => {
        const progress = parseProgressLine(line);
        if (progress) {
          onProgress?.(progress);
        } else if (line.trim()) {
          this.debugLog(`[EvaluationRunner] ${line.trim()}`);
        }
      };

      child.stdout?.on('data', (chunk) => {
        stdoutBuffer += typeof chunk === 'string' ? chunk : stdoutDecoder.write(chunk);
        const lines = stdoutBuffer.split('\n');
        stdoutBuffer = lines.pop() ?? '';
        lines.forEach(handleLine);
      });

      child.stderr?.on('data', (chunk) => {
        const text = typeof chunk === 'string' ? chunk : stderrDecoder.write(chunk);
        stderrTail = (stderrTail + text).slice(-STDERR_TAIL_CHARS);
      });

      child.on('error', (error) => {
        settle(new ExecutionFailureError(`Failed to start evaluation runner: ${error.message}`, { cause: error }));
      });

      child.on('close', (code, signal) => {
        stdoutBuffer += stdoutDecoder.end();
        stderrTail = (stderrTail + stderrDecoder.end()).slice(-STDERR_TAIL_CHARS);
        if (stdoutBuffer) {
          handleLine(stdoutBuffer);
          stdoutBuffer = '';
        }

        if (timedOut) {
          settle(new ExecutionFailureError(`Evaluation runner timed out after ${this.options.timeoutMs}ms`));
        } else if (code !== 0) {
          const reason = code === null ? `was killed by ${signal ?? 'a signal'}` : `exited with code ${code}`;
          const detail = stderrTail.trim();
          settle(new ExecutionFailureError(`Evaluation runner ${reason}${detail ? `: ${detail}` : ''}`));
        } else {
          settle();
        }
      });
    });
  }

  private async collectReport(outputDir: string): Promise<EvaluationReport> {
    const files = (await fs.promises.readdir(outputDir)).sort();
    const jsonFile = files.find((f) => f.endsWith('.json'));
    const htmlFile = files.find((f) => f.endsWith('.html'));

    if (!jsonFile) {
      throw new ExecutionFailureError(`Evaluation runner produced no JSON report in ${outputDir}`);
    }

    const reportJsonPath = path.join(outputDir, jsonFile);
    const report = parseReport(await fs.promises.readFile(reportJsonPath, 'utf8'));

    report.reportJsonPath = reportJsonPath;
    if (htmlFile) {
      report.reportHtmlPath = path.join(outputDir, htmlFile);
    }
    return report;
  }
}
