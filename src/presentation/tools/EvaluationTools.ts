import { z } from 'zod';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { EvaluationService } from '../../application/services/EvaluationService.js';
import { EvaluationSubmissionSchema, parseSubmission } from '../../application/validation.js';
import {
  serializeResults,
  serializeScorer,
  serializeStatus,
  serializeSummary,
} from '../../application/serializers.js';
import { errorMessage, InvalidJobStateError } from '../../core/errors.js';

function jsonBlock(value: unknown): string {
  return `\`\`\`json\n${JSON.stringify(value, null, 2)}\n\`\`\``;
}

/**
 * Register the evaluation job tools
 */
export function registerEvaluationTools(server: McpServer, evaluationService: EvaluationService) {
  // submit-evaluation tool
  server.tool(
    'submit-evaluation',
    'Submit a batch of questions to be evaluated against a target agent endpoint. Returns immediately with a job ID; poll get-evaluation-status for progress.',
    EvaluationSubmissionSchema.shape,
    async (args) => {
      try {
        const { request, idempotencyKey } = parseSubmission(args);
        const { jobId, duplicate } = evaluationService.submit(request, idempotencyKey);
        const status = serializeStatus(evaluationService.getStatus(jobId));

        const heading = duplicate
          ? `# Existing evaluation job: ${jobId}\n\nDuplicate idempotency_key detected. Returning existing job.`
          : `# Evaluation job submitted: ${jobId}`;

        return {
          content: [
            {
              type: 'text',
              text: `${heading}\n\n${jsonBlock(status)}\n\nUse \`get-evaluation-status\` with job ID \`${jobId}\` to follow progress.`,
            },
          ],
        };
      } catch (error) {
        return {
          isError: true,
          content: [
            {
              type: 'text',
              text: `Error submitting evaluation: ${errorMessage(error)}`,
            },
          ],
        };
      }
    }
  );

  // get-evaluation-status tool
  server.tool(
    'get-evaluation-status',
    'Get the status and progress of an evaluation job',
    {
      job_id: z.string().describe('The ID of the evaluation job'),
    },
    async ({ job_id }) => {
      try {
        const status = serializeStatus(evaluationService.getStatus(job_id));
        return {
          content: [
            {
              type: 'text',
              text: `# Evaluation ${job_id}: ${status.status}\n\n${jsonBlock(status)}`,
            },
          ],
        };
      } catch (error) {
        return {
          isError: true,
          content: [
            {
              type: 'text',
              text: `Error getting evaluation status: ${errorMessage(error)}`,
            },
          ],
        };
      }
    }
  );

  // get-evaluation-results tool
  server.tool(
    'get-evaluation-results',
    'Get the scored results of a completed evaluation job',
    {
      job_id: z.string().describe('The ID of the completed evaluation job'),
    },
    async ({ job_id }) => {
      try {
        const results = serializeResults(evaluationService.getResults(job_id));
        return {
          content: [
            {
              type: 'text',
              text: `# Evaluation results: ${job_id}\n\nOverall score: ${results.overall_score}\n\n${jsonBlock(results)}`,
            },
          ],
        };
      } catch (error) {
        const hint =
          error instanceof InvalidJobStateError && (error.status === 'queued' || error.status === 'running')
            ? `\n\nThe job has not finished yet. Use \`get-evaluation-status\` to check progress.`
            : '';
        return {
          isError: true,
          content: [
            {
              type: 'text',
              text: `Error getting evaluation results: ${errorMessage(error)}${hint}`,
            },
          ],
        };
      }
    }
  );

  // list-evaluations tool
  server.tool(
    'list-evaluations',
    'List all evaluation jobs with their status',
    {},
    async () => {
      const jobs = evaluationService.list().map(serializeSummary);
      const stats = evaluationService.getStatistics();

      const text = `# Evaluation Jobs

## Statistics
- Total: ${stats.total}
- Queued: ${stats.queued}
- Running: ${stats.running}
- Completed: ${stats.completed}
- Failed: ${stats.failed}
- Max Concurrent: ${stats.maxConcurrent}

## Jobs
${jobs.length === 0 ? 'No jobs found' : jsonBlock(jobs)}`;

      return {
        content: [
          {
            type: 'text',
            text,
          },
        ],
      };
    }
  );

  // list-scorers tool
  server.tool(
    'list-scorers',
    'List the scorers applied to every question, with their weights',
    {},
    async () => {
      const scorers = evaluationService.listScorers().map(serializeScorer);
      return {
        content: [
          {
            type: 'text',
            text: `# Scorers\n\n${jsonBlock(scorers)}`,
          },
        ],
      };
    }
  );
}
