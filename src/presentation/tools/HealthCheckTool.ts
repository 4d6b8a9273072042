import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { EvaluationService } from '../../application/services/EvaluationService.js';
import { errorMessage } from '../../core/errors.js';
import { SqliteResultsExporter } from '../../infrastructure/export/SqliteResultsExporter.js';

interface ComponentHealth {
  status: 'healthy' | 'error' | 'disabled';
  message: string;
  statistics?: unknown;
}

/**
 * Register the health-check tool
 */
export function registerHealthCheckTool(
  server: McpServer,
  evaluationService: EvaluationService,
  exporter: SqliteResultsExporter | null
) {
  server.tool(
    'health-check',
    'Check the health of the evaluation server and its components (job registry, results store)',
    {},
    async () => {
      let status: 'healthy' | 'degraded' = 'healthy';
      let resultsStore: ComponentHealth = {
        status: 'disabled',
        message: 'Results export is disabled',
      };

      if (exporter) {
        try {
          const stats = exporter.getStatistics();
          resultsStore = {
            status: 'healthy',
            message: `Results store connected - ${stats.totalRows} rows for ${stats.totalJobs} jobs`,
            statistics: stats,
          };
        } catch (error) {
          resultsStore = { status: 'error', message: errorMessage(error) };
          status = 'degraded';
        }
      }

      const health = {
        timestamp: new Date().toISOString(),
        status,
        components: {
          jobs: evaluationService.getStatistics(),
          scorers: evaluationService.listScorers().length,
          resultsStore,
        },
      };

      return {
        content: [
          {
            type: 'text',
            text: `# System Health Check\n\n\`\`\`json\n${JSON.stringify(health, null, 2)}\n\`\`\``,
          },
        ],
      };
    }
  );
}
