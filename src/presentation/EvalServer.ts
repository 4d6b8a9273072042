import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { Config } from '../config.js';
import { ConfigurationError } from '../core/errors.js';
import { DatabaseConnection } from '../infrastructure/database/DatabaseConnection.js';
import { SqliteResultsExporter } from '../infrastructure/export/SqliteResultsExporter.js';
import { JobRegistry } from '../infrastructure/registry/JobRegistry.js';
import { SubprocessEvaluationRunner } from '../infrastructure/runner/SubprocessEvaluationRunner.js';
import { WebServer } from '../infrastructure/web/WebServer.js';
import { JobExecutor } from '../application/services/JobExecutor.js';
import { EvaluationService } from '../application/services/EvaluationService.js';
import { DEFAULT_RETRY_CONFIG } from '../utils/retry.js';
import { registerEvaluationTools } from './tools/EvaluationTools.js';
import { registerHealthCheckTool } from './tools/HealthCheckTool.js';
import { StreamableHTTPTransportManager, SessionFactory } from '../infrastructure/transport/StreamableHTTPTransportManager.js';

/**
 * Wires the registry, executor and service together and exposes them over
 * HTTP and MCP
 */
export class EvalServer implements SessionFactory {
  private server: McpServer | null = null; // stdio mode only; HTTP sessions get their own
  private evaluationService: EvaluationService;
  private exporter: SqliteResultsExporter | null = null;
  private webServer: WebServer | null = null;
  private streamableTransportManager: StreamableHTTPTransportManager | null = null;
  private debugLog: (message: string) => void;

  constructor(private config: Config) {
    this.debugLog = (message: string) => {
      if (config.server.debug) {
        console.error(`[DEBUG] ${message}`);
      }
    };

    if (config.mcp.transport === 'streamable' && !config.http.enabled) {
      throw new ConfigurationError('MCP_TRANSPORT=streamable requires HTTP_ENABLED=true');
    }

    const registry = new JobRegistry(config.scorers.length, this.debugLog);
    const runner = new SubprocessEvaluationRunner({
      ...config.runner,
      debugLog: this.debugLog,
    });

    if (config.resultsExport.enabled) {
      this.exporter = new SqliteResultsExporter(
        new DatabaseConnection(config.resultsExport.databasePath),
        { ...DEFAULT_RETRY_CONFIG, maxAttempts: config.resultsExport.retryAttempts }
      );
    }

    const executor = new JobExecutor(registry, runner, config.scorers, {
      maxConcurrent: config.jobQueue.maxConcurrentJobs,
      exporter: this.exporter ?? undefined,
      debugLog: this.debugLog,
    });
    this.evaluationService = new EvaluationService(registry, executor, config.scorers);

    if (config.http.enabled) {
      this.webServer = new WebServer(this.evaluationService, {
        port: config.http.port,
        name: config.server.name,
        version: config.server.version,
        healthComponents: () => ({ resultsStore: this.resultsStoreHealth() }),
      });
    }

    if (config.mcp.transport === 'stdio') {
      this.server = this.createServer();
    } else if (config.mcp.transport === 'streamable') {
      this.streamableTransportManager = new StreamableHTTPTransportManager(
        this,
        config.mcp.sessionTimeoutMinutes
      );
    }
  }

  /**
   * Create a new MCP server instance for a session (SessionFactory implementation)
   */
  createServerForSession(sessionId: string): McpServer {
    this.debugLog(`Creating MCP server for session: ${sessionId}`);
    return this.createServer();
  }

  private createServer(): McpServer {
    const server = new McpServer({
      name: this.config.server.name,
      version: this.config.server.version,
    });

    registerEvaluationTools(server, this.evaluationService);
    registerHealthCheckTool(server, this.evaluationService, this.exporter);

    return server;
  }

  private resultsStoreHealth() {
    if (!this.exporter) {
      return { enabled: false };
    }
    return { enabled: true, ...this.exporter.getStatistics() };
  }

  printStats() {
    const stats = this.evaluationService.getStatistics();
    console.error(
      `📋 Job Statistics: ${stats.total} total, ${stats.queued} queued, ${stats.running} running, ${stats.completed} completed, ${stats.failed} failed`
    );
    if (this.exporter) {
      const dbStats = this.exporter.getStatistics();
      console.error(
        `📊 Results Store: ${dbStats.totalRows} rows for ${dbStats.totalJobs} jobs, ${(dbStats.databaseSize / 1024).toFixed(2)} KB`
      );
    }
  }

  async start() {
    if (this.webServer) {
      if (this.streamableTransportManager) {
        this.webServer.enableStreamableTransport(this.streamableTransportManager);
      }
      await this.webServer.start();
    }

    if (this.server) {
      const transport = new StdioServerTransport();

      process.stdin.on('error', (error) => {
        console.error('⚠️ stdin error (non-fatal):', error.message);
      });
      process.stdout.on('error', (error) => {
        console.error('⚠️ stdout error (non-fatal):', error.message);
      });
      process.stdin.on('end', () => {
        console.error('⚠️ stdin ended - client may have disconnected');
      });

      await this.server.connect(transport);
      console.error(`\n✅ ${this.config.server.name} MCP server running on stdio`);
      this.debugLog('stdio transport connected successfully');
    } else if (this.streamableTransportManager) {
      const port = this.config.http.port;
      console.error(`\n✅ ${this.config.server.name} running with Streamable HTTP MCP`);
      console.error(`📡 MCP Endpoint: http://localhost:${port}/mcp`);
      console.error(`📋 Session Info: http://localhost:${port}/mcp/sessions`);
    }
  }

  /**
   * Stop accepting work and release resources. Running evaluations are not
   * awaited; their jobs are lost with the process.
   */
  async shutdown() {
    console.error('\n👋 Shutting down gracefully...');

    if (this.streamableTransportManager) {
      await this.streamableTransportManager.closeAll();
    }
    if (this.webServer) {
      await this.webServer.stop();
    }
    if (this.server) {
      await this.server.close();
    }
    if (this.exporter) {
      this.exporter.close();
    }
  }
}
