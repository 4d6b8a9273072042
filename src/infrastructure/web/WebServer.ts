import express, { Express, NextFunction, Request, Response } from 'express';
import { Server as HttpServer } from 'http';
import cors from 'cors';
import { ZodError } from 'zod';
import type { EvaluationService } from '../../application/services/EvaluationService.js';
import { parseSubmission } from '../../application/validation.js';
import {
  serializeResults,
  serializeScorer,
  serializeStatus,
  serializeSummary,
} from '../../application/serializers.js';
import { InvalidJobStateError, JobNotFoundError } from '../../core/errors.js';
import type { StreamableHTTPTransportManager } from '../transport/StreamableHTTPTransportManager.js';

export interface WebServerOptions {
  port: number;
  name: string;
  version: string;
  // Extra components reported by GET /health
  healthComponents?: () => Record<string, unknown>;
}

const IDEMPOTENCY_HEADER = 'idempotency-key';

/**
 * HTTP surface of the evaluation service
 */
export class WebServer {
  private app: Express;
  private httpServer: HttpServer | null = null;
  private streamableTransportManager: StreamableHTTPTransportManager | null = null;

  constructor(
    private evaluationService: EvaluationService,
    private options: WebServerOptions
  ) {
    this.app = express();
    this.setupMiddleware();
    this.setupRoutes();
  }

  /**
   * Express application, for mounting or in-process testing
   */
  getApp(): Express {
    return this.app;
  }

  /**
   * Enable the Streamable HTTP MCP transport on /mcp
   */
  public enableStreamableTransport(manager: StreamableHTTPTransportManager): void {
    this.streamableTransportManager = manager;
    this.setupStreamableRoutes();
  }

  private setupMiddleware(): void {
    this.app.use(cors());
    this.app.use(express.json({ limit: '5mb' }));
  }

  private setupRoutes(): void {
    this.app.get('/', (_req: Request, res: Response) => {
      res.json({ status: 'ok', message: `${this.options.name} API` });
    });

    this.app.get('/health', (_req: Request, res: Response) => {
      res.json({
        status: 'healthy',
        version: this.options.version,
        timestamp: new Date().toISOString(),
        jobs: this.evaluationService.getStatistics(),
        ...(this.options.healthComponents?.() ?? {}),
      });
    });

    // API: List configured scorers with their weights
    this.app.get('/scorers', (_req: Request, res: Response) => {
      res.json(this.evaluationService.listScorers().map(serializeScorer));
    });

    // API: Submit a batch evaluation job (202, or 200 for a duplicate idempotency key)
    this.app.post('/evaluate', (req: Request, res: Response, next: NextFunction) => {
      try {
        const { request, idempotencyKey } = parseSubmission(req.body, req.get(IDEMPOTENCY_HEADER));
        const { jobId, duplicate } = this.evaluationService.submit(request, idempotencyKey);
        const status = serializeStatus(this.evaluationService.getStatus(jobId));

        if (duplicate) {
          res.status(200).json({
            ...status,
            message: 'Duplicate idempotency_key detected. Returning existing job.',
          });
          return;
        }
        res.status(202).json(status);
      } catch (error) {
        next(error);
      }
    });

    // API: Poll job status
    this.app.get('/evaluate/:jobId', (req: Request, res: Response, next: NextFunction) => {
      try {
        res.json(serializeStatus(this.evaluationService.getStatus(req.params.jobId)));
      } catch (error) {
        next(error);
      }
    });

    // API: Detailed results, only once the job is completed
    this.app.get('/evaluate/:jobId/results', (req: Request, res: Response, next: NextFunction) => {
      try {
        res.json(serializeResults(this.evaluationService.getResults(req.params.jobId)));
      } catch (error) {
        next(error);
      }
    });

    // API: Get all jobs
    this.app.get('/jobs', (_req: Request, res: Response) => {
      const jobs = this.evaluationService.list();
      res.json({ total: jobs.length, jobs: jobs.map(serializeSummary) });
    });
  }

  /**
   * Register /mcp routes. Must run before installErrorHandlers().
   */
  private setupStreamableRoutes(): void {
    if (!this.streamableTransportManager) {
      console.error('[WebServer] Streamable transport manager not initialized');
      return;
    }
    const manager = this.streamableTransportManager;

    this.app.post('/mcp', async (req: Request, res: Response) => {
      await manager.handlePostRequest(req, res);
    });
    this.app.get('/mcp', async (req: Request, res: Response) => {
      await manager.handleGetRequest(req, res);
    });
    this.app.delete('/mcp', async (req: Request, res: Response) => {
      await manager.handleDeleteRequest(req, res);
    });
    this.app.get('/mcp/sessions', (_req: Request, res: Response) => {
      res.json({
        activeSessionCount: manager.getActiveSessionCount(),
        sessions: manager.getSessionInfo(),
      });
    });

    console.error('[WebServer] MCP Streamable HTTP routes registered: POST|GET|DELETE /mcp, GET /mcp/sessions');
  }

  private errorHandlersInstalled = false;

  /**
   * Install the 404 and error handlers. Idempotent; call after all routes.
   */
  installErrorHandlers(): void {
    if (this.errorHandlersInstalled) return;
    this.errorHandlersInstalled = true;

    this.app.use((_req: Request, res: Response) => {
      res.status(404).json({ error: 'Route not found' });
    });

    this.app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
      if (error instanceof JobNotFoundError) {
        res.status(404).json({ error: error.message });
        return;
      }
      if (error instanceof InvalidJobStateError) {
        res.status(409).json({ error: error.message, status: error.status });
        return;
      }
      if (error instanceof ZodError) {
        res.status(400).json({ error: error.issues.map((i) => i.message).join(', ') });
        return;
      }
      if (isBodyParseError(error)) {
        res.status(400).json({ error: 'Malformed JSON body' });
        return;
      }

      console.error('[WebServer] Unhandled error:', error);
      res.status(500).json({ error: 'Internal server error' });
    });
  }

  public start(): Promise<void> {
    this.installErrorHandlers();

    return new Promise((resolve, reject) => {
      const server = this.app.listen(this.options.port, () => {
        console.error(`[WebServer] API available at http://localhost:${this.options.port}`);
        resolve();
      });
      server.on('error', (error) => {
        console.error('[WebServer] Server error:', error);
        reject(error);
      });
      this.httpServer = server;
    });
  }

  public stop(): Promise<void> {
    return new Promise((resolve) => {
      if (!this.httpServer) {
        resolve();
        return;
      }
      this.httpServer.close(() => {
        console.error('[WebServer] HTTP server closed');
        this.httpServer = null;
        resolve();
      });
    });
  }
}

function isBodyParseError(error: unknown): boolean {
  return (
    error instanceof SyntaxError &&
    'type' in error &&
    error.type === 'entity.parse.failed'
  );
}
