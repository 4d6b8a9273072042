import type { EvaluationResultsView } from '../../core/entities/EvaluationViews.js';
import type { IResultsExporter } from '../../core/interfaces/IResultsExporter.js';
import { DatabaseConnection } from '../database/DatabaseConnection.js';
import { ResultsRepository } from '../database/repositories/ResultsRepository.js';
import { DEFAULT_RETRY_CONFIG, isRetryableError, RetryConfig, withRetry } from '../../utils/retry.js';

/**
 * Writes completed evaluation results into the SQLite results store
 */
export class SqliteResultsExporter implements IResultsExporter {
  private repository: ResultsRepository;

  constructor(
    private connection: DatabaseConnection,
    private retryConfig: RetryConfig = DEFAULT_RETRY_CONFIG
  ) {
    this.repository = new ResultsRepository(connection.getDatabase());
  }

  async export(results: EvaluationResultsView): Promise<void> {
    const rows = await withRetry(
      async () => this.repository.saveResults(results),
      this.retryConfig,
      {
        shouldRetry: isRetryableError,
        onLog: (log) => {
          if (!log.success) {
            console.error(
              `[ResultsExporter] ✗ Attempt ${log.attempt} for job ${results.jobId} failed: ${log.error}` +
                (log.nextRetryInMs !== undefined ? ` (retrying in ${log.nextRetryInMs}ms)` : '')
            );
          }
        },
      }
    );

    console.error(`[ResultsExporter] ✓ ${rows} rows written for job ${results.jobId} to ${this.connection.getDatabasePath()}`);
  }

  getStatistics() {
    return this.connection.getStatistics();
  }

  close(): void {
    this.connection.close();
  }
}
