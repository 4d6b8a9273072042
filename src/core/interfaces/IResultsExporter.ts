import type { EvaluationResultsView } from '../entities/EvaluationViews.js';

/**
 * Export of completed evaluation results to an analytical store
 */
export interface IResultsExporter {
  export(results: EvaluationResultsView): Promise<void>;
}
