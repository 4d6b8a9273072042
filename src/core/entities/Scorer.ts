/**
 * Scorer configured for every evaluation run
 */
export interface ScorerDefinition {
  name: string;
  weight: number; // 0-1; the configured weights sum to 1
  description: string;
  threshold?: number;
  required?: boolean;
}
