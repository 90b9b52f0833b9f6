import type { AnalysisResult } from '../entities/analysis-result.entity';
import type { Document } from '../entities/document.entity';

/**
 * A way of producing an analysis for one document
 */
export interface AnalysisStrategy {
  analyze(document: Document): Promise<AnalysisResult>;
}

export const RETRIEVAL_ANALYZER = 'RETRIEVAL_ANALYZER';
export const HEURISTIC_ANALYZER = 'HEURISTIC_ANALYZER';
