import type { AnalysisResult } from '../entities/analysis-result.entity';

export const ANALYSIS_REPOSITORY = 'ANALYSIS_REPOSITORY';

/**
 * Store of the current analysis per document
 */
export interface AnalysisRepository {
  findByDocumentId(documentId: string): Promise<AnalysisResult | null>;

  /**
   * Persist a result, assigning an id when it has none.
   * Replaces any previous result for the same document.
   */
  save(result: AnalysisResult): Promise<AnalysisResult>;
}
