import type {
  AnalysisResult,
  AnalysisSource,
} from '../entities/analysis-result.entity';

export interface AnalysisResponseDto {
  id: string | null;
  documentId: string;
  missingTopics: string[];
  summary: string;
  insights: string[];
  analyzedAt: string;
  source: AnalysisSource;
  isComplete: boolean;
  hasMeaningfulAnalysis: boolean;
}

export function toAnalysisResponse(result: AnalysisResult): AnalysisResponseDto {
  return {
    id: result.id ?? null,
    documentId: result.documentId,
    missingTopics: [...result.missingTopics],
    summary: result.summary,
    insights: [...result.insights],
    analyzedAt: result.analyzedAt.toISOString(),
    source: result.source,
    isComplete: result.isComplete(),
    hasMeaningfulAnalysis: result.hasMeaningfulAnalysis(),
  };
}
