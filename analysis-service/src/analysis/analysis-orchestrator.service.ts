/**
 * Analysis Orchestrator
 * Entry point for document analysis: cache check, model-backed analysis with
 * heuristic fallback, persistence.
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import type { AnalysisResult } from './entities/analysis-result.entity';
import type { Document } from './entities/document.entity';
import {
  AIServiceError,
  AnalysisNotFoundError,
  DocumentAnalysisError,
  DocumentNotFoundError,
} from './errors/analysis-errors';
import {
  ANALYSIS_REPOSITORY,
  type AnalysisRepository,
} from './repositories/analysis.repository';
import {
  DOCUMENT_REPOSITORY,
  type DocumentRepository,
} from './repositories/document.repository';
import {
  HEURISTIC_ANALYZER,
  RETRIEVAL_ANALYZER,
  type AnalysisStrategy,
} from './strategies/analysis-strategy.interface';

export interface ExecuteOptions {
  forceReanalysis?: boolean;
  /** Aborting before persistence leaves the store untouched */
  signal?: AbortSignal;
}

@Injectable()
export class AnalysisOrchestratorService {
  private readonly logger = new Logger(AnalysisOrchestratorService.name);

  constructor(
    @Inject(DOCUMENT_REPOSITORY)
    private readonly documentRepository: DocumentRepository,
    @Inject(ANALYSIS_REPOSITORY)
    private readonly analysisRepository: AnalysisRepository,
    @Inject(RETRIEVAL_ANALYZER)
    private readonly retrievalAnalyzer: AnalysisStrategy,
    @Inject(HEURISTIC_ANALYZER)
    private readonly heuristicAnalyzer: AnalysisStrategy,
  ) {}

  /**
   * @throws DocumentNotFoundError when the document does not exist
   * @throws DocumentAnalysisError when the document has no analyzable text
   */
  async execute(
    documentId: string,
    options: ExecuteOptions = {},
  ): Promise<AnalysisResult> {
    const { forceReanalysis = false, signal } = options;
    const startTime = Date.now();

    const document = await this.documentRepository.findById(documentId);
    if (!document) {
      throw new DocumentNotFoundError(documentId);
    }

    if (!document.canBeAnalyzed()) {
      throw new DocumentAnalysisError(
        documentId,
        document.isDeleted() ? 'document has been deleted' : undefined,
      );
    }

    if (!forceReanalysis) {
      const cached = await this.analysisRepository.findByDocumentId(documentId);
      if (cached) {
        this.logger.log(
          `[Analysis] documentId=${documentId} status=cached analyzedAt=${cached.analyzedAt.toISOString()}`,
        );
        return cached;
      }
    }

    const result = await this.analyze(document);

    signal?.throwIfAborted();
    const stored = await this.analysisRepository.save(result);

    this.logger.log(
      `[Analysis] documentId=${documentId} status=completed source=${stored.source} force=${forceReanalysis} duration=${Date.now() - startTime}ms`,
    );

    return stored;
  }

  /**
   * @throws AnalysisNotFoundError when the document was never analyzed
   */
  async getLatest(documentId: string): Promise<AnalysisResult> {
    const result = await this.analysisRepository.findByDocumentId(documentId);
    if (!result) {
      throw new AnalysisNotFoundError(documentId);
    }
    return result;
  }

  private async analyze(document: Document): Promise<AnalysisResult> {
    try {
      return await this.retrievalAnalyzer.analyze(document);
    } catch (error) {
      if (!(error instanceof AIServiceError)) {
        throw error;
      }

      this.logger.warn(
        `[Analysis] documentId=${document.id} falling back to heuristic analysis: ${error.message}`,
      );
      return this.heuristicAnalyzer.analyze(document);
    }
  }
}
