/**
 * Retrieval Analyzer
 * Chunks the document, retrieves the most relevant chunks and asks the chat
 * model for a structured assessment. Every failure surfaces as AIServiceError.
 */

import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { BaseChatModel } from '@langchain/core/language_models/chat_models';
import { StringOutputParser } from '@langchain/core/output_parsers';
import { CHAT_MODEL } from '../../providers/types';
import { AIServiceError } from '../../errors/analysis-errors';
import { AnalysisResult } from '../../entities/analysis-result.entity';
import type { Document } from '../../entities/document.entity';
import { TextChunkerService } from '../../stages/chunk/text-chunker.service';
import { DEFAULT_SEPARATORS, type Chunk } from '../../stages/chunk/chunk.types';
import { EmbeddingIndexService } from '../../stages/embed/embedding-index.service';
import { getInteger } from '../../../common/config/config.utils';
import { withTimeout } from '../../../common/utils/async.utils';
import {
  ANALYSIS_CLOCK,
  monotonicClock,
  type Clock,
} from '../../../common/utils/clock';
import type { AnalysisStrategy } from '../analysis-strategy.interface';
import { ANALYSIS_QUERY, analysisPrompt } from './analysis-prompt';
import { AnalysisOutputParser } from './analysis-output.parser';

@Injectable()
export class RetrievalAnalyzerService implements AnalysisStrategy {
  private readonly logger = new Logger(RetrievalAnalyzerService.name);
  private readonly outputParser = new AnalysisOutputParser();

  private readonly chunkSize: number;
  private readonly overlap: number;
  private readonly topK: number;
  private readonly timeoutMs: number;

  constructor(
    @Inject(CHAT_MODEL) private readonly model: BaseChatModel,
    private readonly chunker: TextChunkerService,
    private readonly indexService: EmbeddingIndexService,
    private readonly configService: ConfigService,
    @Optional()
    @Inject(ANALYSIS_CLOCK)
    private readonly clock: Clock = monotonicClock,
  ) {
    this.chunkSize = getInteger(this.configService, 'ANALYSIS_CHUNK_SIZE', 1000);
    this.overlap = getInteger(this.configService, 'ANALYSIS_CHUNK_OVERLAP', 200, 0);
    this.topK = getInteger(this.configService, 'ANALYSIS_TOP_K', 3);
    this.timeoutMs = getInteger(
      this.configService,
      'ANALYSIS_LLM_TIMEOUT_MS',
      60000,
    );
  }

  async analyze(document: Document): Promise<AnalysisResult> {
    const startTime = Date.now();

    try {
      const result = await this.run(document);

      this.logger.log(
        `[RetrievalAnalyzer] documentId=${document.id} status=success duration=${Date.now() - startTime}ms`,
      );
      return result;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(
        `[RetrievalAnalyzer] documentId=${document.id} status=failed duration=${Date.now() - startTime}ms error=${message}`,
      );

      if (error instanceof AIServiceError) {
        throw error;
      }
      throw new AIServiceError(`Retrieval analysis failed: ${message}`, error);
    }
  }

  private async run(document: Document): Promise<AnalysisResult> {
    const chunks = await this.chunker.split(document.content, {
      chunkSize: this.chunkSize,
      overlap: this.overlap,
      separators: [...DEFAULT_SEPARATORS],
    });

    if (chunks.length === 0) {
      throw new AIServiceError('Document produced no chunks to index');
    }

    const index = await this.indexService.build(chunks);
    const relevant = await index.query(ANALYSIS_QUERY, this.topK);

    this.logger.debug(
      `Retrieved chunks [${relevant.map((c) => c.index).join(', ')}] of ${chunks.length}`,
    );

    const raw = await this.invokeModel(document, relevant);
    const output = await this.outputParser.parse(raw);

    const result = AnalysisResult.create(
      {
        documentId: document.id,
        missingTopics: output.missing_topics,
        summary: output.summary,
        insights: output.insights,
        source: 'retrieval',
      },
      this.clock,
    );

    if (!result.hasMeaningfulAnalysis()) {
      throw new AIServiceError('Model returned an empty analysis');
    }

    return result;
  }

  private async invokeModel(
    document: Document,
    chunks: Chunk[],
  ): Promise<string> {
    const chain = analysisPrompt.pipe(this.model).pipe(new StringOutputParser());

    // The RunnableConfig timeout aborts the request; the race bounds the
    // wait for providers that ignore the abort
    return withTimeout(
      chain.invoke(
        {
          format_instructions: this.outputParser.getFormatInstructions(),
          document_name: document.name,
          context: chunks
            .map((chunk) => `[Excerpt ${chunk.index + 1}]\n${chunk.text}`)
            .join('\n\n'),
        },
        { timeout: this.timeoutMs },
      ),
      this.timeoutMs,
      'chat model',
    );
  }
}
