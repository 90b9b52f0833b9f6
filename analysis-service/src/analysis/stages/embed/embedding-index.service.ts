/**
 * Embedding Index Service
 * Embeds chunks and builds the per-run similarity index
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { Embeddings } from '@langchain/core/embeddings';
import { EMBEDDING_MODEL } from '../../providers/types';
import { ProviderError } from '../../errors/analysis-errors';
import { getInteger } from '../../../common/config/config.utils';
import { sleep, withTimeout } from '../../../common/utils/async.utils';
import type { Chunk } from '../chunk/chunk.types';
import { EmbeddingIndex } from './embedding-index';

@Injectable()
export class EmbeddingIndexService {
  private readonly logger = new Logger(EmbeddingIndexService.name);

  private readonly timeoutMs: number;
  private readonly retryDelayMs: number;

  constructor(
    @Inject(EMBEDDING_MODEL) private readonly embeddings: Embeddings,
    private readonly configService: ConfigService,
  ) {
    this.timeoutMs = getInteger(this.configService, 'EMBEDDING_TIMEOUT_MS', 30000);
    this.retryDelayMs = getInteger(
      this.configService,
      'EMBEDDING_RETRY_DELAY_MS',
      500,
      0,
    );
  }

  /**
   * @throws ProviderError when embedding fails twice or returns malformed vectors
   */
  async build(chunks: readonly Chunk[]): Promise<EmbeddingIndex> {
    const startTime = Date.now();

    const vectors = await this.withRetry('embedDocuments', () =>
      this.embeddings.embedDocuments(chunks.map((c) => c.text)),
    );
    this.validateVectors(chunks.length, vectors);

    this.logger.debug(
      `Embedded ${chunks.length} chunks in ${Date.now() - startTime}ms`,
    );

    return new EmbeddingIndex(chunks, vectors, (question) =>
      this.withRetry('embedQuery', () => this.embeddings.embedQuery(question)),
    );
  }

  private validateVectors(expected: number, vectors: number[][]): void {
    if (vectors.length !== expected) {
      throw new ProviderError(
        'embedDocuments',
        new Error(`expected ${expected} vectors, got ${vectors.length}`),
      );
    }

    const dimension = vectors[0]?.length ?? 0;
    if (vectors.some((v) => v.length !== dimension || v.length === 0)) {
      throw new ProviderError(
        'embedDocuments',
        new Error('vectors have inconsistent or empty dimensions'),
      );
    }
  }

  /**
   * One attempt, a short backoff, one more attempt
   */
  private async withRetry<T>(
    operation: string,
    call: () => Promise<T>,
  ): Promise<T> {
    try {
      return await withTimeout(call(), this.timeoutMs, operation);
    } catch (error) {
      this.logger.warn(
        `${operation} failed, retrying in ${this.retryDelayMs}ms: ${error instanceof Error ? error.message : String(error)}`,
      );
    }

    await sleep(this.retryDelayMs);

    try {
      return await withTimeout(call(), this.timeoutMs, operation);
    } catch (error) {
      throw new ProviderError(operation, error);
    }
  }
}
