import { cosineSimilarity } from '@langchain/core/utils/math';
import type { Chunk } from '../chunk/chunk.types';

export type QueryEmbedder = (question: string) => Promise<number[]>;

/**
 * Per-document similarity index over chunk embeddings.
 * Built for one analysis run and dropped with it.
 */
export class EmbeddingIndex {
  private readonly chunks: readonly Chunk[];
  private readonly vectors: number[][];

  constructor(
    chunks: readonly Chunk[],
    vectors: number[][],
    private readonly embedQuery: QueryEmbedder,
  ) {
    if (chunks.length !== vectors.length) {
      throw new Error(
        `Expected ${chunks.length} vectors, got ${vectors.length}`,
      );
    }

    this.chunks = chunks;
    this.vectors = vectors;
  }

  get size(): number {
    return this.chunks.length;
  }

  /**
   * Top-k chunks by descending cosine similarity; ties go to the lower index
   */
  async query(question: string, k: number): Promise<Chunk[]> {
    if (k < 1 || this.chunks.length === 0) {
      return [];
    }

    const queryVector = await this.embedQuery(question);
    const [scores] = cosineSimilarity([queryVector], this.vectors);

    return this.chunks
      .map((chunk, i) => ({
        chunk,
        // Zero-length vectors come back as NaN
        score: Number.isNaN(scores[i]) ? -Infinity : scores[i],
      }))
      .sort((a, b) => b.score - a.score || a.chunk.index - b.chunk.index)
      .slice(0, Math.floor(k))
      .map(({ chunk }) => chunk);
  }
}
