import { Injectable, Logger } from '@nestjs/common';
import { RecursiveCharacterTextSplitter } from '@langchain/textsplitters';
import { ChunkingConfigError } from '../../errors/analysis-errors';
import type { Chunk, ChunkingOptions } from './chunk.types';

/**
 * Text Chunker Service
 * Splits document text into overlapping, offset-addressed chunks.
 *
 * RecursiveCharacterTextSplitter picks the cut points (earliest separator
 * that fits first). Each piece is then mapped back onto the source text so
 * that consecutive chunks tile it, every chunk is extended backwards by
 * exactly `overlap` characters, and any span the separators could not bring
 * under budget is hard-cut.
 */
@Injectable()
export class TextChunkerService {
  private readonly logger = new Logger(TextChunkerService.name);

  async split(text: string, options: ChunkingOptions): Promise<Chunk[]> {
    this.validateOptions(options);

    if (text.trim().length === 0) {
      return [];
    }

    const { chunkSize, overlap } = options;
    // Room left for new text once the overlap is prepended
    const budget = chunkSize - overlap;

    const separators = options.separators.filter((s) => s.length > 0);
    const splitter = new RecursiveCharacterTextSplitter({
      chunkSize: budget,
      chunkOverlap: 0,
      separators: separators.length > 0 ? separators : [''],
      keepSeparator: true,
    });

    const pieces = await splitter.splitText(text);
    const boundaries = this.hardCut(
      this.locateBoundaries(text, pieces),
      budget,
    );

    const chunks: Chunk[] = [];
    for (let i = 0; i < boundaries.length - 1; i++) {
      const startOffset = i === 0 ? 0 : Math.max(0, boundaries[i] - overlap);
      const endOffset = boundaries[i + 1];

      chunks.push({
        index: i,
        text: text.slice(startOffset, endOffset),
        startOffset,
        endOffset,
      });
    }

    this.logger.debug(
      `Split ${text.length} chars into ${chunks.length} chunks (size=${chunkSize}, overlap=${overlap})`,
    );

    return chunks;
  }

  private validateOptions(options: ChunkingOptions): void {
    const { chunkSize, overlap } = options;

    if (!Number.isInteger(chunkSize) || chunkSize < 1) {
      throw new ChunkingConfigError(
        `chunkSize must be a positive integer, got ${chunkSize}`,
      );
    }

    if (!Number.isInteger(overlap) || overlap < 0) {
      throw new ChunkingConfigError(
        `overlap must be a non-negative integer, got ${overlap}`,
      );
    }

    if (overlap >= chunkSize) {
      throw new ChunkingConfigError(
        `overlap (${overlap}) must be smaller than chunkSize (${chunkSize})`,
      );
    }
  }

  /**
   * Start offsets of each piece, plus 0 and text.length as outer bounds.
   * Whitespace trimmed away by the splitter stays with the preceding span.
   */
  private locateBoundaries(text: string, pieces: string[]): number[] {
    const boundaries = [0];
    let cursor = 0;

    for (const piece of pieces) {
      let position = text.indexOf(piece, cursor);

      if (position === -1) {
        this.logger.warn(
          `Splitter piece not found at or after offset ${cursor}, anchoring at cursor`,
        );
        position = cursor;
      }

      if (position > boundaries[boundaries.length - 1]) {
        boundaries.push(position);
      }
      cursor = position + piece.length;
    }

    boundaries.push(text.length);
    return boundaries.filter(
      (offset, i) => i === 0 || offset > boundaries[i - 1],
    );
  }

  /**
   * Last resort: cut any span longer than the budget at fixed character steps
   */
  private hardCut(boundaries: number[], budget: number): number[] {
    const result = [boundaries[0]];

    for (let i = 1; i < boundaries.length; i++) {
      let start = result[result.length - 1];
      const end = boundaries[i];

      while (end - start > budget) {
        start += budget;
        result.push(start);
      }
      result.push(end);
    }

    return result;
  }
}
