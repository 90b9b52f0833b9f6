/**
 * Chunk Stage Types
 */

/**
 * Ordered span of the source text. Never persisted.
 * Invariant: text === source.slice(startOffset, endOffset)
 */
export interface Chunk {
  index: number;
  text: string;
  startOffset: number;
  endOffset: number;
}

export interface ChunkingOptions {
  chunkSize: number;
  overlap: number;
  separators: string[];
}

/**
 * Paragraph break, line break, sentence end, space
 */
export const DEFAULT_SEPARATORS: readonly string[] = ['\n\n', '\n', '. ', ' '];
