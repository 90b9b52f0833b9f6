import { Embeddings } from '@langchain/core/embeddings';

/**
 * Deterministic embeddings: one dimension per vocabulary word, holding its
 * occurrence count. Texts sharing words with the query score higher.
 */
export class KeywordEmbeddings extends Embeddings {
  embedDocumentsCalls = 0;
  embedQueryCalls = 0;

  constructor(private readonly vocabulary: string[]) {
    super({});
  }

  async embedDocuments(documents: string[]): Promise<number[][]> {
    this.embedDocumentsCalls++;
    return documents.map((text) => this.vectorize(text));
  }

  async embedQuery(document: string): Promise<number[]> {
    this.embedQueryCalls++;
    return this.vectorize(document);
  }

  private vectorize(text: string): number[] {
    const words = text.toLowerCase().match(/[a-z]+/g) ?? [];
    // Constant component keeps every vector non-zero
    return [
      1,
      ...this.vocabulary.map((term) => words.filter((w) => w === term).length),
    ];
  }
}
