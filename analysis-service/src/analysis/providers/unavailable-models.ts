/**
 * Stand-ins for providers that are selected but not configured.
 * Every call fails, so the analyzer reports AIServiceError and the
 * heuristic fallback answers instead.
 */

import { SimpleChatModel } from '@langchain/core/language_models/chat_models';
import { Embeddings } from '@langchain/core/embeddings';
import { ProviderError } from '../errors/analysis-errors';

export class UnavailableChatModel extends SimpleChatModel {
  constructor(private readonly reason: string) {
    super({});
  }

  _llmType(): string {
    return 'unavailable';
  }

  async _call(): Promise<string> {
    throw new ProviderError('chat', new Error(this.reason));
  }
}

export class UnavailableEmbeddings extends Embeddings {
  constructor(private readonly reason: string) {
    super({});
  }

  embedDocuments(): Promise<number[][]> {
    return Promise.reject(new ProviderError('embedDocuments', new Error(this.reason)));
  }

  embedQuery(): Promise<number[]> {
    return Promise.reject(new ProviderError('embedQuery', new Error(this.reason)));
  }
}
