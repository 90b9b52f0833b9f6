import { Module } from '@nestjs/common';
import { LLMProviderFactory } from './llm-provider.factory';
import { EmbeddingProviderFactory } from './embedding-provider.factory';
import { CHAT_MODEL, EMBEDDING_MODEL } from './types';

/**
 * Providers Module
 * Exposes the configured chat and embedding models under injection tokens
 * so tests can swap them for in-process fakes.
 */
@Module({
  providers: [
    LLMProviderFactory,
    EmbeddingProviderFactory,
    {
      provide: CHAT_MODEL,
      useFactory: (factory: LLMProviderFactory) =>
        factory.createAnalysisModel(),
      inject: [LLMProviderFactory],
    },
    {
      provide: EMBEDDING_MODEL,
      useFactory: (factory: EmbeddingProviderFactory) =>
        factory.createEmbeddingModel(),
      inject: [EmbeddingProviderFactory],
    },
  ],
  exports: [CHAT_MODEL, EMBEDDING_MODEL],
})
export class ProvidersModule {}
