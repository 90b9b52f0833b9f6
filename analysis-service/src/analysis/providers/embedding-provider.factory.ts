/**
 * Embedding Provider Factory
 * Multi-provider support: Ollama, OpenAI, Google
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { OllamaEmbeddings } from '@langchain/ollama';
import { OpenAIEmbeddings } from '@langchain/openai';
import { GoogleGenerativeAIEmbeddings } from '@langchain/google-genai';
import type { Embeddings } from '@langchain/core/embeddings';
import {
  EMBEDDING_PROVIDERS,
  type EmbeddingProvider,
  type EmbeddingProviderConfig,
} from './types';
import { UnavailableEmbeddings } from './unavailable-models';

const DEFAULT_MODELS: Record<EmbeddingProvider, string> = {
  ollama: 'bge-m3:567m',
  openai: 'text-embedding-3-small',
  google: 'text-embedding-004',
};

@Injectable()
export class EmbeddingProviderFactory {
  private readonly logger = new Logger(EmbeddingProviderFactory.name);

  constructor(private readonly configService: ConfigService) {}

  createEmbeddingModel(): Embeddings {
    const { provider, model } = this.getProviderConfig();

    if (!this.isProviderConfigured(provider)) {
      this.logger.warn(
        `Embedding provider ${provider} has no API key; analyses will use the heuristic fallback`,
      );
      return new UnavailableEmbeddings(`${provider} embeddings are not configured`);
    }

    this.logger.log(`Creating embedding model: ${provider}/${model}`);

    switch (provider) {
      case 'ollama':
        return this.createOllamaEmbeddings(model);
      case 'openai':
        return this.createOpenAIEmbeddings(model);
      case 'google':
        return this.createGoogleEmbeddings(model);
    }
  }

  getProviderConfig(): EmbeddingProviderConfig {
    const provider = this.getProvider();

    return {
      provider,
      model: this.configService.get<string>(
        `EMBEDDING_MODEL_${provider.toUpperCase()}`,
        DEFAULT_MODELS[provider],
      ),
      baseURL:
        provider === 'ollama'
          ? this.configService.get<string>(
              'OLLAMA_BASE_URL',
              'http://localhost:11434',
            )
          : undefined,
    };
  }

  isProviderConfigured(provider: EmbeddingProvider): boolean {
    switch (provider) {
      case 'openai':
        return !!this.configService.get<string>('OPENAI_API_KEY');
      case 'google':
        return !!this.configService.get<string>('GOOGLE_API_KEY');
      case 'ollama':
        return true;
    }
  }

  private getProvider(): EmbeddingProvider {
    const provider = this.configService.get<string>(
      'EMBEDDING_PROVIDER',
      'ollama',
    );

    const known = EMBEDDING_PROVIDERS.find((p) => p === provider);
    if (!known) {
      this.logger.warn(
        `Invalid embedding provider: ${provider}, defaulting to ollama`,
      );
      return 'ollama';
    }

    return known;
  }

  private createOllamaEmbeddings(model: string): OllamaEmbeddings {
    return new OllamaEmbeddings({
      model,
      baseUrl: this.configService.get<string>(
        'OLLAMA_BASE_URL',
        'http://localhost:11434',
      ),
    });
  }

  private createOpenAIEmbeddings(model: string): OpenAIEmbeddings {
    const apiKey = this.configService.get<string>('OPENAI_API_KEY');

    if (!apiKey) {
      throw new Error('OPENAI_API_KEY is required for OpenAI embeddings');
    }

    return new OpenAIEmbeddings({
      model,
      apiKey,
    });
  }

  private createGoogleEmbeddings(model: string): GoogleGenerativeAIEmbeddings {
    const apiKey = this.configService.get<string>('GOOGLE_API_KEY');

    if (!apiKey) {
      throw new Error('GOOGLE_API_KEY is required for Google embeddings');
    }

    return new GoogleGenerativeAIEmbeddings({
      model,
      apiKey,
    });
  }
}
