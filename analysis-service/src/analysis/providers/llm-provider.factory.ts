/**
 * LLM Provider Factory
 * Creates chat models from multiple providers (OpenAI, Google, Anthropic, Ollama)
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ChatOpenAI } from '@langchain/openai';
import { ChatGoogleGenerativeAI } from '@langchain/google-genai';
import { ChatAnthropic } from '@langchain/anthropic';
import { ChatOllama } from '@langchain/ollama';
import type { BaseChatModel } from '@langchain/core/language_models/chat_models';
import { getInteger, getNumber } from '../../common/config/config.utils';
import { LLM_PROVIDERS, type ChatModelOptions, type LLMProvider } from './types';
import { UnavailableChatModel } from './unavailable-models';

@Injectable()
export class LLMProviderFactory {
  private readonly logger = new Logger(LLMProviderFactory.name);

  constructor(private readonly configService: ConfigService) {}

  /**
   * Chat model used by the retrieval analyzer, tuned from ANALYSIS_* settings.
   * Timeouts are applied per call, not here.
   */
  createAnalysisModel(): BaseChatModel {
    const provider = this.getProvider();

    if (!this.isProviderConfigured(provider)) {
      this.logger.warn(
        `LLM provider ${provider} has no API key; analyses will use the heuristic fallback`,
      );
      return new UnavailableChatModel(`${provider} provider is not configured`);
    }

    return this.createChatModel(provider, {
      temperature: getNumber(this.configService, 'ANALYSIS_TEMPERATURE', 0.3),
      maxTokens: getInteger(this.configService, 'ANALYSIS_MAX_TOKENS', 1024),
      // The analyzer already falls back to heuristics; keep SDK retries short
      maxRetries: getInteger(this.configService, 'LLM_MAX_RETRIES', 1, 0),
    });
  }

  /**
   * Create chat model based on provider
   * @param provider - Provider name (openai, google, anthropic, ollama)
   * @param options - Optional overrides (model, temperature, maxTokens, maxRetries)
   */
  createChatModel(
    provider: LLMProvider,
    options?: ChatModelOptions,
  ): BaseChatModel {
    this.logger.log(`Creating chat model for provider: ${provider}`);

    switch (provider) {
      case 'openai':
        return this.createOpenAIModel(options);
      case 'google':
        return this.createGoogleModel(options);
      case 'anthropic':
        return this.createAnthropicModel(options);
      case 'ollama':
        return this.createOllamaModel(options);
    }
  }

  /**
   * Get provider from config (default: ollama)
   */
  getProvider(): LLMProvider {
    const provider = this.configService.get<string>('LLM_PROVIDER', 'ollama');

    if (!this.isLLMProvider(provider)) {
      this.logger.warn(`Invalid LLM provider: ${provider}, defaulting to ollama`);
      return 'ollama';
    }

    return provider;
  }

  /**
   * Check if provider is configured
   */
  isProviderConfigured(provider: LLMProvider): boolean {
    switch (provider) {
      case 'openai':
        return !!this.configService.get<string>('OPENAI_API_KEY');
      case 'google':
        return !!this.configService.get<string>('GOOGLE_API_KEY');
      case 'anthropic':
        return !!this.configService.get<string>('ANTHROPIC_API_KEY');
      case 'ollama':
        // Local, always reachable by configuration
        return true;
    }
  }

  private isLLMProvider(value: string): value is LLMProvider {
    return (LLM_PROVIDERS as readonly string[]).includes(value);
  }

  private createOpenAIModel(options?: ChatModelOptions): ChatOpenAI {
    const model =
      options?.model ||
      this.configService.get<string>('OPENAI_CHAT_MODEL') ||
      'gpt-4o-mini';

    const apiKey = this.configService.get<string>('OPENAI_API_KEY');
    if (!apiKey) {
      throw new Error('OPENAI_API_KEY is required for OpenAI provider');
    }

    return new ChatOpenAI({
      model,
      temperature: options?.temperature ?? 0.3,
      maxTokens: options?.maxTokens ?? 1024,
      maxRetries: options?.maxRetries ?? 1,
      configuration: {
        baseURL:
          this.configService.get<string>('OPENAI_BASE_URL') ||
          'https://api.openai.com/v1',
        apiKey,
      },
    });
  }

  private createGoogleModel(
    options?: ChatModelOptions,
  ): ChatGoogleGenerativeAI {
    const model =
      options?.model ||
      this.configService.get<string>('GOOGLE_CHAT_MODEL') ||
      'gemini-2.5-flash-lite';

    const apiKey = this.configService.get<string>('GOOGLE_API_KEY');
    if (!apiKey) {
      throw new Error('GOOGLE_API_KEY is required for Google provider');
    }

    return new ChatGoogleGenerativeAI({
      model,
      temperature: options?.temperature ?? 0.3,
      maxOutputTokens: options?.maxTokens ?? 1024,
      maxRetries: options?.maxRetries ?? 1,
      apiKey,
    });
  }

  private createAnthropicModel(options?: ChatModelOptions): ChatAnthropic {
    const model =
      options?.model ||
      this.configService.get<string>('ANTHROPIC_CHAT_MODEL') ||
      'claude-3-5-haiku-20241022';

    const apiKey = this.configService.get<string>('ANTHROPIC_API_KEY');
    if (!apiKey) {
      throw new Error('ANTHROPIC_API_KEY is required for Anthropic provider');
    }

    return new ChatAnthropic({
      model,
      temperature: options?.temperature ?? 0.3,
      maxTokens: options?.maxTokens ?? 1024,
      maxRetries: options?.maxRetries ?? 1,
      apiKey,
    });
  }

  private createOllamaModel(options?: ChatModelOptions): ChatOllama {
    const model =
      options?.model ||
      this.configService.get<string>('OLLAMA_CHAT_MODEL') ||
      'llama3';

    return new ChatOllama({
      model,
      temperature: options?.temperature ?? 0.3,
      numPredict: options?.maxTokens ?? 1024,
      baseUrl:
        this.configService.get<string>('OLLAMA_BASE_URL') ||
        'http://localhost:11434',
    });
  }
}
