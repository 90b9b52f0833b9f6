/**
 * Provider Types and Configurations
 */

export const LLM_PROVIDERS = ['openai', 'google', 'anthropic', 'ollama'] as const;
export type LLMProvider = (typeof LLM_PROVIDERS)[number];

export const EMBEDDING_PROVIDERS = ['ollama', 'openai', 'google'] as const;
export type EmbeddingProvider = (typeof EMBEDDING_PROVIDERS)[number];

/**
 * Injection tokens for the configured model instances
 */
export const CHAT_MODEL = 'CHAT_MODEL';
export const EMBEDDING_MODEL = 'EMBEDDING_MODEL';

export interface ChatModelOptions {
  model?: string;
  temperature?: number;
  maxTokens?: number;
  maxRetries?: number;
}

export interface EmbeddingProviderConfig {
  provider: EmbeddingProvider;
  model: string;
  baseURL?: string;
}
