import { ConfigService } from '@nestjs/config';
import { ChatOllama, OllamaEmbeddings } from '@langchain/ollama';
import { LLMProviderFactory } from './llm-provider.factory';
import { EmbeddingProviderFactory } from './embedding-provider.factory';
import { UnavailableChatModel, UnavailableEmbeddings } from './unavailable-models';
import { ProviderError } from '../errors/analysis-errors';

// ConfigService falls back to process.env; keep real keys out of the tests
const API_KEY_VARS = ['OPENAI_API_KEY', 'GOOGLE_API_KEY', 'ANTHROPIC_API_KEY'];
const savedEnv = { ...process.env };

beforeEach(() => {
  for (const name of API_KEY_VARS) {
    delete process.env[name];
  }
});

afterAll(() => {
  process.env = savedEnv;
});

describe('LLMProviderFactory', () => {
  it('defaults to ollama for an unknown provider', () => {
    const factory = new LLMProviderFactory(new ConfigService({ LLM_PROVIDER: 'mystery' }));

    expect(factory.getProvider()).toBe('ollama');
  });

  it('reads a known provider', () => {
    const factory = new LLMProviderFactory(new ConfigService({ LLM_PROVIDER: 'anthropic' }));

    expect(factory.getProvider()).toBe('anthropic');
    expect(factory.isProviderConfigured('anthropic')).toBe(false);
  });

  it('requires an API key for hosted providers', () => {
    const factory = new LLMProviderFactory(new ConfigService({}));

    expect(() => factory.createChatModel('openai')).toThrow(
      'OPENAI_API_KEY is required for OpenAI provider',
    );
  });

  it('builds the analysis model from configuration', () => {
    const factory = new LLMProviderFactory(
      new ConfigService({ LLM_PROVIDER: 'ollama', OLLAMA_CHAT_MODEL: 'test-model' }),
    );

    const model = factory.createAnalysisModel();

    expect(model).toBeInstanceOf(ChatOllama);
  });

  it('builds a failing stand-in when the hosted provider has no key', async () => {
    const factory = new LLMProviderFactory(new ConfigService({ LLM_PROVIDER: 'openai' }));

    const model = factory.createAnalysisModel();

    expect(model).toBeInstanceOf(UnavailableChatModel);
    await expect(model.invoke('Summarize this document')).rejects.toBeInstanceOf(
      ProviderError,
    );
  });
});

describe('EmbeddingProviderFactory', () => {
  it('resolves the model for the configured provider', () => {
    const factory = new EmbeddingProviderFactory(
      new ConfigService({ EMBEDDING_PROVIDER: 'openai', EMBEDDING_MODEL_OPENAI: 'text-embedding-3-large' }),
    );

    expect(factory.getProviderConfig()).toEqual({
      provider: 'openai',
      model: 'text-embedding-3-large',
      baseURL: undefined,
    });
  });

  it('defaults to ollama', () => {
    const factory = new EmbeddingProviderFactory(new ConfigService({ EMBEDDING_PROVIDER: 'other' }));

    expect(factory.getProviderConfig()).toEqual({
      provider: 'ollama',
      model: 'bge-m3:567m',
      baseURL: 'http://localhost:11434',
    });
    expect(factory.createEmbeddingModel()).toBeInstanceOf(OllamaEmbeddings);
  });

  it('builds a failing stand-in when the hosted provider has no key', async () => {
    const factory = new EmbeddingProviderFactory(
      new ConfigService({ EMBEDDING_PROVIDER: 'google' }),
    );

    const embeddings = factory.createEmbeddingModel();

    expect(embeddings).toBeInstanceOf(UnavailableEmbeddings);
    await expect(embeddings.embedDocuments(['text'])).rejects.toThrow(
      'Provider call "embedDocuments" failed: google embeddings are not configured',
    );
  });
});
