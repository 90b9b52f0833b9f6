import { Test } from '@nestjs/testing';
import { ConfigModule } from '@nestjs/config';
import { ProvidersModule } from './providers.module';
import { CHAT_MODEL, EMBEDDING_MODEL } from './types';
import { UnavailableChatModel, UnavailableEmbeddings } from './unavailable-models';

describe('ProvidersModule', () => {
  const savedEnv = { ...process.env };

  beforeEach(() => {
    delete process.env.OPENAI_API_KEY;
  });

  afterAll(() => {
    process.env = savedEnv;
  });

  it('starts without API keys for hosted providers', async () => {
    const moduleRef = await Test.createTestingModule({
      imports: [
        ConfigModule.forRoot({
          isGlobal: true,
          ignoreEnvFile: true,
          load: [() => ({ LLM_PROVIDER: 'openai', EMBEDDING_PROVIDER: 'openai' })],
        }),
        ProvidersModule,
      ],
    }).compile();

    expect(moduleRef.get(CHAT_MODEL)).toBeInstanceOf(UnavailableChatModel);
    expect(moduleRef.get(EMBEDDING_MODEL)).toBeInstanceOf(UnavailableEmbeddings);
  });
});
